/**
 * Sparse state -> action -> utility table.
 *
 * Unknown pairs read as 0 and reading never creates entries, so
 * `stateCount` only grows when a value is written.
 */
export class QTable<S, A> {
  private readonly table = new Map<S, Map<A, number>>();

  /**
   * Build a table from `[state, [[action, value], ...]]` pairs.
   */
  static from<S, A>(
    entries: Iterable<readonly [S, Iterable<readonly [A, number]>]>
  ): QTable<S, A> {
    const qTable = new QTable<S, A>();
    for (const [state, actionValues] of entries) {
      for (const [action, value] of actionValues) {
        qTable.set(state, action, value);
      }
    }
    return qTable;
  }

  get(state: S, action: A): number {
    return this.table.get(state)?.get(action) ?? 0;
  }

  set(state: S, action: A, value: number): void {
    let row = this.table.get(state);
    if (!row) {
      row = new Map();
      this.table.set(state, row);
    }
    row.set(action, value);
  }

  has(state: S): boolean {
    return this.table.has(state);
  }

  /**
   * Recorded utilities for a state; empty when nothing was written there.
   */
  actionValues(state: S): ReadonlyMap<A, number> {
    return this.table.get(state) ?? new Map<A, number>();
  }

  actions(state: S): A[] {
    return [...this.actionValues(state).keys()];
  }

  /**
   * Best utility at a state over its recorded entries and `including`,
   * where an unrecorded action is worth 0. Returns 0 when both are empty.
   */
  maxValue(state: S, including: readonly A[] = []): number {
    const row = this.table.get(state);
    let best = -Infinity;
    if (row) {
      for (const value of row.values()) {
        if (value > best) best = value;
      }
    }
    for (const action of including) {
      const value = row?.get(action) ?? 0;
      if (value > best) best = value;
    }
    return best === -Infinity ? 0 : best;
  }

  states(): S[] {
    return [...this.table.keys()];
  }

  get stateCount(): number {
    return this.table.size;
  }
}
