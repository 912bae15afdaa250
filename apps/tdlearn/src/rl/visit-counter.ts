/**
 * Per (state, action) visit counts. Counts only ever increase.
 */
export class VisitCounter<S, A> {
  private readonly counts = new Map<S, Map<A, number>>();

  get(state: S, action: A): number {
    return this.counts.get(state)?.get(action) ?? 0;
  }

  /**
   * Returns the count after incrementing.
   */
  increment(state: S, action: A): number {
    let row = this.counts.get(state);
    if (!row) {
      row = new Map();
      this.counts.set(state, row);
    }
    const next = (row.get(action) ?? 0) + 1;
    row.set(action, next);
    return next;
  }

  forState(state: S): ReadonlyMap<A, number> {
    return this.counts.get(state) ?? new Map<A, number>();
  }
}
