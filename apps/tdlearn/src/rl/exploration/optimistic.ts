import { PolicyError, ValidationError } from '../../utils/errors';
import { ExplorationStrategy } from '../types';

/**
 * Greedy selection with an optimistic floor: any action visited fewer than
 * `minVisits` times is valued at `optimisticReward`, which forces each action
 * to be tried a minimum number of times before its learned utility counts.
 */
export class OptimisticCountStrategy implements ExplorationStrategy {
  readonly name = 'optimistic';

  constructor(
    private readonly optimisticReward: number,
    private readonly minVisits: number
  ) {
    if (!Number.isFinite(optimisticReward)) {
      throw new ValidationError('Optimistic reward must be finite', { optimisticReward });
    }
    if (!Number.isInteger(minVisits) || minVisits < 0) {
      throw new ValidationError('Minimum visits must be a non-negative integer', { minVisits });
    }
  }

  /**
   * Utilities as seen by the selection, in `actions` order.
   */
  effectiveUtilities<A>(
    actions: readonly A[],
    utilities: ReadonlyMap<A, number>,
    visitCounts: ReadonlyMap<A, number>
  ): number[] {
    return actions.map(action =>
      (visitCounts.get(action) ?? 0) < this.minVisits
        ? this.optimisticReward
        : utilities.get(action) ?? 0
    );
  }

  select<A>(
    actions: readonly A[],
    utilities: ReadonlyMap<A, number>,
    _temperature: number,
    visitCounts: ReadonlyMap<A, number>
  ): A {
    if (actions.length === 0) {
      throw new PolicyError('Cannot select from an empty action set');
    }

    const values = this.effectiveUtilities(actions, utilities, visitCounts);

    // strict comparison keeps the first of equal maxima
    let best = 0;
    for (let i = 1; i < values.length; i++) {
      if (values[i] > values[best]) {
        best = i;
      }
    }

    return actions[best];
  }
}
