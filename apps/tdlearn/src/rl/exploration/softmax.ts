import { PolicyError } from '../../utils/errors';
import { random as sharedRandom } from '../random';
import { TEMPERATURE_FLOOR } from '../temperature';
import { ExplorationStrategy, RandomSource } from '../types';

const bounds = (values: readonly number[]): { min: number; max: number } => {
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max };
};

/**
 * Boltzmann exploration over min-max normalized utilities.
 *
 * Low temperatures concentrate probability on the best action, high
 * temperatures flatten the distribution toward uniform. When every candidate
 * has the same utility the choice is uniform.
 */
export class SoftmaxStrategy implements ExplorationStrategy {
  readonly name = 'softmax';

  constructor(private readonly random: RandomSource = sharedRandom) {}

  /**
   * Selection probabilities in `actions` order.
   */
  probabilities<A>(
    actions: readonly A[],
    utilities: ReadonlyMap<A, number>,
    temperature: number
  ): number[] {
    const values = actions.map(action => utilities.get(action) ?? 0);
    const { min, max } = bounds(values);

    if (max === min) {
      return values.map(() => 1 / values.length);
    }

    const t = Math.max(temperature, TEMPERATURE_FLOOR);
    const weights = values.map(u => Math.exp((u - min) / (max - min) / t));
    const total = weights.reduce((sum, w) => sum + w, 0);
    return weights.map(w => w / total);
  }

  select<A>(
    actions: readonly A[],
    utilities: ReadonlyMap<A, number>,
    temperature: number,
    _visitCounts: ReadonlyMap<A, number>
  ): A {
    if (actions.length === 0) {
      throw new PolicyError('Cannot select from an empty action set');
    }

    const values = actions.map(action => utilities.get(action) ?? 0);
    const { min, max } = bounds(values);
    if (max === min) {
      return actions[Math.floor(this.random() * actions.length)];
    }

    const probs = this.probabilities(actions, utilities, temperature);
    const r = this.random();

    let cumulative = 0;
    for (let i = 0; i < actions.length; i++) {
      cumulative += probs[i];
      if (r < cumulative) {
        return actions[i];
      }
    }

    // rounding can leave the cumulative sum just below r
    return actions[actions.length - 1];
  }
}
