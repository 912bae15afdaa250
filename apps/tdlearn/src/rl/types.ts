import type { QTable } from './q-table';

/**
 * Maps a trial or visit count to a positive temperature.
 */
export type TemperatureFunction = (n: number) => number;

/**
 * Uniform draw in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Picks one action from a non-empty candidate list.
 */
export interface ExplorationStrategy {
  readonly name: string;
  select<A>(
    actions: readonly A[],
    utilities: ReadonlyMap<A, number>,
    temperature: number,
    visitCounts: ReadonlyMap<A, number>
  ): A;
}

/**
 * Legal actions for a state; an empty list means nothing can be done there.
 */
export type ActionProvider<S, A> = (state: S) => readonly A[];

export interface LearnerOptions<S, A> {
  exploration: ExplorationStrategy;
  discountFactor: number;         // (0, 1]
  temperatureFunction: TemperatureFunction;
  qTable?: QTable<S, A | null>;   // pre-seeded utilities
  actions?: ActionProvider<S, A>;
  name?: string;
}

/**
 * Result of applying an update rule to one (state, action) pair.
 */
export interface TransitionUpdate<S, A> {
  state: S;
  action: A | null;
  reward: number;
  nextState: S;
  nextAction: A | null;
  oldValue: number;
  newValue: number;
  tdError: number;
  learningRate: number;
  visitCount: number;
}

export interface LearnerStatistics {
  name: string;
  trials: number;
  accumulatedRewards: number[];
  knownStates: number[];
  temperatures: number[];
}
