import { z } from 'zod';
import { PolicyError, ValidationError } from '../utils/errors';
import { createLogger, Logger } from '../utils/logger';
import { QTable } from './q-table';
import {
  ActionProvider,
  ExplorationStrategy,
  LearnerOptions,
  TemperatureFunction,
  TransitionUpdate,
} from './types';
import { VisitCounter } from './visit-counter';

const optionsSchema = z.object({
  discountFactor: z.number().gt(0).lte(1),
  name: z.string().min(1).optional(),
});

/**
 * Tabular temporal-difference learner.
 *
 * Drive it with one `step(percept)` per timestep and `setReward` after each
 * action. The update for a transition is deferred until the next `step`,
 * when the successor state and the action chosen there are known. A terminal
 * reward is written straight into the table without bootstrapping.
 *
 * Subclasses supply the update rule; `updateState` and `actions` are the
 * per-problem hooks.
 */
export abstract class Learner<S, A> {
  readonly name: string;
  readonly qTable: QTable<S, A | null>;
  readonly exploration: ExplorationStrategy;
  readonly discountFactor: number;
  readonly temperatureFunction: TemperatureFunction;

  protected readonly counter = new VisitCounter<S, A | null>();
  protected readonly logger: Logger;

  private readonly actionProvider?: ActionProvider<S, A>;
  private readonly seenStates = new Set<S>();
  private _trials = 0;
  private _lastState: S | null = null;
  private _lastAction: A | null = null;
  private _lastReward: number | null = null;

  constructor(options: LearnerOptions<S, A>) {
    const parsed = optionsSchema.safeParse({
      discountFactor: options.discountFactor,
      name: options.name,
    });
    if (!parsed.success) {
      throw new ValidationError('Invalid learner options', parsed.error.errors);
    }

    this.name = options.name ?? this.constructor.name;
    this.qTable = options.qTable ?? new QTable<S, A | null>();
    this.exploration = options.exploration;
    this.discountFactor = options.discountFactor;
    this.temperatureFunction = options.temperatureFunction;
    this.actionProvider = options.actions;
    this.logger = createLogger(this.name);
  }

  get trials(): number {
    return this._trials;
  }

  get lastState(): S | null {
    return this._lastState;
  }

  get lastAction(): A | null {
    return this._lastAction;
  }

  get lastReward(): number | null {
    return this._lastReward;
  }

  /**
   * States stepped into plus any others already in the table.
   */
  get knownStateCount(): number {
    let count = this.seenStates.size;
    for (const state of this.qTable.states()) {
      if (!this.seenStates.has(state)) count++;
    }
    return count;
  }

  visitCount(state: S, action: A | null): number {
    return this.counter.get(state, action);
  }

  /**
   * Turn a raw percept into a canonical state key. Identity by default.
   */
  updateState(percept: S): S {
    return percept;
  }

  /**
   * Actions available from `state`. Uses the `actions` option when given,
   * otherwise nothing is available; override per problem.
   */
  actions(state: S): readonly A[] {
    return this.actionProvider ? this.actionProvider(state) : [];
  }

  setReward(reward: number, terminal = false): void {
    this._lastReward = reward;
    if (!terminal) {
      return;
    }

    this._trials++;
    if (this._lastState === null) {
      this.logger.warn('Terminal reward before the first step, nothing to write', {
        reward,
        trials: this._trials,
      });
      return;
    }

    this.qTable.set(this._lastState, this._lastAction, reward);
    this.logger.debug('Trial finished', { trials: this._trials, reward });
  }

  step(percept: S): A | null {
    const previousState = this._lastState;
    const previousAction = this._lastAction;
    const reward = this._lastReward;

    if (previousState !== null && reward === null) {
      throw new PolicyError('No reward recorded for the pending transition; call setReward before step');
    }

    const state = this.updateState(percept);
    this.seenStates.add(state);
    const candidates = this.actions(state);

    const currentAction = candidates.length > 0
      ? this.exploration.select<A | null>(
          candidates,
          this.qTable.actionValues(state),
          this.temperatureFunction(this._trials),
          this.counter.forState(state)
        )
      : null;

    if (previousState !== null && reward !== null) {
      this.counter.increment(previousState, previousAction);
      this.updateRule(previousState, previousAction, reward, state, currentAction);
    }

    this._lastState = state;
    this._lastAction = currentAction;
    return currentAction;
  }

  /**
   * Learning rate for a pair visited `n` times, capped at 1.
   */
  learningRate(n: number): number {
    return Math.min(1, this.temperatureFunction(n));
  }

  /**
   * Forget the pending transition so the next `step` starts a fresh episode.
   * Trials, the table and visit counts are kept.
   */
  resetEpisode(): void {
    this._lastState = null;
    this._lastAction = null;
    this._lastReward = null;
  }

  /**
   * Move `Q[state][action]` toward `reward + discountFactor * target` by the
   * pair's learning rate and record the result.
   */
  protected applyUpdate(
    state: S,
    action: A | null,
    reward: number,
    nextState: S,
    nextAction: A | null,
    target: number
  ): TransitionUpdate<S, A> {
    const visitCount = this.counter.get(state, action);
    const learningRate = this.learningRate(visitCount);
    const oldValue = this.qTable.get(state, action);
    const tdError = reward + this.discountFactor * target - oldValue;
    const newValue = oldValue + learningRate * tdError;

    this.qTable.set(state, action, newValue);

    const update: TransitionUpdate<S, A> = {
      state,
      action,
      reward,
      nextState,
      nextAction,
      oldValue,
      newValue,
      tdError,
      learningRate,
      visitCount,
    };
    this.logger.debug('Q-value updated', update);
    return update;
  }

  abstract updateRule(
    state: S,
    action: A | null,
    reward: number,
    nextState: S,
    nextAction: A | null
  ): TransitionUpdate<S, A>;
}
