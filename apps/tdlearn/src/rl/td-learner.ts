import { Learner } from './learner';
import { TransitionUpdate } from './types';

/**
 * Off-policy Q-learning: bootstraps from the best value at the successor
 * state, whatever action is actually taken there. Legal actions without an
 * entry count as 0.
 */
export class TDLearner<S, A> extends Learner<S, A> {
  updateRule(
    state: S,
    action: A | null,
    reward: number,
    nextState: S,
    nextAction: A | null
  ): TransitionUpdate<S, A> {
    const target = this.qTable.maxValue(nextState, this.actions(nextState));
    return this.applyUpdate(state, action, reward, nextState, nextAction, target);
  }
}
