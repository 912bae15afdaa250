import { Learner } from './learner';
import { TransitionUpdate } from './types';

/**
 * On-policy SARSA: bootstraps from the value of the action the policy
 * selected at the successor state.
 */
export class SarsaLearner<S, A> extends Learner<S, A> {
  updateRule(
    state: S,
    action: A | null,
    reward: number,
    nextState: S,
    nextAction: A | null
  ): TransitionUpdate<S, A> {
    const target = this.qTable.get(nextState, nextAction);
    return this.applyUpdate(state, action, reward, nextState, nextAction, target);
  }
}
