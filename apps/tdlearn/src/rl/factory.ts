import { AppConfig, ExplorationKind, getConfig, LearnerKind } from '../utils/config';
import { ConfigurationError } from '../utils/errors';
import { OptimisticCountStrategy } from './exploration/optimistic';
import { SoftmaxStrategy } from './exploration/softmax';
import { Learner } from './learner';
import { seedRandom } from './random';
import { SarsaLearner } from './sarsa-learner';
import { TDLearner } from './td-learner';
import { makeExponentialTemperature } from './temperature';
import { ActionProvider, ExplorationStrategy, LearnerOptions } from './types';

export function createLearner<S, A>(kind: LearnerKind, options: LearnerOptions<S, A>): Learner<S, A> {
  switch (kind) {
    case 'td':
      return new TDLearner<S, A>(options);
    case 'sarsa':
      return new SarsaLearner<S, A>(options);
    default:
      throw new ConfigurationError(`Unknown learner kind: ${String(kind)}`);
  }
}

export function createExploration(kind: ExplorationKind, config: AppConfig): ExplorationStrategy {
  switch (kind) {
    case 'softmax':
      return new SoftmaxStrategy();
    case 'optimistic':
      return new OptimisticCountStrategy(config.rl.optimisticReward, config.rl.minVisits);
    default:
      throw new ConfigurationError(`Unknown exploration strategy: ${String(kind)}`);
  }
}

/**
 * Build the learner described by the configuration. Seeds the shared random
 * source first when a seed is configured.
 */
export function createLearnerFromConfig<S, A>(
  actions: ActionProvider<S, A>,
  config: AppConfig = getConfig(),
  name?: string
): Learner<S, A> {
  if (config.rl.seed !== undefined) {
    seedRandom(config.rl.seed);
  }

  return createLearner<S, A>(config.rl.learner, {
    exploration: createExploration(config.rl.exploration, config),
    discountFactor: config.rl.discountFactor,
    temperatureFunction: makeExponentialTemperature(
      config.rl.initialTemperature,
      config.rl.temperatureDecay
    ),
    actions,
    name,
  });
}
