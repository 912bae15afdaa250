export { Learner } from './learner';
export { TDLearner } from './td-learner';
export { SarsaLearner } from './sarsa-learner';
export { QTable } from './q-table';
export { VisitCounter } from './visit-counter';
export { OptimisticCountStrategy } from './exploration/optimistic';
export { SoftmaxStrategy } from './exploration/softmax';
export { makeExponentialTemperature, TEMPERATURE_FLOOR } from './temperature';
export { random, seedRandom, resetRandom, createRandom } from './random';
export { createLearner, createExploration, createLearnerFromConfig } from './factory';
export { PerformanceCounter } from './performance-counter';

export * from './types';
