export * from './rl';
export { displayStatistics, renderStatistics } from './cli/display/statistics';
export { CONFIG, getConfig, validateConfig } from './utils/config';
export type { AppConfig, LearnerKind, ExplorationKind } from './utils/config';
export { Logger, LogLevel, createLogger, logger } from './utils/logger';
export {
  TDLearnError,
  ValidationError,
  ConfigurationError,
  PolicyError,
  isTDLearnError,
  handleError,
} from './utils/errors';
