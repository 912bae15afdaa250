/**
 * tdlearn Configuration
 *
 * Hyperparameter defaults, environment overrides and validation.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';

dotenv.config();

export const LEARNER_KINDS = ['td', 'sarsa'] as const;
export const EXPLORATION_KINDS = ['softmax', 'optimistic'] as const;

export type LearnerKind = (typeof LEARNER_KINDS)[number];
export type ExplorationKind = (typeof EXPLORATION_KINDS)[number];

/**
 * Main configuration object
 */
export const CONFIG = {
  /**
   * Learning hyperparameters
   */
  rl: {
    learner: 'td',
    exploration: 'softmax',
    discountFactor: 0.9,      // (0, 1]
    initialTemperature: 1.0,  // temperature at trial 0
    temperatureDecay: 0.01,   // alpha in initial / exp(n * alpha)
    optimisticReward: 1.0,    // utility assumed for under-visited actions
    minVisits: 3,             // visits before an action loses its optimistic value
    seed: undefined,
  },

  /**
   * Logging Configuration
   */
  logging: {
    level: process.env.LOG_LEVEL || 'info',  // debug, info, warn, error
    pretty: process.env.NODE_ENV !== 'production',
  },
} as const;

const configSchema = z.object({
  rl: z.object({
    learner: z.enum(LEARNER_KINDS),
    exploration: z.enum(EXPLORATION_KINDS),
    discountFactor: z.coerce.number().gt(0).lte(1),
    initialTemperature: z.coerce.number().positive(),
    temperatureDecay: z.coerce.number().nonnegative().finite(),
    optimisticReward: z.coerce.number().finite(),
    minVisits: z.coerce.number().int().nonnegative(),
    seed: z.string().min(1).optional(),
  }),
});

/**
 * Type-safe configuration access
 */
export type AppConfig = z.infer<typeof configSchema>;

/**
 * Validate a raw configuration; throws ConfigurationError listing every issue
 */
export const validateConfig = (config: unknown): AppConfig => {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError('Invalid configuration', result.error.errors);
  }
  return result.data;
};

/**
 * Learning configuration with environment overrides applied. Logging settings
 * are read by the logger itself from `CONFIG.logging`.
 */
export const getConfig = (): AppConfig => {
  const env = process.env;

  return validateConfig({
    rl: {
      learner: env.TDLEARN_LEARNER || CONFIG.rl.learner,
      exploration: env.TDLEARN_EXPLORATION || CONFIG.rl.exploration,
      discountFactor: env.TDLEARN_DISCOUNT || CONFIG.rl.discountFactor,
      initialTemperature: env.TDLEARN_TEMPERATURE || CONFIG.rl.initialTemperature,
      temperatureDecay: env.TDLEARN_TEMPERATURE_DECAY || CONFIG.rl.temperatureDecay,
      optimisticReward: env.TDLEARN_OPTIMISTIC_REWARD || CONFIG.rl.optimisticReward,
      minVisits: env.TDLEARN_MIN_VISITS || CONFIG.rl.minVisits,
      seed: env.TDLEARN_SEED || CONFIG.rl.seed,
    },
  });
};
