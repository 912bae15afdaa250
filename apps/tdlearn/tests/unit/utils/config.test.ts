/**
 * Configuration Tests
 */

import { CONFIG, getConfig, validateConfig } from '../../../src/utils/config';
import { ConfigurationError } from '../../../src/utils/errors';

describe('config', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe('getConfig', () => {
    it('should fall back to the defaults', () => {
      // Act
      const config = getConfig();

      // Assert
      expect(config.rl.learner).toBe(CONFIG.rl.learner);
      expect(config.rl.exploration).toBe('softmax');
      expect(config.rl.discountFactor).toBe(0.9);
      expect(config.rl.initialTemperature).toBe(1);
      expect(config.rl.temperatureDecay).toBe(0.01);
      expect(config.rl.minVisits).toBe(3);
      expect(config.rl.seed).toBeUndefined();
    });

    it('should apply environment overrides', () => {
      // Arrange
      process.env.TDLEARN_LEARNER = 'sarsa';
      process.env.TDLEARN_EXPLORATION = 'optimistic';
      process.env.TDLEARN_DISCOUNT = '0.5';
      process.env.TDLEARN_MIN_VISITS = '7';
      process.env.TDLEARN_SEED = 'run-42';

      // Act
      const config = getConfig();

      // Assert
      expect(config.rl.learner).toBe('sarsa');
      expect(config.rl.exploration).toBe('optimistic');
      expect(config.rl.discountFactor).toBe(0.5);
      expect(config.rl.minVisits).toBe(7);
      expect(config.rl.seed).toBe('run-42');
    });

    it('should reject out of range overrides', () => {
      process.env.TDLEARN_DISCOUNT = '2';

      expect(() => getConfig()).toThrow(ConfigurationError);
    });

    it('should reject non-numeric overrides', () => {
      process.env.TDLEARN_MIN_VISITS = 'many';

      expect(() => getConfig()).toThrow(ConfigurationError);
    });

    it('should leave logging settings out of validation', () => {
      // Arrange - the logger falls back to INFO for unknown levels
      process.env.LOG_LEVEL = 'verbose';

      // Act
      const config = getConfig();

      // Assert
      expect(Object.keys(config)).toEqual(['rl']);
      expect(config.rl.discountFactor).toBe(0.9);
    });

    it('should reject unknown learner kinds', () => {
      process.env.TDLEARN_LEARNER = 'monte-carlo';

      expect(() => getConfig()).toThrow(ConfigurationError);
    });
  });

  describe('validateConfig', () => {
    it('should list every invalid field', () => {
      // Arrange
      const raw = {
        rl: { ...CONFIG.rl, discountFactor: 0, minVisits: -1 },
      };

      // Act
      let caught: unknown;
      try {
        validateConfig(raw);
      } catch (error) {
        caught = error;
      }

      // Assert
      expect(caught).toBeInstanceOf(ConfigurationError);
      const details = caught instanceof ConfigurationError ? caught.details : undefined;
      expect(Array.isArray(details) ? details.length : 0).toBe(2);
    });
  });
});
