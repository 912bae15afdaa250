import { ValidationError } from '../utils/errors';
import { TemperatureFunction } from './types';

/**
 * Value returned once the schedule saturates, and the lowest temperature
 * softmax exploration will divide by.
 */
export const TEMPERATURE_FLOOR = 0.01;

/**
 * Exponential decay schedule: `initialTemperature / exp(n * alpha)`.
 *
 * When `exp(n * alpha)` overflows the schedule returns {@link TEMPERATURE_FLOOR}
 * instead of collapsing to zero.
 */
export function makeExponentialTemperature(
  initialTemperature: number,
  alpha: number
): TemperatureFunction {
  if (!(initialTemperature > 0) || !Number.isFinite(initialTemperature)) {
    throw new ValidationError('Initial temperature must be a positive number', { initialTemperature });
  }
  if (!(alpha >= 0) || !Number.isFinite(alpha)) {
    throw new ValidationError('Temperature decay must be a non-negative number', { alpha });
  }

  return (n: number): number => {
    if (!Number.isInteger(n) || n < 0) {
      throw new ValidationError('Temperature is defined for non-negative integer counts', { n });
    }

    const denominator = Math.exp(n * alpha);
    if (!Number.isFinite(denominator)) {
      return TEMPERATURE_FLOOR;
    }
    return initialTemperature / denominator;
  };
}
