/**
 * tdlearn Error Classes
 *
 * Typed errors raised by the learning core.
 */

/**
 * Base library error
 */
export class TDLearnError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'TDLearnError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
      timestamp: Date.now(),
    };
  }
}

/**
 * Invalid argument or option
 */
export class ValidationError extends TDLearnError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Invalid configuration
 */
export class ConfigurationError extends TDLearnError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Misuse of the step/reward protocol
 */
export class PolicyError extends TDLearnError {
  constructor(message: string, details?: unknown) {
    super(message, 'POLICY_ERROR', details);
    this.name = 'PolicyError';
  }
}

/**
 * Type guard for TDLearnError
 */
export const isTDLearnError = (error: unknown): error is TDLearnError => {
  return error instanceof TDLearnError;
};

/**
 * Normalize anything thrown into a TDLearnError
 */
export const handleError = (error: unknown): TDLearnError => {
  if (isTDLearnError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new TDLearnError(error.message, 'UNKNOWN_ERROR', {
      originalError: error.name,
    });
  }

  return new TDLearnError('An unknown error occurred', 'UNKNOWN_ERROR', {
    originalError: String(error),
  });
};
