/**
 * Puffdown Error Classes - Typed Error Handling
 *
 * Expected user mistakes (bad answers, answering with no wizard running)
 * are not errors: the engine answers them with a reply. Everything in this
 * module is for conditions the caller has to deal with.
 *
 * @module errors
 */

export interface ErrorDetails {
  [key: string]: unknown;
}

export interface ErrorJSON {
  name: string;
  code: string;
  message: string;
  details: ErrorDetails;
  timestamp: string;
  stack?: string;
}

/**
 * Base error class for all Puffdown errors
 */
export class PuffdownError extends Error {
  code: string;
  details: ErrorDetails;
  timestamp: string;

  constructor(message: string, code = 'PUFFDOWN_ERROR', details: ErrorDetails = {}) {
    super(message);
    this.name = 'PuffdownError';
    this.code = code;
    this.details = details;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): ErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when the session database cannot be read or written.
 * The session is left in its last committed state.
 */
export class PersistenceError extends PuffdownError {
  operation: string;

  constructor(operation: string, message: string, details: ErrorDetails = {}) {
    super(`Session store ${operation} failed: ${message}`, 'PERSISTENCE_ERROR', {
      operation,
      ...details,
    });
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

/**
 * Error thrown when a question catalog definition is malformed
 */
export class CatalogConfigurationError extends PuffdownError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(`Invalid question catalog: ${message}`, 'CATALOG_CONFIG_ERROR', details);
    this.name = 'CatalogConfigurationError';
  }
}

/**
 * Error thrown when a step index falls outside the catalog
 */
export class StepIndexError extends PuffdownError {
  index: number;

  constructor(index: number, stepCount: number) {
    super(`Step ${index} is outside [0, ${stepCount})`, 'STEP_OUT_OF_RANGE', {
      index,
      stepCount,
    });
    this.name = 'StepIndexError';
    this.index = index;
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends PuffdownError {
  configKey: string;

  constructor(configKey: string, message: string, details: ErrorDetails = {}) {
    super(`Configuration error for '${configKey}': ${message}`, 'CONFIG_ERROR', {
      configKey,
      ...details,
    });
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}

export const ErrorCodes = {
  PERSISTENCE_ERROR: 'PERSISTENCE_ERROR',
  CATALOG_CONFIG_ERROR: 'CATALOG_CONFIG_ERROR',
  STEP_OUT_OF_RANGE: 'STEP_OUT_OF_RANGE',
  CONFIG_ERROR: 'CONFIG_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

/**
 * Helper function to wrap unknown errors
 */
export function wrapError(error: unknown, context = 'Unknown operation'): PuffdownError {
  if (error instanceof PuffdownError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new PuffdownError(`${context}: ${message}`, 'INTERNAL_ERROR', {
    originalError: message,
    originalStack: stack,
  });
}

/**
 * Helper function to check if an error is a Puffdown error
 */
export function isPuffdownError(error: unknown): error is PuffdownError {
  return error instanceof PuffdownError;
}
