/**
 * Tutor Custom Error Classes
 *
 * Provides type-safe error handling across the engine.
 */

/**
 * Base engine error
 */
export class TutorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'TutorError';
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
 * Invalid argument passed by a caller (e.g. a negative mastery increment)
 */
export class InvalidArgumentError extends TutorError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_ARGUMENT', details);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * An oracle is missing, failed, or timed out.
 * Always recoverable through a local fallback.
 */
export class OracleUnavailableError extends TutorError {
  constructor(oracle: string, message: string, details?: unknown) {
    super(`${oracle} oracle unavailable: ${message}`, 'ORACLE_UNAVAILABLE', details);
    this.name = 'OracleUnavailableError';
  }
}

/**
 * Persisted trajectory or profile does not match its format
 */
export class CorruptDataError extends TutorError {
  constructor(message: string, details?: unknown) {
    super(message, 'CORRUPT_DATA', details);
    this.name = 'CorruptDataError';
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends TutorError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Non-fatal problem found while parsing a session log line
 */
export interface ParseWarning {
  lineNumber: number;
  line: string;
  reason: string;
}

/**
 * Type guard for TutorError
 */
export const isTutorError = (error: unknown): error is TutorError => {
  return error instanceof TutorError;
};

/**
 * Error handler utility
 */
export const handleError = (error: unknown): TutorError => {
  if (isTutorError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new TutorError(
      error.message,
      'UNKNOWN_ERROR',
      { originalError: error.name }
    );
  }

  return new TutorError(
    'An unknown error occurred',
    'UNKNOWN_ERROR',
    { originalError: String(error) }
  );
};

/**
 * Message of an unknown thrown value
 */
export const errorMessage = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
