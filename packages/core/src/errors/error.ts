import {
  ErrorCode,
  DecodeErrorCode,
  ValidationErrorCode,
  InitializationErrorCode,
  StorageErrorCode,
} from './codes.js';

/**
 * Additional context for errors
 */
export interface ErrorDetails {
  /** Field or representation that caused the error */
  field?: string;
  /** The invalid value */
  value?: unknown;
  /** Expected format or value */
  expected?: unknown;
  /** Actual value received */
  actual?: unknown;
  /** Additional arbitrary context */
  [key: string]: unknown;
}

/**
 * Base error class for all lexid errors.
 * Provides structured error information with code, message, and details.
 */
export class LexidError extends Error {
  /** Machine-readable error code */
  readonly code: ErrorCode;
  /** Additional context about the error */
  readonly details: ErrorDetails;

  constructor(
    message: string,
    code: ErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message);
    this.name = 'LexidError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LexidError);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): {
    name: string;
    message: string;
    code: ErrorCode;
    details: ErrorDetails;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Error for malformed input to a codec conversion
 */
export class DecodeError extends LexidError {
  constructor(
    message: string,
    code: DecodeErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'DecodeError';
  }
}

/**
 * Error for invalid caller input or configuration
 */
export class ValidationError extends LexidError {
  constructor(
    message: string,
    code: ValidationErrorCode = ErrorCode.INVALID_INPUT,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Error raised when the host cannot be trusted to produce identifiers.
 * Never retried: construction is refused for the lifetime of the generator.
 */
export class FatalInitializationError extends LexidError {
  readonly fatal = true;

  constructor(
    message: string,
    code: InitializationErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'FatalInitializationError';
  }
}

/**
 * Error for persisted counter store operations
 */
export class StorageError extends LexidError {
  constructor(
    message: string,
    code: StorageErrorCode = ErrorCode.DATABASE_ERROR,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'StorageError';
  }
}

/**
 * Type guard to check if an error is a LexidError
 */
export function isLexidError(error: unknown): error is LexidError {
  return error instanceof LexidError;
}

/**
 * Type guard to check if an error is a DecodeError
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}

/**
 * Type guard to check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Type guard to check if an error is a FatalInitializationError
 */
export function isFatalInitializationError(error: unknown): error is FatalInitializationError {
  return error instanceof FatalInitializationError;
}

/**
 * Type guard to check if an error is a StorageError
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Type guard to check if an error has a specific error code
 */
export function hasErrorCode(
  error: unknown,
  code: ErrorCode
): error is LexidError {
  return isLexidError(error) && error.code === code;
}
