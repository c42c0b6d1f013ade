import { ErrorCode } from './codes.js';
import {
  DecodeError,
  ValidationError,
  FatalInitializationError,
  StorageError,
  type ErrorDetails,
} from './error.js';

// =============================================================================
// Decode Factories
// =============================================================================

/**
 * Creates a DecodeError for input of the wrong length
 */
export function invalidLength(
  field: string,
  expected: number,
  actual: number,
  details: ErrorDetails = {}
): DecodeError {
  return new DecodeError(
    `Invalid ${field} length: expected ${expected}, got ${actual}`,
    ErrorCode.INVALID_LENGTH,
    { field, expected, actual, ...details }
  );
}

/**
 * Creates a DecodeError for a character outside the alphabet
 */
export function invalidCharacter(
  field: string,
  character: string,
  position: number,
  details: ErrorDetails = {}
): DecodeError {
  return new DecodeError(
    `Invalid ${field} character '${character}' at position ${position}`,
    ErrorCode.INVALID_CHARACTER,
    { field, value: character, position, ...details }
  );
}

/**
 * Creates a DecodeError for an integer outside its field
 */
export function outOfRange(
  field: string,
  value: bigint | number,
  bits: number,
  details: ErrorDetails = {}
): DecodeError {
  return new DecodeError(
    `${capitalize(field)} out of range: ${truncateValue(value.toString())} does not fit in ${bits} unsigned bits`,
    ErrorCode.OUT_OF_RANGE,
    { field, value: value.toString(), expected: `0 <= ${field} < 2^${bits}`, ...details }
  );
}

/**
 * Creates a DecodeError for text that is not a numeral or debug form
 */
export function invalidText(
  field: string,
  value: string,
  expected: string,
  details: ErrorDetails = {}
): DecodeError {
  return new DecodeError(
    `Invalid ${field}: ${truncateValue(value)}`,
    ErrorCode.INVALID_TEXT,
    { field, value, expected, ...details }
  );
}

// =============================================================================
// Validation Factories
// =============================================================================

/**
 * Creates a ValidationError for invalid input
 */
export function invalidInput(
  field: string,
  value: unknown,
  expected: unknown,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid ${field}: ${truncateValue(value)}`,
    ErrorCode.INVALID_INPUT,
    { field, value, expected, ...details }
  );
}

/**
 * Creates a ValidationError for an invalid configuration value
 */
export function invalidConfig(
  key: string,
  value: unknown,
  expected: unknown,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid configuration value for ${key}: ${truncateValue(value)}`,
    ErrorCode.INVALID_CONFIG,
    { field: key, value, expected, ...details }
  );
}

/**
 * Creates a ValidationError for an unregistered strategy name
 */
export function unknownStrategy(
  name: string,
  known: readonly string[],
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Unknown randomness strategy: ${name}`,
    ErrorCode.UNKNOWN_STRATEGY,
    { field: 'strategy', value: name, expected: known, ...details }
  );
}

// =============================================================================
// Initialization Factories
// =============================================================================

/**
 * Creates a FatalInitializationError for failed integrity checks
 */
export function integrityCheckFailed(
  failed: readonly string[],
  details: ErrorDetails = {}
): FatalInitializationError {
  return new FatalInitializationError(
    `System integrity check failed: ${failed.join(', ')}`,
    ErrorCode.INTEGRITY_CHECK_FAILED,
    { failed, ...details }
  );
}

/**
 * Creates a FatalInitializationError for a clock value beyond 48 bits
 */
export function timestampOverflow(
  value: number,
  details: ErrorDetails = {}
): FatalInitializationError {
  return new FatalInitializationError(
    `Clock value ${value} is not a 48-bit unsigned millisecond timestamp`,
    ErrorCode.TIMESTAMP_OVERFLOW,
    { value, expected: '0 <= ms < 2^48', ...details }
  );
}

// =============================================================================
// Storage Factories
// =============================================================================

/**
 * Creates a StorageError for a counter that cannot be loaded
 */
export function counterReadFailed(
  name: string,
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Failed to read counter ${name}: ${message}`,
    ErrorCode.COUNTER_READ_FAILED,
    { counter: name, ...details },
    cause
  );
}

/**
 * Creates a StorageError for a counter that cannot be written back
 */
export function counterWriteFailed(
  name: string,
  message: string,
  cause?: Error,
  details: ErrorDetails = {}
): StorageError {
  return new StorageError(
    `Failed to write counter ${name}: ${message}`,
    ErrorCode.COUNTER_WRITE_FAILED,
    { counter: name, ...details },
    cause
  );
}

/**
 * Creates a StorageError for a store used after close
 */
export function storeClosed(location: string, details: ErrorDetails = {}): StorageError {
  return new StorageError(
    `Counter store is closed: ${location}`,
    ErrorCode.STORE_CLOSED,
    { location, ...details }
  );
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Capitalizes the first letter of a string
 */
function capitalize(str: string): string {
  return str.charAt(0).toUpperCase() + str.slice(1);
}

/**
 * Truncates a value for display in error messages
 */
function truncateValue(value: unknown, maxLength = 50): string {
  const str =
    typeof value === 'string'
      ? value
      : typeof value === 'bigint'
        ? value.toString()
        : JSON.stringify(value);
  if (str === undefined) {
    return String(value);
  }
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - 3) + '...';
}
