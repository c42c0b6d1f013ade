/**
 * Error codes for lexid.
 * Categorized by error type for consistent handling.
 */

/**
 * Decode error codes - malformed input to a codec conversion
 */
export const DecodeErrorCode = {
  /** Byte sequence or text has the wrong length */
  INVALID_LENGTH: 'INVALID_LENGTH',
  /** Character outside the encoding alphabet */
  INVALID_CHARACTER: 'INVALID_CHARACTER',
  /** Integer negative or wider than the field */
  OUT_OF_RANGE: 'OUT_OF_RANGE',
  /** Text that is not a numeral or debug form */
  INVALID_TEXT: 'INVALID_TEXT',
} as const;

export type DecodeErrorCode = typeof DecodeErrorCode[keyof typeof DecodeErrorCode];

/**
 * Validation error codes - caller input and configuration
 */
export const ValidationErrorCode = {
  /** General validation failure */
  INVALID_INPUT: 'INVALID_INPUT',
  /** Configuration value invalid */
  INVALID_CONFIG: 'INVALID_CONFIG',
  /** Strategy name not registered */
  UNKNOWN_STRATEGY: 'UNKNOWN_STRATEGY',
} as const;

export type ValidationErrorCode = typeof ValidationErrorCode[keyof typeof ValidationErrorCode];

/**
 * Initialization error codes - unrecoverable host or clock failures
 */
export const InitializationErrorCode = {
  /** Host failed a system integrity check */
  INTEGRITY_CHECK_FAILED: 'INTEGRITY_CHECK_FAILED',
  /** Clock value does not fit in 48 bits */
  TIMESTAMP_OVERFLOW: 'TIMESTAMP_OVERFLOW',
} as const;

export type InitializationErrorCode =
  typeof InitializationErrorCode[keyof typeof InitializationErrorCode];

/**
 * Storage error codes - persisted counter stores
 */
export const StorageErrorCode = {
  /** SQLite error */
  DATABASE_ERROR: 'DATABASE_ERROR',
  /** Database is busy/locked */
  DATABASE_BUSY: 'DATABASE_BUSY',
  /** Stored counter could not be read or parsed */
  COUNTER_READ_FAILED: 'COUNTER_READ_FAILED',
  /** Counter could not be written back */
  COUNTER_WRITE_FAILED: 'COUNTER_WRITE_FAILED',
  /** Store used after close */
  STORE_CLOSED: 'STORE_CLOSED',
} as const;

export type StorageErrorCode = typeof StorageErrorCode[keyof typeof StorageErrorCode];

/**
 * All error codes combined
 */
export const ErrorCode = {
  ...DecodeErrorCode,
  ...ValidationErrorCode,
  ...InitializationErrorCode,
  ...StorageErrorCode,
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];
