/**
 * Error handling module for lexid
 *
 * Provides structured errors with codes, messages, and details
 * for consistent error handling across the codec, generator, and storage layers.
 */

// Error codes
export {
  ErrorCode,
  DecodeErrorCode,
  ValidationErrorCode,
  InitializationErrorCode,
  StorageErrorCode,
} from './codes.js';

// Error classes
export {
  LexidError,
  DecodeError,
  ValidationError,
  FatalInitializationError,
  StorageError,
  isLexidError,
  isDecodeError,
  isValidationError,
  isFatalInitializationError,
  isStorageError,
  hasErrorCode,
  type ErrorDetails,
} from './error.js';

// Factory functions
export {
  // Decode
  invalidLength,
  invalidCharacter,
  outOfRange,
  invalidText,
  // Validation
  invalidInput,
  invalidConfig,
  unknownStrategy,
  // Initialization
  integrityCheckFailed,
  timestampOverflow,
  // Storage
  counterReadFailed,
  counterWriteFailed,
  storeClosed,
} from './factories.js';
