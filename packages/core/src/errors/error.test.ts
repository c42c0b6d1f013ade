import { describe, it, expect } from 'vitest';
import {
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
} from './error.js';
import { ErrorCode } from './codes.js';

describe('LexidError', () => {
  describe('constructor', () => {
    it('should create error with required parameters', () => {
      const error = new LexidError('Test error', ErrorCode.INVALID_INPUT);

      expect(error.message).toBe('Test error');
      expect(error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(error.details).toEqual({});
      expect(error.name).toBe('LexidError');
    });

    it('should create error with details', () => {
      const details = { field: 'timestamp', value: -1 };
      const error = new LexidError('Test error', ErrorCode.OUT_OF_RANGE, details);

      expect(error.details).toEqual(details);
    });

    it('should create error with cause', () => {
      const cause = new Error('Original error');
      const error = new LexidError('Wrapped error', ErrorCode.DATABASE_ERROR, {}, cause);

      expect(error.cause).toBe(cause);
    });

    it('should extend Error', () => {
      const error = new LexidError('Test', ErrorCode.INVALID_TEXT);
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('toJSON', () => {
    it('should serialize error to JSON', () => {
      const error = new LexidError('Counter store is closed', ErrorCode.STORE_CLOSED, {
        location: ':memory:',
      });

      expect(error.toJSON()).toEqual({
        name: 'LexidError',
        message: 'Counter store is closed',
        code: 'STORE_CLOSED',
        details: { location: ':memory:' },
      });
    });

    it('should produce JSON-serializable output', () => {
      const error = new LexidError('Test', ErrorCode.INVALID_INPUT, { value: { nested: true } });
      const parsed = JSON.parse(JSON.stringify(error));

      expect(parsed.code).toBe('INVALID_INPUT');
      expect(parsed.details).toEqual({ value: { nested: true } });
    });
  });
});

describe('subclasses', () => {
  it('should name each subclass', () => {
    expect(new DecodeError('x', ErrorCode.INVALID_LENGTH).name).toBe('DecodeError');
    expect(new ValidationError('x').name).toBe('ValidationError');
    expect(new FatalInitializationError('x', ErrorCode.TIMESTAMP_OVERFLOW).name).toBe(
      'FatalInitializationError'
    );
    expect(new StorageError('x').name).toBe('StorageError');
  });

  it('should default ValidationError to INVALID_INPUT', () => {
    expect(new ValidationError('x').code).toBe(ErrorCode.INVALID_INPUT);
  });

  it('should default StorageError to DATABASE_ERROR', () => {
    expect(new StorageError('x').code).toBe(ErrorCode.DATABASE_ERROR);
  });

  it('should mark initialization errors as fatal', () => {
    const error = new FatalInitializationError('x', ErrorCode.INTEGRITY_CHECK_FAILED);
    expect(error.fatal).toBe(true);
  });

  it('should be instances of LexidError', () => {
    expect(new DecodeError('x', ErrorCode.INVALID_CHARACTER)).toBeInstanceOf(LexidError);
    expect(new StorageError('x')).toBeInstanceOf(LexidError);
  });
});

describe('type guards', () => {
  const decode = new DecodeError('x', ErrorCode.OUT_OF_RANGE);
  const validation = new ValidationError('x', ErrorCode.UNKNOWN_STRATEGY);
  const fatal = new FatalInitializationError('x', ErrorCode.INTEGRITY_CHECK_FAILED);
  const storage = new StorageError('x', ErrorCode.DATABASE_BUSY);

  it('should recognize each error type', () => {
    expect(isDecodeError(decode)).toBe(true);
    expect(isValidationError(validation)).toBe(true);
    expect(isFatalInitializationError(fatal)).toBe(true);
    expect(isStorageError(storage)).toBe(true);
  });

  it('should reject other error types', () => {
    expect(isDecodeError(validation)).toBe(false);
    expect(isValidationError(storage)).toBe(false);
    expect(isFatalInitializationError(decode)).toBe(false);
    expect(isStorageError(fatal)).toBe(false);
  });

  it('should recognize every subclass as LexidError', () => {
    for (const error of [decode, validation, fatal, storage]) {
      expect(isLexidError(error)).toBe(true);
    }
    expect(isLexidError(new Error('plain'))).toBe(false);
    expect(isLexidError('string')).toBe(false);
    expect(isLexidError(null)).toBe(false);
  });

  it('should match error codes', () => {
    expect(hasErrorCode(storage, ErrorCode.DATABASE_BUSY)).toBe(true);
    expect(hasErrorCode(storage, ErrorCode.DATABASE_ERROR)).toBe(false);
    expect(hasErrorCode(new Error('plain'), ErrorCode.DATABASE_BUSY)).toBe(false);
  });
});
