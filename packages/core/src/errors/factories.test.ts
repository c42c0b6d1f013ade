import { describe, it, expect } from 'vitest';
import {
  invalidLength,
  invalidCharacter,
  outOfRange,
  invalidText,
  invalidInput,
  invalidConfig,
  unknownStrategy,
  integrityCheckFailed,
  timestampOverflow,
  counterReadFailed,
  counterWriteFailed,
  storeClosed,
} from './factories.js';
import { DecodeError, ValidationError, FatalInitializationError, StorageError } from './error.js';
import { ErrorCode } from './codes.js';

describe('Decode factories', () => {
  it('invalidLength should report expected and actual lengths', () => {
    const error = invalidLength('ULID bytes', 16, 15);

    expect(error).toBeInstanceOf(DecodeError);
    expect(error.code).toBe(ErrorCode.INVALID_LENGTH);
    expect(error.message).toBe('Invalid ULID bytes length: expected 16, got 15');
    expect(error.details).toEqual({ field: 'ULID bytes', expected: 16, actual: 15 });
  });

  it('invalidCharacter should report character and position', () => {
    const error = invalidCharacter('ULID text', 'U', 3);

    expect(error.code).toBe(ErrorCode.INVALID_CHARACTER);
    expect(error.message).toBe("Invalid ULID text character 'U' at position 3");
    expect(error.details).toEqual({ field: 'ULID text', value: 'U', position: 3 });
  });

  it('outOfRange should stringify bigint values', () => {
    const error = outOfRange('randomness', BigInt(256), 8);

    expect(error.code).toBe(ErrorCode.OUT_OF_RANGE);
    expect(error.message).toBe('Randomness out of range: 256 does not fit in 8 unsigned bits');
    expect(error.details.value).toBe('256');
    expect(error.details.expected).toBe('0 <= randomness < 2^8');
  });

  it('invalidText should truncate long values in the message', () => {
    const long = 'x'.repeat(80);
    const error = invalidText('hex numeral', long, '0x digits');

    expect(error.code).toBe(ErrorCode.INVALID_TEXT);
    expect(error.message).toBe(`Invalid hex numeral: ${'x'.repeat(47)}...`);
    expect(error.details.value).toBe(long);
  });
});

describe('Validation factories', () => {
  it('invalidInput should create INVALID_INPUT', () => {
    const error = invalidInput('step count', -1, 'non-negative integer');

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.code).toBe(ErrorCode.INVALID_INPUT);
    expect(error.message).toBe('Invalid step count: -1');
  });

  it('invalidConfig should name the key', () => {
    const error = invalidConfig('log_level', 'loud', ['debug', 'info']);

    expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
    expect(error.message).toBe('Invalid configuration value for log_level: loud');
    expect(error.details).toEqual({ field: 'log_level', value: 'loud', expected: ['debug', 'info'] });
  });

  it('unknownStrategy should list known strategies', () => {
    const error = unknownStrategy('fast', ['default', 'slid']);

    expect(error.code).toBe(ErrorCode.UNKNOWN_STRATEGY);
    expect(error.message).toBe('Unknown randomness strategy: fast');
    expect(error.details.expected).toEqual(['default', 'slid']);
  });
});

describe('Initialization factories', () => {
  it('integrityCheckFailed should list failed checks', () => {
    const error = integrityCheckFailed(['byte-order', 'entropy-source']);

    expect(error).toBeInstanceOf(FatalInitializationError);
    expect(error.code).toBe(ErrorCode.INTEGRITY_CHECK_FAILED);
    expect(error.message).toBe('System integrity check failed: byte-order, entropy-source');
    expect(error.fatal).toBe(true);
  });

  it('timestampOverflow should include the clock value', () => {
    const error = timestampOverflow(2 ** 48);

    expect(error.code).toBe(ErrorCode.TIMESTAMP_OVERFLOW);
    expect(error.message).toBe('Clock value 281474976710656 is not a 48-bit unsigned millisecond timestamp');
  });
});

describe('Storage factories', () => {
  it('counterReadFailed and counterWriteFailed should name the counter', () => {
    const read = counterReadFailed('local_lexical', 'not a number');
    const write = counterWriteFailed('local_lexical', 'EACCES');

    expect(read).toBeInstanceOf(StorageError);
    expect(read.code).toBe(ErrorCode.COUNTER_READ_FAILED);
    expect(read.message).toBe('Failed to read counter local_lexical: not a number');
    expect(read.details.counter).toBe('local_lexical');
    expect(write.code).toBe(ErrorCode.COUNTER_WRITE_FAILED);
    expect(write.message).toBe('Failed to write counter local_lexical: EACCES');
  });

  it('storeClosed should include the location', () => {
    const error = storeClosed('/tmp/counters');

    expect(error.code).toBe(ErrorCode.STORE_CLOSED);
    expect(error.message).toBe('Counter store is closed: /tmp/counters');
    expect(error.details).toEqual({ location: '/tmp/counters' });
  });
});
