import { describe, it, expect } from 'vitest';
import { Identifier, maxUnsigned } from './identifier.js';
import { ULID, SHORT_ULID, SLID } from './formats.js';
import { isLexidError, type LexidError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';

function caught(fn: () => unknown): LexidError {
  try {
    fn();
  } catch (err) {
    if (isLexidError(err)) return err;
    throw err;
  }
  throw new Error('expected a LexidError');
}

describe('formats', () => {
  it('should describe the three layouts', () => {
    expect([ULID.totalBits, ULID.byteLength, ULID.textLength]).toEqual([128, 16, 26]);
    expect([SHORT_ULID.totalBits, SHORT_ULID.byteLength, SHORT_ULID.textLength]).toEqual([56, 7, 12]);
    expect([SLID.totalBits, SLID.byteLength, SLID.textLength]).toEqual([64, 8, 16]);
  });
});

describe('Identifier', () => {
  describe('of', () => {
    it('should pack timestamp above randomness', () => {
      const id = Identifier.of(SLID, 0x170a3c1, BigInt(0x0203));
      expect(id.value).toBe(BigInt('0x00000170a3c10203'));
    });

    it('should reject a negative or too-wide timestamp', () => {
      expect(caught(() => Identifier.of(ULID, -1, BigInt(0))).code).toBe(ErrorCode.OUT_OF_RANGE);
      expect(caught(() => Identifier.of(ULID, 2 ** 48, BigInt(0))).code).toBe(ErrorCode.OUT_OF_RANGE);
    });

    it('should reject a fractional timestamp', () => {
      expect(caught(() => Identifier.of(ULID, 1.5, BigInt(0))).code).toBe(ErrorCode.INVALID_INPUT);
    });

    it('should reject randomness wider than the format', () => {
      expect(caught(() => Identifier.of(SLID, 0, BigInt(0x10000))).code).toBe(ErrorCode.OUT_OF_RANGE);
      expect(caught(() => Identifier.of(SHORT_ULID, 0, BigInt(256))).code).toBe(ErrorCode.OUT_OF_RANGE);
      expect(caught(() => Identifier.of(ULID, 0, BigInt(-1))).code).toBe(ErrorCode.OUT_OF_RANGE);
    });

    it('should be frozen', () => {
      const id = Identifier.of(ULID, 1, BigInt(2));
      expect(Object.isFrozen(id)).toBe(true);
    });
  });

  describe('fromPacked', () => {
    it('should split the packed value', () => {
      const id = Identifier.fromPacked(ULID, (BigInt(1700000000000) << BigInt(80)) | BigInt(42));
      expect(id.timestamp).toBe(1700000000000);
      expect(id.randomness).toBe(BigInt(42));
    });

    it('should reject values wider than the format', () => {
      expect(caught(() => Identifier.fromPacked(SLID, maxUnsigned(64) + BigInt(1))).code).toBe(
        ErrorCode.OUT_OF_RANGE
      );
    });
  });

  describe('prime', () => {
    it('should read the seed bits of the layout', () => {
      expect(Identifier.of(SLID, 0, BigInt(0xab07)).prime).toBe(0xab);
      expect(Identifier.of(SHORT_ULID, 0, BigInt(0xa5)).prime).toBe(0xa);
    });

    it('should be undefined without a seed', () => {
      expect(Identifier.of(ULID, 0, BigInt(0xff)).prime).toBeUndefined();
    });

    it('should follow a replaced layout', () => {
      const id = Identifier.of(ULID, 0, BigInt(0x7f) << BigInt(72)).withLayout({ seedBits: 8 });
      expect(id.prime).toBe(0x7f);
    });

    it('should reject an impossible layout', () => {
      expect(caught(() => Identifier.of(SLID, 0, BigInt(0)).withLayout({ seedBits: 17 })).code).toBe(
        ErrorCode.INVALID_INPUT
      );
    });

    it('should reject an impossible layout when building from fields or packed values', () => {
      expect(caught(() => Identifier.of(SLID, 1, BigInt(0x0203), { seedBits: 20 })).code).toBe(
        ErrorCode.INVALID_INPUT
      );
      expect(caught(() => Identifier.of(SLID, 1, BigInt(0x0203), { seedBits: 4.5 })).code).toBe(
        ErrorCode.INVALID_INPUT
      );
      expect(caught(() => Identifier.fromPacked(SLID, BigInt(1), { seedBits: -1 })).code).toBe(
        ErrorCode.INVALID_INPUT
      );
    });

    it('should accept a seed that fills the whole field', () => {
      expect(Identifier.of(SLID, 1, BigInt(0x0203), { seedBits: 16 }).prime).toBe(0x0203);
    });
  });

  describe('ordering', () => {
    it('should order by timestamp before randomness', () => {
      const early = Identifier.of(ULID, 1000, maxUnsigned(80));
      const late = Identifier.of(ULID, 1001, BigInt(0));
      expect(early.compareTo(late)).toBe(-1);
      expect(late.compareTo(early)).toBe(1);
      expect(early.compareTo(early)).toBe(0);
    });

    it('should compare equal by format and value', () => {
      const a = Identifier.of(SLID, 5, BigInt(7));
      expect(a.equals(Identifier.fromPacked(SLID, a.value))).toBe(true);
      expect(a.equals(Identifier.of(SLID, 5, BigInt(8)))).toBe(false);
    });
  });

  describe('toString', () => {
    it('should print canonical text', () => {
      const id = Identifier.of(ULID, 1700000000000, BigInt('0x0123456789abcdef0123'));
      expect(id.toString()).toBe('01HF7YAT0004HMASW9NF6YY093');
      expect(JSON.stringify({ id })).toBe('{"id":"01HF7YAT0004HMASW9NF6YY093"}');
    });
  });
});
