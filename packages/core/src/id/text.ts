/**
 * Fixed-width text encodings of unsigned integers:
 * Crockford base-32 (5 bits/char) and plain hexadecimal (4 bits/char).
 */

import { invalidCharacter, invalidLength, outOfRange } from '../errors/factories.js';

/** Crockford base-32 alphabet (no I, L, O, U) */
export const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

/** Lowercase hexadecimal alphabet */
export const HEX_ALPHABET = '0123456789abcdef';

const FIVE = BigInt(5);
const FIVE_BIT_MASK = BigInt(0x1f);
const ZERO = BigInt(0);

const CROCKFORD_INDEX: ReadonlyMap<string, number> = new Map(
  Array.from(CROCKFORD_ALPHABET, (char, index) => [char, index] as const)
);

// ============================================================================
// Crockford Base-32
// ============================================================================

/**
 * Encodes an unsigned integer as exactly `length` upper-case Crockford characters,
 * left-padded with '0'.
 */
export function encodeCrockford(value: bigint, length: number): string {
  let result = '';
  let remaining = value;
  for (let i = 0; i < length; i++) {
    result = CROCKFORD_ALPHABET.charAt(Number(remaining & FIVE_BIT_MASK)) + result;
    remaining >>= FIVE;
  }
  return result;
}

/**
 * Decodes `length` Crockford characters (any case) into an unsigned integer
 * that must fit in `bits`.
 */
export function decodeCrockford(text: string, length: number, bits: number): bigint {
  if (text.length !== length) {
    throw invalidLength('base-32 text', length, text.length, { value: text });
  }

  let value = ZERO;
  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);
    const digit = CROCKFORD_INDEX.get(char.toUpperCase());
    if (digit === undefined) {
      throw invalidCharacter('base-32', char, i, { value: text, expected: CROCKFORD_ALPHABET });
    }
    value = (value << FIVE) | BigInt(digit);
  }

  if (value >> BigInt(bits) !== ZERO) {
    throw outOfRange('base-32 value', value, bits, { text });
  }
  return value;
}

// ============================================================================
// Hexadecimal
// ============================================================================

/**
 * Encodes an unsigned integer as exactly `length` lower-case hex characters
 */
export function encodeHex(value: bigint, length: number): string {
  return value.toString(16).padStart(length, '0');
}

/**
 * Decodes exactly `length` hex characters (any case)
 */
export function decodeHex(text: string, length: number): bigint {
  if (text.length !== length) {
    throw invalidLength('hex text', length, text.length, { value: text });
  }

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);
    if (!HEX_ALPHABET.includes(char.toLowerCase())) {
      throw invalidCharacter('hex', char, i, { value: text, expected: HEX_ALPHABET });
    }
  }

  return BigInt(`0x${text}`);
}
