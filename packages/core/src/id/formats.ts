/**
 * Identifier formats and bit layouts.
 *
 * Every format is a 48-bit millisecond timestamp followed by a randomness
 * field, packed big-endian with no padding.
 */

// ============================================================================
// Constants
// ============================================================================

/** Width of the timestamp field in every format */
export const TIMESTAMP_BITS = 48;

/** Largest representable timestamp (2^48 - 1 ms, ~10889 CE) */
export const MAX_TIMESTAMP_MS = 2 ** TIMESTAMP_BITS - 1;

/** Smallest representable timestamp */
export const MIN_TIMESTAMP_MS = 0;

// ============================================================================
// Types
// ============================================================================

/**
 * Format names
 */
export type FormatName = 'ulid' | 'short-ulid' | 'slid';

/**
 * Canonical text encodings
 */
export type TextEncoding = 'crockford' | 'hex';

/**
 * How the randomness field splits into a seed and a counter.
 * `seedBits` is 0 when the producing strategy has no one-time seed.
 */
export interface RandomnessLayout {
  readonly seedBits: number;
}

/**
 * Static description of an identifier format
 */
export interface IdentifierFormat {
  readonly name: FormatName;
  /** Label used in the debug form, e.g. `<ULID ...>` */
  readonly label: string;
  readonly timestampBits: number;
  readonly randomnessBits: number;
  /** timestampBits + randomnessBits */
  readonly totalBits: number;
  readonly byteLength: number;
  readonly encoding: TextEncoding;
  /** Length of the canonical text form */
  readonly textLength: number;
  /** Layout assumed when decoding without a known strategy */
  readonly defaultLayout: RandomnessLayout;
}

function defineFormat(
  name: FormatName,
  label: string,
  randomnessBits: number,
  encoding: TextEncoding,
  seedBits: number
): IdentifierFormat {
  const totalBits = TIMESTAMP_BITS + randomnessBits;
  return Object.freeze({
    name,
    label,
    timestampBits: TIMESTAMP_BITS,
    randomnessBits,
    totalBits,
    byteLength: totalBits / 8,
    encoding,
    textLength: encoding === 'crockford' ? Math.ceil(totalBits / 5) : totalBits / 4,
    defaultLayout: Object.freeze({ seedBits }),
  });
}

// ============================================================================
// Formats
// ============================================================================

/** 128-bit ULID: 48-bit timestamp + 80-bit randomness, 26 base-32 chars */
export const ULID = defineFormat('ulid', 'ULID', 80, 'crockford', 0);

/**
 * 56-bit short ULID: 48-bit timestamp + 8-bit randomness (seed nibble + counter nibble),
 * 12 base-32 chars. Not interchangeable with the 128-bit layout.
 */
export const SHORT_ULID = defineFormat('short-ulid', 'ShortULID', 8, 'crockford', 4);

/** 64-bit SLID: 48-bit timestamp + 16-bit randomness (seed byte + counter byte), 16 hex chars */
export const SLID = defineFormat('slid', 'SLID', 16, 'hex', 8);

/** All formats by name */
export const FORMATS: Readonly<Record<FormatName, IdentifierFormat>> = {
  ulid: ULID,
  'short-ulid': SHORT_ULID,
  slid: SLID,
};
