/**
 * Codec: bit-exact conversions between identifiers and their
 * byte, integer, canonical text, numeral and debug representations.
 *
 * All functions are pure. Every `from*` function throws a DecodeError on
 * malformed input and never returns a partially decoded identifier.
 */

import { invalidLength, invalidText, invalidInput } from '../errors/factories.js';
import {
  MAX_TIMESTAMP_MS,
  MIN_TIMESTAMP_MS,
  FORMATS,
  type IdentifierFormat,
  type RandomnessLayout,
} from './formats.js';
import { Identifier, maxUnsigned } from './identifier.js';
import { decodeCrockford, decodeHex } from './text.js';

const ZERO = BigInt(0);
const EIGHT = BigInt(8);
const BYTE_MASK = BigInt(0xff);

/** A representation produced by {@link primeFromTypeOf} */
export type Representation = bigint | Uint8Array | string;

/** Anything an identifier can be compared against */
export type Comparable = Identifier | bigint | number | Uint8Array | string;

const NUMERAL_PATTERNS = {
  hex: /^0x[0-9a-f]+$/i,
  oct: /^0o[0-7]+$/i,
  bin: /^0b[01]+$/i,
} as const;

type NumeralView = keyof typeof NUMERAL_PATTERNS;

const NUMERAL_PREFIXES: Record<NumeralView, string> = { hex: '0x', oct: '0o', bin: '0b' };

const NUMERAL_VIEWS: readonly NumeralView[] = ['hex', 'oct', 'bin'];

const REPR_PATTERN = /^<(\S+) (\S+)>$/;

// ============================================================================
// Bytes
// ============================================================================

/**
 * Big-endian byte sequence of fixed length (16 ULID, 7 short ULID, 8 SLID)
 */
export function toBytes(id: Identifier): Uint8Array {
  const bytes = new Uint8Array(id.format.byteLength);
  let remaining = id.value;
  for (let i = bytes.length - 1; i >= 0; i--) {
    bytes[i] = Number(remaining & BYTE_MASK);
    remaining >>= EIGHT;
  }
  return bytes;
}

/**
 * @throws DecodeError (INVALID_LENGTH) if the length does not match the format
 */
export function fromBytes(
  format: IdentifierFormat,
  bytes: Uint8Array,
  layout?: RandomnessLayout
): Identifier {
  if (bytes.length !== format.byteLength) {
    throw invalidLength(`${format.label} bytes`, format.byteLength, bytes.length);
  }
  let value = ZERO;
  for (const byte of bytes) {
    value = (value << EIGHT) | BigInt(byte);
  }
  return Identifier.fromPacked(format, value, layout);
}

// ============================================================================
// Integer
// ============================================================================

/**
 * The packed value as one unsigned integer
 */
export function toInt(id: Identifier): bigint {
  return id.value;
}

/**
 * @throws DecodeError (OUT_OF_RANGE) if negative or wider than the format
 */
export function fromInt(
  format: IdentifierFormat,
  value: bigint,
  layout?: RandomnessLayout
): Identifier {
  return Identifier.fromPacked(format, value, layout);
}

// ============================================================================
// Canonical Text
// ============================================================================

/**
 * Canonical text: upper-case Crockford base-32 (ULID, short ULID) or lower-case hex (SLID)
 */
export function toString(id: Identifier): string {
  return id.toString();
}

/**
 * Decodes canonical text, case-insensitively.
 *
 * @throws DecodeError on wrong length, a character outside the alphabet,
 * or a leading character that overflows the format width
 */
export function fromString(
  format: IdentifierFormat,
  text: string,
  layout?: RandomnessLayout
): Identifier {
  const value =
    format.encoding === 'crockford'
      ? decodeCrockford(text, format.textLength, format.totalBits)
      : decodeHex(text, format.textLength);
  return Identifier.fromPacked(format, value, layout);
}

// ============================================================================
// Numeral Views
// ============================================================================

function toNumeral(id: Identifier, view: NumeralView): string {
  const radix = view === 'hex' ? 16 : view === 'oct' ? 8 : 2;
  return NUMERAL_PREFIXES[view] + id.value.toString(radix);
}

function parseNumeral(text: string, view: NumeralView): bigint {
  const prefixed = text.toLowerCase().startsWith(NUMERAL_PREFIXES[view])
    ? text
    : NUMERAL_PREFIXES[view] + text;
  if (!NUMERAL_PATTERNS[view].test(prefixed)) {
    throw invalidText(`${view} numeral`, text, `${NUMERAL_PREFIXES[view]}-prefixed or bare ${view} digits`);
  }
  return BigInt(prefixed.toLowerCase());
}

/** `0x`-prefixed hexadecimal view of the integer form */
export function toHex(id: Identifier): string {
  return toNumeral(id, 'hex');
}

/** `0o`-prefixed octal view of the integer form */
export function toOct(id: Identifier): string {
  return toNumeral(id, 'oct');
}

/** `0b`-prefixed binary view of the integer form */
export function toBin(id: Identifier): string {
  return toNumeral(id, 'bin');
}

export function fromHex(format: IdentifierFormat, text: string, layout?: RandomnessLayout): Identifier {
  return Identifier.fromPacked(format, parseNumeral(text, 'hex'), layout);
}

export function fromOct(format: IdentifierFormat, text: string, layout?: RandomnessLayout): Identifier {
  return Identifier.fromPacked(format, parseNumeral(text, 'oct'), layout);
}

export function fromBin(format: IdentifierFormat, text: string, layout?: RandomnessLayout): Identifier {
  return Identifier.fromPacked(format, parseNumeral(text, 'bin'), layout);
}

// ============================================================================
// Debug Form
// ============================================================================

/**
 * Debug form, e.g. `<ULID 01ARZ3NDEKTSV4RRFFQ69G5FAV>`
 */
export function toRepr(id: Identifier): string {
  return `<${id.format.label} ${id.toString()}>`;
}

/**
 * Parses the debug form. The label must match the format.
 */
export function fromRepr(
  format: IdentifierFormat,
  text: string,
  layout?: RandomnessLayout
): Identifier {
  const match = REPR_PATTERN.exec(text);
  if (!match || match[1] !== format.label) {
    throw invalidText('debug form', text, `<${format.label} ...>`);
  }
  return fromString(format, match[2], layout);
}

// ============================================================================
// Fields
// ============================================================================

/**
 * Builds an identifier from its (timestamp, randomness) pair, bypassing any strategy.
 *
 * @throws DecodeError (OUT_OF_RANGE) if either field exceeds its width
 */
export function fromInterfaces(
  format: IdentifierFormat,
  timestamp: number,
  randomness: bigint,
  layout?: RandomnessLayout
): Identifier {
  return Identifier.of(format, timestamp, randomness, layout);
}

/**
 * The (timestamp, randomness) pair
 */
export function toInterfaces(id: Identifier): [timestamp: number, randomness: bigint] {
  return [id.timestamp, id.randomness];
}

/** The timestamp field as a Date */
export function toDate(id: Identifier): Date {
  return new Date(id.timestamp);
}

/** The timestamp field in (fractional) seconds */
export function toSeconds(id: Identifier): number {
  return id.timestamp / 1000;
}

export function fromDate(
  format: IdentifierFormat,
  date: Date,
  randomness: bigint,
  layout?: RandomnessLayout
): Identifier {
  const ms = date.getTime();
  if (Number.isNaN(ms)) {
    throw invalidInput('date', String(date), 'valid Date');
  }
  return Identifier.of(format, ms, randomness, layout);
}

export function fromSeconds(
  format: IdentifierFormat,
  seconds: number,
  randomness: bigint,
  layout?: RandomnessLayout
): Identifier {
  if (!Number.isFinite(seconds)) {
    throw invalidInput('seconds', seconds, 'finite number');
  }
  return Identifier.of(format, Math.trunc(seconds * 1000), randomness, layout);
}

// ============================================================================
// Bounds
// ============================================================================

/** Smallest identifier of a format (all zero bits) */
export function minIdentifier(format: IdentifierFormat): Identifier {
  return Identifier.of(format, MIN_TIMESTAMP_MS, ZERO);
}

/** Largest identifier of a format (all one bits) */
export function maxIdentifier(format: IdentifierFormat): Identifier {
  return Identifier.of(format, MAX_TIMESTAMP_MS, maxUnsigned(format.randomnessBits));
}

export const MIN_ULID = minIdentifier(FORMATS.ulid);
export const MAX_ULID = maxIdentifier(FORMATS.ulid);
export const MIN_SLID = minIdentifier(FORMATS.slid);
export const MAX_SLID = maxIdentifier(FORMATS.slid);

// ============================================================================
// Representation Matching
// ============================================================================

/**
 * Returns the representation of `id` that has the same shape as `sample`:
 * integers (bigint, number, Identifier) get the packed integer, byte arrays
 * get the bytes, and strings are matched by prefix (`0x` hex, `0o` octal,
 * `0b` binary, `<` debug form, anything else canonical text).
 *
 * Returns undefined when the sample's shape has no matching representation.
 */
export function primeFromTypeOf(id: Identifier, sample: unknown): Representation | undefined {
  if (sample instanceof Identifier || typeof sample === 'bigint' || typeof sample === 'number') {
    return id.value;
  }
  if (sample instanceof Uint8Array) {
    return toBytes(id);
  }
  if (typeof sample === 'string') {
    const view = numeralViewOf(sample);
    if (view) {
      return toNumeral(id, view);
    }
    if (sample.startsWith('<')) {
      return toRepr(id);
    }
    return id.toString();
  }
  return undefined;
}

function numeralViewOf(text: string): NumeralView | undefined {
  const prefix = text.slice(0, 2).toLowerCase();
  for (const view of NUMERAL_VIEWS) {
    if (NUMERAL_PREFIXES[view] === prefix) {
      return view;
    }
  }
  return undefined;
}

function sign(a: bigint, b: bigint): -1 | 0 | 1 {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareBytes(a: Uint8Array, b: Uint8Array): -1 | 0 | 1 {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}

function compareNumber(value: bigint, other: number): -1 | 0 | 1 {
  if (Number.isNaN(other)) {
    throw invalidInput('comparison value', other, 'number');
  }
  if (other === Infinity) return -1;
  if (other === -Infinity) return 1;
  const floor = Math.floor(other);
  const byFloor = sign(value, BigInt(floor));
  // value is an integer: equal to the floor of a fractional number means smaller
  return byFloor === 0 && floor !== other ? -1 : byFloor;
}

/**
 * Compares an identifier against a value in any representation, using the
 * representation of `id` chosen by {@link primeFromTypeOf}. Numerals compare
 * numerically; canonical text and debug forms compare case-insensitively.
 *
 * @throws DecodeError if a numeral-prefixed string has invalid digits
 */
export function compare(id: Identifier, other: Comparable): -1 | 0 | 1 {
  if (other instanceof Identifier) {
    return id.compareTo(other);
  }
  if (typeof other === 'bigint') {
    return sign(id.value, other);
  }
  if (typeof other === 'number') {
    return compareNumber(id.value, other);
  }
  if (other instanceof Uint8Array) {
    return compareBytes(toBytes(id), other);
  }

  const view = numeralViewOf(other);
  if (view) {
    return sign(id.value, parseNumeral(other, view));
  }
  const own = (other.startsWith('<') ? toRepr(id) : id.toString()).toUpperCase();
  const theirs = other.toUpperCase();
  return own < theirs ? -1 : own > theirs ? 1 : 0;
}

/**
 * Equality against a value in any representation
 */
export function equals(id: Identifier, other: Comparable): boolean {
  return compare(id, other) === 0;
}
