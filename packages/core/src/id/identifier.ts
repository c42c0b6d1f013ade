/**
 * Identifier value object.
 *
 * An identifier is a 48-bit millisecond timestamp and a randomness field
 * packed into one unsigned big-endian integer. Instances are immutable;
 * every derived identifier is a new instance.
 */

import { outOfRange, invalidInput } from '../errors/factories.js';
import type { IdentifierFormat, RandomnessLayout } from './formats.js';
import { encodeCrockford, encodeHex } from './text.js';

const ZERO = BigInt(0);
const ONE = BigInt(1);

/**
 * Returns 2^bits - 1
 */
export function maxUnsigned(bits: number): bigint {
  return (ONE << BigInt(bits)) - ONE;
}

/**
 * Checks that a timestamp is an integer in [0, 2^bits)
 */
function assertTimestamp(timestamp: number, bits: number): void {
  if (!Number.isSafeInteger(timestamp)) {
    throw invalidInput('timestamp', timestamp, 'integer milliseconds');
  }
  if (timestamp < 0 || BigInt(timestamp) > maxUnsigned(bits)) {
    throw outOfRange('timestamp', timestamp, bits);
  }
}

/**
 * Checks that an unsigned field fits in `bits`
 */
function assertUnsigned(field: string, value: bigint, bits: number): void {
  if (value < ZERO || value > maxUnsigned(bits)) {
    throw outOfRange(field, value, bits);
  }
}

/**
 * Checks that a layout's seed fits inside the randomness field
 */
function assertLayout(layout: RandomnessLayout, randomnessBits: number): void {
  if (!Number.isInteger(layout.seedBits) || layout.seedBits < 0 || layout.seedBits > randomnessBits) {
    throw invalidInput('layout.seedBits', layout.seedBits, `0..${randomnessBits}`);
  }
}

export class Identifier {
  readonly format: IdentifierFormat;
  /** Milliseconds since the Unix epoch */
  readonly timestamp: number;
  readonly randomness: bigint;
  readonly layout: RandomnessLayout;

  private constructor(
    format: IdentifierFormat,
    timestamp: number,
    randomness: bigint,
    layout: RandomnessLayout
  ) {
    this.format = format;
    this.timestamp = timestamp;
    this.randomness = randomness;
    this.layout = layout;
    Object.freeze(this);
  }

  /**
   * Builds an identifier from its two fields.
   *
   * @throws DecodeError (OUT_OF_RANGE) if either field exceeds its width
   */
  static of(
    format: IdentifierFormat,
    timestamp: number,
    randomness: bigint,
    layout: RandomnessLayout = format.defaultLayout
  ): Identifier {
    assertTimestamp(timestamp, format.timestampBits);
    assertUnsigned('randomness', randomness, format.randomnessBits);
    assertLayout(layout, format.randomnessBits);
    return new Identifier(format, timestamp, randomness, layout);
  }

  /**
   * Builds an identifier from its packed integer value.
   *
   * @throws DecodeError (OUT_OF_RANGE) if the value is negative or wider than the format
   */
  static fromPacked(
    format: IdentifierFormat,
    value: bigint,
    layout: RandomnessLayout = format.defaultLayout
  ): Identifier {
    assertUnsigned('integer', value, format.totalBits);
    assertLayout(layout, format.randomnessBits);
    const randomnessBits = BigInt(format.randomnessBits);
    const timestamp = Number(value >> randomnessBits);
    const randomness = value & maxUnsigned(format.randomnessBits);
    return new Identifier(format, timestamp, randomness, layout);
  }

  /**
   * The packed value: timestamp and randomness concatenated big-endian
   */
  get value(): bigint {
    return (BigInt(this.timestamp) << BigInt(this.format.randomnessBits)) | this.randomness;
  }

  /**
   * The one-time seed portion of the randomness field (top `layout.seedBits` bits),
   * or undefined when the producing strategy has no seed.
   */
  get prime(): number | undefined {
    const { seedBits } = this.layout;
    if (seedBits === 0) {
      return undefined;
    }
    return Number(this.randomness >> BigInt(this.format.randomnessBits - seedBits));
  }

  /**
   * Returns a copy carrying a different seed layout (same bits)
   */
  withLayout(layout: RandomnessLayout): Identifier {
    assertLayout(layout, this.format.randomnessBits);
    return new Identifier(this.format, this.timestamp, this.randomness, layout);
  }

  /**
   * Equality of format and packed value
   */
  equals(other: Identifier): boolean {
    return this.format.name === other.format.name && this.value === other.value;
  }

  /**
   * Unsigned comparison of packed values; identifiers of different formats
   * compare by format width first.
   */
  compareTo(other: Identifier): -1 | 0 | 1 {
    if (this.format.totalBits !== other.format.totalBits) {
      return this.format.totalBits < other.format.totalBits ? -1 : 1;
    }
    const a = this.value;
    const b = other.value;
    return a < b ? -1 : a > b ? 1 : 0;
  }

  /**
   * Canonical text: upper-case Crockford base-32, or lower-case hex for SLID
   */
  toString(): string {
    return this.format.encoding === 'crockford'
      ? encodeCrockford(this.value, this.format.textLength)
      : encodeHex(this.value, this.format.textLength);
  }

  toJSON(): string {
    return this.toString();
  }
}
