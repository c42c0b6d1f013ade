/**
 * Clock and entropy capabilities consumed by identifier construction.
 */

import { randomFillSync } from 'node:crypto';
import { timestampOverflow } from '../errors/factories.js';
import { MAX_TIMESTAMP_MS } from './formats.js';

/**
 * Supplies the current time in milliseconds since the Unix epoch
 */
export interface TimeSource {
  now(): number;
}

/**
 * Supplies random bytes on demand
 */
export interface EntropySource {
  bytes(length: number): Uint8Array;
}

/**
 * Checks that a clock reading is a 48-bit unsigned integer.
 *
 * @throws FatalInitializationError (TIMESTAMP_OVERFLOW) otherwise
 */
export function checkTimestamp(ms: number): number {
  if (!Number.isSafeInteger(ms) || ms < 0 || ms > MAX_TIMESTAMP_MS) {
    throw timestampOverflow(ms);
  }
  return ms;
}

/**
 * Wall-clock time source
 */
export const systemTimeSource: TimeSource = {
  now(): number {
    return checkTimestamp(Date.now());
  },
};

/**
 * Entropy from the operating system CSPRNG
 */
export const cryptoEntropySource: EntropySource = {
  bytes(length: number): Uint8Array {
    return randomFillSync(new Uint8Array(length));
  },
};

/**
 * Time source that returns a fixed, manually advanced value
 */
export class FixedTimeSource implements TimeSource {
  private current: number;

  constructor(start: number) {
    this.current = start;
  }

  now(): number {
    return checkTimestamp(this.current);
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms = 1): void {
    this.current += ms;
  }
}

/**
 * Entropy source that replays a byte pattern, cycling when exhausted
 */
export class SequenceEntropySource implements EntropySource {
  private readonly pattern: Uint8Array;
  private offset = 0;

  constructor(pattern: ArrayLike<number>) {
    this.pattern = Uint8Array.from(pattern);
  }

  bytes(length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
      out[i] = this.pattern.length === 0 ? 0 : this.pattern[this.offset % this.pattern.length];
      this.offset++;
    }
    return out;
  }
}
