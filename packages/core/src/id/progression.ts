/**
 * Progression: stepping through the identifier space by packed integer value.
 *
 * Arithmetic is modulo 2^totalBits of the format, so stepping past the
 * largest identifier wraps to the smallest and vice versa. Stepped
 * identifiers keep the layout of the one they were derived from.
 */

import { invalidInput } from '../errors/factories.js';
import { Identifier } from './identifier.js';

const ZERO = BigInt(0);
const ONE = BigInt(1);

/**
 * Normalizes a step count to a non-negative bigint
 */
function toSteps(n: bigint | number): bigint {
  if (typeof n === 'number') {
    if (!Number.isSafeInteger(n) || n < 0) {
      throw invalidInput('step count', n, 'non-negative integer');
    }
    return BigInt(n);
  }
  if (n < ZERO) {
    throw invalidInput('step count', n.toString(), 'non-negative integer');
  }
  return n;
}

function step(id: Identifier, delta: bigint): Identifier {
  const value = BigInt.asUintN(id.format.totalBits, id.value + delta);
  return Identifier.fromPacked(id.format, value, id.layout);
}

/**
 * The identifier `n` positions after `id` (mod 2^totalBits)
 *
 * @throws ValidationError (INVALID_INPUT) if n is negative or not an integer
 */
export function forward(id: Identifier, n: bigint | number = ONE): Identifier {
  return step(id, toSteps(n));
}

/**
 * The identifier `n` positions before `id` (mod 2^totalBits)
 *
 * @throws ValidationError (INVALID_INPUT) if n is negative or not an integer
 */
export function backward(id: Identifier, n: bigint | number = ONE): Identifier {
  return step(id, -toSteps(n));
}

export function next(id: Identifier): Identifier {
  return forward(id, ONE);
}

export function previous(id: Identifier): Identifier {
  return backward(id, ONE);
}

// ============================================================================
// Sequences
// ============================================================================

/**
 * A lazy, restartable run of consecutive identifiers beginning at (and
 * including) its start. Iterating twice yields the same identifiers.
 * Without a count the run is unbounded and wraps around the format.
 */
export class IdentifierSequence implements Iterable<Identifier> {
  readonly start: Identifier;
  readonly count: bigint | undefined;
  readonly direction: 1 | -1;

  constructor(start: Identifier, count?: bigint | number, direction: 1 | -1 = 1) {
    this.start = start;
    this.count = count === undefined ? undefined : toSteps(count);
    this.direction = direction;
  }

  *[Symbol.iterator](): Iterator<Identifier> {
    let current = this.start;
    let emitted = ZERO;
    while (this.count === undefined || emitted < this.count) {
      yield current;
      emitted += ONE;
      current = this.direction === 1 ? next(current) : previous(current);
    }
  }

  /**
   * The same run stepping the other way from the same start
   */
  reversed(): IdentifierSequence {
    return new IdentifierSequence(this.start, this.count, this.direction === 1 ? -1 : 1);
  }

  /**
   * Collects at most `limit` identifiers; an unbounded sequence needs a limit
   */
  take(limit: number): Identifier[] {
    if (!Number.isSafeInteger(limit) || limit < 0) {
      throw invalidInput('limit', limit, 'non-negative integer');
    }
    const items: Identifier[] = [];
    if (limit === 0) {
      return items;
    }
    for (const id of this) {
      items.push(id);
      if (items.length >= limit) {
        break;
      }
    }
    return items;
  }
}

/**
 * Consecutive identifiers starting at `id`, ascending
 *
 * @example
 * ```typescript
 * const [a, b, c] = sequence(id, 3);  // a equals id, b = next(id), c = next(b)
 * ```
 */
export function sequence(id: Identifier, count?: bigint | number): IdentifierSequence {
  return new IdentifierSequence(id, count);
}
