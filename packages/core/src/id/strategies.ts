/**
 * Randomness strategies: the ways of filling the non-timestamp bits.
 *
 * | Strategy           | Format     | Bits                                  | Safe across                  |
 * |--------------------|------------|---------------------------------------|------------------------------|
 * | default            | ulid       | 80 random                             | any concurrency              |
 * | runtime_lexical    | ulid       | 80-bit process counter from 0         | one thread                   |
 * | local_lexical      | ulid       | 80-bit counter kept in a CounterStore | one thread, restarts         |
 * | env_lexical        | ulid       | 8 process seed + 72 counter           | <= 256 processes             |
 * | thread_env_lexical | ulid       | 8 thread seed + 72 thread counter     | <= 256 threads               |
 * | short_env_lexical  | short-ulid | 4 process seed + 4 counter            | <= 16 processes              |
 * | slid               | slid       | 8 process seed + 8 counter            | <= 256 processes             |
 *
 * Counter strategies trade randomness for ordering within a millisecond;
 * the caller picks the one matching its concurrency topology.
 */

import { invalidInput } from '../errors/factories.js';
import { CounterState, type PersistedCounter } from './counter.js';
import {
  ULID,
  SHORT_ULID,
  SLID,
  type IdentifierFormat,
  type RandomnessLayout,
} from './formats.js';
import { SeedRegistry, workerThreadHandle, type ThreadHandleProvider } from './seeds.js';
import type { EntropySource } from './sources.js';

const ZERO = BigInt(0);
const EIGHT = BigInt(8);

// ============================================================================
// Types
// ============================================================================

export type StrategyName =
  | 'default'
  | 'runtime_lexical'
  | 'local_lexical'
  | 'env_lexical'
  | 'thread_env_lexical'
  | 'short_env_lexical'
  | 'slid';

export const STRATEGY_NAMES: readonly StrategyName[] = [
  'default',
  'runtime_lexical',
  'local_lexical',
  'env_lexical',
  'thread_env_lexical',
  'short_env_lexical',
  'slid',
];

/**
 * Checks if a value names a strategy
 */
export function isStrategyName(value: unknown): value is StrategyName {
  return STRATEGY_NAMES.some((name) => name === value);
}

/**
 * Produces the randomness field of one format
 */
export interface RandomnessStrategy {
  readonly name: StrategyName;
  readonly format: IdentifierFormat;
  readonly layout: RandomnessLayout;
  /** Next randomness value; may advance a counter, never fails */
  next(): bigint;
}

/**
 * Notified when a counter wraps back to zero
 */
export type CounterWrapListener = (counterName: string) => void;

/** Anything that issues counter values */
interface CounterLike {
  readonly name: string;
  /** The value the next call will issue */
  readonly value: bigint;
  next(): bigint;
}

// ============================================================================
// Process Scope
// ============================================================================

export interface ProcessScopeOptions {
  entropy: EntropySource;
  threadHandle?: ThreadHandleProvider;
}

/**
 * Owns the process-wide counters and seeds strategies close over.
 * Counters are created on first use and kept for the life of the scope.
 */
export class ProcessScope {
  readonly seeds: SeedRegistry;
  readonly threadHandle: ThreadHandleProvider;
  private readonly counters: Map<string, CounterState> = new Map();

  constructor(options: ProcessScopeOptions) {
    this.seeds = new SeedRegistry(options.entropy);
    this.threadHandle = options.threadHandle ?? workerThreadHandle;
  }

  /**
   * The process-wide counter with this name, created at 0 on first use
   */
  counter(name: string, width: number): CounterState {
    let counter = this.counters.get(name);
    if (!counter) {
      counter = new CounterState(name, width);
      this.counters.set(name, counter);
    } else if (counter.width !== width) {
      throw invalidInput('counter width', width, `${counter.width} (width of existing counter ${name})`);
    }
    return counter;
  }

  /**
   * The counter with this name owned by one thread handle
   */
  threadCounter(name: string, width: number, handle: number): CounterState {
    return this.counter(`${name}@${handle}`, width);
  }
}

// ============================================================================
// Strategy Factories
// ============================================================================

/**
 * 80 fresh random bits per call
 */
export function randomStrategy(entropy: EntropySource): RandomnessStrategy {
  const byteLength = ULID.randomnessBits / 8;
  return {
    name: 'default',
    format: ULID,
    layout: ULID.defaultLayout,
    next(): bigint {
      let value = ZERO;
      for (const byte of entropy.bytes(byteLength)) {
        value = (value << EIGHT) | BigInt(byte);
      }
      return value;
    },
  };
}

function counterStrategy(
  name: StrategyName,
  format: IdentifierFormat,
  seedBits: number,
  resolve: () => { seed: number; counter: CounterLike },
  onWrap?: CounterWrapListener
): RandomnessStrategy {
  const counterBits = BigInt(format.randomnessBits - seedBits);
  return {
    name,
    format,
    layout: Object.freeze({ seedBits }),
    next(): bigint {
      const { seed, counter } = resolve();
      const issued = counter.next();
      if (onWrap && counter.value === ZERO) {
        onWrap(counter.name);
      }
      return (BigInt(seed) << counterBits) | issued;
    },
  };
}

/**
 * 80-bit process counter starting at 0.
 * Unsynchronized: concurrent callers sharing the counter race on the increment.
 */
export function runtimeLexicalStrategy(
  counter: CounterState,
  onWrap?: CounterWrapListener
): RandomnessStrategy {
  assertWidth(counter, ULID.randomnessBits);
  return counterStrategy(
    'runtime_lexical',
    ULID,
    0,
    () => ({ seed: 0, counter }),
    onWrap
  );
}

/**
 * 80-bit counter that continues from a CounterStore.
 * Unsynchronized, and one process per store.
 */
export function localLexicalStrategy(
  counter: PersistedCounter,
  onWrap?: CounterWrapListener
): RandomnessStrategy {
  assertWidth(counter.state, ULID.randomnessBits);
  return counterStrategy(
    'local_lexical',
    ULID,
    0,
    () => ({ seed: 0, counter }),
    onWrap
  );
}

/**
 * Process seed byte over a 72-bit process counter
 */
export function envLexicalStrategy(
  scope: ProcessScope,
  onWrap?: CounterWrapListener
): RandomnessStrategy {
  const counter = scope.counter('env_lexical', 72);
  return counterStrategy(
    'env_lexical',
    ULID,
    8,
    () => ({ seed: scope.seeds.processByte(), counter }),
    onWrap
  );
}

/**
 * Thread seed byte over a 72-bit counter owned by the calling thread
 */
export function threadEnvLexicalStrategy(
  scope: ProcessScope,
  onWrap?: CounterWrapListener
): RandomnessStrategy {
  return counterStrategy(
    'thread_env_lexical',
    ULID,
    8,
    () => {
      const handle = scope.threadHandle();
      const counter = scope.threadCounter('thread_env_lexical', 72, handle);
      return { seed: scope.seeds.threadByte(handle), counter };
    },
    onWrap
  );
}

/**
 * Process seed nibble over a 4-bit counter; 8 bits in total
 */
export function shortEnvLexicalStrategy(
  scope: ProcessScope,
  onWrap?: CounterWrapListener
): RandomnessStrategy {
  const counter = scope.counter('short_env_lexical', 4);
  return counterStrategy(
    'short_env_lexical',
    SHORT_ULID,
    4,
    () => ({ seed: scope.seeds.processNibble(), counter }),
    onWrap
  );
}

/**
 * Process seed byte over an 8-bit counter; 16 bits in total
 */
export function slidStrategy(
  scope: ProcessScope,
  onWrap?: CounterWrapListener
): RandomnessStrategy {
  const counter = scope.counter('slid', 8);
  return counterStrategy(
    'slid',
    SLID,
    8,
    () => ({ seed: scope.seeds.processByte(), counter }),
    onWrap
  );
}

function assertWidth(counter: CounterState, width: number): void {
  if (counter.width !== width) {
    throw invalidInput('counter width', counter.width, width);
  }
}
