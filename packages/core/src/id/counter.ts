/**
 * Monotonic counters used in place of randomness.
 *
 * A CounterState is plain mutable state with no synchronization. A
 * PersistedCounter wraps one with a scoped lifecycle: its starting value is
 * read from a CounterStore on acquisition and the last issued value is
 * written back on release.
 */

import { counterReadFailed, invalidInput, storeClosed } from '../errors/factories.js';
import { isStorageError } from '../errors/error.js';
import { maxUnsigned } from './identifier.js';
import { silentLogger, type IdLogger, type IdMetricsCollector } from './telemetry.js';

const ZERO = BigInt(0);
const ONE = BigInt(1);

// ============================================================================
// Counter State
// ============================================================================

/**
 * Unsigned counter of fixed bit width that wraps to zero on overflow.
 *
 * Not safe for concurrent use: two callers that interleave `next()` on
 * shared memory can receive the same value.
 */
export class CounterState {
  readonly name: string;
  readonly width: number;
  private current: bigint;
  private readonly max: bigint;

  constructor(name: string, width: number, initial: bigint = ZERO) {
    if (!Number.isInteger(width) || width < 1) {
      throw invalidInput('counter width', width, 'positive integer');
    }
    const max = maxUnsigned(width);
    if (initial < ZERO || initial > max) {
      throw invalidInput('counter initial value', initial.toString(), `0..2^${width}-1`);
    }
    this.name = name;
    this.width = width;
    this.max = max;
    this.current = initial;
  }

  /** The value the next call will issue */
  get value(): bigint {
    return this.current;
  }

  /**
   * Issues the current value and advances: value = (value + 1) mod 2^width
   */
  next(): bigint {
    const issued = this.current;
    this.current = issued === this.max ? ZERO : issued + ONE;
    return issued;
  }
}

// ============================================================================
// Counter Store
// ============================================================================

/**
 * Persistence for named counter values.
 * Implementations are synchronous and single-writer per process.
 */
export interface CounterStore {
  /** Where the values live, for logs and errors */
  readonly location: string;

  /** Returns the stored value, or undefined if the counter was never written */
  read(name: string): bigint | undefined;

  write(name: string, value: bigint): void;

  close(): void;
}

/**
 * In-memory CounterStore; values survive only as long as the instance
 */
export class MemoryCounterStore implements CounterStore {
  readonly location = ':memory:';
  private readonly values: Map<string, bigint> = new Map();
  private closed = false;

  read(name: string): bigint | undefined {
    this.ensureOpen();
    return this.values.get(name);
  }

  write(name: string, value: bigint): void {
    this.ensureOpen();
    this.values.set(name, value);
  }

  close(): void {
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw storeClosed(this.location);
    }
  }
}

// ============================================================================
// Persisted Counter
// ============================================================================

export interface PersistedCounterOptions {
  logger?: IdLogger;
  metrics?: IdMetricsCollector;
}

/**
 * Counter whose state survives restarts through a CounterStore.
 *
 * The stored value is the last issued value; the first value issued after
 * acquisition is the stored value plus one (mod 2^width), or 0 when nothing
 * was stored. Not safe for concurrent use, and not safe for two processes
 * sharing one store.
 */
export class PersistedCounter {
  readonly state: CounterState;
  private readonly store: CounterStore;
  private readonly logger: IdLogger;
  private readonly metrics?: IdMetricsCollector;
  private lastIssued: bigint | undefined;
  private released = false;

  private constructor(
    store: CounterStore,
    state: CounterState,
    lastIssued: bigint | undefined,
    options: PersistedCounterOptions
  ) {
    this.store = store;
    this.state = state;
    this.lastIssued = lastIssued;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics;
  }

  /**
   * Reads the stored value and opens the counter scope.
   *
   * @throws StorageError (COUNTER_READ_FAILED) if the stored value is outside the counter width
   */
  static acquire(
    store: CounterStore,
    name: string,
    width: number,
    options: PersistedCounterOptions = {}
  ): PersistedCounter {
    let stored: bigint | undefined;
    try {
      stored = store.read(name);
    } catch (error) {
      if (isStorageError(error)) {
        throw error;
      }
      throw counterReadFailed(
        name,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined,
        { location: store.location }
      );
    }

    const max = maxUnsigned(width);
    if (stored !== undefined && (stored < ZERO || stored > max)) {
      throw counterReadFailed(name, `stored value ${stored} does not fit in ${width} bits`, undefined, {
        location: store.location,
      });
    }

    const initial = stored === undefined ? ZERO : stored === max ? ZERO : stored + ONE;
    (options.logger ?? silentLogger).log('debug', 'Persisted counter acquired', {
      counter: name,
      location: store.location,
      stored: stored?.toString(),
    });
    return new PersistedCounter(store, new CounterState(name, width, initial), stored, options);
  }

  get name(): string {
    return this.state.name;
  }

  /** The value the next call will issue */
  get value(): bigint {
    return this.state.value;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Issues the next value.
   *
   * @throws StorageError (STORE_CLOSED) after release
   */
  next(): bigint {
    if (this.released) {
      throw storeClosed(this.store.location, { counter: this.name });
    }
    const issued = this.state.next();
    this.lastIssued = issued;
    return issued;
  }

  /**
   * Writes the last issued value back. Idempotent; a counter that never
   * issued or loaded a value writes nothing.
   */
  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    if (this.lastIssued === undefined) {
      return;
    }

    this.store.write(this.name, this.lastIssued);
    this.metrics?.record({ type: 'counter_flushed', source: this.name, timestamp: new Date() });
    this.logger.log('debug', 'Persisted counter flushed', {
      counter: this.name,
      location: this.store.location,
      value: this.lastIssued.toString(),
    });
  }
}

/**
 * Runs `fn` with an acquired PersistedCounter and releases it on every exit path
 */
export function withPersistedCounter<T>(
  store: CounterStore,
  name: string,
  width: number,
  fn: (counter: PersistedCounter) => T,
  options: PersistedCounterOptions = {}
): T {
  const counter = PersistedCounter.acquire(store, name, width, options);
  try {
    return fn(counter);
  } finally {
    counter.release();
  }
}
