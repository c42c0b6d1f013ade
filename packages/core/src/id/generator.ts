/**
 * Identifier Generation
 *
 * Constructs identifiers from a clock reading and a randomness strategy:
 * - Integrity checks run once before the first generator is usable
 * - Strategies are built on first use and cached per generator
 * - Process-wide counters and seeds live in a shared ProcessScope
 * - The local_lexical counter is acquired from a CounterStore and
 *   written back on close
 */

import { invalidConfig, storeClosed, unknownStrategy } from '../errors/factories.js';
import { PersistedCounter, type CounterStore } from './counter.js';
import { Identifier } from './identifier.js';
import { defaultIntegrityGate, type IntegrityGate } from './integrity.js';
import {
  checkTimestamp,
  cryptoEntropySource,
  systemTimeSource,
  type EntropySource,
  type TimeSource,
} from './sources.js';
import {
  ProcessScope,
  STRATEGY_NAMES,
  isStrategyName,
  randomStrategy,
  runtimeLexicalStrategy,
  localLexicalStrategy,
  envLexicalStrategy,
  threadEnvLexicalStrategy,
  shortEnvLexicalStrategy,
  slidStrategy,
  type CounterWrapListener,
  type RandomnessStrategy,
  type StrategyName,
} from './strategies.js';
import { silentLogger, type IdLogger, type IdMetricsCollector } from './telemetry.js';

// ============================================================================
// Constants
// ============================================================================

/** Counter name used for local_lexical when none is configured */
export const DEFAULT_LOCAL_COUNTER = 'local_lexical';

/** Strategy used by `construct()` when none is configured */
export const DEFAULT_STRATEGY: StrategyName = 'default';

// ============================================================================
// Types
// ============================================================================

/**
 * Configuration for an IdentifierGenerator
 */
export interface GeneratorOptions {
  /** Run the integrity checks before the generator is usable (default true) */
  systemChecks?: boolean;
  /** Clock (defaults to the system clock) */
  time?: TimeSource;
  /** Random bytes (defaults to the OS CSPRNG) */
  entropy?: EntropySource;
  /**
   * Counters and seeds shared between generators. Defaults to a scope over
   * `entropy` when one is given, else to the process-wide scope.
   */
  scope?: ProcessScope;
  /** Backing store for the local_lexical counter */
  counterStore?: CounterStore;
  /** Close `counterStore` together with the generator */
  ownsCounterStore?: boolean;
  /** Name of the local_lexical counter in the store */
  localCounterName?: string;
  /** Strategy used by `construct()` without a name */
  defaultStrategy?: StrategyName;
  logger?: IdLogger;
  metrics?: IdMetricsCollector;
  /**
   * Integrity gate, run against `time` and `entropy`. Without one the
   * process-wide gate runs against the system clock and the OS CSPRNG.
   */
  integrity?: IntegrityGate;
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Builds one identifier: timestamp from the clock, randomness from the strategy.
 * Internal to the package; callers construct through an IdentifierGenerator,
 * which refuses to exist on a host that failed the integrity checks.
 *
 * @throws FatalInitializationError (TIMESTAMP_OVERFLOW) if the clock exceeds 48 bits
 */
export function construct(strategy: RandomnessStrategy, time: TimeSource = systemTimeSource): Identifier {
  const timestamp = checkTimestamp(time.now());
  return Identifier.of(strategy.format, timestamp, strategy.next(), strategy.layout);
}

let processScope: ProcessScope | undefined;

/**
 * The process-wide scope over the OS CSPRNG, created on first use
 */
export function getProcessScope(): ProcessScope {
  if (!processScope) {
    processScope = new ProcessScope({ entropy: cryptoEntropySource });
  }
  return processScope;
}

// ============================================================================
// Generator
// ============================================================================

/**
 * Constructs identifiers with any registered strategy.
 *
 * Not synchronized. Counter strategies that share a ProcessScope share its
 * counters, so callers that interleave on one counter can receive the same value.
 *
 * @example
 * ```typescript
 * const generator = createGenerator({ logger: new ConsoleIdLogger() });
 * const id = generator.ulid();
 * console.log(id.toString()); // e.g. 01JC9Q5Y1T4G3N6Z8W2R7KXM5A
 * ```
 */
export class IdentifierGenerator {
  readonly time: TimeSource;
  readonly entropy: EntropySource;
  readonly scope: ProcessScope;
  readonly defaultStrategy: StrategyName;
  private readonly counterStore?: CounterStore;
  private readonly ownsCounterStore: boolean;
  private readonly localCounterName: string;
  private readonly logger: IdLogger;
  private readonly metrics?: IdMetricsCollector;
  private readonly strategies: Map<StrategyName, RandomnessStrategy> = new Map();
  private persisted: PersistedCounter | undefined;
  private closed = false;

  constructor(options: GeneratorOptions = {}) {
    this.time = options.time ?? systemTimeSource;
    this.entropy = options.entropy ?? cryptoEntropySource;
    this.scope =
      options.scope ??
      (options.entropy ? new ProcessScope({ entropy: options.entropy }) : getProcessScope());
    this.defaultStrategy = options.defaultStrategy ?? DEFAULT_STRATEGY;
    this.counterStore = options.counterStore;
    this.ownsCounterStore = options.ownsCounterStore ?? false;
    this.localCounterName = options.localCounterName ?? DEFAULT_LOCAL_COUNTER;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics;

    if (options.systemChecks ?? true) {
      // The process-wide gate judges the host, never an injected clock or entropy source
      const context = options.integrity
        ? { time: this.time, entropy: this.entropy, logger: this.logger }
        : { time: systemTimeSource, entropy: cryptoEntropySource, logger: this.logger };
      (options.integrity ?? defaultIntegrityGate).ensure(context);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * The strategy registered under `name`, built on first use.
   *
   * @throws ValidationError (UNKNOWN_STRATEGY) for an unregistered name
   * @throws ValidationError (INVALID_CONFIG) for local_lexical without a counter store
   */
  strategy(name: string): RandomnessStrategy {
    if (!isStrategyName(name)) {
      throw unknownStrategy(name, STRATEGY_NAMES);
    }
    let strategy = this.strategies.get(name);
    if (!strategy) {
      strategy = this.build(name);
      this.strategies.set(name, strategy);
    }
    return strategy;
  }

  /**
   * Constructs an identifier with the named strategy (or the default one)
   */
  construct(name: string = this.defaultStrategy): Identifier {
    const strategy = this.strategy(name);
    const id = construct(strategy, this.time);
    this.metrics?.record({ type: 'constructed', source: strategy.name, timestamp: new Date() });
    return id;
  }

  /** 128-bit ULID with 80 random bits */
  ulid(): Identifier {
    return this.construct('default');
  }

  /** 56-bit short ULID from short_env_lexical */
  shortUlid(): Identifier {
    return this.construct('short_env_lexical');
  }

  /** 64-bit SLID */
  slid(): Identifier {
    return this.construct('slid');
  }

  /**
   * Writes the local_lexical counter back and, if owned, closes the store.
   * Idempotent. Strategies that hold no resources keep working after close.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      this.persisted?.release();
    } finally {
      if (this.ownsCounterStore) {
        this.counterStore?.close();
      }
    }
  }

  private build(name: StrategyName): RandomnessStrategy {
    const onWrap = this.wrapListener();
    switch (name) {
      case 'default':
        return randomStrategy(this.entropy);
      case 'runtime_lexical':
        return runtimeLexicalStrategy(this.scope.counter('runtime_lexical', 80), onWrap);
      case 'local_lexical':
        return localLexicalStrategy(this.acquirePersisted(), onWrap);
      case 'env_lexical':
        return envLexicalStrategy(this.scope, onWrap);
      case 'thread_env_lexical':
        return threadEnvLexicalStrategy(this.scope, onWrap);
      case 'short_env_lexical':
        return shortEnvLexicalStrategy(this.scope, onWrap);
      case 'slid':
        return slidStrategy(this.scope, onWrap);
    }
  }

  private acquirePersisted(): PersistedCounter {
    if (!this.counterStore) {
      throw invalidConfig('counterStore', undefined, 'a CounterStore for the local_lexical strategy');
    }
    if (this.closed) {
      throw storeClosed(this.counterStore.location, { counter: this.localCounterName });
    }
    this.persisted = PersistedCounter.acquire(this.counterStore, this.localCounterName, 80, {
      logger: this.logger,
      metrics: this.metrics,
    });
    return this.persisted;
  }

  private wrapListener(): CounterWrapListener {
    return (counterName) => {
      this.metrics?.record({ type: 'counter_wrapped', source: counterName, timestamp: new Date() });
      this.logger.log('debug', 'Counter wrapped to zero', { counter: counterName });
    };
  }
}

/**
 * Creates a generator. Runs the integrity checks unless `systemChecks` is false.
 *
 * @throws FatalInitializationError (INTEGRITY_CHECK_FAILED) if the host fails the checks
 */
export function createGenerator(options: GeneratorOptions = {}): IdentifierGenerator {
  return new IdentifierGenerator(options);
}

/**
 * Runs `fn` with a generator and closes it on every exit path
 */
export function withGenerator<T>(options: GeneratorOptions, fn: (generator: IdentifierGenerator) => T): T {
  const generator = createGenerator(options);
  try {
    return fn(generator);
  } finally {
    generator.close();
  }
}
