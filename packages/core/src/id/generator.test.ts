import { describe, it, expect } from 'vitest';
import {
  createGenerator,
  construct,
  getProcessScope,
  withGenerator,
  type GeneratorOptions,
  type IdentifierGenerator,
} from './generator.js';
import * as lexid from '../index.js';
import { MemoryCounterStore } from './counter.js';
import { IntegrityGate, defaultIntegrityGate } from './integrity.js';
import { FixedTimeSource, SequenceEntropySource } from './sources.js';
import { randomStrategy } from './strategies.js';
import { DefaultIdMetricsCollector } from './telemetry.js';
import { ULID, SHORT_ULID, SLID } from './formats.js';
import { isLexidError, type LexidError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';

const NOW = 1700000000000;
const RANDOM_BYTES = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];

function caught(fn: () => unknown): LexidError {
  try {
    fn();
  } catch (err) {
    if (isLexidError(err)) return err;
    throw err;
  }
  throw new Error('expected a LexidError');
}

function testGenerator(options: GeneratorOptions = {}): IdentifierGenerator {
  return createGenerator({
    systemChecks: false,
    time: new FixedTimeSource(NOW),
    entropy: new SequenceEntropySource(RANDOM_BYTES),
    ...options,
  });
}

describe('construct', () => {
  it('should combine the clock reading and the strategy value', () => {
    const id = construct(randomStrategy(new SequenceEntropySource(RANDOM_BYTES)), new FixedTimeSource(NOW));
    expect(id.format).toBe(ULID);
    expect(id.timestamp).toBe(NOW);
    expect(id.randomness).toBe(BigInt('0x0102030405060708090a'));
  });

  it('should refuse a clock reading beyond 48 bits', () => {
    const strategy = randomStrategy(new SequenceEntropySource(RANDOM_BYTES));
    const error = caught(() => construct(strategy, { now: () => 2 ** 48 }));
    expect(error.code).toBe(ErrorCode.TIMESTAMP_OVERFLOW);
  });
});

describe('IdentifierGenerator', () => {
  it('should construct ULIDs with the default strategy', () => {
    const id = testGenerator().ulid();
    expect(id.toString()).toBe('01HF7YAT00041061050R3GG28A');
  });

  it('should construct SLIDs from the process seed byte', () => {
    const generator = testGenerator();
    expect(generator.slid().toString()).toBe('018bcfe568000100');
    expect(generator.slid().toString()).toBe('018bcfe568000101');
  });

  it('should construct short ULIDs from the process seed nibble', () => {
    const generator = testGenerator({ entropy: new SequenceEntropySource([0xa5]) });
    const id = generator.shortUlid();
    expect(id.format).toBe(SHORT_ULID);
    expect(id.randomness).toBe(BigInt(0xa0));
    expect(id.prime).toBe(0xa);
  });

  it('should use the configured default strategy', () => {
    const generator = testGenerator({ defaultStrategy: 'runtime_lexical' });
    expect(generator.construct().randomness).toBe(BigInt(0));
    expect(generator.construct().randomness).toBe(BigInt(1));
  });

  it('should cache strategies per generator', () => {
    const generator = testGenerator();
    expect(generator.strategy('slid')).toBe(generator.strategy('slid'));
  });

  it('should reject unknown strategy names', () => {
    const error = caught(() => testGenerator().construct('lexical'));
    expect(error.code).toBe(ErrorCode.UNKNOWN_STRATEGY);
  });

  it('should require a counter store for local_lexical', () => {
    const error = caught(() => testGenerator().construct('local_lexical'));
    expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
  });

  it('should record metrics for constructions and wraps', () => {
    const metrics = new DefaultIdMetricsCollector();
    const generator = testGenerator({ metrics });
    for (let i = 0; i < 256; i++) {
      generator.slid();
    }
    generator.ulid();

    const snapshot = metrics.getSnapshot();
    expect(snapshot.totalConstructed).toBe(257);
    expect(snapshot.constructedByStrategy).toEqual({ slid: 256, default: 1 });
    expect(snapshot.wrapsByCounter).toEqual({ slid: 1 });
  });

  it('should keep SLIDs from one millisecond in ascending order', () => {
    const generator = testGenerator();
    const ids = Array.from({ length: 10 }, () => generator.slid());
    for (let i = 1; i < ids.length; i++) {
      expect(ids[i - 1].compareTo(ids[i])).toBe(-1);
    }
    expect(ids.every((id) => id.format === SLID)).toBe(true);
  });
});

describe('getProcessScope', () => {
  it('should return one scope for the whole process', () => {
    expect(getProcessScope()).toBe(getProcessScope());
  });

  it('should back generators that bring no entropy or scope', () => {
    const generator = createGenerator({ systemChecks: false, time: new FixedTimeSource(NOW) });
    expect(generator.scope).toBe(getProcessScope());
    expect(testGenerator().scope).not.toBe(getProcessScope());
  });
});

describe('local_lexical', () => {
  it('should continue the counter across generators sharing a store', () => {
    const store = new MemoryCounterStore();
    const first = testGenerator({ counterStore: store });
    expect(first.construct('local_lexical').randomness).toBe(BigInt(0));
    expect(first.construct('local_lexical').randomness).toBe(BigInt(1));
    first.close();
    expect(store.read('local_lexical')).toBe(BigInt(1));

    const second = testGenerator({ counterStore: store });
    expect(second.construct('local_lexical').randomness).toBe(BigInt(2));
    second.close();
  });

  it('should use the configured counter name', () => {
    const store = new MemoryCounterStore();
    withGenerator(
      { systemChecks: false, time: new FixedTimeSource(NOW), counterStore: store, localCounterName: 'orders' },
      (generator) => generator.construct('local_lexical')
    );
    expect(store.read('orders')).toBe(BigInt(0));
  });
});

describe('close', () => {
  it('should be idempotent and leave stateless strategies working', () => {
    const generator = testGenerator();
    generator.close();
    generator.close();
    expect(generator.isClosed).toBe(true);
    expect(generator.slid().format).toBe(SLID);
  });

  it('should refuse local_lexical after close', () => {
    const store = new MemoryCounterStore();
    const used = testGenerator({ counterStore: store });
    used.construct('local_lexical');
    used.close();
    expect(caught(() => used.construct('local_lexical')).code).toBe(ErrorCode.STORE_CLOSED);

    const unused = testGenerator({ counterStore: store });
    unused.close();
    expect(caught(() => unused.construct('local_lexical')).code).toBe(ErrorCode.STORE_CLOSED);
  });

  it('should close an owned store', () => {
    const store = new MemoryCounterStore();
    testGenerator({ counterStore: store, ownsCounterStore: true }).close();
    expect(caught(() => store.read('local_lexical')).code).toBe(ErrorCode.STORE_CLOSED);
  });

  it('should leave a borrowed store open', () => {
    const store = new MemoryCounterStore();
    testGenerator({ counterStore: store }).close();
    expect(store.read('local_lexical')).toBeUndefined();
  });

  it('should close the generator when the callback throws', () => {
    const store = new MemoryCounterStore();
    expect(() =>
      withGenerator(
        { systemChecks: false, time: new FixedTimeSource(NOW), counterStore: store },
        (generator) => {
          generator.construct('local_lexical');
          throw new Error('boom');
        }
      )
    ).toThrow('boom');
    expect(store.read('local_lexical')).toBe(BigInt(0));
  });
});

describe('integrity', () => {
  it('should refuse to create a generator on a failing host', () => {
    const integrity = new IntegrityGate(() => [{ name: 'byte-order', run: () => 'little endian' }]);
    const options = { time: new FixedTimeSource(NOW), integrity };
    expect(caught(() => createGenerator(options)).code).toBe(ErrorCode.INTEGRITY_CHECK_FAILED);
    expect(caught(() => createGenerator(options)).code).toBe(ErrorCode.INTEGRITY_CHECK_FAILED);
  });

  it('should skip the checks when disabled', () => {
    let runs = 0;
    const integrity = new IntegrityGate(() => {
      runs++;
      return [];
    });
    createGenerator({ systemChecks: false, integrity });
    expect(runs).toBe(0);
  });

  it('should run the process-wide checks against the system clock, not an injected one', () => {
    const early = createGenerator({ time: new FixedTimeSource(1000) });
    expect(early.construct().timestamp).toBe(1000);
    expect(() => createGenerator()).not.toThrow();
    expect(defaultIntegrityGate.lastReport?.ok).toBe(true);
  });

  it('should run a private gate against the injected clock', () => {
    const integrity = new IntegrityGate();
    const error = caught(() => createGenerator({ time: new FixedTimeSource(1000), integrity }));
    expect(error.code).toBe(ErrorCode.INTEGRITY_CHECK_FAILED);
    expect(error.details.failed).toEqual(['clock-plausible']);
  });

  it('should keep construction behind the generator', () => {
    expect(Object.keys(lexid)).not.toContain('construct');
    expect(Object.keys(lexid)).toContain('createGenerator');
  });

  it('should export only what the package uses', () => {
    expect(Object.keys(lexid)).not.toContain('isFormatName');
    expect(Object.keys(lexid)).not.toContain('databaseError');
    expect(Object.keys(lexid)).toContain('getProcessScope');
  });

  it('should run the default checks against the configured sources', () => {
    const integrity = new IntegrityGate();
    createGenerator({ time: new FixedTimeSource(Date.UTC(2026, 0, 1)), integrity });
    expect(integrity.lastReport?.ok).toBe(true);
  });
});
