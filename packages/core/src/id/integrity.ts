/**
 * Host integrity checks run once before any identifier is constructed.
 *
 * Identifiers rely on exact 128-bit integer arithmetic, big-endian packing,
 * modular counter wrap, a millisecond Unix clock and a working entropy
 * source. If any of these fails the generator refuses to start.
 */

import { integrityCheckFailed } from '../errors/factories.js';
import type { FatalInitializationError } from '../errors/error.js';
import { fromBytes, toBytes } from './codec.js';
import { CounterState } from './counter.js';
import { ULID } from './formats.js';
import { maxUnsigned } from './identifier.js';
import type { EntropySource, TimeSource } from './sources.js';
import { silentLogger, type IdLogger } from './telemetry.js';

const ZERO = BigInt(0);
const ONE = BigInt(1);

/** Counter widths the strategies use */
export const COUNTER_WIDTHS: readonly number[] = [4, 8, 16, 72, 80];

/** Earliest plausible wall-clock reading (2025-01-01T00:00:00Z) */
export const EARLIEST_PLAUSIBLE_MS = Date.UTC(2025, 0, 1);

// ============================================================================
// Types
// ============================================================================

/**
 * A single named check. `run` returns true on success, or a string
 * describing the failure.
 */
export interface IntegrityCheck {
  readonly name: string;
  run(): true | string;
}

export interface IntegrityCheckResult {
  readonly name: string;
  readonly ok: boolean;
  readonly detail?: string;
}

export interface IntegrityReport {
  readonly ok: boolean;
  readonly results: readonly IntegrityCheckResult[];
}

export interface IntegrityContext {
  time: TimeSource;
  entropy: EntropySource;
  logger?: IdLogger;
}

// ============================================================================
// Checks
// ============================================================================

function bigIntWidthCheck(): IntegrityCheck {
  return {
    name: 'integer-width',
    run() {
      const max = maxUnsigned(128);
      const overflow = max + ONE;
      if (overflow >> BigInt(128) !== ONE || overflow - ONE !== max) {
        return '128-bit integers truncate on overflow';
      }
      if (max.toString(16) !== 'f'.repeat(32)) {
        return '128-bit integers do not print exactly';
      }
      if (BigInt.asUintN(128, overflow) !== ZERO) {
        return 'modular reduction at 2^128 is not exact';
      }
      return true;
    },
  };
}

function byteOrderCheck(): IntegrityCheck {
  return {
    name: 'byte-order',
    run() {
      const pattern = Uint8Array.from({ length: ULID.byteLength }, (_, i) => i + 1);
      const id = fromBytes(ULID, pattern);
      if (id.timestamp !== 0x010203040506) {
        return `timestamp unpacked as ${id.timestamp.toString(16)}`;
      }
      const repacked = toBytes(id);
      if (!repacked.every((byte, i) => byte === pattern[i])) {
        return 'packing does not round-trip';
      }

      const view = new DataView(new ArrayBuffer(8));
      view.setBigUint64(0, BigInt('0x0102030405060708'), false);
      if (view.getUint8(0) !== 1 || view.getUint8(7) !== 8) {
        return 'big-endian writes are not most-significant-first';
      }
      return true;
    },
  };
}

function counterWrapCheck(): IntegrityCheck {
  return {
    name: 'counter-wrap',
    run() {
      for (const width of COUNTER_WIDTHS) {
        const max = maxUnsigned(width);
        const counter = new CounterState('integrity', width, max);
        if (counter.next() !== max || counter.value !== ZERO) {
          return `counter of width ${width} does not wrap to 0`;
        }
        if (max >> BigInt(width) !== ZERO || (max + ONE) % (ONE << BigInt(width)) !== ZERO) {
          return `arithmetic mod 2^${width} is not exact`;
        }
      }
      return true;
    },
  };
}

function clockResolutionCheck(time: TimeSource): IntegrityCheck {
  return {
    name: 'clock-resolution',
    run() {
      const now = time.now();
      return Number.isInteger(now) ? true : `clock reading ${now} is not whole milliseconds`;
    },
  };
}

function epochCheck(): IntegrityCheck {
  return {
    name: 'unix-epoch',
    run() {
      const epoch = new Date(0).toISOString();
      return epoch === '1970-01-01T00:00:00.000Z' ? true : `epoch is ${epoch}`;
    },
  };
}

function clockPlausibleCheck(time: TimeSource): IntegrityCheck {
  return {
    name: 'clock-plausible',
    run() {
      const now = time.now();
      return now >= EARLIEST_PLAUSIBLE_MS
        ? true
        : `clock reads ${new Date(now).toISOString()}, before 2025`;
    },
  };
}

function entropyCheck(entropy: EntropySource): IntegrityCheck {
  return {
    name: 'entropy-source',
    run() {
      const a = entropy.bytes(16);
      const b = entropy.bytes(16);
      if (a.length !== 16 || b.length !== 16) {
        return 'entropy source returned the wrong number of bytes';
      }
      return a.some((byte, i) => byte !== b[i]) ? true : 'entropy source repeats itself';
    },
  };
}

/**
 * The standard checks for a time and entropy source
 */
export function defaultIntegrityChecks(time: TimeSource, entropy: EntropySource): IntegrityCheck[] {
  return [
    bigIntWidthCheck(),
    byteOrderCheck(),
    counterWrapCheck(),
    clockResolutionCheck(time),
    epochCheck(),
    clockPlausibleCheck(time),
    entropyCheck(entropy),
  ];
}

/**
 * Runs every check; a check that throws counts as failed with the error message
 */
export function runIntegrityChecks(checks: readonly IntegrityCheck[]): IntegrityReport {
  const results = checks.map((check): IntegrityCheckResult => {
    try {
      const outcome = check.run();
      return outcome === true ? { name: check.name, ok: true } : { name: check.name, ok: false, detail: outcome };
    } catch (error) {
      return {
        name: check.name,
        ok: false,
        detail: error instanceof Error ? error.message : String(error),
      };
    }
  });
  return { ok: results.every((result) => result.ok), results };
}

// ============================================================================
// Gate
// ============================================================================

export type IntegrityChecksFactory = (context: IntegrityContext) => readonly IntegrityCheck[];

/**
 * Runs the checks once and remembers the outcome. A failure is logged once
 * and every later `ensure` throws the same error without re-running.
 */
export class IntegrityGate {
  private readonly factory: IntegrityChecksFactory;
  private report: IntegrityReport | undefined;
  private failure: FatalInitializationError | undefined;

  constructor(factory: IntegrityChecksFactory = ({ time, entropy }) => defaultIntegrityChecks(time, entropy)) {
    this.factory = factory;
  }

  /** The cached report, if the checks have run */
  get lastReport(): IntegrityReport | undefined {
    return this.report;
  }

  /**
   * @throws FatalInitializationError (INTEGRITY_CHECK_FAILED) if any check failed
   */
  ensure(context: IntegrityContext): IntegrityReport {
    if (this.failure) {
      throw this.failure;
    }
    if (this.report) {
      return this.report;
    }

    const report = runIntegrityChecks(this.factory(context));
    this.report = report;
    if (!report.ok) {
      const failed = report.results.filter((result) => !result.ok);
      this.failure = integrityCheckFailed(
        failed.map((result) => result.name),
        { results: failed }
      );
      (context.logger ?? silentLogger).log('error', 'System integrity check failed; refusing to construct identifiers', {
        failed: failed.map((result) => ({ name: result.name, detail: result.detail })),
      });
      throw this.failure;
    }
    return report;
  }
}

/** Process-wide gate used by generators that do not bring their own */
export const defaultIntegrityGate = new IntegrityGate();
