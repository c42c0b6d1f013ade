/**
 * Logging and metrics hooks for identifier generation.
 */

// ============================================================================
// Logging
// ============================================================================

/**
 * Log level for identifier events
 */
export type IdLogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Log levels in ascending severity */
export const ID_LOG_LEVELS: readonly IdLogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Checks if a value is a valid log level
 */
export function isIdLogLevel(value: unknown): value is IdLogLevel {
  return ID_LOG_LEVELS.some((level) => level === value);
}

/**
 * Logger interface for identifier events
 */
export interface IdLogger {
  /**
   * Log a message at the specified level
   */
  log(level: IdLogLevel, message: string, data?: Record<string, unknown>): void;
}

/**
 * Logger that discards everything
 */
export const silentLogger: IdLogger = {
  log(): void {},
};

/**
 * Console-based logger implementation
 *
 * Logs identifier events to the console with structured data.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleIdLogger({ minLevel: 'debug' });
 * const generator = createGenerator({ logger });
 * ```
 */
export class ConsoleIdLogger implements IdLogger {
  private readonly minLevel: IdLogLevel;

  constructor(options: { minLevel?: IdLogLevel } = {}) {
    this.minLevel = options.minLevel ?? 'info';
  }

  log(level: IdLogLevel, message: string, data?: Record<string, unknown>): void {
    if (ID_LOG_LEVELS.indexOf(level) < ID_LOG_LEVELS.indexOf(this.minLevel)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [lexid] [${level.toUpperCase()}]`;
    const args: unknown[] = data ? [prefix, message, data] : [prefix, message];

    switch (level) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.info(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  }
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Event types for generation metrics
 */
export type IdMetricsEventType = 'constructed' | 'counter_wrapped' | 'counter_flushed';

/**
 * Event data for generation metrics
 */
export interface IdMetricsEvent {
  type: IdMetricsEventType;
  /** Strategy or counter name the event belongs to */
  source: string;
  timestamp: Date;
}

/**
 * Snapshot of current metrics
 */
export interface IdMetricsSnapshot {
  /** Total identifiers constructed */
  totalConstructed: number;
  /** Identifiers constructed, by strategy name */
  constructedByStrategy: Record<string, number>;
  /** Counter wraps to zero, by counter name */
  wrapsByCounter: Record<string, number>;
  /** Persisted counter write-backs */
  flushes: number;
  startedAt: Date;
  lastEventAt?: Date;
}

/**
 * Interface for collecting generation metrics
 */
export interface IdMetricsCollector {
  record(event: IdMetricsEvent): void;
  getSnapshot(): IdMetricsSnapshot;
  reset(): void;
}

/**
 * Default implementation of IdMetricsCollector.
 * Not synchronized; intended for a single JavaScript thread.
 */
export class DefaultIdMetricsCollector implements IdMetricsCollector {
  private totalConstructed = 0;
  private constructedByStrategy: Map<string, number> = new Map();
  private wrapsByCounter: Map<string, number> = new Map();
  private flushes = 0;
  private startedAt: Date = new Date();
  private lastEventAt?: Date;

  record(event: IdMetricsEvent): void {
    this.lastEventAt = event.timestamp;

    switch (event.type) {
      case 'constructed':
        this.totalConstructed++;
        increment(this.constructedByStrategy, event.source);
        break;

      case 'counter_wrapped':
        increment(this.wrapsByCounter, event.source);
        break;

      case 'counter_flushed':
        this.flushes++;
        break;
    }
  }

  getSnapshot(): IdMetricsSnapshot {
    return {
      totalConstructed: this.totalConstructed,
      constructedByStrategy: Object.fromEntries(this.constructedByStrategy),
      wrapsByCounter: Object.fromEntries(this.wrapsByCounter),
      flushes: this.flushes,
      startedAt: this.startedAt,
      lastEventAt: this.lastEventAt,
    };
  }

  reset(): void {
    this.totalConstructed = 0;
    this.constructedByStrategy.clear();
    this.wrapsByCounter.clear();
    this.flushes = 0;
    this.startedAt = new Date();
    this.lastEventAt = undefined;
  }
}

function increment(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}
