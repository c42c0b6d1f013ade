import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleIdLogger, DefaultIdMetricsCollector, isIdLogLevel } from './telemetry.js';

describe('isIdLogLevel', () => {
  it('should accept the four levels only', () => {
    expect(['debug', 'info', 'warn', 'error'].every(isIdLogLevel)).toBe(true);
    expect(isIdLogLevel('trace')).toBe(false);
  });
});

describe('ConsoleIdLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new ConsoleIdLogger({ minLevel: 'warn' });

    logger.log('debug', 'hidden');
    logger.log('warn', 'shown', { counter: 'slid' });

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    const [prefix, message, data] = warn.mock.calls[0];
    expect(prefix).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[lexid\] \[WARN\]$/);
    expect(message).toBe('shown');
    expect(data).toEqual({ counter: 'slid' });
  });

  it('should default to info', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new ConsoleIdLogger();
    logger.log('debug', 'hidden');
    logger.log('info', 'shown');
    expect(debug).not.toHaveBeenCalled();
    expect(info.mock.calls[0]).toHaveLength(2);
  });
});

describe('DefaultIdMetricsCollector', () => {
  it('should count events by type and source', () => {
    const metrics = new DefaultIdMetricsCollector();
    const at = new Date('2026-01-01T00:00:00Z');
    metrics.record({ type: 'constructed', source: 'default', timestamp: at });
    metrics.record({ type: 'constructed', source: 'slid', timestamp: at });
    metrics.record({ type: 'constructed', source: 'slid', timestamp: at });
    metrics.record({ type: 'counter_wrapped', source: 'slid', timestamp: at });
    metrics.record({ type: 'counter_flushed', source: 'local_lexical', timestamp: at });

    const snapshot = metrics.getSnapshot();
    expect(snapshot.totalConstructed).toBe(3);
    expect(snapshot.constructedByStrategy).toEqual({ default: 1, slid: 2 });
    expect(snapshot.wrapsByCounter).toEqual({ slid: 1 });
    expect(snapshot.flushes).toBe(1);
    expect(snapshot.lastEventAt).toEqual(at);
  });

  it('should clear counts on reset', () => {
    const metrics = new DefaultIdMetricsCollector();
    metrics.record({ type: 'constructed', source: 'default', timestamp: new Date() });
    metrics.reset();
    const snapshot = metrics.getSnapshot();
    expect(snapshot.totalConstructed).toBe(0);
    expect(snapshot.constructedByStrategy).toEqual({});
    expect(snapshot.lastEventAt).toBeUndefined();
  });
});
