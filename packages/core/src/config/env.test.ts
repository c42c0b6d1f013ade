/**
 * Environment Configuration Tests
 */

import { describe, test, expect } from 'vitest';
import { getEnvConfigPath, getEnvVar, getSetEnvVars, loadEnvConfig, parseEnvBoolean } from './env.js';
import { EnvVars } from './types.js';
import { isValidationError } from '../errors/error.js';
import { ErrorCode } from '../errors/codes.js';

// ============================================================================
// parseEnvBoolean Tests
// ============================================================================

describe('parseEnvBoolean', () => {
  test('parses truthy values case-insensitively', () => {
    for (const value of ['1', 'true', 'TRUE', 'yes', 'On', ' on ']) {
      expect(parseEnvBoolean(value)).toBe(true);
    }
  });

  test('parses falsy values case-insensitively', () => {
    for (const value of ['0', 'false', 'No', 'OFF']) {
      expect(parseEnvBoolean(value)).toBe(false);
    }
  });

  test('returns undefined for anything else', () => {
    expect(parseEnvBoolean(undefined)).toBeUndefined();
    expect(parseEnvBoolean('maybe')).toBeUndefined();
  });
});

// ============================================================================
// getEnvVar Tests
// ============================================================================

describe('getEnvVar', () => {
  test('treats the empty string as unset', () => {
    expect(getEnvVar(EnvVars.STRATEGY, { LEXID_STRATEGY: '' })).toBeUndefined();
    expect(getEnvVar(EnvVars.STRATEGY, { LEXID_STRATEGY: 'slid' })).toBe('slid');
  });
});

// ============================================================================
// loadEnvConfig Tests
// ============================================================================

describe('loadEnvConfig', () => {
  test('returns an empty configuration when nothing is set', () => {
    expect(loadEnvConfig({})).toEqual({});
  });

  test('reads every variable', () => {
    const config = loadEnvConfig({
      LEXID_SYSTEM_CHECKS: 'off',
      LEXID_STRATEGY: ' env_lexical ',
      LEXID_LOG_LEVEL: 'DEBUG',
      LEXID_COUNTER_BACKEND: 'SQLite',
      LEXID_COUNTER_PATH: '/var/lib/lexid/counters.db',
    });

    expect(config).toEqual({
      systemChecks: false,
      defaultStrategy: 'env_lexical',
      logLevel: 'debug',
      counterStore: { backend: 'sqlite', path: '/var/lib/lexid/counters.db' },
    });
  });

  test('rejects an unrecognized boolean', () => {
    let error: unknown;
    try {
      loadEnvConfig({ LEXID_SYSTEM_CHECKS: 'sometimes' });
    } catch (err) {
      error = err;
    }
    expect(isValidationError(error)).toBe(true);
    if (isValidationError(error)) {
      expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
      expect(error.details.field).toBe('LEXID_SYSTEM_CHECKS');
    }
  });

  test('rejects unknown strategies and backends', () => {
    expect(() => loadEnvConfig({ LEXID_STRATEGY: 'lexical' })).toThrow('LEXID_STRATEGY');
    expect(() => loadEnvConfig({ LEXID_COUNTER_BACKEND: 'redis' })).toThrow('LEXID_COUNTER_BACKEND');
    expect(() => loadEnvConfig({ LEXID_LOG_LEVEL: 'trace' })).toThrow('LEXID_LOG_LEVEL');
  });
});

// ============================================================================
// Helper Tests
// ============================================================================

describe('getEnvConfigPath', () => {
  test('returns the config file override', () => {
    expect(getEnvConfigPath({ LEXID_CONFIG: '/etc/lexid.yaml' })).toBe('/etc/lexid.yaml');
    expect(getEnvConfigPath({})).toBeUndefined();
  });
});

describe('getSetEnvVars', () => {
  test('lists only the variables that are set', () => {
    expect(getSetEnvVars({ LEXID_STRATEGY: 'slid', LEXID_LOG_LEVEL: '', OTHER: 'x' })).toEqual([
      { name: 'LEXID_STRATEGY', value: 'slid' },
    ]);
  });
});
