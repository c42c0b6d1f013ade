/**
 * Configuration Defaults
 *
 * Built-in default values, overridden by file, environment and overrides.
 */

import type { Configuration, CounterBackend } from './types.js';

/** Project directory holding config.yaml and file-backed counters */
export const LEXID_DIR = '.lexid';

/**
 * Default location per counter backend
 */
export const DEFAULT_COUNTER_PATHS: Readonly<Record<CounterBackend, string>> = {
  memory: ':memory:',
  file: `${LEXID_DIR}/counters`,
  sqlite: `${LEXID_DIR}/counters.db`,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: Readonly<Configuration> = {
  systemChecks: true,
  defaultStrategy: 'default',
  logLevel: 'warn',
  counterStore: { backend: 'file' },
};

/**
 * Returns a fresh copy of the default configuration
 */
export function getDefaultConfig(): Configuration {
  return {
    ...DEFAULT_CONFIG,
    counterStore: { ...DEFAULT_CONFIG.counterStore },
  };
}
