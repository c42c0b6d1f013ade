/**
 * Configuration System Types
 *
 * Settings that choose how generators are created: whether the integrity
 * checks run, which strategy `construct()` uses, how verbose logging is and
 * where the local_lexical counter is persisted. Values come from built-in
 * defaults, a YAML file, environment variables and programmatic overrides.
 */

import type { StrategyName } from '../id/strategies.js';
import type { IdLogLevel } from '../id/telemetry.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * Where persisted counters live
 */
export type CounterBackend = 'memory' | 'file' | 'sqlite';

/** All counter backends */
export const COUNTER_BACKENDS: readonly CounterBackend[] = ['memory', 'file', 'sqlite'];

/**
 * Counter store configuration
 */
export interface CounterStoreConfig {
  /** Backend (default: 'file') */
  backend: CounterBackend;
  /** Directory (file) or database file (sqlite); backend default when unset */
  path?: string;
}

/**
 * Complete configuration
 */
export interface Configuration {
  /** Run integrity checks when a generator is created (default: true) */
  systemChecks: boolean;
  /** Strategy used by `construct()` without a name (default: 'default') */
  defaultStrategy: StrategyName;
  /** Minimum level the console logger prints (default: 'warn') */
  logLevel: IdLogLevel;
  counterStore: CounterStoreConfig;
}

/**
 * Partial configuration, as read from one source
 */
export interface PartialConfiguration {
  systemChecks?: boolean;
  defaultStrategy?: StrategyName;
  logLevel?: IdLogLevel;
  counterStore?: Partial<CounterStoreConfig>;
}

// ============================================================================
// Source Tracking
// ============================================================================

/**
 * Where a configuration value came from
 */
export const ConfigSource = {
  /** Built-in default value */
  DEFAULT: 'default',
  /** From config file */
  FILE: 'file',
  /** From environment variable */
  ENVIRONMENT: 'environment',
  /** From programmatic overrides */
  OVERRIDE: 'override',
} as const;

export type ConfigSource = (typeof ConfigSource)[keyof typeof ConfigSource];

/**
 * Dot-notation paths of every configuration value
 */
export type ConfigPath =
  | 'systemChecks'
  | 'defaultStrategy'
  | 'logLevel'
  | 'counterStore.backend'
  | 'counterStore.path';

/**
 * Loaded configuration with the source of each value
 */
export interface ResolvedConfiguration {
  config: Configuration;
  sources: Record<ConfigPath, ConfigSource>;
  /** Config file that was read, if any */
  filePath?: string;
}

// ============================================================================
// Environment Variables
// ============================================================================

/**
 * Environment variable names
 */
export const EnvVars = {
  /** Config file path override */
  CONFIG: 'LEXID_CONFIG',
  /** Integrity checks on/off */
  SYSTEM_CHECKS: 'LEXID_SYSTEM_CHECKS',
  /** Default strategy */
  STRATEGY: 'LEXID_STRATEGY',
  /** Console log level */
  LOG_LEVEL: 'LEXID_LOG_LEVEL',
  /** Counter store backend */
  COUNTER_BACKEND: 'LEXID_COUNTER_BACKEND',
  /** Counter store path */
  COUNTER_PATH: 'LEXID_COUNTER_PATH',
} as const;

export type EnvVar = (typeof EnvVars)[keyof typeof EnvVars];

/** Environment to read variables from */
export type Environment = Readonly<Record<string, string | undefined>>;

// ============================================================================
// Configuration Operations
// ============================================================================

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Override config file path */
  configPath?: string;
  /** Skip environment variables */
  skipEnv?: boolean;
  /** Skip config file loading */
  skipFile?: boolean;
  /** Highest-precedence values */
  overrides?: PartialConfiguration;
  /** Directory the config file search starts from (default: cwd) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: Environment;
}

/**
 * Result of configuration file discovery
 */
export interface ConfigFileDiscovery {
  /** Path to the config file, if one was named or found */
  path?: string;
  /** Whether the file exists */
  exists: boolean;
  /** Directory containing the config file */
  configDir?: string;
}
