/**
 * Environment Variable Configuration
 *
 * Handles reading configuration from environment variables.
 */

import { invalidConfig } from '../errors/factories.js';
import type { Environment, EnvVar, PartialConfiguration } from './types.js';
import { EnvVars } from './types.js';
import {
  validateCounterBackend,
  validateCounterPath,
  validateLogLevel,
  validateStrategy,
} from './validation.js';

// ============================================================================
// Boolean Parsing
// ============================================================================

/**
 * Truthy values for environment variables (case-insensitive)
 */
const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);

/**
 * Falsy values for environment variables (case-insensitive)
 */
const FALSY_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Parses a boolean from an environment variable value
 *
 * @returns Parsed boolean, or undefined if not a recognized boolean value
 */
export function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const lower = value.toLowerCase().trim();
  if (TRUTHY_VALUES.has(lower)) {
    return true;
  }
  if (FALSY_VALUES.has(lower)) {
    return false;
  }
  return undefined;
}

// ============================================================================
// Environment Configuration Loading
// ============================================================================

/**
 * Gets an environment variable, treating the empty string as unset
 */
export function getEnvVar(name: EnvVar, env: Environment = process.env): string | undefined {
  const value = env[name];
  return value !== undefined && value !== '' ? value : undefined;
}

/**
 * Loads configuration from environment variables
 *
 * @throws ValidationError (INVALID_CONFIG) if a set variable has an invalid value
 */
export function loadEnvConfig(env: Environment = process.env): PartialConfiguration {
  const config: PartialConfiguration = {};

  const systemChecks = getEnvVar(EnvVars.SYSTEM_CHECKS, env);
  if (systemChecks !== undefined) {
    const parsed = parseEnvBoolean(systemChecks);
    if (parsed === undefined) {
      throw invalidConfig(EnvVars.SYSTEM_CHECKS, systemChecks, 'boolean (1/0, true/false, yes/no, on/off)');
    }
    config.systemChecks = parsed;
  }

  const strategy = getEnvVar(EnvVars.STRATEGY, env);
  if (strategy !== undefined) {
    config.defaultStrategy = validateStrategy(strategy.trim(), EnvVars.STRATEGY);
  }

  const logLevel = getEnvVar(EnvVars.LOG_LEVEL, env);
  if (logLevel !== undefined) {
    config.logLevel = validateLogLevel(logLevel.trim().toLowerCase(), EnvVars.LOG_LEVEL);
  }

  const backend = getEnvVar(EnvVars.COUNTER_BACKEND, env);
  if (backend !== undefined) {
    config.counterStore = config.counterStore || {};
    config.counterStore.backend = validateCounterBackend(backend.trim().toLowerCase(), EnvVars.COUNTER_BACKEND);
  }

  const counterPath = getEnvVar(EnvVars.COUNTER_PATH, env);
  if (counterPath !== undefined) {
    config.counterStore = config.counterStore || {};
    config.counterStore.path = validateCounterPath(counterPath, EnvVars.COUNTER_PATH);
  }

  return config;
}

/**
 * Gets the config file path override from environment
 */
export function getEnvConfigPath(env: Environment = process.env): string | undefined {
  return getEnvVar(EnvVars.CONFIG, env);
}

/**
 * Gets currently set environment variables for configuration
 */
export function getSetEnvVars(env: Environment = process.env): Array<{ name: EnvVar; value: string }> {
  const result: Array<{ name: EnvVar; value: string }> = [];
  for (const name of Object.values(EnvVars)) {
    const value = getEnvVar(name, env);
    if (value !== undefined) {
      result.push({ name, value });
    }
  }
  return result;
}
