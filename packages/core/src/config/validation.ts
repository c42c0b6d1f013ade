/**
 * Configuration Validation
 *
 * Validates configuration values. Every failure is a ValidationError with
 * code INVALID_CONFIG naming the offending key.
 */

import { invalidConfig } from '../errors/factories.js';
import { STRATEGY_NAMES, isStrategyName, type StrategyName } from '../id/strategies.js';
import { ID_LOG_LEVELS, isIdLogLevel, type IdLogLevel } from '../id/telemetry.js';
import { COUNTER_BACKENDS, type Configuration, type CounterBackend, type PartialConfiguration } from './types.js';

// ============================================================================
// Field Validators
// ============================================================================

/**
 * Checks if a value names a counter backend
 */
export function isCounterBackend(value: unknown): value is CounterBackend {
  return COUNTER_BACKENDS.some((backend) => backend === value);
}

export function validateSystemChecks(value: unknown, key = 'systemChecks'): boolean {
  if (typeof value !== 'boolean') {
    throw invalidConfig(key, value, 'boolean');
  }
  return value;
}

export function validateStrategy(value: unknown, key = 'defaultStrategy'): StrategyName {
  if (!isStrategyName(value)) {
    throw invalidConfig(key, value, STRATEGY_NAMES);
  }
  return value;
}

export function validateLogLevel(value: unknown, key = 'logLevel'): IdLogLevel {
  if (!isIdLogLevel(value)) {
    throw invalidConfig(key, value, ID_LOG_LEVELS);
  }
  return value;
}

export function validateCounterBackend(value: unknown, key = 'counterStore.backend'): CounterBackend {
  if (!isCounterBackend(value)) {
    throw invalidConfig(key, value, COUNTER_BACKENDS);
  }
  return value;
}

export function validateCounterPath(value: unknown, key = 'counterStore.path'): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw invalidConfig(key, value, 'non-empty path');
  }
  return value;
}

// ============================================================================
// Configuration Validators
// ============================================================================

/**
 * Validates every field of a partial configuration that is present
 *
 * @throws ValidationError (INVALID_CONFIG) on the first invalid value
 */
export function validatePartialConfiguration(config: PartialConfiguration): void {
  if (config.systemChecks !== undefined) {
    validateSystemChecks(config.systemChecks);
  }
  if (config.defaultStrategy !== undefined) {
    validateStrategy(config.defaultStrategy);
  }
  if (config.logLevel !== undefined) {
    validateLogLevel(config.logLevel);
  }
  if (config.counterStore?.backend !== undefined) {
    validateCounterBackend(config.counterStore.backend);
  }
  if (config.counterStore?.path !== undefined) {
    validateCounterPath(config.counterStore.path);
  }
}

/**
 * Validates a complete configuration
 *
 * @throws ValidationError (INVALID_CONFIG) on the first invalid value
 */
export function validateConfiguration(config: Configuration): void {
  validateSystemChecks(config.systemChecks);
  validateStrategy(config.defaultStrategy);
  validateLogLevel(config.logLevel);
  validateCounterBackend(config.counterStore.backend);
  if (config.counterStore.path !== undefined) {
    validateCounterPath(config.counterStore.path);
  }
}
