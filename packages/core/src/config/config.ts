/**
 * Configuration Access API
 *
 * Loads configuration with the precedence: overrides > environment > file > defaults.
 */

import { ConsoleIdLogger } from '../id/telemetry.js';
import type { GeneratorOptions } from '../id/generator.js';
import { getDefaultConfig } from './defaults.js';
import { getEnvConfigPath, loadEnvConfig } from './env.js';
import { discoverConfigFile, readConfigFile } from './file.js';
import { cloneConfiguration, mergeConfiguration } from './merge.js';
import {
  ConfigSource,
  type ConfigPath,
  type Configuration,
  type LoadConfigOptions,
  type PartialConfiguration,
  type ResolvedConfiguration,
} from './types.js';
import { validateConfiguration, validatePartialConfiguration } from './validation.js';

// ============================================================================
// Configuration State
// ============================================================================

/** Cached configuration instance */
let cachedConfig: Configuration | null = null;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Loads configuration and records where each value came from
 *
 * @throws ValidationError (INVALID_CONFIG) if any source holds an invalid value
 */
export function resolveConfig(options: LoadConfigOptions = {}): ResolvedConfiguration {
  const env = options.env ?? process.env;
  let config = getDefaultConfig();
  const sources = createDefaultSources();

  const envConfigPath = options.skipEnv ? undefined : getEnvConfigPath(env);
  const discovery = options.skipFile
    ? { exists: false, path: undefined }
    : discoverConfigFile(options.configPath ?? envConfigPath, options.cwd);

  let filePath: string | undefined;
  if (discovery.exists && discovery.path) {
    const fileConfig = readConfigFile(discovery.path);
    config = mergeConfiguration(config, fileConfig);
    trackSources(sources, fileConfig, ConfigSource.FILE);
    filePath = discovery.path;
  }

  if (!options.skipEnv) {
    const envConfig = loadEnvConfig(env);
    config = mergeConfiguration(config, envConfig);
    trackSources(sources, envConfig, ConfigSource.ENVIRONMENT);
  }

  if (options.overrides) {
    validatePartialConfiguration(options.overrides);
    config = mergeConfiguration(config, options.overrides);
    trackSources(sources, options.overrides, ConfigSource.OVERRIDE);
  }

  if (config.counterStore.path === undefined) {
    sources['counterStore.path'] = ConfigSource.DEFAULT;
  }

  validateConfiguration(config);
  return { config, sources, filePath };
}

/**
 * Loads configuration with full precedence chain
 *
 * Precedence (highest to lowest):
 * 1. Overrides (if provided)
 * 2. Environment variables
 * 3. Config file
 * 4. Built-in defaults
 */
export function loadConfig(options: LoadConfigOptions = {}): Configuration {
  const { config } = resolveConfig(options);
  cachedConfig = config;
  return cloneConfiguration(config);
}

/**
 * Gets the current configuration, loading it from the default sources if necessary
 */
export function getConfig(): Configuration {
  if (cachedConfig === null) {
    return loadConfig();
  }
  return cloneConfiguration(cachedConfig);
}

/**
 * Clears the configuration cache
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

// ============================================================================
// Generator Options
// ============================================================================

/**
 * Generator options a configuration implies, minus the counter store,
 * which the storage package opens from `config.counterStore`
 */
export function toGeneratorOptions(config: Configuration): GeneratorOptions {
  return {
    systemChecks: config.systemChecks,
    defaultStrategy: config.defaultStrategy,
    logger: new ConsoleIdLogger({ minLevel: config.logLevel }),
  };
}

// ============================================================================
// Helper Functions
// ============================================================================

function createDefaultSources(): Record<ConfigPath, ConfigSource> {
  return {
    systemChecks: ConfigSource.DEFAULT,
    defaultStrategy: ConfigSource.DEFAULT,
    logLevel: ConfigSource.DEFAULT,
    'counterStore.backend': ConfigSource.DEFAULT,
    'counterStore.path': ConfigSource.DEFAULT,
  };
}

function trackSources(
  sources: Record<ConfigPath, ConfigSource>,
  partial: PartialConfiguration,
  source: ConfigSource
): void {
  if (partial.systemChecks !== undefined) {
    sources.systemChecks = source;
  }
  if (partial.defaultStrategy !== undefined) {
    sources.defaultStrategy = source;
  }
  if (partial.logLevel !== undefined) {
    sources.logLevel = source;
  }
  if (partial.counterStore?.backend !== undefined) {
    sources['counterStore.backend'] = source;
  }
  if (partial.counterStore?.path !== undefined) {
    sources['counterStore.path'] = source;
  }
}
