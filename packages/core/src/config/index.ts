/**
 * Configuration System
 *
 * Layered configuration for generators: defaults, a `.lexid/config.yaml`
 * file, `LEXID_*` environment variables and programmatic overrides.
 */

// Types
export {
  COUNTER_BACKENDS,
  ConfigSource,
  EnvVars,
  type CounterBackend,
  type CounterStoreConfig,
  type Configuration,
  type PartialConfiguration,
  type ConfigPath,
  type ResolvedConfiguration,
  type EnvVar,
  type Environment,
  type LoadConfigOptions,
  type ConfigFileDiscovery,
} from './types.js';

// Defaults
export { LEXID_DIR, DEFAULT_COUNTER_PATHS, DEFAULT_CONFIG, getDefaultConfig } from './defaults.js';

// Validation
export {
  isCounterBackend,
  validateSystemChecks,
  validateStrategy,
  validateLogLevel,
  validateCounterBackend,
  validateCounterPath,
  validatePartialConfiguration,
  validateConfiguration,
} from './validation.js';

// Merging
export { mergeConfiguration, cloneConfiguration } from './merge.js';

// Environment
export { parseEnvBoolean, getEnvVar, loadEnvConfig, getEnvConfigPath, getSetEnvVars } from './env.js';

// File
export {
  CONFIG_FILE_NAME,
  findLexidDir,
  discoverConfigFile,
  parseYamlConfig,
  convertYamlToConfig,
  readConfigFile,
} from './file.js';

// Loading
export {
  resolveConfig,
  loadConfig,
  getConfig,
  clearConfigCache,
  toGeneratorOptions,
} from './config.js';
