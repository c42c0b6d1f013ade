/**
 * Configuration File Loading
 *
 * Handles YAML configuration file parsing and discovery.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { invalidConfig } from '../errors/factories.js';
import { LEXID_DIR } from './defaults.js';
import type { ConfigFileDiscovery, PartialConfiguration } from './types.js';
import {
  validateCounterBackend,
  validateCounterPath,
  validateLogLevel,
  validateStrategy,
  validateSystemChecks,
} from './validation.js';

// ============================================================================
// Constants
// ============================================================================

/** Default config file name */
export const CONFIG_FILE_NAME = 'config.yaml';

/** Top-level keys a config file may contain */
const KNOWN_KEYS = new Set(['system_checks', 'default_strategy', 'log_level', 'counter_store']);

/** Keys of the counter_store section */
const KNOWN_COUNTER_KEYS = new Set(['backend', 'path']);

// ============================================================================
// File Discovery
// ============================================================================

/**
 * Finds the nearest .lexid directory by walking up from the given directory.
 *
 * @returns Path to .lexid directory, or undefined if not found
 */
export function findLexidDir(startDir: string): string | undefined {
  let currentDir = path.resolve(startDir);

  for (;;) {
    const candidate = path.join(currentDir, LEXID_DIR);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isDirectory()) {
      return candidate;
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      return undefined;
    }
    currentDir = parent;
  }
}

/**
 * Discovers the configuration file location
 *
 * @param overridePath - Explicit file path; used as is when given
 * @param startDir - Directory to start searching from (default: cwd)
 */
export function discoverConfigFile(
  overridePath?: string,
  startDir: string = process.cwd()
): ConfigFileDiscovery {
  if (overridePath) {
    const resolvedPath = path.resolve(startDir, overridePath);
    const exists = fs.existsSync(resolvedPath);
    return {
      path: resolvedPath,
      exists,
      configDir: exists ? path.dirname(resolvedPath) : undefined,
    };
  }

  const lexidDir = findLexidDir(startDir);
  if (lexidDir) {
    const configPath = path.join(lexidDir, CONFIG_FILE_NAME);
    return {
      path: configPath,
      exists: fs.existsSync(configPath),
      configDir: lexidDir,
    };
  }

  return { exists: false };
}

// ============================================================================
// YAML Parsing
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses YAML content into a raw config object
 *
 * @throws ValidationError (INVALID_CONFIG) if the content is not YAML or not a mapping
 */
export function parseYamlConfig(content: string, filePath?: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw invalidConfig(
      filePath ?? 'config',
      content,
      'YAML document',
      { reason: err instanceof Error ? err.message : String(err) }
    );
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw invalidConfig(filePath ?? 'config', parsed, 'YAML mapping');
  }
  return parsed;
}

/**
 * Converts YAML config (snake_case) to internal format (camelCase)
 *
 * @throws ValidationError (INVALID_CONFIG) on unknown keys or invalid values
 */
export function convertYamlToConfig(yamlConfig: Record<string, unknown>): PartialConfiguration {
  for (const key of Object.keys(yamlConfig)) {
    if (!KNOWN_KEYS.has(key)) {
      throw invalidConfig(key, yamlConfig[key], `one of ${[...KNOWN_KEYS].join(', ')}`);
    }
  }

  const result: PartialConfiguration = {};

  if (yamlConfig.system_checks !== undefined) {
    result.systemChecks = validateSystemChecks(yamlConfig.system_checks, 'system_checks');
  }
  if (yamlConfig.default_strategy !== undefined) {
    result.defaultStrategy = validateStrategy(yamlConfig.default_strategy, 'default_strategy');
  }
  if (yamlConfig.log_level !== undefined) {
    result.logLevel = validateLogLevel(yamlConfig.log_level, 'log_level');
  }

  const counterStore = yamlConfig.counter_store;
  if (counterStore !== undefined && counterStore !== null) {
    if (!isPlainObject(counterStore)) {
      throw invalidConfig('counter_store', counterStore, 'mapping with backend and path');
    }
    for (const key of Object.keys(counterStore)) {
      if (!KNOWN_COUNTER_KEYS.has(key)) {
        throw invalidConfig(`counter_store.${key}`, counterStore[key], 'backend or path');
      }
    }
    result.counterStore = {};
    if (counterStore.backend !== undefined) {
      result.counterStore.backend = validateCounterBackend(counterStore.backend, 'counter_store.backend');
    }
    if (counterStore.path !== undefined) {
      result.counterStore.path = validateCounterPath(counterStore.path, 'counter_store.path');
    }
  }

  return result;
}

/**
 * Reads and parses a configuration file. A relative counter path is
 * resolved against the directory that holds the file.
 *
 * @returns Partial configuration, empty when the file does not exist
 */
export function readConfigFile(filePath: string): PartialConfiguration {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  const config = convertYamlToConfig(parseYamlConfig(content, filePath));
  if (config.counterStore?.path !== undefined && !path.isAbsolute(config.counterStore.path)) {
    config.counterStore.path = path.resolve(path.dirname(filePath), config.counterStore.path);
  }
  return config;
}
