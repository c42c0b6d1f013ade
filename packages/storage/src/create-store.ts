/**
 * Counter Store Factory
 *
 * Opens the counter store a configuration names, and builds generators
 * whose local_lexical counter lives in it.
 */

import * as path from 'node:path';
import {
  DEFAULT_COUNTER_PATHS,
  MemoryCounterStore,
  createGenerator,
  toGeneratorOptions,
  type Configuration,
  type CounterStore,
  type CounterStoreConfig,
  type GeneratorOptions,
  type IdLogger,
  type IdentifierGenerator,
} from '@lexid/core';
import { FileCounterStore } from './file-store.js';
import { SqliteCounterStore } from './sqlite-store.js';

export interface CreateCounterStoreOptions {
  /** Directory relative paths resolve against (default: cwd) */
  cwd?: string;
  logger?: IdLogger;
}

/**
 * Opens the counter store for a counter store configuration
 */
export function createCounterStore(
  config: CounterStoreConfig,
  options: CreateCounterStoreOptions = {}
): CounterStore {
  const location = path.resolve(options.cwd ?? process.cwd(), config.path ?? DEFAULT_COUNTER_PATHS[config.backend]);
  switch (config.backend) {
    case 'memory':
      return new MemoryCounterStore();
    case 'file':
      return new FileCounterStore({ directory: location, logger: options.logger });
    case 'sqlite':
      return new SqliteCounterStore({
        path: config.path === ':memory:' ? ':memory:' : location,
        logger: options.logger,
      });
  }
}

/**
 * Creates a generator from a loaded configuration. The generator owns the
 * counter store it opens and closes it on `close()`.
 *
 * @example
 * ```typescript
 * const generator = createConfiguredGenerator(loadConfig());
 * try {
 *   const id = generator.construct('local_lexical');
 * } finally {
 *   generator.close();
 * }
 * ```
 */
export function createConfiguredGenerator(
  config: Configuration,
  overrides: GeneratorOptions = {},
  options: CreateCounterStoreOptions = {}
): IdentifierGenerator {
  const base = toGeneratorOptions(config);
  const logger = overrides.logger ?? base.logger;
  const counterStore = createCounterStore(config.counterStore, { ...options, logger: options.logger ?? logger });
  try {
    return createGenerator({
      ...base,
      ...overrides,
      logger,
      counterStore,
      ownsCounterStore: true,
    });
  } catch (error) {
    counterStore.close();
    throw error;
  }
}
