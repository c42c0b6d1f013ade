/**
 * Configuration Merging
 */

import type { Configuration, PartialConfiguration } from './types.js';

/**
 * Merges a partial configuration over a complete one.
 * Undefined values never override, except that a counter store path belongs
 * to its backend: switching backend without a path drops the old path.
 */
export function mergeConfiguration(base: Configuration, partial: PartialConfiguration): Configuration {
  const backend = partial.counterStore?.backend ?? base.counterStore.backend;
  const basePath = backend === base.counterStore.backend ? base.counterStore.path : undefined;
  return {
    systemChecks: partial.systemChecks ?? base.systemChecks,
    defaultStrategy: partial.defaultStrategy ?? base.defaultStrategy,
    logLevel: partial.logLevel ?? base.logLevel,
    counterStore: {
      backend,
      path: partial.counterStore?.path ?? basePath,
    },
  };
}

/**
 * Deep copy of a configuration
 */
export function cloneConfiguration(config: Configuration): Configuration {
  return { ...config, counterStore: { ...config.counterStore } };
}
