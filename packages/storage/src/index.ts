/**
 * @lexid/storage
 *
 * Persisted counter stores for the local_lexical strategy.
 */

// Types
export {
  DEFAULT_PRAGMAS,
  type SqlitePragmas,
  type SqliteCounterStoreConfig,
  type FileCounterStoreConfig,
} from './types.js';

// Errors
export {
  SqliteResultCode,
  isBusyError,
  isCorruptionError,
  mapStorageError,
  connectionError,
} from './errors.js';

// Stores
export { FileCounterStore, COUNTER_FILE_EXTENSION } from './file-store.js';
export { SqliteCounterStore, COUNTERS_SCHEMA } from './sqlite-store.js';

// Factory
export {
  createCounterStore,
  createConfiguredGenerator,
  type CreateCounterStoreOptions,
} from './create-store.js';
