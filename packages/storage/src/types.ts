/**
 * Storage Types
 *
 * Configuration for the persisted counter stores.
 */

import type { IdLogger } from '@lexid/core';

// ============================================================================
// SQLite Configuration
// ============================================================================

/**
 * SQLite pragma settings
 */
export interface SqlitePragmas {
  /** Journal mode (default: WAL) */
  journal_mode?: 'delete' | 'truncate' | 'persist' | 'memory' | 'wal' | 'off';
  /** Synchronous mode (default: FULL; counter write-backs are rare) */
  synchronous?: 'off' | 'normal' | 'full' | 'extra';
  /** Busy timeout in milliseconds (default: 5000) */
  busy_timeout?: number;
}

/**
 * Default pragma settings for counter databases
 */
export const DEFAULT_PRAGMAS: Required<SqlitePragmas> = {
  journal_mode: 'wal',
  synchronous: 'full',
  busy_timeout: 5000,
};

/**
 * Configuration for a SQLite counter store
 */
export interface SqliteCounterStoreConfig {
  /** Path to the database file (or :memory: for in-memory) */
  path: string;
  /** SQLite pragma settings */
  pragmas?: SqlitePragmas;
  logger?: IdLogger;
}

// ============================================================================
// File Configuration
// ============================================================================

/**
 * Configuration for a file counter store
 */
export interface FileCounterStoreConfig {
  /** Directory holding one file per counter; created if missing */
  directory: string;
  logger?: IdLogger;
}
