/**
 * SQLite Counter Store
 *
 * Keeps counters in a `counters` table of a better-sqlite3 database.
 * Values are stored as decimal text since they exceed SQLite's 64-bit integers.
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType, Statement } from 'better-sqlite3';
import {
  counterReadFailed,
  silentLogger,
  storeClosed,
  type CounterStore,
  type IdLogger,
} from '@lexid/core';
import { connectionError, mapStorageError } from './errors.js';
import { DEFAULT_PRAGMAS, type SqliteCounterStoreConfig, type SqlitePragmas } from './types.js';

const DECIMAL_PATTERN = /^\d+$/;

/** Schema of the counters table */
export const COUNTERS_SCHEMA = `
  CREATE TABLE IF NOT EXISTS counters (
    name TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

/**
 * CounterStore backed by a SQLite database
 */
export class SqliteCounterStore implements CounterStore {
  private db: DatabaseType | null;
  private readonly _path: string;
  private readonly logger: IdLogger;
  private readonly selectStmt: Statement<[string], { value: unknown }>;
  private readonly upsertStmt: Statement<[string, string, string]>;

  constructor(config: SqliteCounterStoreConfig) {
    this._path = config.path;
    this.logger = config.logger ?? silentLogger;

    let db: DatabaseType | undefined;
    try {
      db = new Database(config.path);
      this.db = db;
      this.applyPragmas(db, config.pragmas);
      db.exec(COUNTERS_SCHEMA);
      this.selectStmt = db.prepare<[string], { value: unknown }>('SELECT value FROM counters WHERE name = ?');
      this.upsertStmt = db.prepare<[string, string, string]>(
        `INSERT INTO counters (name, value, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(name) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
      );
    } catch (error) {
      if (db?.open) {
        db.close();
      }
      throw connectionError(config.path, error);
    }
  }

  private applyPragmas(db: DatabaseType, pragmas?: SqlitePragmas): void {
    const settings = { ...DEFAULT_PRAGMAS, ...pragmas };

    // In-memory databases ignore WAL and report 'memory'
    db.pragma(`journal_mode = ${settings.journal_mode}`);
    db.pragma(`synchronous = ${settings.synchronous}`);
    db.pragma(`busy_timeout = ${settings.busy_timeout}`);
  }

  // --------------------------------------------------------------------------
  // Connection Management
  // --------------------------------------------------------------------------

  get location(): string {
    return this._path;
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private ensureOpen(): DatabaseType {
    if (!this.db) {
      throw storeClosed(this._path);
    }
    return this.db;
  }

  // --------------------------------------------------------------------------
  // Counter Access
  // --------------------------------------------------------------------------

  /**
   * @throws StorageError (COUNTER_READ_FAILED) if the stored value is not a decimal integer
   */
  read(name: string): bigint | undefined {
    this.ensureOpen();
    let row: { value: unknown } | undefined;
    try {
      row = this.selectStmt.get(name);
    } catch (error) {
      throw mapStorageError(error, { operation: 'read', counter: name });
    }
    if (row === undefined) {
      return undefined;
    }
    if (typeof row.value !== 'string' || !DECIMAL_PATTERN.test(row.value)) {
      throw counterReadFailed(name, `expected a decimal integer, found ${String(row.value)}`, undefined, {
        location: this._path,
      });
    }
    return BigInt(row.value);
  }

  write(name: string, value: bigint): void {
    this.ensureOpen();
    try {
      this.upsertStmt.run(name, value.toString(), new Date().toISOString());
    } catch (error) {
      throw mapStorageError(error, { operation: 'write', counter: name });
    }
    this.logger.log('debug', 'Counter written', { counter: name, location: this._path });
  }

  /**
   * Names of all stored counters
   */
  names(): string[] {
    const db = this.ensureOpen();
    try {
      return db
        .prepare<[], { name: string }>('SELECT name FROM counters ORDER BY name')
        .all()
        .map((row) => row.name);
    } catch (error) {
      throw mapStorageError(error, { operation: 'names' });
    }
  }
}
