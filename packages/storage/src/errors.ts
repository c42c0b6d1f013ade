/**
 * Storage Error Mapping
 *
 * Maps SQLite and filesystem failures to lexid StorageErrors, so that
 * callers see the same error codes whichever backend persists counters.
 */

import { StorageError, ErrorCode } from '@lexid/core';

// ============================================================================
// SQLite Error Codes
// ============================================================================

/**
 * Common SQLite result codes that we need to handle
 * @see https://www.sqlite.org/rescode.html
 */
export const SqliteResultCode = {
  /** Generic error */
  ERROR: 1,
  /** Access permission denied */
  PERM: 3,
  /** Database file is locked */
  BUSY: 5,
  /** Table in the database is locked */
  LOCKED: 6,
  /** Attempt to write a readonly database */
  READONLY: 8,
  /** Disk I/O error */
  IOERR: 10,
  /** Database disk image is malformed */
  CORRUPT: 11,
  /** Database or disk is full */
  FULL: 13,
  /** Unable to open database file */
  CANTOPEN: 14,
  /** File opened that is not a database file */
  NOTADB: 26,
} as const;

export type SqliteResultCode = (typeof SqliteResultCode)[keyof typeof SqliteResultCode];

// ============================================================================
// Error Detection
// ============================================================================

/**
 * Reads the `code` property of an error. better-sqlite3 uses names such as
 * `SQLITE_BUSY`; other drivers use the numeric result code.
 */
function errorCode(error: Error): unknown {
  return 'code' in error ? error.code : undefined;
}

function hasResultCode(error: Error, numeric: readonly number[], names: readonly string[]): boolean {
  const code = errorCode(error);
  if (typeof code === 'number') {
    return numeric.includes(code);
  }
  if (typeof code === 'string') {
    return names.some((name) => code === name || code.startsWith(`${name}_`));
  }
  return false;
}

/**
 * Check if an error is a SQLite busy/locked error
 */
export function isBusyError(error: unknown): boolean {
  if (error instanceof Error) {
    if (hasResultCode(error, [SqliteResultCode.BUSY, SqliteResultCode.LOCKED], ['SQLITE_BUSY', 'SQLITE_LOCKED'])) {
      return true;
    }
    if (/database is locked/i.test(error.message)) {
      return true;
    }
  }
  return false;
}

/**
 * Check if an error indicates database corruption
 */
export function isCorruptionError(error: unknown): boolean {
  if (error instanceof Error) {
    if (hasResultCode(error, [SqliteResultCode.CORRUPT, SqliteResultCode.NOTADB], ['SQLITE_CORRUPT', 'SQLITE_NOTADB'])) {
      return true;
    }
    if (/malformed|corrupt|not a database/i.test(error.message)) {
      return true;
    }
  }
  return false;
}

// ============================================================================
// Error Conversion
// ============================================================================

/**
 * Convert a SQLite error to a StorageError
 *
 * @param error - The original SQLite error
 * @param context - Optional context about the operation that failed
 */
export function mapStorageError(
  error: unknown,
  context?: { operation?: string; counter?: string }
): StorageError {
  if (error instanceof StorageError) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new StorageError(
      `Storage operation failed: ${String(error)}`,
      ErrorCode.DATABASE_ERROR,
      { operation: context?.operation, counter: context?.counter }
    );
  }

  if (isBusyError(error)) {
    return new StorageError(
      'Database is busy. Please retry the operation.',
      ErrorCode.DATABASE_BUSY,
      {
        operation: context?.operation,
        counter: context?.counter,
        retryable: true,
      },
      error
    );
  }

  if (isCorruptionError(error)) {
    return new StorageError(
      'Database is corrupted or not a valid database file',
      ErrorCode.DATABASE_ERROR,
      {
        operation: context?.operation,
        counter: context?.counter,
        corrupted: true,
      },
      error
    );
  }

  return new StorageError(
    `Database operation failed: ${error.message}`,
    ErrorCode.DATABASE_ERROR,
    {
      sqliteCode: errorCode(error),
      operation: context?.operation,
      counter: context?.counter,
    },
    error
  );
}

/**
 * Create a storage error for connection failures
 */
export function connectionError(path: string, error: unknown): StorageError {
  if (!(error instanceof Error)) {
    return new StorageError(
      `Failed to open database at ${path}: ${String(error)}`,
      ErrorCode.DATABASE_ERROR,
      { path }
    );
  }

  return new StorageError(
    `Failed to open database at ${path}: ${error.message}`,
    ErrorCode.DATABASE_ERROR,
    { path },
    error
  );
}
