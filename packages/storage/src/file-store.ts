/**
 * File Counter Store
 *
 * Keeps each counter as decimal text in its own file under one directory.
 * Writes go to a temporary file that is renamed over the target, so a
 * crash mid-write leaves the previous value intact.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  counterReadFailed,
  counterWriteFailed,
  invalidInput,
  silentLogger,
  storeClosed,
  type CounterStore,
  type IdLogger,
} from '@lexid/core';
import type { FileCounterStoreConfig } from './types.js';

/** Counter names become file names, so they are limited to a safe alphabet */
const COUNTER_NAME_PATTERN = /^[A-Za-z0-9_@.-]+$/;

const DECIMAL_PATTERN = /^\d+$/;

/** Extension of counter files */
export const COUNTER_FILE_EXTENSION = '.counter';

/**
 * CounterStore backed by plain files
 */
export class FileCounterStore implements CounterStore {
  readonly directory: string;
  private readonly logger: IdLogger;
  private closed = false;

  constructor(config: FileCounterStoreConfig) {
    this.directory = path.resolve(config.directory);
    this.logger = config.logger ?? silentLogger;
    fs.mkdirSync(this.directory, { recursive: true });
  }

  get location(): string {
    return this.directory;
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  /**
   * Path of the file holding a counter
   */
  pathFor(name: string): string {
    if (!COUNTER_NAME_PATTERN.test(name) || name === '.' || name === '..') {
      throw invalidInput('counter name', name, 'letters, digits, _ @ . -');
    }
    return path.join(this.directory, `${name}${COUNTER_FILE_EXTENSION}`);
  }

  /**
   * @throws StorageError (COUNTER_READ_FAILED) if the file holds anything but a decimal integer
   */
  read(name: string): bigint | undefined {
    this.ensureOpen();
    const file = this.pathFor(name);

    let content: string;
    try {
      content = fs.readFileSync(file, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw counterReadFailed(name, describe(error), asError(error), { location: file });
    }

    const text = content.trim();
    if (!DECIMAL_PATTERN.test(text)) {
      throw counterReadFailed(name, `expected a decimal integer, found ${JSON.stringify(text.slice(0, 40))}`, undefined, {
        location: file,
      });
    }
    return BigInt(text);
  }

  /**
   * @throws StorageError (COUNTER_WRITE_FAILED) if the file cannot be written
   */
  write(name: string, value: bigint): void {
    this.ensureOpen();
    const file = this.pathFor(name);
    const temp = `${file}.${process.pid}.tmp`;

    try {
      fs.writeFileSync(temp, `${value.toString()}\n`, 'utf-8');
      fs.renameSync(temp, file);
    } catch (error) {
      fs.rmSync(temp, { force: true });
      throw counterWriteFailed(name, describe(error), asError(error), { location: file });
    }
    this.logger.log('debug', 'Counter written', { counter: name, location: file });
  }

  close(): void {
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw storeClosed(this.directory);
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
