/**
 * One-time seeds that tell concurrently running processes and threads apart.
 */

import { threadId } from 'node:worker_threads';
import { invalidInput } from '../errors/factories.js';
import type { EntropySource } from './sources.js';

/**
 * Returns a stable integer handle for the calling thread
 */
export type ThreadHandleProvider = () => number;

/**
 * Node assigns worker thread ids sequentially per process (main thread is 0),
 * so the handle itself is the first-seen order of threads.
 */
export const workerThreadHandle: ThreadHandleProvider = () => threadId;

/**
 * Seeds derived once per scope and cached for its lifetime. Never persisted.
 */
export class SeedRegistry {
  private readonly entropy: EntropySource;
  private processSeed: number | undefined;
  private readonly threadSeeds: Map<number, number> = new Map();

  constructor(entropy: EntropySource) {
    this.entropy = entropy;
  }

  /**
   * The process seed byte, read from entropy on first use
   */
  processByte(): number {
    if (this.processSeed === undefined) {
      this.processSeed = this.entropy.bytes(1)[0];
    }
    return this.processSeed;
  }

  /**
   * The process seed nibble: the high half of the process seed byte
   */
  processNibble(): number {
    return this.processByte() >> 4;
  }

  /**
   * Seed byte for a thread handle: the handle reduced mod 256.
   * More than 256 live threads can share a seed.
   */
  threadByte(handle: number): number {
    let seed = this.threadSeeds.get(handle);
    if (seed === undefined) {
      if (!Number.isSafeInteger(handle) || handle < 0) {
        throw invalidInput('thread handle', handle, 'non-negative integer');
      }
      seed = handle % 256;
      this.threadSeeds.set(handle, seed);
    }
    return seed;
  }
}
