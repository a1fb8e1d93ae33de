/**
 * Concurrency primitives: a counting semaphore that bounds in-flight
 * transfers, and a bounded worker pool for fan-out/fan-in dispatch.
 *
 * Both are plain objects created by the caller and passed down the call
 * chain; nothing here is process-global.
 */

import * as os from 'node:os';
import { MAX_CONCURRENT_COPIES } from './types.js';

/**
 * Counting semaphore with FIFO waiters.
 */
export class Semaphore {
  private _available: number;
  private readonly _capacity: number;
  private readonly _waiters: Array<() => void> = [];

  constructor(capacity: number = MAX_CONCURRENT_COPIES) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this._capacity = capacity;
    this._available = capacity;
  }

  /** Permits not currently held. */
  get available(): number {
    return this._available;
  }

  get capacity(): number {
    return this._capacity;
  }

  /** Number of callers blocked in `acquire()`. */
  get waiting(): number {
    return this._waiters.length;
  }

  /**
   * Take one permit, waiting until one is free.
   */
  async acquire(): Promise<void> {
    if (this._available > 0) {
      this._available--;
      return;
    }
    await new Promise<void>((resolve) => {
      this._waiters.push(resolve);
    });
  }

  /**
   * Return one permit. A blocked waiter receives it directly.
   */
  release(): void {
    const next = this._waiters.shift();
    if (next) {
      next();
      return;
    }
    if (this._available >= this._capacity) {
      throw new Error('Semaphore released more times than acquired');
    }
    this._available++;
  }

  /**
   * Run `fn` while holding a permit. The permit is released on every exit path.
   */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Default worker-pool width: half the cores, clamped to [2, 8].
 */
export function defaultPoolSize(): number {
  const cores = os.cpus()?.length ?? 4;
  return Math.min(Math.max(2, Math.floor(cores / 2)), 8);
}

/**
 * Run `worker` over every item with at most `size` running at once.
 *
 * Resolves only after every item has settled. If any worker threw, the
 * first failure is rethrown at that point.
 */
export async function runPool<T>(
  items: readonly T[],
  size: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let next = 0;
  const failures: unknown[] = [];

  async function lane(): Promise<void> {
    while (next < items.length) {
      const item = items[next++];
      try {
        await worker(item);
      } catch (err) {
        failures.push(err);
      }
    }
  }

  const lanes = Math.max(1, Math.min(size, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  if (failures.length > 0) throw failures[0];
}
