/**
 * Async locking primitives.
 * - AsyncMutex: single-resource exclusive lock, FIFO, abortable waits
 * - KeyedMutex: one AsyncMutex per key (e.g. per device alias)
 */

import { CancelledError } from './errors.js';

type Release = () => void;

interface Waiter {
  grant: () => void;
}

/**
 * AsyncMutex — Exclusive lock for async operations.
 * Only one holder at a time; others queue in FIFO order.
 */
export class AsyncMutex {
  private locked = false;
  private queue: Waiter[] = [];

  /**
   * Acquire the lock. Returns a release function.
   * An aborted waiter leaves the queue and rejects with CancelledError.
   */
  async acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) throw new CancelledError();

    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = (): void => {
        this.queue = this.queue.filter((w) => w !== waiter);
        reject(new CancelledError());
      };
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve(this.createRelease());
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  /**
   * Run a function while holding the lock.
   */
  async withLock<T>(fn: () => T | Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return; // Idempotent
      released = true;

      const next = this.queue.shift();
      if (next) {
        // Execute next in microtask to avoid stack overflow
        queueMicrotask(next.grant);
      } else {
        this.locked = false;
      }
    };
  }
}

/**
 * KeyedMutex — serializes work per key while different keys run concurrently.
 * Idle mutexes are dropped so the map only holds keys with live holders.
 */
export class KeyedMutex {
  private mutexes = new Map<string, AsyncMutex>();

  async acquire(key: string, signal?: AbortSignal): Promise<Release> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new AsyncMutex();
      this.mutexes.set(key, mutex);
    }
    const held = mutex;
    const release = await held.acquire(signal);
    return () => {
      release();
      if (!held.isLocked && held.queueLength === 0 && this.mutexes.get(key) === held) {
        this.mutexes.delete(key);
      }
    };
  }

  async withLock<T>(key: string, fn: () => T | Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(key, signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.mutexes.get(key)?.isLocked ?? false;
  }

  get size(): number {
    return this.mutexes.size;
  }
}
