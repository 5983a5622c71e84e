/**
 * Async FIFO mutex.
 * Callers wait in the order they called acquire(); the lock is handed
 * directly to the next waiter on release.
 */

import { createModuleLogger } from '../utils/logger.js';

const log = createModuleLogger('mutex');

/** Releases a held lock. Calling it more than once has no effect. */
export type ReleaseFn = () => void;

/**
 * Async mutex that serializes access to a shared resource.
 */
export interface AsyncMutex {
  /**
   * Acquire the lock. If already held, the returned promise
   * resolves once all preceding callers have released.
   * @returns A release function that MUST be called when done.
   */
  acquire(): Promise<ReleaseFn>;

  /**
   * Acquire the lock, run fn, then release it (even if fn throws).
   * @returns The return value of fn.
   */
  withLock<T>(fn: () => T | Promise<T>): Promise<T>;

  /** Whether the lock is currently held */
  isLocked(): boolean;
}

/**
 * Create a new AsyncMutex instance.
 */
export function createAsyncMutex(): AsyncMutex {
  let locked = false;
  const waiters: Array<(release: ReleaseFn) => void> = [];

  function createRelease(): ReleaseFn {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = waiters.shift();
      if (next) {
        // Stay locked and hand off to the next waiter
        log.trace({ queueLength: waiters.length }, 'Mutex handed to next waiter');
        next(createRelease());
      } else {
        locked = false;
      }
    };
  }

  return {
    async acquire(): Promise<ReleaseFn> {
      if (!locked) {
        locked = true;
        return createRelease();
      }

      log.trace({ queueLength: waiters.length + 1 }, 'Mutex busy, queuing waiter');
      return new Promise<ReleaseFn>((resolve) => {
        waiters.push(resolve);
      });
    },

    async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
      const release = await this.acquire();
      try {
        return await fn();
      } finally {
        release();
      }
    },

    isLocked(): boolean {
      return locked;
    },
  };
}
