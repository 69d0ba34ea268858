/**
 * Per-key exclusive locks for transactions on one process.
 *
 * Waiters are granted in FIFO order. A wait ends with `BusyError` after
 * `timeoutMs`, or with the error mapped from the signal's reason when the
 * caller aborts. Re-acquiring a key already held by the same owner returns
 * immediately.
 */

import { BusyError, errorFromAbortReason } from '../errors.js';

export interface AcquireOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

interface Waiter {
  owner: object;
  grant: () => void;
}

interface LockEntry {
  owner: object;
  waiters: Waiter[];
}

export class LockManager {
  private readonly locks = new Map<string, LockEntry>();

  async acquire(key: string, owner: object, options: AcquireOptions): Promise<void> {
    if (options.signal?.aborted) {
      throw errorFromAbortReason(options.signal.reason);
    }

    const entry = this.locks.get(key);
    if (!entry) {
      this.locks.set(key, { owner, waiters: [] });
      return;
    }
    if (entry.owner === owner) return;

    const { timeoutMs, signal } = options;

    return new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const waiter: Waiter = {
        owner,
        grant: () => {
          cleanup();
          resolve();
        },
      };

      const withdraw = (): void => {
        const index = entry.waiters.indexOf(waiter);
        if (index !== -1) entry.waiters.splice(index, 1);
      };

      const timer = setTimeout(() => {
        withdraw();
        cleanup();
        reject(new BusyError(key, timeoutMs));
      }, timeoutMs);

      const onAbort = (): void => {
        withdraw();
        cleanup();
        reject(errorFromAbortReason(signal?.reason));
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      entry.waiters.push(waiter);
    });
  }

  /**
   * Release `key` and hand it to the next waiter, if any.
   */
  release(key: string, owner: object): void {
    const entry = this.locks.get(key);
    if (!entry || entry.owner !== owner) return;

    const next = entry.waiters.shift();
    if (next) {
      entry.owner = next.owner;
      next.grant();
    } else {
      this.locks.delete(key);
    }
  }

  isHeldBy(key: string, owner: object): boolean {
    return this.locks.get(key)?.owner === owner;
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  /** Number of owners queued behind the holder of `key` */
  queueLength(key: string): number {
    return this.locks.get(key)?.waiters.length ?? 0;
  }
}

export const cartKey = (userId: number): string => `cart:${userId}`;
export const orderKey = (orderId: string): string => `order:${orderId}`;
export const productKey = (productId: number): string => `product:${productId}`;
