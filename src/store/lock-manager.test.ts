import { describe, it, expect } from 'vitest';
import { LockManager, cartKey, orderKey, productKey } from './lock-manager.js';
import { AbortedError, BusyError, TimeoutError } from '../errors.js';

describe('LockManager', () => {
  const options = { timeoutMs: 1000 };

  it('should grant a free lock immediately', async () => {
    const locks = new LockManager();
    const owner = {};

    await locks.acquire('product:1', owner, options);

    expect(locks.isHeldBy('product:1', owner)).toBe(true);
    expect(locks.isLocked('product:2')).toBe(false);
  });

  it('should be reentrant for the same owner', async () => {
    const locks = new LockManager();
    const owner = {};

    await locks.acquire('cart:1', owner, options);
    await locks.acquire('cart:1', owner, options);

    expect(locks.queueLength('cart:1')).toBe(0);
  });

  it('should grant waiters in FIFO order', async () => {
    const locks = new LockManager();
    const [a, b, c] = [{}, {}, {}];
    const granted: string[] = [];

    await locks.acquire('product:1', a, options);
    const second = locks.acquire('product:1', b, options).then(() => granted.push('b'));
    const third = locks.acquire('product:1', c, options).then(() => granted.push('c'));

    expect(locks.queueLength('product:1')).toBe(2);

    locks.release('product:1', a);
    await second;
    expect(locks.isHeldBy('product:1', b)).toBe(true);

    locks.release('product:1', b);
    await third;

    expect(granted).toEqual(['b', 'c']);
    locks.release('product:1', c);
    expect(locks.isLocked('product:1')).toBe(false);
  });

  it('should ignore a release by a non-holder', async () => {
    const locks = new LockManager();
    const owner = {};
    await locks.acquire('order:x', owner, options);

    locks.release('order:x', {});

    expect(locks.isHeldBy('order:x', owner)).toBe(true);
  });

  it('should fail with BusyError after the timeout and leave the queue', async () => {
    const locks = new LockManager();
    await locks.acquire('product:1', {}, options);

    const waiting = locks.acquire('product:1', {}, { timeoutMs: 20 });

    await expect(waiting).rejects.toBeInstanceOf(BusyError);
    await expect(waiting).rejects.toThrow("Timed out after 20ms waiting for lock 'product:1'");
    expect(locks.queueLength('product:1')).toBe(0);
  });

  it('should stop waiting when the signal aborts', async () => {
    const locks = new LockManager();
    await locks.acquire('product:1', {}, options);
    const controller = new AbortController();

    const waiting = locks.acquire('product:1', {}, { ...options, signal: controller.signal });
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(AbortedError);
    expect(locks.queueLength('product:1')).toBe(0);
  });

  it('should report a deadline abort as a timeout', async () => {
    const locks = new LockManager();
    await locks.acquire('product:1', {}, options);
    const controller = new AbortController();

    const waiting = locks.acquire('product:1', {}, { ...options, signal: controller.signal });
    controller.abort(new TimeoutError(15));

    await expect(waiting).rejects.toThrow('Execution exceeded 15ms');
  });

  it('should refuse to start with an aborted signal', async () => {
    const locks = new LockManager();
    const controller = new AbortController();
    controller.abort();

    await expect(locks.acquire('product:1', {}, { ...options, signal: controller.signal })).rejects.toBeInstanceOf(
      AbortedError,
    );
    expect(locks.isLocked('product:1')).toBe(false);
  });

  it('should build namespaced keys', () => {
    expect(cartKey(2)).toBe('cart:2');
    expect(orderKey('abc')).toBe('order:abc');
    expect(productKey(9)).toBe('product:9');
  });
});
