/**
 * Tests for Mutex.
 */

import { describe, it, expect } from 'vitest';
import { Mutex } from '../utils/mutex.js';

describe('Mutex', () => {
  it('should grant the lock in FIFO order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const first = await mutex.acquire();
    const second = mutex.acquire().then((guard) => {
      order.push('second');
      guard.dispose();
    });
    const third = mutex.acquire().then((guard) => {
      order.push('third');
      guard.dispose();
    });

    expect(mutex.pending).toBe(2);
    order.push('first');
    first.dispose();
    await Promise.all([second, third]);

    expect(order).toEqual(['first', 'second', 'third']);
    expect(mutex.pending).toBe(0);
  });

  it('should ignore a second dispose', async () => {
    const mutex = new Mutex();
    const guard = await mutex.acquire();
    const waiting = mutex.acquire();

    guard.dispose();
    guard.dispose();
    const next = await waiting;

    let acquired = false;
    const pending = mutex.acquire().then((g) => {
      acquired = true;
      g.dispose();
    });
    await Promise.resolve();
    expect(acquired).toBe(false);

    next.dispose();
    await pending;
    expect(acquired).toBe(true);
  });

  it('should drop a waiter whose signal aborts', async () => {
    const mutex = new Mutex();
    const held = await mutex.acquire();
    const abort = new AbortController();
    const reason = new Error('stop waiting');

    const waiting = mutex.acquire(abort.signal);
    const after = mutex.acquire();
    expect(mutex.pending).toBe(2);

    abort.abort(reason);
    await expect(waiting).rejects.toBe(reason);
    expect(mutex.pending).toBe(1);

    held.dispose();
    const next = await after;
    expect(mutex.pending).toBe(0);
    next.dispose();
  });

  it('should reject at once when the signal is already aborted', async () => {
    const mutex = new Mutex();
    const reason = new Error('too late');

    await expect(mutex.acquire(AbortSignal.abort(reason))).rejects.toBe(reason);
    const guard = await mutex.acquire();
    guard.dispose();
  });
});
