/**
 * @license
 * Copyright 2025 Google Inc.
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * A simple asynchronous FIFO mutex.
 * Used to serialise inference on runtimes that cannot run calls in parallel.
 */
export class Mutex {
  static Guard = class Guard {
    #mutex: Mutex;
    #released = false;

    constructor(mutex: Mutex) {
      this.#mutex = mutex;
    }

    /**
     * Releases the mutex. Safe to call more than once.
     */
    dispose(): void {
      if (this.#released) return;
      this.#released = true;
      this.#mutex.release();
    }
  };

  #locked = false;
  #acquirers: Array<() => void> = [];

  /**
   * Acquires the mutex, waiting in FIFO order if necessary.
   * Rejects with the signal's reason, and leaves the queue, when `signal`
   * aborts before the mutex is granted.
   */
  async acquire(signal?: AbortSignal): Promise<InstanceType<typeof Mutex.Guard>> {
    signal?.throwIfAborted();
    if (!this.#locked) {
      this.#locked = true;
      return new Mutex.Guard(this);
    }
    await new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.#acquirers.indexOf(grant);
        if (index === -1) return;
        this.#acquirers.splice(index, 1);
        reject(signal?.reason);
      };
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.#acquirers.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
    return new Mutex.Guard(this);
  }

  get pending(): number {
    return this.#acquirers.length;
  }

  private release(): void {
    const resolve = this.#acquirers.shift();
    if (!resolve) {
      this.#locked = false;
      return;
    }
    resolve();
  }
}
