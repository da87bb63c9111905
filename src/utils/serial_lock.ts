/**
 * @fileoverview Promise-chain locks.
 *
 * `KeyedSerialLock` serializes work per key (one conversation turn at a time)
 * without making different keys wait on each other. `Mutex` is the single-key
 * case, used for index writers.
 */

import { waitUnlessAborted } from './async.js';

export class KeyedSerialLock {
  private locks = new Map<string, Promise<void>>();

  /**
   * Run `work` once every earlier holder of `key` has finished. A caller
   * whose signal fires while still queued gives up its place and rejects
   * with PipelineCancelledError; later callers keep waiting for the holders
   * ahead of it.
   */
  async run<T>(key: string, work: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const prior = this.locks.get(key);
    const previous = prior ?? Promise.resolve();
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const chain = previous.then(() => gate);
    this.locks.set(key, chain);

    try {
      await waitUnlessAborted(previous, signal, 'queue');
    } catch (error) {
      release();
      if (this.locks.get(key) === chain) {
        if (prior) {
          this.locks.set(key, prior);
          // The holder of `prior` may already have finished without clearing it.
          void prior.then(() => {
            if (this.locks.get(key) === prior) this.locks.delete(key);
          });
        } else {
          this.locks.delete(key);
        }
      }
      throw error;
    }
    try {
      return await work();
    } finally {
      release();
      if (this.locks.get(key) === chain) {
        this.locks.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get pending(): number {
    return this.locks.size;
  }
}

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(work: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    this.tail = previous.then(() => gate);

    await previous;
    try {
      return await work();
    } finally {
      release();
    }
  }
}
