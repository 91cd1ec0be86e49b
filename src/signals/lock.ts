/**
 * TimedLock - a mutex whose acquisition gives up after a bounded wait.
 *
 * The lock word lives in a SharedArrayBuffer and is driven with Atomics, so
 * waiting blocks the calling thread without spinning. Inside one isolate the
 * holder can never release while the waiter is blocked; contention there
 * always ends in a DeadlockError once the timeout elapses instead of hanging.
 */

import { DeadlockError } from "./errors.js";

const UNLOCKED = 0;
const LOCKED = 1;

export class TimedLock {
  readonly #word = new Int32Array(new SharedArrayBuffer(4));

  get isLocked(): boolean {
    return Atomics.load(this.#word, 0) === LOCKED;
  }

  /** Try to take the lock, waiting at most `timeoutMs`. */
  tryLockFor(timeoutMs: number): boolean {
    const deadline = Date.now() + timeoutMs;
    while (
      Atomics.compareExchange(this.#word, 0, UNLOCKED, LOCKED) !== UNLOCKED
    ) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) return false;
      Atomics.wait(this.#word, 0, LOCKED, remaining);
    }
    return true;
  }

  release(): void {
    Atomics.store(this.#word, 0, UNLOCKED);
    Atomics.notify(this.#word, 0, 1);
  }

  /**
   * Run `fn` while holding the lock.
   * @param resource - named in the DeadlockError if the wait times out
   */
  run<T>(timeoutMs: number, resource: string, fn: () => T): T {
    if (!this.tryLockFor(timeoutMs)) {
      throw new DeadlockError(resource, timeoutMs);
    }
    try {
      return fn();
    } finally {
      this.release();
    }
  }
}
