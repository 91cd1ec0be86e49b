/**
 * Ambient ownership for the reactive system.
 *
 * An Owner collects cleanups (computed disposal, scoped subscriptions,
 * effects) and runs each exactly once when it is disposed. `scope()` makes
 * an owner ambient so that everything created inside registers itself.
 */

import { throwCollected } from "./dispatcher.js";

/** Callback function for subscribers */
export type Subscriber = () => void;

export type Cleanup = () => void;

export class Owner {
  #cleanups: Cleanup[] = [];
  #disposed = false;
  #disposing = false;

  get disposed(): boolean {
    return this.#disposed;
  }

  /**
   * Register a cleanup. Runs immediately if the owner is already disposed.
   */
  onCleanup(fn: Cleanup): void {
    if (this.#disposed) {
      fn();
      return;
    }
    this.#cleanups.push(fn);
  }

  /**
   * Run every cleanup once, most recent first. Calling it again, or from
   * inside a cleanup, does nothing. Errors are rethrown after all cleanups ran.
   */
  dispose(): void {
    if (this.#disposed || this.#disposing) return;
    this.#disposing = true;
    const cleanups = this.#cleanups;
    this.#cleanups = [];
    const errors: unknown[] = [];
    for (let i = cleanups.length - 1; i >= 0; i--) {
      try {
        cleanups[i]?.();
      } catch (error) {
        errors.push(error);
      }
    }
    this.#disposing = false;
    this.#disposed = true;
    throwCollected(errors, "owner cleanup failed");
  }
}

/** The owner new reactive objects register with */
let currentOwner: Owner | null = null;

export function getOwner(): Owner | null {
  return currentOwner;
}

/** Register a cleanup with the ambient owner, if there is one. */
export function registerDisposer(fn: Cleanup): void {
  currentOwner?.onCleanup(fn);
}

/** Run `fn` with `owner` as the ambient owner. */
export function runWithOwner<T>(owner: Owner | null, fn: () => T): T {
  const prev = currentOwner;
  currentOwner = owner;
  try {
    return fn();
  } finally {
    currentOwner = prev;
  }
}

/**
 * Run `fn` in a fresh ownership scope.
 *
 * @returns the result of `fn` and a function disposing everything created inside
 *
 * @example
 * const [total, dispose] = scope(() => computed(() => a.get() + b.get()));
 * total.get();
 * dispose(); // unsubscribes the computed from a and b
 */
export function scope<T>(fn: () => T): [T, () => void] {
  const owner = new Owner();
  const result = runWithOwner(owner, fn);
  return [result, () => owner.dispose()];
}
