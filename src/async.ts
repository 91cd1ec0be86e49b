/**
 * Promise-based helpers over reactive values.
 *
 * This module is opt-in: it bridges change notifications to promises and
 * async callbacks for code that lives on the event loop.
 *
 * @example
 * ```ts
 * import { signal } from "dataflow-signals";
 * import { waitUntil } from "dataflow-signals/async";
 *
 * const progress = signal(0);
 * const done = waitUntil(progress, (p) => p >= 100);
 * progress.set(100);
 * await done; // 100
 * ```
 */

import type { Reactive } from "./signals/index.js";
import type { Subscription } from "./signals/subscription.js";

export interface WaitOptions {
  /** Abort the wait; the promise rejects with the signal's reason. */
  signal?: AbortSignal;
}

/**
 * Subscribe until `settle` says the wait is over. Handles the abort wiring
 * and the unsubscribe shared by both waits.
 */
function waitFor<T>(
  source: Reactive<T>,
  settle: (value: T) => boolean,
  options: WaitOptions,
): Promise<T> {
  const { signal } = options;
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const cleanup = () => {
      source.unsubscribe(subscriptionId);
      signal?.removeEventListener("abort", onAbort);
    };
    const onAbort = () => {
      cleanup();
      reject(signal?.reason);
    };

    const subscriptionId = source.subscribe(() => {
      try {
        const value = source.peek();
        if (!settle(value)) return;
        cleanup();
        resolve(value);
      } catch (error) {
        cleanup();
        reject(error);
      }
    });
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Resolve with the value after the next change notification.
 *
 * @example
 * const next = waitForChange(count);
 * count.set(5);
 * await next; // 5
 */
export function waitForChange<T>(
  source: Reactive<T>,
  options: WaitOptions = {},
): Promise<T> {
  return waitFor(source, () => true, options);
}

/**
 * Resolve with the first value satisfying `predicate`: the current one if it
 * already does, otherwise the first one after a change.
 */
export function waitUntil<T>(
  source: Reactive<T>,
  predicate: (value: T) => boolean,
  options: WaitOptions = {},
): Promise<T> {
  try {
    const current = source.peek();
    if (predicate(current)) return Promise.resolve(current);
  } catch (error) {
    return Promise.reject(error);
  }
  return waitFor(source, predicate, options);
}

/**
 * Run `callback` with the new value on every change. The callback may be
 * async; a rejection (or a throw) is logged through the source's runtime
 * logger and the watcher keeps going.
 *
 * @returns the subscription; dispose it to stop watching
 */
export function watch<T>(
  source: Reactive<T>,
  callback: (value: T) => void | Promise<void>,
): Subscription {
  const { logger } = source.runtime;
  const run = async () => {
    try {
      await callback(source.peek());
    } catch (error) {
      logger.error("[async] Watcher callback failed", error);
    }
  };
  return source.subscribeScoped(() => {
    void run();
  });
}
