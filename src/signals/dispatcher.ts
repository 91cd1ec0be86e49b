/**
 * Notification dispatch.
 *
 * The registry never calls subscribers directly: it hands a unit of work,
 * keyed by the cell that changed, to a Dispatcher. A dispatcher keeps at most
 * one pending unit per key (a second enqueue replaces the first) and runs each
 * unit exactly once per flush.
 */

import type { Logger } from "./config.js";
import type { SignalId } from "./ids.js";

/** A pending notification for one cell. */
export type Work = () => void;

export interface Dispatcher {
  enqueue(key: SignalId, work: Work): void;
  /** Defer notifications until `fn` returns. Optional for dispatchers that always defer. */
  batch?<T>(fn: () => T): T;
}

/** Run every queued unit, then rethrow what failed. */
function drain(queue: Map<SignalId, Work>): void {
  const errors: unknown[] = [];
  for (const work of queue.values()) {
    try {
      work();
    } catch (error) {
      errors.push(error);
    }
  }
  throwCollected(errors, "notification work failed");
}

/**
 * Rethrow the only error as-is, or several as an AggregateError.
 * @internal
 */
export function throwCollected(errors: unknown[], message: string): void {
  if (errors.length === 1) throw errors[0];
  if (errors.length > 1) throw new AggregateError(errors, message);
}

/**
 * Default dispatcher: synchronous outside a batch, deduplicated and deferred
 * to the end of the outermost `batch()` inside one.
 */
export class BatchDispatcher implements Dispatcher {
  #depth = 0;
  #queue = new Map<SignalId, Work>();

  get isBatching(): boolean {
    return this.#depth > 0;
  }

  /** Number of keys waiting for the current batch to end. */
  get pending(): number {
    return this.#queue.size;
  }

  enqueue(key: SignalId, work: Work): void {
    if (this.#depth === 0) {
      work();
      return;
    }
    this.#queue.set(key, work);
  }

  /**
   * Batch multiple signal updates into a single notification pass.
   * Subscribers are only notified after the batch function completes.
   */
  batch<T>(fn: () => T): T {
    this.#depth++;
    try {
      return fn();
    } finally {
      if (--this.#depth === 0 && this.#queue.size > 0) {
        const queue = this.#queue;
        this.#queue = new Map();
        drain(queue);
      }
    }
  }
}

export interface MicrotaskDispatcherOptions {
  /** Where failures of a deferred flush are logged; `console` by default. */
  logger?: Pick<Logger, "error">;
  /**
   * Receives failures of a deferred flush instead of the logger. Rethrowing
   * here makes them uncaught exceptions.
   */
  onError?: (error: unknown) => void;
}

/**
 * Always defers: pending work runs in one microtask, deduplicated per key.
 * Work enqueued while a flush is running waits for the next microtask.
 */
export class MicrotaskDispatcher implements Dispatcher {
  #queue = new Map<SignalId, Work>();
  #scheduled = false;
  readonly #onError: (error: unknown) => void;

  constructor(options: MicrotaskDispatcherOptions = {}) {
    const { logger = console } = options;
    this.#onError =
      options.onError ??
      ((error) => logger.error("[dispatcher] Deferred notifications failed", error));
  }

  get pending(): number {
    return this.#queue.size;
  }

  enqueue(key: SignalId, work: Work): void {
    this.#queue.set(key, work);
    if (!this.#scheduled) {
      this.#scheduled = true;
      queueMicrotask(() => {
        try {
          this.flush();
        } catch (error) {
          this.#onError(error);
        }
      });
    }
  }

  /** Run everything pending now. */
  flush(): void {
    this.#scheduled = false;
    const queue = this.#queue;
    this.#queue = new Map();
    drain(queue);
  }
}
