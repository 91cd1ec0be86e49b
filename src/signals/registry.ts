/**
 * Registry - the store of reactive cells.
 *
 * Maps opaque SignalIds to type-tagged value cells plus their subscriber
 * sets. It knows nothing about computeds: it stores, locks, and notifies.
 *
 * Every operation first looks the entry up, then works on that entry alone.
 * A subscriber callback may therefore remove the cell (or touch any other
 * cell) while an operation on it is still in flight.
 */

import type { RuntimeConfig } from "./config.js";
import type { Subscriber } from "./context.js";
import { throwCollected, type Dispatcher } from "./dispatcher.js";
import { draftOf } from "./draft.js";
import {
  SignalLimitError,
  SignalNotFoundError,
  SignalTypeMismatchError,
  TooManySubscribersError,
  type Result,
} from "./errors.js";
import { SignalId, SubscriptionId } from "./ids.js";
import { TimedLock } from "./lock.js";
import { typeTagOf, type TypeTag } from "./tag.js";

interface SubscriberRecord {
  readonly fn: Subscriber;
  readonly immediate: boolean;
}

interface Entry<T> {
  readonly id: SignalId;
  readonly tag: TypeTag;
  value: T;
  /** Guards `value` only; subscribers are never touched under it. */
  readonly lock: TimedLock;
  readonly subscribers: Map<SubscriptionId, SubscriberRecord>;
}

export interface SubscribeOptions {
  /**
   * Run the callback synchronously on every notification instead of through
   * the dispatcher. Meant for cheap bookkeeping such as marking a computed
   * dirty, which must not wait for a batch to end.
   */
  immediate?: boolean;
}

/** Narrow an erased entry to the caller's type once its tag matched. */
function hasTag<T>(entry: Entry<unknown>, tag: TypeTag): entry is Entry<T> {
  return entry.tag === tag;
}

export class Registry {
  readonly #entries = new Map<SignalId, Entry<unknown>>();
  readonly #config: RuntimeConfig;
  readonly #dispatcher: Dispatcher;

  constructor(config: RuntimeConfig, dispatcher: Dispatcher) {
    this.#config = config;
    this.#dispatcher = dispatcher;
  }

  /** Number of live cells. */
  get size(): number {
    return this.#entries.size;
  }

  has(id: SignalId): boolean {
    return this.#entries.has(id);
  }

  /**
   * Create a cell holding `initial`.
   *
   * @param tag - recorded type tag; derived from `initial` when omitted
   * @throws SignalLimitError when `maxSignals` cells are already live
   */
  create<T>(initial: T, tag: TypeTag = typeTagOf(initial)): SignalId {
    const count = this.#entries.size;
    if (count >= this.#config.maxSignals) {
      throw new SignalLimitError(count, this.#config.maxSignals);
    }
    const id = SignalId.next();
    const entry: Entry<T> = {
      id,
      tag,
      value: initial,
      lock: new TimedLock(),
      subscribers: new Map(),
    };
    this.#entries.set(id, entry);
    if (this.#config.debug) {
      this.#config.logger.debug(
        `[registry] Created ${id} with type ${tag}. Total signals: ${this.#entries.size}`,
      );
    }
    return id;
  }

  get<T>(id: SignalId, tag: TypeTag): T {
    const entry = this.#lookup<T>(id, tag);
    return this.#locked(entry, () => entry.value);
  }

  /** Lend the stored value to `fn` under the cell lock. */
  with<T, R>(id: SignalId, tag: TypeTag, fn: (value: T) => R): R {
    const entry = this.#lookup<T>(id, tag);
    return this.#locked(entry, () => fn(entry.value));
  }

  set<T>(id: SignalId, tag: TypeTag, value: T): void {
    const entry = this.#lookup<T>(id, tag);
    this.#locked(entry, () => {
      entry.value = value;
    });
    this.#notify(entry);
  }

  /**
   * Replace the value with `fn(current)`.
   * If `fn` throws, the value is left untouched and nobody is notified.
   */
  update<T>(id: SignalId, tag: TypeTag, fn: (value: T) => T): void {
    const entry = this.#lookup<T>(id, tag);
    this.#locked(entry, () => {
      entry.value = fn(entry.value);
    });
    this.#notify(entry);
  }

  /**
   * Mutate the value in place. `fn` works on a draft copy that is committed
   * only if it returns normally, so a throw never leaves a half-applied value.
   *
   * @param clone - produces the draft; `draftOf` unless given
   */
  updateMut<T>(
    id: SignalId,
    tag: TypeTag,
    fn: (draft: T) => void,
    clone: (value: T) => T = draftOf,
  ): void {
    const entry = this.#lookup<T>(id, tag);
    this.#locked(entry, () => {
      const draft = clone(entry.value);
      fn(draft);
      entry.value = draft;
    });
    this.#notify(entry);
  }

  /**
   * Write without notifying. Used by computeds, whose dependents were already
   * notified when the computed went dirty.
   */
  replace<T>(id: SignalId, tag: TypeTag, value: T): void {
    const entry = this.#lookup<T>(id, tag);
    this.#locked(entry, () => {
      entry.value = value;
    });
  }

  /**
   * Register `callback` for changes to `id`.
   * Returns an error result, rather than throwing, when the cell is full.
   */
  subscribe(
    id: SignalId,
    callback: Subscriber,
    options: SubscribeOptions = {},
  ): Result<SubscriptionId, TooManySubscribersError> {
    const entry = this.#find(id);
    const max = this.#config.maxSubscribersPerSignal;
    if (entry.subscribers.size >= max) {
      this.#config.logger.warn(
        `[registry] ${id} exceeded max subscribers (${max})`,
      );
      return { ok: false, error: new TooManySubscribersError(id, max) };
    }
    const subscriptionId = SubscriptionId.next();
    entry.subscribers.set(subscriptionId, {
      fn: callback,
      immediate: options.immediate ?? false,
    });
    return { ok: true, value: subscriptionId };
  }

  /** Remove a subscriber. Unknown cells or subscriptions are ignored. */
  unsubscribe(id: SignalId, subscriptionId: SubscriptionId): boolean {
    const entry = this.#entries.get(id);
    return entry ? entry.subscribers.delete(subscriptionId) : false;
  }

  subscriberCount(id: SignalId): number {
    return this.#entries.get(id)?.subscribers.size ?? 0;
  }

  /** Notify subscribers of `id` without writing. Ignored for removed cells. */
  notify(id: SignalId): void {
    const entry = this.#entries.get(id);
    if (entry) this.#notify(entry);
  }

  /** Drop a cell and its subscribers. Handles to it fail from now on. */
  remove(id: SignalId): boolean {
    const entry = this.#entries.get(id);
    if (!entry) return false;
    entry.subscribers.clear();
    this.#entries.delete(id);
    if (this.#config.debug) {
      this.#config.logger.debug(
        `[registry] Removed ${id}. Remaining signals: ${this.#entries.size}`,
      );
    }
    return true;
  }

  /** Drop every subscription first, then every cell. */
  clear(): void {
    for (const entry of this.#entries.values()) entry.subscribers.clear();
    this.#entries.clear();
  }

  #find(id: SignalId): Entry<unknown> {
    const entry = this.#entries.get(id);
    if (!entry) throw new SignalNotFoundError(id);
    return entry;
  }

  #lookup<T>(id: SignalId, tag: TypeTag): Entry<T> {
    const entry = this.#find(id);
    if (!hasTag<T>(entry, tag)) {
      throw new SignalTypeMismatchError(id, tag, entry.tag);
    }
    return entry;
  }

  #locked<R>(entry: Entry<unknown>, fn: () => R): R {
    return entry.lock.run(
      this.#config.lockTimeoutMs,
      `${entry.id} value`,
      fn,
    );
  }

  #notify(entry: Entry<unknown>): void {
    const { id, subscribers } = entry;
    const dispatcher = this.#dispatcher;
    // Immediate subscribers first, and the whole cascade they start inside
    // one batch: every downstream computed is dirty before any deferred
    // callback gets to read one.
    const dispatch = () => {
      try {
        run(subscribers, true, `${id} immediate subscribers failed`);
      } finally {
        dispatcher.enqueue(id, () =>
          run(subscribers, false, `${id} subscribers failed`),
        );
      }
    };
    if (dispatcher.batch) dispatcher.batch(dispatch);
    else dispatch();
  }
}

/**
 * Call the subscribers of one kind, snapshotted first. Callbacks removed by
 * an earlier callback in the same pass are skipped. Every callback runs
 * before failures are rethrown.
 */
function run(
  subscribers: Map<SubscriptionId, SubscriberRecord>,
  immediate: boolean,
  message: string,
): void {
  const errors: unknown[] = [];
  for (const [subscriptionId, record] of [...subscribers]) {
    if (record.immediate !== immediate) continue;
    if (subscribers.get(subscriptionId) !== record) continue;
    try {
      record.fn();
    } catch (error) {
      errors.push(error);
    }
  }
  throwCollected(errors, message);
}
