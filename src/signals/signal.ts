/**
 * Signal - a typed handle onto a registry cell.
 *
 * The handle is just (runtime, id, tag); the value lives in the runtime's
 * registry. Many handles may point at one cell, and dropping a handle does
 * not remove the cell: call `remove()` or let the runtime outlive it.
 */

import { registerDisposer, type Subscriber } from "./context.js";
import type { SignalId, SubscriptionId } from "./ids.js";
import { getGlobalRuntime, type Runtime } from "./runtime.js";
import { Subscription } from "./subscription.js";
import { typeTagOf, type TypeTag } from "./tag.js";
import type { TrackingScope } from "./tracker.js";

/** Common interface for reactive values (Signal or Computed). */
export interface Reactive<T> {
  readonly value: T;
  readonly runtime: Runtime;
  /**
   * Read and record the read with the ambient tracker. Throws
   * `CrossRuntimeReadError` inside a computed of another runtime.
   */
  get(): T;
  /** Read and record the read into `scope` only. */
  getTracked(scope: TrackingScope): T;
  /** Read without recording anything. */
  peek(): T;
  subscribe(fn: Subscriber): SubscriptionId;
  subscribeScoped(fn: Subscriber): Subscription;
  unsubscribe(id: SubscriptionId): void;
}

export interface SignalOptions {
  /** Runtime to create the cell in; the global runtime by default. */
  runtime?: Runtime;
  /** Type tag recorded for the cell; derived from the initial value by default. */
  tag?: TypeTag;
}

const ATTACH = Symbol("attach");

/** Marker for building a handle onto an existing cell. */
interface AttachRequest {
  readonly [ATTACH]: SignalId;
}

function isAttachRequest(value: unknown): value is AttachRequest {
  return typeof value === "object" && value !== null && ATTACH in value;
}

/**
 * A reactive value container. Writing notifies subscribers; reading inside a
 * computed makes the computed depend on it.
 *
 * @example
 * const count = new Signal(0);
 * count.set(1);
 * count.update((n) => n + 1);
 * count.get(); // 2
 */
export class Signal<T> implements Reactive<T> {
  readonly id: SignalId;
  readonly tag: TypeTag;
  readonly runtime: Runtime;

  constructor(initial: T, options?: SignalOptions);
  /** @internal */
  constructor(initial: AttachRequest, options: SignalOptions);
  constructor(initial: T | AttachRequest, options: SignalOptions = {}) {
    this.runtime = options.runtime ?? getGlobalRuntime();
    if (isAttachRequest(initial)) {
      this.id = initial[ATTACH];
      this.tag = options.tag ?? "unknown";
    } else {
      this.tag = options.tag ?? typeTagOf(initial);
      this.id = this.runtime.registry.create(initial, this.tag);
    }
  }

  /**
   * Build another handle onto an existing cell. Every access checks `tag`
   * against the tag recorded for the cell.
   */
  static attach<T>(runtime: Runtime, id: SignalId, tag: TypeTag): Signal<T> {
    return new Signal<T>({ [ATTACH]: id }, { runtime, tag });
  }

  get value(): T {
    return this.get();
  }

  set value(v: T) {
    this.set(v);
  }

  get(): T {
    this.runtime.tracker.record(this.id);
    return this.peek();
  }

  getTracked(scope: TrackingScope): T {
    scope.record(this.id);
    return this.peek();
  }

  peek(): T {
    return this.runtime.registry.get<T>(this.id, this.tag);
  }

  /** Pass the stored value to `fn` without recording a dependency. */
  with<R>(fn: (value: T) => R): R {
    return this.runtime.registry.with(this.id, this.tag, fn);
  }

  set(value: T): void {
    this.runtime.registry.set(this.id, this.tag, value);
  }

  update(fn: (value: T) => T): void {
    this.runtime.registry.update(this.id, this.tag, fn);
  }

  /**
   * Mutate the value in place. `fn` receives a draft copy (see
   * `Registry.updateMut`); pass `clone` for values that keep state outside
   * their own properties, such as private `#fields`.
   */
  updateMut(fn: (draft: T) => void, clone?: (value: T) => T): void {
    this.runtime.registry.updateMut(this.id, this.tag, fn, clone);
  }

  /**
   * Subscribe to changes. The returned id must be passed to `unsubscribe`;
   * prefer `subscribeScoped` where a guard fits.
   *
   * @throws TooManySubscribersError
   */
  subscribe(fn: Subscriber): SubscriptionId {
    const result = this.runtime.registry.subscribe(this.id, fn);
    if (!result.ok) throw result.error;
    return result.value;
  }

  /** Subscribe and get a guard; it is disposed with the ambient scope, if any. */
  subscribeScoped(fn: Subscriber): Subscription {
    const subscription = new Subscription(
      this.runtime.registry,
      this.id,
      this.subscribe(fn),
    );
    registerDisposer(() => subscription.dispose());
    return subscription;
  }

  unsubscribe(id: SubscriptionId): void {
    this.runtime.registry.unsubscribe(this.id, id);
  }

  /** @internal Notify subscribers without writing. */
  notify(): void {
    this.runtime.registry.notify(this.id);
  }

  /** Remove the cell from the registry. Every handle to it fails afterwards. */
  remove(): boolean {
    return this.runtime.registry.remove(this.id);
  }
}

/** Create a new signal with the given initial value. */
export const signal = <T>(value: T, options?: SignalOptions) =>
  new Signal(value, options);
