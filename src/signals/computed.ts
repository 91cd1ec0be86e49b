/**
 * Computed - A derived reactive value.
 *
 * The compute function runs once eagerly; every cell it reads becomes a
 * dependency with one subscription each. A dependency change only flips the
 * dirty flag and passes the notification on; the function runs again on the
 * next read, and the dependency set is re-diffed every time it does.
 *
 * Dependency callbacks hold the computed's state through a WeakRef, so a
 * computed nobody references can be collected while its dependencies live on.
 * A FinalizationRegistry then removes the leftover subscriptions.
 */

import {
  registerDisposer,
  type Owner,
  type Subscriber,
} from "./context.js";
import { ComputedDisposedError } from "./errors.js";
import { ComputedId, type SignalId, type SubscriptionId } from "./ids.js";
import { TimedLock } from "./lock.js";
import type { Registry } from "./registry.js";
import { getGlobalRuntime, type Runtime } from "./runtime.js";
import { Signal, type Reactive } from "./signal.js";
import type { Subscription } from "./subscription.js";
import type { TypeTag } from "./tag.js";
import type { DependencyTracker, TrackingScope } from "./tracker.js";

/**
 * Computation function. Reads through `get()` are tracked ambiently; reads
 * through `getTracked(scope)` are recorded explicitly. Both count.
 */
export type ComputeFn<T> = (scope: TrackingScope) => T;

export interface ComputedOptions {
  runtime?: Runtime;
  /** Type tag of the cached value; derived from the first result by default. */
  tag?: TypeTag;
}

/**
 * What a computed holds on to in the registry. Shared with the finalizer, so
 * it must never reference the computed itself.
 */
interface Links {
  readonly registry: Registry;
  readonly cachedId: SignalId;
  /** One subscription per dependency: the keys are the dependency set. */
  readonly subscriptions: Map<SignalId, SubscriptionId>;
}

interface ComputedState<T> {
  readonly id: ComputedId;
  readonly runtime: Runtime;
  readonly compute: ComputeFn<T>;
  readonly lock: TimedLock;
  readonly cached: Signal<T>;
  readonly links: Links;
  dirty: boolean;
  disposed: boolean;
}

function release(links: Links): void {
  for (const [dependency, subscription] of links.subscriptions) {
    links.registry.unsubscribe(dependency, subscription);
  }
  links.subscriptions.clear();
  links.registry.remove(links.cachedId);
}

const finalizer = new FinalizationRegistry<Links>(release);

/**
 * Build the dependency callback. Kept outside any function that holds the
 * state strongly, so the closure captures nothing but the WeakRef.
 */
function dirtyHandler<T>(ref: WeakRef<ComputedState<T>>): Subscriber {
  return () => {
    const state = ref.deref();
    if (!state || state.disposed) return;
    state.dirty = true;
    state.runtime.registry.notify(state.links.cachedId);
  };
}

/** Run `compute` in a fresh capture frame. */
function capture<T>(
  tracker: DependencyTracker,
  compute: ComputeFn<T>,
): { value: T; dependencies: ReadonlySet<SignalId> } {
  const scope = tracker.beginCapture();
  try {
    return { value: compute(scope), dependencies: scope.dependencies };
  } finally {
    tracker.endCapture(scope);
  }
}

/**
 * Bring the subscriptions in line with `next`. Additions are made first and
 * rolled back together if any fails, leaving the previous set intact.
 */
function rewire<T>(
  state: ComputedState<T>,
  next: ReadonlySet<SignalId>,
  handler: Subscriber,
): void {
  const { registry, subscriptions } = state.links;
  const added: [SignalId, SubscriptionId][] = [];
  try {
    for (const dependency of next) {
      if (subscriptions.has(dependency)) continue;
      const result = registry.subscribe(dependency, handler, {
        immediate: true,
      });
      if (!result.ok) throw result.error;
      added.push([dependency, result.value]);
    }
  } catch (error) {
    for (const [dependency, subscription] of added) {
      registry.unsubscribe(dependency, subscription);
    }
    throw error;
  }

  let removed = 0;
  for (const [dependency, subscription] of subscriptions) {
    if (next.has(dependency)) continue;
    registry.unsubscribe(dependency, subscription);
    subscriptions.delete(dependency);
    removed++;
  }
  for (const [dependency, subscription] of added) {
    subscriptions.set(dependency, subscription);
  }

  const { config } = state.runtime;
  if (config.debug && (added.length > 0 || removed > 0)) {
    config.logger.debug(
      `[computed] Dependencies of ${state.id} changed: +${added.length} -${removed} (now ${subscriptions.size})`,
    );
  }
}

function recompute<T>(state: ComputedState<T>): void {
  const { runtime } = state;
  try {
    const { value, dependencies } = state.lock.run(
      runtime.config.lockTimeoutMs,
      `${state.id} compute`,
      () => capture(runtime.tracker, state.compute),
    );
    runtime.registry.replace(state.links.cachedId, state.cached.tag, value);
    rewire(state, dependencies, dirtyHandler(new WeakRef(state)));
  } catch (error) {
    // Stay dirty so the next read retries instead of serving a stale value
    state.dirty = true;
    throw error;
  }
}

/**
 * A derived reactive value. Automatically tracks dependencies and
 * recomputes lazily when any of them changes.
 *
 * @example
 * const width = signal(10);
 * const height = signal(5);
 * const area = computed(() => width.get() * height.get());
 * area.get(); // 50
 * width.set(20);
 * area.get(); // 100
 */
export class Computed<T> implements Reactive<T> {
  readonly id: ComputedId;
  readonly runtime: Runtime;
  readonly #state: ComputedState<T>;

  constructor(fn: ComputeFn<T>, options: ComputedOptions = {}) {
    const runtime = options.runtime ?? getGlobalRuntime();
    const id = ComputedId.next();
    this.id = id;
    this.runtime = runtime;

    const { value, dependencies } = runtime.tracker.evaluate(id, () =>
      capture(runtime.tracker, fn),
    );
    const cached = new Signal(value, { runtime, tag: options.tag });
    const state: ComputedState<T> = {
      id,
      runtime,
      compute: fn,
      lock: new TimedLock(),
      cached,
      links: {
        registry: runtime.registry,
        cachedId: cached.id,
        subscriptions: new Map(),
      },
      dirty: false,
      disposed: false,
    };

    try {
      rewire(state, dependencies, dirtyHandler(new WeakRef(state)));
    } catch (error) {
      runtime.logger.error(
        `[computed] Failed to subscribe ${id} to its dependencies. Rolling back all subscriptions.`,
        error,
      );
      cached.remove();
      throw error;
    }

    this.#state = state;
    finalizer.register(state, state.links, state);

    if (runtime.config.debug) {
      runtime.logger.debug(
        `[computed] Created ${id} with ${dependencies.size} dependencies`,
      );
    }

    // Auto-register disposal in current root scope
    registerDisposer(() => this.dispose());
  }

  /** Id of the cell holding the cached value. */
  get signalId(): SignalId {
    return this.#state.links.cachedId;
  }

  get value(): T {
    return this.get();
  }

  /** Current dependency set. */
  get dependencies(): ReadonlySet<SignalId> {
    return new Set(this.#state.links.subscriptions.keys());
  }

  get disposed(): boolean {
    return this.#state.disposed;
  }

  /**
   * Read the value, recomputing first if a dependency changed.
   *
   * @throws CircularDependencyError if this computed is already evaluating
   * @throws DeadlockError if the compute lock can't be taken in time
   * @throws whatever the compute function throws; the next read retries it
   */
  get(): T {
    return this.#read((cached) => cached.get());
  }

  getTracked(scope: TrackingScope): T {
    return this.#read((cached) => cached.getTracked(scope));
  }

  peek(): T {
    return this.#read((cached) => cached.peek());
  }

  /** Lock-free: does not wait for a recompute in progress. */
  isDirty(): boolean {
    return this.#state.dirty;
  }

  /**
   * Subscribe to changes. Subscribers hear about a change when the computed
   * goes dirty; reading inside the callback recomputes.
   *
   * @throws TooManySubscribersError
   */
  subscribe(fn: Subscriber): SubscriptionId {
    return this.#state.cached.subscribe(fn);
  }

  subscribeScoped(fn: Subscriber): Subscription {
    return this.#state.cached.subscribeScoped(fn);
  }

  unsubscribe(id: SubscriptionId): void {
    this.#state.cached.unsubscribe(id);
  }

  /** Dispose this computed when `owner` is disposed. */
  owned(owner: Owner): this {
    owner.onCleanup(() => this.dispose());
    return this;
  }

  /** Unsubscribe from every dependency and drop the cached value. */
  dispose(): void {
    const state = this.#state;
    if (state.disposed) return;
    state.disposed = true;
    finalizer.unregister(state);
    release(state.links);
  }

  #read(read: (cached: Signal<T>) => T): T {
    const state = this.#state;
    if (state.disposed) throw new ComputedDisposedError(state.id);
    return state.runtime.tracker.evaluate(state.id, () => {
      // Take and clear the flag in one step: a change arriving during the
      // recompute sets it again and is picked up by the next read.
      const wasDirty = state.dirty;
      state.dirty = false;
      if (wasDirty) recompute(state);
      return read(state.cached);
    });
  }
}

/** Create a new computed from the given function. */
export const computed = <T>(fn: ComputeFn<T>, options?: ComputedOptions) =>
  new Computed(fn, options);
