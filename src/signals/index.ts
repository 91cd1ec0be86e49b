/**
 * Reactive signals with automatic dependency tracking.
 *
 * Values live in a runtime's registry and are reached through typed handles.
 * Computeds discover their dependencies by running, subscribe to each one,
 * and re-evaluate lazily on the next read after any of them changes.
 */

export { Signal, signal, type Reactive, type SignalOptions } from "./signal.js";
export {
  Computed,
  computed,
  type ComputeFn,
  type ComputedOptions,
} from "./computed.js";
export { effect, type EffectOptions } from "./effect.js";
export {
  EffectScheduler,
  EffectPriority,
  MAX_PENDING_EFFECTS,
  type EffectSchedulerOptions,
} from "./scheduler.js";
export {
  Runtime,
  getGlobalRuntime,
  configureGlobalRuntime,
  resetGlobalRuntime,
  batch,
  untracked,
  type RuntimeInit,
} from "./runtime.js";
export {
  DEFAULT_CONFIG,
  resolveConfig,
  type Logger,
  type RuntimeConfig,
  type RuntimeOptions,
} from "./config.js";
export {
  BatchDispatcher,
  MicrotaskDispatcher,
  type Dispatcher,
  type MicrotaskDispatcherOptions,
  type Work,
} from "./dispatcher.js";
export { Registry, type SubscribeOptions } from "./registry.js";
export { DependencyTracker, TrackingScope } from "./tracker.js";
export { TimedLock } from "./lock.js";
export { draftOf } from "./draft.js";
export { Subscription } from "./subscription.js";
export {
  Owner,
  scope,
  registerDisposer,
  getOwner,
  runWithOwner,
  type Cleanup,
  type Subscriber,
} from "./context.js";
export { SignalId, SubscriptionId, ComputedId, EffectId } from "./ids.js";
export { typeTagOf, type TypeTag } from "./tag.js";
export * from "./errors.js";

import { Signal, type Reactive } from "./signal.js";
import { Computed } from "./computed.js";

/** Check if a value is a reactive signal or computed. */
export const isSignal = (value: unknown): value is Reactive<unknown> =>
  value instanceof Signal || value instanceof Computed;
