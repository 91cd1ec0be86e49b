/**
 * Runtime - one isolated reactive engine.
 *
 * Owns the registry, the dependency tracker, and the dispatcher that
 * notifications go through. Independent runtimes share nothing, which keeps
 * tests from contaminating each other; the global runtime is a lazily created
 * convenience instance for code that does not pass one around.
 */

import { Computed, type ComputeFn, type ComputedOptions } from "./computed.js";
import {
  resolveConfig,
  type Logger,
  type RuntimeConfig,
  type RuntimeOptions,
} from "./config.js";
import { BatchDispatcher, type Dispatcher } from "./dispatcher.js";
import { effect, type EffectOptions } from "./effect.js";
import { ConfigError } from "./errors.js";
import { Registry } from "./registry.js";
import { Signal, type SignalOptions } from "./signal.js";
import { DependencyTracker } from "./tracker.js";

export interface RuntimeInit extends RuntimeOptions {
  /** Receives notification work; a BatchDispatcher by default. */
  dispatcher?: Dispatcher;
}

export class Runtime {
  readonly config: RuntimeConfig;
  readonly registry: Registry;
  readonly tracker: DependencyTracker;
  readonly dispatcher: Dispatcher;

  constructor(init: RuntimeInit = {}) {
    const { dispatcher = new BatchDispatcher(), ...options } = init;
    this.config = resolveConfig(options);
    this.dispatcher = dispatcher;
    this.registry = new Registry(this.config, dispatcher);
    this.tracker = new DependencyTracker(this.config.maxComputedDepth);
  }

  get logger(): Logger {
    return this.config.logger;
  }

  signal<T>(initial: T, options: Omit<SignalOptions, "runtime"> = {}): Signal<T> {
    return new Signal(initial, { ...options, runtime: this });
  }

  computed<T>(
    fn: ComputeFn<T>,
    options: Omit<ComputedOptions, "runtime"> = {},
  ): Computed<T> {
    return new Computed(fn, { ...options, runtime: this });
  }

  effect(
    fn: ComputeFn<void>,
    options: Omit<EffectOptions, "runtime"> = {},
  ): () => void {
    return effect(fn, { ...options, runtime: this });
  }

  /**
   * Defer notifications until `fn` returns, folding repeated writes to a
   * cell into one notification. Runs `fn` directly if the dispatcher does
   * not batch.
   */
  batch<T>(fn: () => T): T {
    return this.dispatcher.batch ? this.dispatcher.batch(fn) : fn();
  }

  /** Run `fn` without recording any reads as dependencies. */
  untracked<T>(fn: () => T): T {
    return this.tracker.untracked(fn);
  }
}

let globalRuntime: Runtime | undefined;

/** The process-wide default runtime, created on first use. */
export function getGlobalRuntime(): Runtime {
  globalRuntime ??= new Runtime();
  return globalRuntime;
}

/**
 * Create the global runtime with the given limits. Must happen before
 * anything uses it; its configuration cannot change afterwards.
 *
 * @throws ConfigError if the global runtime already exists
 */
export function configureGlobalRuntime(init: RuntimeInit): Runtime {
  if (globalRuntime) {
    throw new ConfigError(
      "The global runtime is already initialized; configure it before creating any signal",
    );
  }
  globalRuntime = new Runtime(init);
  return globalRuntime;
}

/** Clear and drop the global runtime. Meant for test isolation. */
export function resetGlobalRuntime(): void {
  globalRuntime?.registry.clear();
  globalRuntime = undefined;
}

/** Batch updates on the global runtime. */
export function batch<T>(fn: () => T): T {
  return getGlobalRuntime().batch(fn);
}

/** Read without tracking on the global runtime. */
export function untracked<T>(fn: () => T): T {
  return getGlobalRuntime().untracked(fn);
}
