/**
 * Effect - Run side effects reactively.
 */

import { Computed, type ComputeFn } from "./computed.js";
import { registerDisposer } from "./context.js";
import { getGlobalRuntime, type Runtime } from "./runtime.js";
import { EffectPriority, type EffectScheduler } from "./scheduler.js";

export interface EffectOptions {
  runtime?: Runtime;
  /** Queue re-runs here instead of running them as soon as a dependency changes. */
  scheduler?: EffectScheduler;
  priority?: EffectPriority;
}

/**
 * Create a reactive effect that automatically tracks dependencies
 * and re-runs when they change.
 *
 * @param fn - The effect function to run
 * @returns A dispose function to stop the effect
 *
 * @example
 * const count = signal(0);
 * const dispose = effect(() => {
 *   console.log("Count is:", count.get());
 * });
 *
 * count.set(1); // logs: "Count is: 1"
 * dispose(); // stop the effect
 */
export function effect(
  fn: ComputeFn<void>,
  options: EffectOptions = {},
): () => void {
  const runtime = options.runtime ?? getGlobalRuntime();
  const { scheduler, priority = EffectPriority.Normal } = options;

  const c = new Computed<undefined>(
    (scope) => {
      fn(scope);
      return undefined;
    },
    { runtime, tag: "undefined" },
  );
  const run = () => {
    if (!c.disposed) c.get();
  };
  const scheduled = scheduler?.register(run, priority);

  // A dependency change dirties the computed and lands here; reading it
  // re-runs fn.
  const subscription = c.subscribeScoped(() => {
    if (scheduler && scheduled) scheduler.schedule(scheduled);
    else run();
  });

  const dispose = () => {
    subscription.dispose();
    c.dispose();
    if (scheduler && scheduled) scheduler.unregister(scheduled);
  };

  // Owned effects are also stopped by their scope; the returned function
  // stops one early.
  registerDisposer(dispose);

  return dispose;
}
