/**
 * Opaque identifiers for registry cells, subscriptions, computeds and effects.
 *
 * Each kind draws from its own process-wide monotonic counter. Values are
 * never reused, so a stale handle fails with "not found" instead of
 * silently aliasing a newer cell.
 */

import { IdOverflowError } from "./errors.js";

const LIMIT = Number.MAX_SAFE_INTEGER - 1;

/**
 * Create a counter that hands out 1, 2, 3, … and refuses to wrap.
 * @internal
 */
export function counter(kind: string, start = 1): () => number {
  let current = start;
  return () => {
    if (current >= LIMIT) throw new IdOverflowError(kind);
    return current++;
  };
}

const nextSignal = counter("SignalId");
const nextSubscription = counter("SubscriptionId");
const nextComputed = counter("ComputedId");
const nextEffect = counter("EffectId");

/** Identity of a registry cell. Compared by reference. */
export class SignalId {
  readonly kind = "signal" as const;
  readonly value: number;

  private constructor(value: number) {
    this.value = value;
  }

  static next(): SignalId {
    return new SignalId(nextSignal());
  }

  toString(): string {
    return `Signal(${this.value})`;
  }
}

/** Identity of a single subscriber; only used to remove it again. */
export class SubscriptionId {
  readonly kind = "subscription" as const;
  readonly value: number;

  private constructor(value: number) {
    this.value = value;
  }

  static next(): SubscriptionId {
    return new SubscriptionId(nextSubscription());
  }

  toString(): string {
    return `Subscription(${this.value})`;
  }
}

export class ComputedId {
  readonly kind = "computed" as const;
  readonly value: number;

  private constructor(value: number) {
    this.value = value;
  }

  static next(): ComputedId {
    return new ComputedId(nextComputed());
  }

  toString(): string {
    return `Computed(${this.value})`;
  }
}

export class EffectId {
  readonly kind = "effect" as const;
  readonly value: number;

  private constructor(value: number) {
    this.value = value;
  }

  static next(): EffectId {
    return new EffectId(nextEffect());
  }

  toString(): string {
    return `Effect(${this.value})`;
  }
}
