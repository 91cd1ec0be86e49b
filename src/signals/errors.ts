/**
 * Error taxonomy.
 *
 * - InvariantError: a programming defect (bad handle, invalid dependency
 *   graph, suspected deadlock). Never recovered from inside the library.
 * - CapacityError: a configured ceiling was reached. Callers may catch it,
 *   free something and retry.
 */

import type { ComputedId, SignalId } from "./ids.js";

/** Base class for every error thrown by the engine. */
export class ReactivityError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvariantError extends ReactivityError {}

export class CapacityError extends ReactivityError {}

export class SignalNotFoundError extends InvariantError {
  readonly signalId: SignalId;

  constructor(signalId: SignalId) {
    super(
      `${signalId} not found. The handle outlived its cell (removed or never created in this runtime).`,
    );
    this.signalId = signalId;
  }
}

export class SignalTypeMismatchError extends InvariantError {
  readonly signalId: SignalId;
  readonly expected: string;
  readonly actual: string;

  constructor(signalId: SignalId, expected: string, actual: string) {
    super(
      `Signal type mismatch on ${signalId}: expected ${expected}, got ${actual}`,
    );
    this.signalId = signalId;
    this.expected = expected;
    this.actual = actual;
  }
}

export class CircularDependencyError extends InvariantError {
  readonly computedId: ComputedId;

  constructor(computedId: ComputedId) {
    super(
      `Circular dependency detected in ${computedId}. Computed signals cannot form dependency cycles.`,
    );
    this.computedId = computedId;
  }
}

export class ComputedDepthError extends InvariantError {
  readonly computedId: ComputedId;
  readonly maxDepth: number;

  constructor(computedId: ComputedId, maxDepth: number) {
    super(
      `Computed nesting depth exceeded while evaluating ${computedId}: more than ${maxDepth} computeds evaluating at once`,
    );
    this.computedId = computedId;
    this.maxDepth = maxDepth;
  }
}

export class ComputedDisposedError extends InvariantError {
  readonly computedId: ComputedId;

  constructor(computedId: ComputedId) {
    super(`${computedId} was disposed and can no longer be read`);
    this.computedId = computedId;
  }
}

export class CrossRuntimeReadError extends InvariantError {
  readonly signalId: SignalId;

  constructor(signalId: SignalId) {
    super(
      `${signalId} was read while a computed of another runtime is evaluating. A computed can only depend on cells of its own runtime.`,
    );
    this.signalId = signalId;
  }
}

export class DeadlockError extends InvariantError {
  readonly resource: string;
  readonly timeoutMs: number;

  constructor(resource: string, timeoutMs: number) {
    super(
      `Potential deadlock detected in ${resource}: failed to acquire lock within ${timeoutMs}ms. ` +
        "This likely indicates circular dependencies across threads, or a cell written from inside its own update. " +
        "Review your Computed dependency graph.",
    );
    this.resource = resource;
    this.timeoutMs = timeoutMs;
  }
}

export class IdOverflowError extends InvariantError {
  constructor(kind: string) {
    super(`${kind} counter overflow! Cannot create more identifiers.`);
  }
}

export class ConfigError extends InvariantError {}

export class SignalLimitError extends CapacityError {
  readonly count: number;
  readonly max: number;

  constructor(count: number, max: number) {
    super(
      `Signal count limit exceeded: ${count} >= ${max}. ` +
        "Increase maxSignals or find the code that creates signals without removing them.",
    );
    this.count = count;
    this.max = max;
  }
}

export class TooManySubscribersError extends CapacityError {
  readonly signalId: SignalId;
  readonly max: number;

  constructor(signalId: SignalId, max: number) {
    super(`${signalId} exceeded max subscribers (${max})`);
    this.signalId = signalId;
    this.max = max;
  }
}

/** Outcome of an operation whose failure is an expected, typed condition. */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };
