/**
 * Dependency tracking.
 *
 * Reads are recorded into the innermost open capture frame. A frame is a
 * TrackingScope: the same object a compute closure receives, so callers that
 * prefer explicit context can record into it directly with `getTracked`.
 *
 * The tracker also keeps the set of computeds currently evaluating, which is
 * how a computed that reads itself (directly or through others) is caught.
 * Each Runtime owns one tracker; it is only ever used from the isolate that
 * created it. A computed can only depend on cells of its own runtime.
 */

import {
  CircularDependencyError,
  ComputedDepthError,
  CrossRuntimeReadError,
  InvariantError,
} from "./errors.js";
import type { ComputedId, SignalId } from "./ids.js";

/** Collects the ids read during one evaluation. */
export class TrackingScope {
  readonly #dependencies = new Set<SignalId>();
  #closed = false;

  get closed(): boolean {
    return this.#closed;
  }

  /** Ids recorded so far. */
  get dependencies(): ReadonlySet<SignalId> {
    return this.#dependencies;
  }

  /** Record a read. Ignored once the scope is closed. */
  record(id: SignalId): void {
    if (!this.#closed) this.#dependencies.add(id);
  }

  /** @internal */
  close(): Set<SignalId> {
    this.#closed = true;
    return this.#dependencies;
  }
}

/** Tracker of every open frame, across runtimes, innermost last. */
const frameOwners: DependencyTracker[] = [];

export class DependencyTracker {
  /** `null` frames are untracked regions. */
  readonly #frames: (TrackingScope | null)[] = [];
  readonly #evaluating = new Set<ComputedId>();
  readonly #maxDepth: number;

  constructor(maxDepth: number) {
    this.#maxDepth = maxDepth;
  }

  /** Whether a read right now would be recorded. */
  get isTracking(): boolean {
    return this.#frames.length > 0 && this.#frames.at(-1) !== null;
  }

  /** Number of computeds currently evaluating. */
  get depth(): number {
    return this.#evaluating.size;
  }

  /** Open a fresh capture frame. */
  beginCapture(): TrackingScope {
    const scope = new TrackingScope();
    this.#frames.push(scope);
    frameOwners.push(this);
    return scope;
  }

  /** Close `scope` and return what it captured. It must be the innermost frame. */
  endCapture(scope: TrackingScope): Set<SignalId> {
    if (this.#frames.at(-1) !== scope) {
      throw new InvariantError(
        "Capture frames closed out of order: endCapture() must match the latest beginCapture()",
      );
    }
    this.#frames.pop();
    frameOwners.pop();
    return scope.close();
  }

  /**
   * Record a read into the innermost frame, if any.
   *
   * @throws CrossRuntimeReadError if the innermost open frame belongs to
   * another runtime's tracker, which would never see this read
   */
  record(id: SignalId): void {
    const owner = frameOwners.at(-1);
    if (owner !== this) {
      if (owner?.isTracking) throw new CrossRuntimeReadError(id);
      return;
    }
    this.#frames.at(-1)?.record(id);
  }

  /** Run `fn` without recording any of its reads. */
  untracked<T>(fn: () => T): T {
    this.#frames.push(null);
    frameOwners.push(this);
    try {
      return fn();
    } finally {
      this.#frames.pop();
      frameOwners.pop();
    }
  }

  /**
   * Mark `id` as evaluating.
   * @throws CircularDependencyError if it already is
   * @throws ComputedDepthError if too many computeds are already evaluating
   */
  enter(id: ComputedId): void {
    if (this.#evaluating.has(id)) throw new CircularDependencyError(id);
    if (this.#evaluating.size >= this.#maxDepth) {
      throw new ComputedDepthError(id, this.#maxDepth);
    }
    this.#evaluating.add(id);
  }

  leave(id: ComputedId): void {
    this.#evaluating.delete(id);
  }

  isEvaluating(id: ComputedId): boolean {
    return this.#evaluating.has(id);
  }

  /** Run `fn` between `enter(id)` and an unconditional `leave(id)`. */
  evaluate<T>(id: ComputedId, fn: () => T): T {
    this.enter(id);
    try {
      return fn();
    } finally {
      this.leave(id);
    }
  }
}
