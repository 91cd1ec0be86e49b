/**
 * Effect scheduling for batched updates.
 *
 * Effects are registered once, scheduled any number of times, and run when
 * `flush()` is called. Scheduling an effect that is already queued does
 * nothing, so an effect runs at most once per flush however many of its
 * dependencies changed.
 */

import { DEFAULT_CONFIG, type Logger } from "./config.js";
import { throwCollected } from "./dispatcher.js";
import { EffectId } from "./ids.js";

export const EffectPriority = {
  /** Logging, analytics */
  Low: 0,
  Normal: 1,
  /** UI updates */
  High: 2,
  /** Error handlers */
  Critical: 3,
} as const;

export type EffectPriority =
  (typeof EffectPriority)[keyof typeof EffectPriority];

export interface EffectSchedulerOptions {
  /** Queue length at which `schedule` flushes early. */
  maxPending?: number;
  logger?: Logger;
  debug?: boolean;
}

interface RegisteredEffect {
  readonly callback: () => void;
  readonly priority: EffectPriority;
}

export const MAX_PENDING_EFFECTS = 10_000;

export class EffectScheduler {
  readonly #effects = new Map<EffectId, RegisteredEffect>();
  #queue: EffectId[] = [];
  #queued = new Set<EffectId>();
  #flushing = false;
  readonly #maxPending: number;
  readonly #logger: Logger;
  readonly #debug: boolean;

  constructor(options: EffectSchedulerOptions = {}) {
    this.#maxPending = options.maxPending ?? MAX_PENDING_EFFECTS;
    this.#logger = options.logger ?? DEFAULT_CONFIG.logger;
    this.#debug = options.debug ?? false;
  }

  get hasPending(): boolean {
    return this.#queue.length > 0;
  }

  get pendingCount(): number {
    return this.#queue.length;
  }

  /** Register an effect; schedule it later through the returned id. */
  register(
    callback: () => void,
    priority: EffectPriority = EffectPriority.Normal,
  ): EffectId {
    const id = EffectId.next();
    this.#effects.set(id, { callback, priority });
    if (this.#debug) {
      this.#logger.debug(`[scheduler] ${id} registered with priority ${priority}`);
    }
    return id;
  }

  /** Queue an effect for the next flush. Already-queued effects are skipped. */
  schedule(id: EffectId): void {
    if (this.#queued.has(id)) return;
    if (!this.#effects.has(id)) {
      if (this.#debug) {
        this.#logger.debug(`[scheduler] Attempted to schedule unknown ${id}`);
      }
      return;
    }
    if (this.#queue.length >= this.#maxPending) {
      this.#logger.warn(
        `[scheduler] Pending effects exceeded limit (${this.#maxPending}), flushing early`,
      );
      this.#run(this.#take());
    }
    this.#queue.push(id);
    this.#queued.add(id);
  }

  /** Forget an effect. It will not run, even if already queued. */
  unregister(id: EffectId): void {
    this.#effects.delete(id);
  }

  /**
   * Run the queued effects, higher priority first and in scheduling order
   * within a priority. Effects scheduled meanwhile wait for the next flush.
   * A flush started from inside an effect does nothing.
   */
  flush(): void {
    if (this.#flushing || this.#queue.length === 0) return;
    this.#flushing = true;
    try {
      this.#run(this.#take());
    } finally {
      this.#flushing = false;
    }
  }

  /** Drop everything queued without running it. */
  clear(): void {
    this.#queue = [];
    this.#queued = new Set();
  }

  #take(): EffectId[] {
    const queue = this.#queue;
    this.#queue = [];
    this.#queued = new Set();
    return queue;
  }

  #run(ids: EffectId[]): void {
    const due: [EffectId, RegisteredEffect][] = [];
    for (const id of ids) {
      const effect = this.#effects.get(id);
      if (effect) due.push([id, effect]);
    }
    // Array#sort is stable, which keeps FIFO order within a priority
    due.sort(([, a], [, b]) => b.priority - a.priority);

    const errors: unknown[] = [];
    let ran = 0;
    for (const [id, effect] of due) {
      // Unregistered by an effect that ran earlier in this pass
      if (this.#effects.get(id) !== effect) continue;
      try {
        effect.callback();
      } catch (error) {
        errors.push(error);
      }
      ran++;
    }
    if (this.#debug) {
      this.#logger.debug(`[scheduler] Ran ${ran} effects`);
    }
    throwCollected(errors, "effects failed");
  }
}
