/**
 * Subscription - a guard that removes one subscriber when disposed.
 */

import type { Owner } from "./context.js";
import type { SignalId, SubscriptionId } from "./ids.js";
import type { Registry } from "./registry.js";

export class Subscription {
  readonly signalId: SignalId;
  readonly id: SubscriptionId;
  readonly #registry: Registry;
  #active = true;

  constructor(registry: Registry, signalId: SignalId, id: SubscriptionId) {
    this.#registry = registry;
    this.signalId = signalId;
    this.id = id;
  }

  get active(): boolean {
    return this.#active;
  }

  /** Unsubscribe. Safe to call more than once. */
  dispose(): void {
    if (!this.#active) return;
    this.#active = false;
    this.#registry.unsubscribe(this.signalId, this.id);
  }

  /** Dispose this subscription when `owner` is disposed. */
  owned(owner: Owner): this {
    owner.onCleanup(() => this.dispose());
    return this;
  }
}
