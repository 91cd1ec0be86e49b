/**
 * Engine-wide limits, fixed when a runtime is constructed.
 */

import { ConfigError } from "./errors.js";

/** Where diagnostics go. `console` satisfies it. */
export type Logger = Pick<Console, "debug" | "warn" | "error">;

export interface RuntimeConfig {
  /** Maximum number of live cells in the registry. */
  readonly maxSignals: number;
  /** Maximum subscribers a single cell accepts. */
  readonly maxSubscribersPerSignal: number;
  /** Maximum number of computeds evaluating inside one another. */
  readonly maxComputedDepth: number;
  /** Bounded wait for cell and compute locks before reporting a deadlock. */
  readonly lockTimeoutMs: number;
  /** Emit debug-level diagnostics. */
  readonly debug: boolean;
  readonly logger: Logger;
}

export type RuntimeOptions = Partial<RuntimeConfig>;

export const DEFAULT_CONFIG: RuntimeConfig = Object.freeze({
  maxSignals: 100_000,
  maxSubscribersPerSignal: 1_000,
  maxComputedDepth: 100,
  lockTimeoutMs: 5_000,
  debug: false,
  logger: console,
});

const LIMITS = [
  "maxSignals",
  "maxSubscribersPerSignal",
  "maxComputedDepth",
  "lockTimeoutMs",
] as const;

/** Merge options over the defaults, validate, and freeze the result. */
export function resolveConfig(options: RuntimeOptions = {}): RuntimeConfig {
  const config: RuntimeConfig = { ...DEFAULT_CONFIG, ...options };
  for (const key of LIMITS) {
    const value = config[key];
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigError(
        `Invalid runtime option ${key}: expected a positive integer, got ${String(value)}`,
      );
    }
  }
  return Object.freeze(config);
}
