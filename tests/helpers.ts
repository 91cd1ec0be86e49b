/**
 * Shared test fixtures: an isolated runtime per test and a logger that
 * records what it is given instead of printing it.
 */

import {
  Runtime,
  type Logger,
  type RuntimeInit,
} from "../src/signals/index.js";

export type LogLevel = keyof Logger;

export interface LogEntry {
  level: LogLevel;
  message: string;
  extra: unknown[];
}

export function createLogger() {
  const entries: LogEntry[] = [];
  const sink =
    (level: LogLevel) =>
    (message?: unknown, ...extra: unknown[]) => {
      entries.push({ level, message: String(message), extra });
    };
  const logger: Logger = {
    debug: sink("debug"),
    warn: sink("warn"),
    error: sink("error"),
  };
  return {
    logger,
    entries,
    messages(level: LogLevel): string[] {
      return entries.filter((e) => e.level === level).map((e) => e.message);
    },
  };
}

/** A fresh runtime logging into memory. */
export function createRuntime(init: RuntimeInit = {}) {
  const log = createLogger();
  const runtime = new Runtime({ logger: log.logger, ...init });
  return { runtime, log };
}
