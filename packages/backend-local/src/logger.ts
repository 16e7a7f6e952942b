/* eslint-disable no-console */
import type { Logger } from "./core.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
    ? normalized
    : fallback;
}

export function createConsoleLogger(namespace: string, level: LogLevel = "info"): Logger {
  const prefix = `[${namespace}]`;
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

  return {
    info(message: string, meta?: unknown): void {
      if (enabled("info")) console.info(prefix, message, meta ?? "");
    },
    warn(message: string, meta?: unknown): void {
      if (enabled("warn")) console.warn(prefix, message, meta ?? "");
    },
    error(message: string, meta?: unknown): void {
      if (enabled("error")) console.error(prefix, message, meta ?? "");
    },
    debug(message: string, meta?: unknown): void {
      if (enabled("debug")) console.debug(prefix, message, meta ?? "");
    },
  } satisfies Logger;
}
