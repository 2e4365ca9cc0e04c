/**
 * Level-gated console logging
 */

import { config } from "./config";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

let currentLevel: LogLevel = isLogLevel(config.LOG_LEVEL) ? config.LOG_LEVEL : "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export const log = {
  debug(...args: unknown[]): void {
    if (enabled("debug")) console.debug(...args);
  },
  info(...args: unknown[]): void {
    if (enabled("info")) console.info(...args);
  },
  warn(...args: unknown[]): void {
    if (enabled("warn")) console.warn(...args);
  },
  error(...args: unknown[]): void {
    if (enabled("error")) console.error(...args);
  },
};
