/**
 * Logging Types
 *
 * What each level carries for a machine:
 * - DEBUG: ignored events, completed transitions
 * - TRACE: every event as it is dispatched
 * - INFO: forced states
 * - WARN: a hook that threw (the error still reaches the caller)
 * - ERROR: rejected operations
 */

import type { UnknownRecord } from "../types.js";

/**
 * All log levels, most verbose first.
 */
export const LOG_LEVELS = ["DEBUG", "TRACE", "INFO", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

/**
 * Logger interface.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("FSM:door", "DEBUG");
 *
 * logger.debug("Event ignored", { state: "open", event: "push" });
 * logger.info("State forced", { from: "open", to: "locked" });
 * ```
 */
export interface Logger {
  debug(message: string, data?: UnknownRecord): void;
  trace(message: string, data?: UnknownRecord): void;
  info(message: string, data?: UnknownRecord): void;
  warn(message: string, data?: UnknownRecord): void;
  error(message: string, data?: UnknownRecord): void;
}

/**
 * Sink every logger method forwards to.
 */
export type LogWriter = (level: LogLevel, message: string, data?: UnknownRecord) => void;

/**
 * Check if a message at `messageLevel` passes a `configuredLevel` threshold.
 *
 * @example
 * ```typescript
 * shouldLog("DEBUG", "INFO"); // false
 * shouldLog("WARN", "INFO");  // true
 * ```
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(messageLevel) >= LOG_LEVELS.indexOf(configuredLevel);
}
