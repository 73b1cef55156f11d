/**
 * Logging Module
 *
 * @example
 * ```typescript
 * import { createScopedLogger, createNoOpLogger, type LogLevel } from "@hookfsm/fsm-runtime";
 *
 * const level: LogLevel = "DEBUG";
 * const logger = createScopedLogger("FSM:door", level);
 * const silent = createNoOpLogger();
 * ```
 */

// Types
export type { Logger, LogLevel, LogWriter } from "./types.js";
export { LOG_LEVELS, DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

// Factories
export {
  createScopedLogger,
  createNoOpLogger,
  createChildLogger,
  formatLogLine,
  loggerFrom,
} from "./scoped.js";
