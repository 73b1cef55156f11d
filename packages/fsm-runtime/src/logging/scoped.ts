/**
 * ## Scoped Loggers
 *
 * Console loggers with a `[scope]` prefix and a minimum level. Machines log
 * under `FSM:<name>`.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("FSM:door", "INFO");
 *
 * logger.debug("Event ignored");  // dropped
 * logger.info("State forced", { from: "open", to: "closed" });
 * // [FSM:door] State forced {"from":"open","to":"closed"}
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Logger, LogLevel, LogWriter } from "./types.js";
import { DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

// Looked up per call so a console spy installed after import still sees output.
const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  DEBUG: (line) => console.debug(line),
  TRACE: (line) => console.debug(line),
  INFO: (line) => console.info(line),
  WARN: (line) => console.warn(line),
  ERROR: (line) => console.error(line),
};

/**
 * Build a Logger whose methods all forward to one writer.
 */
export function loggerFrom(write: LogWriter): Logger {
  return {
    debug: (message, data) => write("DEBUG", message, data),
    trace: (message, data) => write("TRACE", message, data),
    info: (message, data) => write("INFO", message, data),
    warn: (message, data) => write("WARN", message, data),
    error: (message, data) => write("ERROR", message, data),
  };
}

/**
 * Format one log line: `[scope] message`, followed by the data as JSON when
 * there is any.
 */
export function formatLogLine(scope: string, message: string, data?: UnknownRecord): string {
  const line = `[${scope}] ${message}`;
  return data !== undefined && Object.keys(data).length > 0
    ? `${line} ${JSON.stringify(data)}`
    : line;
}

/**
 * Create a console logger that drops messages below `level`.
 */
export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  return loggerFrom((messageLevel, message, data) => {
    if (shouldLog(messageLevel, level)) {
      CONSOLE_WRITERS[messageLevel](formatLogLine(scope, message, data));
    }
  });
}

export function createNoOpLogger(): Logger {
  return loggerFrom(() => {});
}

/**
 * Create a logger scoped `parentScope:childScope`.
 */
export function createChildLogger(
  parentScope: string,
  childScope: string,
  level: LogLevel = DEFAULT_LOG_LEVEL
): Logger {
  return createScopedLogger(`${parentScope}:${childScope}`, level);
}
