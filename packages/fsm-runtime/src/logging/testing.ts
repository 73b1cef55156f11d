/**
 * Mock logger that captures log calls for assertion in tests.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const machine = createMachine({ ..., logger });
 *
 * machine.handle("push");
 *
 * expect(logger.getLastCallAt("DEBUG")?.message).toBe("Transition completed");
 * ```
 */

import type { UnknownRecord } from "../types.js";
import { loggerFrom } from "./scoped.js";
import type { Logger, LogLevel } from "./types.js";

export interface LogCall {
  level: LogLevel;
  message: string;
  /** undefined if no data was passed */
  data: UnknownRecord | undefined;
}

export interface MockLogger extends Logger {
  readonly calls: ReadonlyArray<LogCall>;
  clear(): void;
  getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall>;
  getLastCallAt(level: LogLevel): LogCall | undefined;
}

export function createMockLogger(): MockLogger {
  const calls: LogCall[] = [];
  const callsAt = (level: LogLevel): LogCall[] => calls.filter((call) => call.level === level);

  return {
    ...loggerFrom((level, message, data) => {
      calls.push({ level, message, data });
    }),

    get calls(): ReadonlyArray<LogCall> {
      return calls;
    },

    clear(): void {
      calls.length = 0;
    },

    getCallsAtLevel: callsAt,

    getLastCallAt(level: LogLevel): LogCall | undefined {
      return callsAt(level).at(-1);
    },
  };
}
