/**
 * Machine configuration.
 *
 * Plain settings are validated with zod before a machine is built; runtime
 * collaborators (behavior, logger) are passed alongside and not validated here.
 */

import { z } from "zod";
import { MachineConfigError } from "./errors.js";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "./logging/types.js";

export const DEFAULT_MACHINE_NAME = "machine";

/**
 * Schema for log level values.
 */
export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Schema for machine configuration.
 */
export const MachineConfigSchema = z.object({
  /** Name used in the logger scope `FSM:<name>` */
  name: z.string().trim().min(1, "name must not be empty").default(DEFAULT_MACHINE_NAME),
  /** Minimum level for the machine's scoped logger */
  logLevel: LogLevelSchema.default(DEFAULT_LOG_LEVEL),
});

/**
 * Configuration as accepted from callers (every field optional).
 */
export type MachineConfigInput = z.input<typeof MachineConfigSchema>;

/**
 * Configuration after defaults are applied.
 */
export type MachineConfig = z.output<typeof MachineConfigSchema>;

/**
 * Validate machine configuration and apply defaults.
 *
 * Accepts untrusted input, such as settings read from a file.
 *
 * @throws MachineConfigError listing each invalid field as `path: message`
 *
 * @example
 * ```typescript
 * resolveMachineConfig({ name: "door" }); // { name: "door", logLevel: "INFO" }
 * resolveMachineConfig({ name: "" });     // throws MachineConfigError
 * ```
 */
export function resolveMachineConfig(input: unknown = {}): MachineConfig {
  const result = MachineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new MachineConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}
