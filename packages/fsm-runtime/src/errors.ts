/**
 * Error classes for misuse of the machine runtime.
 *
 * State decisions never produce errors: an event a state does not react to
 * resolves to "no transition". These classes cover invalid configuration and
 * protocol violations by the caller.
 */

import type { UnknownRecord } from "./types.js";

/**
 * Error codes raised by the runtime.
 */
export const MACHINE_ERROR_CODES = {
  /** Machine configuration failed schema validation */
  INVALID_CONFIG: "FSM_INVALID_CONFIG",
  /** A mutating operation was invoked while the same machine was dispatching */
  REENTRANT_DISPATCH: "FSM_REENTRANT_DISPATCH",
  /** A value outside a closed variant set reached an exhaustive match */
  UNREACHABLE_VARIANT: "FSM_UNREACHABLE_VARIANT",
} as const;

export type MachineErrorCode = (typeof MACHINE_ERROR_CODES)[keyof typeof MACHINE_ERROR_CODES];

/**
 * Error thrown when the runtime is driven in a way the protocol forbids.
 */
export class MachineError extends Error {
  readonly code: MachineErrorCode;
  readonly context?: UnknownRecord;

  constructor(code: MachineErrorCode, message: string, context?: UnknownRecord) {
    super(message);
    this.name = "MachineError";
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    Object.setPrototypeOf(this, MachineError.prototype);
  }

  /**
   * Type guard for a MachineError carrying a specific code.
   */
  static hasCode<T extends MachineErrorCode>(
    error: unknown,
    code: T
  ): error is MachineError & { readonly code: T } {
    return isMachineError(error) && error.code === code;
  }
}

/**
 * Error thrown when machine configuration is rejected.
 */
export class MachineConfigError extends MachineError {
  /** Dotted paths of the offending fields, in schema order */
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    const detail = issues.length > 0 ? issues.join("; ") : "(no details)";
    super(MACHINE_ERROR_CODES.INVALID_CONFIG, `Invalid machine configuration: ${detail}`);
    this.name = "MachineConfigError";
    this.issues = issues;
    Object.setPrototypeOf(this, MachineConfigError.prototype);
  }
}

/**
 * Type guard to check if an error was raised by the runtime.
 */
export function isMachineError(error: unknown): error is MachineError {
  return error instanceof MachineError;
}
