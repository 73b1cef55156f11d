/**
 * Finite state machine runtime with guaranteed entry/exit hooks.
 *
 * @example
 * ```typescript
 * import { defineBehavior, defineMachine, assertNever } from "@hookfsm/fsm-runtime";
 *
 * type Light = "off" | "on";
 * type Flip = "toggle";
 *
 * export const lightMachine = defineMachine({
 *   name: "light",
 *   initial: "off",
 *   context: { flips: 0 },
 *   behavior: defineBehavior<Light, Flip, { flips: number }>({
 *     handle(state) {
 *       switch (state) {
 *         case "off": return "on";
 *         case "on": return "off";
 *         default: return assertNever(state, "state");
 *       }
 *     },
 *     enter(_state, context) {
 *       context.flips += 1;
 *     },
 *   }),
 * });
 *
 * const light = lightMachine.create();
 * light.handle("toggle");
 * light.getCurrentState(); // "on"
 * ```
 *
 * @module @hookfsm/fsm-runtime
 */

// Types
export type {
  UnknownRecord,
  EmptyMembers,
  TaggedVariant,
  Variant,
  VariantTag,
  VariantOf,
  StateBehavior,
  StateMachine,
} from "./types.js";

// Variants
export { tagOf, isTaggedVariant, variantsEqual, copyVariant, assertNever } from "./variants.js";

// Errors
export type { MachineErrorCode } from "./errors.js";
export { MACHINE_ERROR_CODES, MachineError, MachineConfigError, isMachineError } from "./errors.js";

// Configuration
export type { MachineConfig, MachineConfigInput } from "./config.js";
export {
  DEFAULT_MACHINE_NAME,
  LogLevelSchema,
  MachineConfigSchema,
  resolveMachineConfig,
} from "./config.js";

// Factories
export { defineBehavior } from "./defineBehavior.js";
export type { CreateMachineOptions } from "./createMachine.js";
export { createMachine } from "./createMachine.js";
export type { Defaults, MachineDefinition, MachineFactory, MachineOverrides } from "./defineMachine.js";
export { defineMachine } from "./defineMachine.js";

// Operations
export { getCurrentState, transition, forceState, handle, handleAll } from "./operations.js";

// Logging
export * from "./logging/index.js";
