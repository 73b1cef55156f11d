/**
 * ## defineMachine - Machine Factory
 *
 * Assembles a reusable machine description (behavior, initial state, context
 * defaults, auxiliary members) and stamps out independent instances from it.
 *
 * ### Factory Methods
 *
 * | Method | Returns | Purpose |
 * |--------|---------|---------|
 * | `create()` | `StateMachine` | Initial state, default context and members |
 * | `create({ state, context, members })` | `StateMachine` | Explicit starting point; missing parts defaulted |
 * | `defaultContext()` | `TContext` | Fresh default context |
 *
 * Defaults are either a factory function or plain data. Plain data is
 * deep-cloned for every instance, so no two machines share a context.
 * Neither form of `create` runs `enter` on the starting state.
 *
 * @example
 * ```typescript
 * type Phase = "idle" | "running" | "done";
 * type Signal = "start" | "finish";
 *
 * export const jobMachine = defineMachine({
 *   name: "job",
 *   initial: "idle",
 *   context: { attempts: 0 },
 *   behavior: defineBehavior<Phase, Signal, { attempts: number }>({
 *     handle(state, event) {
 *       if (state === "idle" && event === "start") return "running";
 *       if (state === "running" && event === "finish") return "done";
 *       return undefined;
 *     },
 *     enter(state, context) {
 *       if (state === "running") context.attempts += 1;
 *     },
 *   }),
 * });
 *
 * const job = jobMachine.create();
 * job.handle("start");
 * job.getContext().attempts; // 1
 * ```
 */

import { resolveMachineConfig } from "./config.js";
import type { MachineConfigInput } from "./config.js";
import { createMachine } from "./createMachine.js";
import type { Logger } from "./logging/types.js";
import type { EmptyMembers, StateBehavior, StateMachine, Variant } from "./types.js";

/**
 * A default value: plain data (cloned per use) or a factory (called per use).
 */
export type Defaults<T> = T | (() => T);

/**
 * Description of a family of machines.
 */
export interface MachineDefinition<
  TState extends Variant,
  TEvent extends Variant,
  TContext,
  TMembers extends object = EmptyMembers,
> extends MachineConfigInput {
  behavior: StateBehavior<TState, TEvent, TContext>;
  /**
   * State new instances start in.
   */
  initial: TState;
  context: Defaults<TContext>;
  members?: Defaults<TMembers>;
  /**
   * Shared by every instance instead of a scoped logger.
   */
  logger?: Logger;
}

/**
 * Explicit starting point for `create()`.
 */
export interface MachineOverrides<TState extends Variant, TContext, TMembers extends object> {
  state?: TState;
  /**
   * Taken as-is: the new machine owns it from then on.
   */
  context?: TContext;
  members?: TMembers;
}

/**
 * Produces machine instances from a definition.
 */
export interface MachineFactory<
  TState extends Variant,
  TEvent extends Variant,
  TContext,
  TMembers extends object = EmptyMembers,
> {
  readonly name: string;
  readonly initial: TState;
  defaultContext(): TContext;
  create(
    overrides?: MachineOverrides<TState, TContext, TMembers>
  ): StateMachine<TState, TEvent, TContext, TMembers>;
}

function isFactory<T>(defaults: Defaults<T>): defaults is () => T {
  return typeof defaults === "function";
}

function resolveDefaults<T>(defaults: Defaults<T>): T {
  return isFactory(defaults) ? defaults() : structuredClone(defaults);
}

/**
 * Define a machine family.
 *
 * Configuration is validated here, once, rather than on every `create()`.
 *
 * @throws MachineConfigError if `name` or `logLevel` are invalid
 */
export function defineMachine<
  TState extends Variant,
  TEvent extends Variant,
  TContext,
  TMembers extends object,
>(
  definition: MachineDefinition<TState, TEvent, TContext, TMembers> & {
    members: Defaults<TMembers>;
  }
): MachineFactory<TState, TEvent, TContext, TMembers>;
export function defineMachine<TState extends Variant, TEvent extends Variant, TContext>(
  definition: MachineDefinition<TState, TEvent, TContext>
): MachineFactory<TState, TEvent, TContext>;
export function defineMachine<
  TState extends Variant,
  TEvent extends Variant,
  TContext,
  TMembers extends object,
>(
  definition: MachineDefinition<TState, TEvent, TContext, TMembers>
): MachineFactory<TState, TEvent, TContext, TMembers | EmptyMembers> {
  const config = resolveMachineConfig({ name: definition.name, logLevel: definition.logLevel });
  const { behavior, initial, logger } = definition;

  const defaultContext = (): TContext => resolveDefaults(definition.context);

  const defaultMembers = (): TMembers | EmptyMembers =>
    definition.members === undefined ? {} : resolveDefaults(definition.members);

  return {
    name: config.name,
    initial,
    defaultContext,

    create(overrides = {}) {
      return createMachine<TState, TEvent, TContext, TMembers | EmptyMembers>({
        name: config.name,
        logLevel: config.logLevel,
        behavior,
        initial: overrides.state ?? initial,
        context: overrides.context ?? defaultContext(),
        members: overrides.members ?? defaultMembers(),
        ...(logger !== undefined && { logger }),
      });
    },
  };
}
