/**
 * ## createMachine - The Transition Engine
 *
 * Holds the single current state and the single context of one machine
 * instance, and runs every state-driven transition as
 * `exit(old) → commit(new) → enter(new)` against that context.
 *
 * ### Operations
 *
 * | Method | Hooks | Purpose |
 * |--------|-------|---------|
 * | `handle(event)` | exit + enter when a next state is returned | Event-driven transition |
 * | `transition(next)` | exit + enter, also for self-transitions | Caller-driven transition |
 * | `forceState(next)` | none | Initialization and diagnostics |
 * | `getCurrentState()` | none | Deep-frozen copy of the current state |
 *
 * Construction installs the initial state without calling `enter`. Callers
 * that need the initial state's entry effects call `transition` themselves.
 *
 * Every state is stored as a deep-frozen copy (`copyVariant`): the caller's
 * own object stays theirs, and nothing outside a transition can change the
 * stored one.
 *
 * ### Reentrancy
 *
 * While a `handle`, `enter` or `exit` of an instance is running, the mutating
 * operations of that same instance throw `MachineError` with code
 * `FSM_REENTRANT_DISPATCH`. Reads stay available.
 *
 * @example
 * ```typescript
 * const machine = createMachine({
 *   name: "door",
 *   behavior: doorBehavior,
 *   initial: "closed",
 *   context: { pushes: 0 },
 * });
 *
 * machine.handle({ type: "push" }); // true
 * machine.getCurrentState();        // "open"
 * ```
 */

import { resolveMachineConfig } from "./config.js";
import type { MachineConfigInput } from "./config.js";
import { MACHINE_ERROR_CODES, MachineError } from "./errors.js";
import { createChildLogger } from "./logging/scoped.js";
import type { Logger } from "./logging/types.js";
import type { EmptyMembers, StateBehavior, StateMachine, Variant, VariantTag } from "./types.js";
import { copyVariant, tagOf } from "./variants.js";

/**
 * Everything needed to build one machine instance.
 */
export interface CreateMachineOptions<
  TState extends Variant,
  TEvent extends Variant,
  TContext,
  TMembers extends object = EmptyMembers,
> extends MachineConfigInput {
  behavior: StateBehavior<TState, TEvent, TContext>;
  initial: TState;
  /**
   * Context owned by the machine from now on. Not copied.
   */
  context: TContext;
  members?: TMembers;
  /**
   * Replaces the scoped `FSM:<name>` logger.
   */
  logger?: Logger;
}

type MutatingOperation = "handle" | "transition" | "forceState";

/** Label for transitions that no event triggered. */
const CALLER_TRIGGER = "transition";

/**
 * Create a machine instance.
 *
 * @throws MachineConfigError if `name` or `logLevel` are invalid
 */
export function createMachine<
  TState extends Variant,
  TEvent extends Variant,
  TContext,
  TMembers extends object,
>(
  options: CreateMachineOptions<TState, TEvent, TContext, TMembers> & { members: TMembers }
): StateMachine<TState, TEvent, TContext, TMembers>;
export function createMachine<TState extends Variant, TEvent extends Variant, TContext>(
  options: CreateMachineOptions<TState, TEvent, TContext>
): StateMachine<TState, TEvent, TContext>;
export function createMachine<
  TState extends Variant,
  TEvent extends Variant,
  TContext,
  TMembers extends object,
>(
  options: CreateMachineOptions<TState, TEvent, TContext, TMembers>
): StateMachine<TState, TEvent, TContext, TMembers | EmptyMembers> {
  const config = resolveMachineConfig({ name: options.name, logLevel: options.logLevel });
  const { behavior, context } = options;
  const logger = options.logger ?? createChildLogger("FSM", config.name, config.logLevel);

  let current = copyVariant(options.initial);
  let dispatching = false;

  const guard = (operation: MutatingOperation): void => {
    if (!dispatching) return;
    const state = tagOf(current);
    logger.error("Reentrant dispatch rejected", { operation, state });
    throw new MachineError(
      MACHINE_ERROR_CODES.REENTRANT_DISPATCH,
      `Cannot ${operation} on machine "${config.name}" while it is dispatching (state "${state}")`,
      { operation, state }
    );
  };

  // A hook's error reaches the caller unchanged; it is only logged on the way.
  const runHook = (hook: "enter" | "exit", state: TState): void => {
    try {
      behavior[hook]?.(state, context);
    } catch (error) {
      logger.warn("Hook failed", {
        hook,
        state: tagOf(state),
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  };

  // exit(old) → commit(next) → enter(next). Caller holds the dispatch flag.
  const runTransition = (next: TState, trigger: string): void => {
    const previous = current;
    runHook("exit", previous);
    current = copyVariant(next);
    runHook("enter", current);
    logger.debug("Transition completed", {
      from: tagOf(previous),
      to: tagOf(current),
      trigger,
    });
  };

  const dispatch = (run: () => boolean): boolean => {
    dispatching = true;
    try {
      return run();
    } finally {
      dispatching = false;
    }
  };

  return {
    name: config.name,
    members: options.members ?? {},

    getCurrentState(): TState {
      return current;
    },

    getContext(): Readonly<TContext> {
      return context;
    },

    isIn(...tags: ReadonlyArray<VariantTag<TState>>): boolean {
      const tag = tagOf(current);
      return tags.some((candidate) => candidate === tag);
    },

    transition(next: TState): void {
      guard("transition");
      dispatch(() => {
        runTransition(next, CALLER_TRIGGER);
        return true;
      });
    },

    forceState(next: TState): void {
      guard("forceState");
      const previous = current;
      current = copyVariant(next);
      logger.info("State forced", { from: tagOf(previous), to: tagOf(current) });
    },

    handle(event: TEvent): boolean {
      guard("handle");
      return dispatch(() => {
        logger.trace("Dispatching event", { state: tagOf(current), event: tagOf(event) });
        const next = behavior.handle(current, event, context);
        if (next === undefined) {
          logger.debug("Event ignored", { state: tagOf(current), event: tagOf(event) });
          return false;
        }
        runTransition(next, tagOf(event));
        return true;
      });
    },
  };
}
