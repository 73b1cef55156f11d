/**
 * Hook Recorder
 *
 * Wraps a behavior so every `handle`, `enter` and `exit` call is recorded in
 * order, then forwarded to the wrapped behavior unchanged.
 *
 * @module @hookfsm/fsm-runtime/testing
 */

import type { StateBehavior, Variant } from "../types.js";
import { tagOf } from "../variants.js";

export type HookName = "handle" | "enter" | "exit";

/**
 * One recorded call.
 */
export interface HookCall {
  hook: HookName;
  /** Tag of the state the hook ran for */
  state: string;
  /** Tag of the event, for `handle` calls only */
  event?: string;
}

/**
 * A wrapped behavior and the calls made through it.
 */
export interface HookRecorder<TState extends Variant, TEvent extends Variant, TContext> {
  /** Pass this to the machine instead of the original behavior */
  readonly behavior: StateBehavior<TState, TEvent, TContext>;
  readonly calls: ReadonlyArray<HookCall>;
  /**
   * Calls formatted as `hook:state` (`handle:state:event` for handle).
   */
  trace(): string[];
  clear(): void;
}

/**
 * Record the hook calls a machine makes on a behavior.
 *
 * @example
 * ```typescript
 * const recorder = createHookRecorder(doorBehavior);
 * const door = createMachine({ behavior: recorder.behavior, initial: "closed", context });
 *
 * door.handle({ type: "push" });
 * recorder.trace(); // ["handle:closed:push", "exit:closed", "enter:open"]
 * ```
 */
export function createHookRecorder<TState extends Variant, TEvent extends Variant, TContext>(
  inner: StateBehavior<TState, TEvent, TContext>
): HookRecorder<TState, TEvent, TContext> {
  const calls: HookCall[] = [];

  const behavior: StateBehavior<TState, TEvent, TContext> = {
    handle(state, event, context) {
      calls.push({ hook: "handle", state: tagOf(state), event: tagOf(event) });
      return inner.handle(state, event, context);
    },
    enter(state, context) {
      calls.push({ hook: "enter", state: tagOf(state) });
      inner.enter?.(state, context);
    },
    exit(state, context) {
      calls.push({ hook: "exit", state: tagOf(state) });
      inner.exit?.(state, context);
    },
  };

  return {
    behavior,

    get calls(): ReadonlyArray<HookCall> {
      return calls;
    },

    trace(): string[] {
      return calls.map((call) =>
        call.event === undefined
          ? `${call.hook}:${call.state}`
          : `${call.hook}:${call.state}:${call.event}`
      );
    },

    clear(): void {
      calls.length = 0;
    },
  };
}
