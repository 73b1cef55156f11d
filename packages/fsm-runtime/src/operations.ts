/**
 * ## Machine Operations - Functional Style
 *
 * Standalone counterparts of the `StateMachine` methods, for callers that pass
 * operations around as callbacks or compose them with other functions.
 *
 * | Function | Returns | Purpose |
 * |----------|---------|---------|
 * | `getCurrentState(machine)` | `TState` | Copy of the current state |
 * | `transition(machine, next)` | `void` | Caller-driven transition with hooks |
 * | `forceState(machine, next)` | `void` | Overwrite without hooks |
 * | `handle(machine, event)` | `boolean` | Deliver one event |
 * | `handleAll(machine, events)` | `number` | Deliver events in order, count transitions |
 *
 * @example
 * ```typescript
 * import { handle, handleAll } from "@hookfsm/fsm-runtime";
 *
 * handle(door, { type: "push" });
 * const moved = handleAll(door, ["unlock", { type: "push" }]);
 * ```
 */

import type { StateMachine, Variant } from "./types.js";

/**
 * Get an immutable copy of the machine's current state.
 */
export function getCurrentState<TState extends Variant, TEvent extends Variant, TContext>(
  machine: StateMachine<TState, TEvent, TContext, object>
): TState {
  return machine.getCurrentState();
}

/**
 * Run `exit(current)`, commit `next`, then `enter(next)`.
 */
export function transition<TState extends Variant, TEvent extends Variant, TContext>(
  machine: StateMachine<TState, TEvent, TContext, object>,
  next: TState
): void {
  machine.transition(next);
}

/**
 * Overwrite the current state without running hooks.
 */
export function forceState<TState extends Variant, TEvent extends Variant, TContext>(
  machine: StateMachine<TState, TEvent, TContext, object>,
  next: TState
): void {
  machine.forceState(next);
}

/**
 * Deliver one event.
 *
 * @returns true if a transition ran
 */
export function handle<TState extends Variant, TEvent extends Variant, TContext>(
  machine: StateMachine<TState, TEvent, TContext, object>,
  event: TEvent
): boolean {
  return machine.handle(event);
}

/**
 * Deliver events one after another, each running to completion before the
 * next is delivered.
 *
 * @returns Number of events that caused a transition
 */
export function handleAll<TState extends Variant, TEvent extends Variant, TContext>(
  machine: StateMachine<TState, TEvent, TContext, object>,
  events: Iterable<TEvent>
): number {
  let transitions = 0;
  for (const event of events) {
    if (machine.handle(event)) {
      transitions += 1;
    }
  }
  return transitions;
}
