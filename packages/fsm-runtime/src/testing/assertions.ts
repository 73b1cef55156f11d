/**
 * Machine Assertion Helpers
 *
 * Assertions for machine behavior in unit and BDD tests, built on vitest's
 * expect() for consistent failure output.
 *
 * @module @hookfsm/fsm-runtime/testing
 */

import { expect } from "vitest";
import type { StateMachine, Variant } from "../types.js";
import type { HookRecorder } from "./hookRecorder.js";

/**
 * Assert the machine's current state (structural comparison).
 *
 * @example
 * ```typescript
 * assertCurrentState(door, { type: "locked", code: 42 });
 * ```
 */
export function assertCurrentState<TState extends Variant, TEvent extends Variant, TContext>(
  machine: StateMachine<TState, TEvent, TContext, object>,
  expected: TState
): void {
  expect(machine.getCurrentState()).toEqual(expected);
}

/**
 * Assert the listed context fields. Fields not listed are not checked.
 *
 * @example
 * ```typescript
 * assertContext(door, { pushes: 2 });
 * ```
 */
export function assertContext<TState extends Variant, TEvent extends Variant, TContext extends object>(
  machine: StateMachine<TState, TEvent, TContext, object>,
  expected: Partial<TContext>
): void {
  const context = machine.getContext();
  const actual = Object.fromEntries(
    Object.keys(expected).map((key) => [key, Reflect.get(context, key)])
  );
  expect(actual).toEqual(expected);
}

/**
 * Deliver an event and assert that no transition ran.
 *
 * @example
 * ```typescript
 * assertNoTransition(door, "unlock");
 * ```
 */
export function assertNoTransition<TState extends Variant, TEvent extends Variant, TContext>(
  machine: StateMachine<TState, TEvent, TContext, object>,
  event: TEvent
): void {
  const before = machine.getCurrentState();
  expect(machine.handle(event)).toBe(false);
  expect(machine.getCurrentState()).toEqual(before);
}

/**
 * Deliver an event and assert that it moved the machine to `expected`.
 *
 * @example
 * ```typescript
 * assertTransitionsTo(door, { type: "push" }, "open");
 * ```
 */
export function assertTransitionsTo<TState extends Variant, TEvent extends Variant, TContext>(
  machine: StateMachine<TState, TEvent, TContext, object>,
  event: TEvent,
  expected: TState
): void {
  expect(machine.handle(event)).toBe(true);
  expect(machine.getCurrentState()).toEqual(expected);
}

/**
 * Assert the recorded hook calls, in order.
 *
 * @example
 * ```typescript
 * assertHookOrder(recorder, ["handle:closed:push", "exit:closed", "enter:open"]);
 * ```
 */
export function assertHookOrder<TState extends Variant, TEvent extends Variant, TContext>(
  recorder: HookRecorder<TState, TEvent, TContext>,
  expected: string[]
): void {
  expect(recorder.trace()).toEqual(expected);
}
