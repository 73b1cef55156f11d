import type { StateBehavior, Variant } from "./types.js";

/**
 * Declare the behavior of a state set with its type parameters fixed.
 *
 * Returns the behavior unchanged; the point is inference: handlers get fully
 * typed `state`, `event` and `context` parameters without annotations.
 *
 * Write `handle` as an exhaustive `switch` over the state and close it with
 * `assertNever`, so adding a state without handling it fails to compile.
 *
 * @example
 * ```typescript
 * type Light = "off" | "on";
 * type Flip = "toggle" | "reset";
 *
 * const light = defineBehavior<Light, Flip, { flips: number }>({
 *   handle(state, event, context) {
 *     switch (state) {
 *       case "off":
 *         return event === "toggle" ? "on" : undefined;
 *       case "on":
 *         return "off";
 *       default:
 *         return assertNever(state, "state");
 *     }
 *   },
 *   enter(_state, context) {
 *     context.flips += 1;
 *   },
 * });
 * ```
 */
export function defineBehavior<TState extends Variant, TEvent extends Variant, TContext>(
  behavior: StateBehavior<TState, TEvent, TContext>
): StateBehavior<TState, TEvent, TContext> {
  return behavior;
}
