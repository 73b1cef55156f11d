/**
 * ## Machine Types - States, Events, Context and the Behavior Contract
 *
 * A machine is described by three consumer-supplied types and one behavior:
 *
 * | Type | Purpose |
 * |------|---------|
 * | `TState` | Closed union of states (bare tags or tagged records) |
 * | `TEvent` | Closed union of events, consumed by a single `handle` call |
 * | `TContext` | Mutable record shared by every state of one instance |
 * | `StateBehavior` | How each state reacts to events, and its entry/exit effects |
 *
 * ### Variant Shapes
 *
 * ```typescript
 * type DoorState = "open" | "closed" | { type: "locked"; code: number };
 * type DoorEvent = { type: "push" } | { type: "lock"; code: number } | "unlock";
 * ```
 *
 * ### Transition Protocol
 *
 * For every state-driven transition the engine runs, in order:
 *
 * 1. `exit(old, context)`
 * 2. commit the new state
 * 3. `enter(new, context)`
 *
 * `handle` returning `undefined` means "no transition": nothing else runs.
 *
 * @example
 * ```typescript
 * import { defineBehavior } from "@hookfsm/fsm-runtime";
 *
 * const door = defineBehavior<DoorState, DoorEvent, { pushes: number }>({
 *   handle(state, event, context) {
 *     if (state === "closed" && event !== "unlock" && event.type === "push") {
 *       context.pushes += 1;
 *       return "open";
 *     }
 *     return undefined;
 *   },
 * });
 * ```
 */

/**
 * Generic string-keyed record.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * Members type of a machine that declares no auxiliary fields.
 */
export type EmptyMembers = Record<never, never>;

/**
 * A tagged record variant. The `type` field names the variant; every other
 * field is associated data.
 */
export interface TaggedVariant {
  readonly type: string;
}

/**
 * A member of a closed state or event set: a bare tag or a tagged record.
 */
export type Variant = string | TaggedVariant;

/**
 * The tag names of a variant union.
 *
 * @example
 * ```typescript
 * type Tags = VariantTag<"idle" | { type: "busy"; job: string }>; // "idle" | "busy"
 * ```
 */
export type VariantTag<T extends Variant> = T extends string
  ? T
  : T extends { readonly type: infer K extends string }
    ? K
    : never;

/**
 * The member(s) of a variant union carrying the given tag.
 */
export type VariantOf<T extends Variant, K extends VariantTag<T>> = T extends string
  ? T extends K
    ? T
    : never
  : T extends { readonly type: K }
    ? T
    : never;

/**
 * Behavior contract every state set must satisfy to be driven by a machine.
 *
 * `handle` is the decision function. It must be total over the pairs that can
 * occur: a pair with no mapping returns `undefined` rather than throwing.
 * `enter` and `exit` are optional and default to no-ops.
 *
 * All side effects go through the `context` argument, which the machine lends
 * for the duration of the call only.
 *
 * @typeParam TState - Closed union of states
 * @typeParam TEvent - Closed union of events
 * @typeParam TContext - Shared mutable context
 */
export interface StateBehavior<TState extends Variant, TEvent extends Variant, TContext> {
  /**
   * Decide the next state for an event.
   *
   * @returns The next state, or `undefined` when the event is a no-op here
   */
  handle(state: TState, event: TEvent, context: TContext): TState | undefined;

  /**
   * Runs once when `state` becomes current through a transition.
   */
  enter?(state: TState, context: TContext): void;

  /**
   * Runs once when `state` stops being current, before it is overwritten.
   */
  exit?(state: TState, context: TContext): void;
}

/**
 * Operations a running machine exposes.
 *
 * @typeParam TState - Closed union of states
 * @typeParam TEvent - Closed union of events
 * @typeParam TContext - Shared mutable context
 * @typeParam TMembers - Auxiliary consumer fields carried beside the context
 */
export interface StateMachine<
  TState extends Variant,
  TEvent extends Variant,
  TContext,
  TMembers extends object = EmptyMembers,
> {
  /**
   * Name used for the logger scope.
   */
  readonly name: string;

  /**
   * Auxiliary fields supplied by the consumer. Never passed to hooks.
   */
  readonly members: TMembers;

  /**
   * Deep-frozen copy of the current state, taken when it was committed.
   */
  getCurrentState(): TState;

  /**
   * Read-only view of the live context.
   */
  getContext(): Readonly<TContext>;

  /**
   * Check whether the current state carries one of the given tags.
   */
  isIn(...tags: ReadonlyArray<VariantTag<TState>>): boolean;

  /**
   * Caller-driven transition: `exit(current)`, commit, `enter(next)`.
   * Fires both hooks even when `next` equals the current state.
   */
  transition(next: TState): void;

  /**
   * Overwrite the current state without running any hook.
   *
   * Callers are responsible for leaving the context consistent.
   */
  forceState(next: TState): void;

  /**
   * Deliver one event to the current state.
   *
   * @returns true if a transition ran
   */
  handle(event: TEvent): boolean;
}
