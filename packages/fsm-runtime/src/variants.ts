/**
 * ## Variant Helpers - Tags, Equality and Immutable States
 *
 * States and events are plain values: a bare string tag, or a record whose
 * `type` field is the tag. These helpers give them value semantics.
 *
 * | Function | Purpose |
 * |----------|---------|
 * | `tagOf(value)` | Tag of a bare or tagged variant |
 * | `variantsEqual(a, b)` | Structural equality over tag and data |
 * | `copyVariant(value)` | Deep-frozen copy of a state, taken before it is stored |
 * | `assertNever(value)` | Exhaustiveness check for `switch` statements |
 *
 * @example
 * ```typescript
 * tagOf("idle");                           // "idle"
 * tagOf({ type: "busy", job: "render" });  // "busy"
 *
 * variantsEqual({ type: "busy", job: "a" }, { type: "busy", job: "a" }); // true
 * ```
 */

import { MACHINE_ERROR_CODES, MachineError } from "./errors.js";
import type { TaggedVariant, Variant } from "./types.js";

/**
 * Check whether a variant is a tagged record rather than a bare tag.
 */
export function isTaggedVariant(value: Variant): value is TaggedVariant {
  return typeof value !== "string";
}

/**
 * Get the tag of a variant.
 */
export function tagOf(value: Variant): string {
  return isTaggedVariant(value) ? value.type : value;
}

/**
 * Structural equality for states and events.
 *
 * Two variants are equal when they carry the same tag and their associated
 * data is deeply equal (own enumerable keys, arrays element-wise).
 */
export function variantsEqual(a: Variant, b: Variant): boolean {
  return structurallyEqual(a, b);
}

function structurallyEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) {
    return false;
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item: unknown, index) => structurallyEqual(item, b[index]));
  }

  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;

  return aKeys.every(
    (key) =>
      Object.prototype.hasOwnProperty.call(b, key) &&
      structurallyEqual(Reflect.get(a, key), Reflect.get(b, key))
  );
}

function deepFreeze(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
  for (const key of Object.keys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  Object.freeze(value);
}

/**
 * Take an immutable copy of a state.
 *
 * The copy is deep-cloned and then deep-frozen, so neither the caller's
 * original nor anyone holding the copy can change the stored value. Bare tags
 * are returned as they are.
 *
 * @example
 * ```typescript
 * const mine = { type: "route", stops: ["a"] };
 * const stored = copyVariant(mine);
 *
 * mine.stops.push("b");   // fine, stored is unaffected
 * stored.stops.push("b"); // TypeError: object is not extensible
 * ```
 */
export function copyVariant<T extends Variant>(value: T): T {
  if (!isTaggedVariant(value)) return value;
  const copy = structuredClone(value);
  deepFreeze(copy);
  return copy;
}

function describeValue(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Exhaustiveness check for `switch` statements over a closed variant set.
 *
 * @throws MachineError with code FSM_UNREACHABLE_VARIANT if reached at runtime
 *
 * @example
 * ```typescript
 * switch (state) {
 *   case "open": return ...;
 *   case "closed": return ...;
 *   default: return assertNever(state);
 * }
 * ```
 */
export function assertNever(value: never, label = "variant"): never {
  throw new MachineError(
    MACHINE_ERROR_CODES.UNREACHABLE_VARIANT,
    `Unexpected ${label}: ${describeValue(value)}`,
    { label }
  );
}
