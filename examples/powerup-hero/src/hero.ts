/**
 * Power-up hero: a platformer character whose form changes as it collects
 * items and takes hits.
 *
 * | From  | GetConsumable(Mushroom) | GetConsumable(Flower) | GetConsumable(Feather) | Hit   |
 * |-------|-------------------------|-----------------------|------------------------|-------|
 * | Small | Super                   | Fire                  | Cape                   | Dead  |
 * | Super | -                       | Fire                  | Cape                   | Small |
 * | Fire  | -                       | -                     | Cape                   | Small |
 * | Cape  | -                       | Fire                  | -                      | Small |
 * | Dead  | -                       | -                     | -                      | -     |
 *
 * Size and liveness live in the context and are maintained by `enter` alone.
 */
import { assertNever, defineBehavior, defineMachine } from "@hookfsm/fsm-runtime";

// ============================================================================
// Variants
// ============================================================================

export const HERO_STATES = ["Dead", "Small", "Super", "Fire", "Cape"] as const;
export type HeroState = (typeof HERO_STATES)[number];

export const CONSUMABLES = ["Mushroom", "Flower", "Feather"] as const;
export type Consumable = (typeof CONSUMABLES)[number];

export type HeroEvent =
  | { readonly type: "GetConsumable"; readonly item: Consumable }
  | { readonly type: "Hit" };

export type HeroSize = "Small" | "Large";

export interface HeroContext {
  size: HeroSize;
  alive: boolean;
}

// ============================================================================
// Event Constructors
// ============================================================================

export function getConsumable(item: Consumable): HeroEvent {
  return { type: "GetConsumable", item };
}

export const hit: HeroEvent = { type: "Hit" };

// ============================================================================
// Behavior
// ============================================================================

function powerUp(state: HeroState, item: Consumable): HeroState | undefined {
  switch (state) {
    case "Small":
      switch (item) {
        case "Mushroom":
          return "Super";
        case "Flower":
          return "Fire";
        case "Feather":
          return "Cape";
        default:
          return assertNever(item, "consumable");
      }
    case "Super":
      if (item === "Flower") return "Fire";
      if (item === "Feather") return "Cape";
      return undefined;
    case "Fire":
      return item === "Feather" ? "Cape" : undefined;
    case "Cape":
      return item === "Flower" ? "Fire" : undefined;
    case "Dead":
      return undefined;
    default:
      return assertNever(state, "state");
  }
}

function takeHit(state: HeroState): HeroState | undefined {
  switch (state) {
    case "Small":
      return "Dead";
    case "Super":
    case "Fire":
    case "Cape":
      return "Small";
    case "Dead":
      return undefined;
    default:
      return assertNever(state, "state");
  }
}

export const heroBehavior = defineBehavior<HeroState, HeroEvent, HeroContext>({
  handle(state, event) {
    switch (event.type) {
      case "GetConsumable":
        return powerUp(state, event.item);
      case "Hit":
        return takeHit(state);
      default:
        return assertNever(event, "event");
    }
  },

  enter(state, context) {
    switch (state) {
      case "Dead":
        context.alive = false;
        break;
      case "Small":
        context.size = "Small";
        break;
      default:
        context.size = "Large";
    }
  },
});

// ============================================================================
// Machine
// ============================================================================

export const heroMachine = defineMachine<HeroState, HeroEvent, HeroContext>({
  name: "hero",
  initial: "Small",
  context: () => ({ size: "Small", alive: true }),
  behavior: heroBehavior,
});
