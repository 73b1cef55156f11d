export type { Consumable, HeroContext, HeroEvent, HeroSize, HeroState } from "./hero.js";
export {
  CONSUMABLES,
  HERO_STATES,
  getConsumable,
  heroBehavior,
  heroMachine,
  hit,
} from "./hero.js";
