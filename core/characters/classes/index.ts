import type { PlayerCharacter, PlayerClassName } from "../PlayerCharacter";
import { Cleric } from "./Cleric";
import { Fighter } from "./Fighter";
import { Rogue } from "./Rogue";
import { Wizard } from "./Wizard";

export type PlayerFactory = (name: string, level: number) => PlayerCharacter;

export const PLAYER_CLASSES: Readonly<Record<PlayerClassName, PlayerFactory>> = {
  Cleric: (name, level) => new Cleric(name, level),
  Fighter: (name, level) => new Fighter(name, level),
  Rogue: (name, level) => new Rogue(name, level),
  Wizard: (name, level) => new Wizard(name, level),
};

export function isPlayerClassName(value: string): value is PlayerClassName {
  return Object.prototype.hasOwnProperty.call(PLAYER_CLASSES, value);
}

/** Builds a party; repeated classes are numbered from the second copy on. */
export function createParty(classes: readonly PlayerClassName[], level: number): PlayerCharacter[] {
  const seen = new Map<string, number>();
  return classes.map((className) => {
    const count = (seen.get(className) ?? 0) + 1;
    seen.set(className, count);
    const name = count === 1 ? className : `${className}${count}`;
    return PLAYER_CLASSES[className](name, level);
  });
}

export { Cleric, Fighter, Rogue, Wizard };
