import type { DiceSpec } from "../utils/Dice";
import type { Ability, DamageType } from "./Abilities";

export interface SecondaryDamage {
  dice: DiceSpec;
  damageType: DamageType;
}

export interface WeaponDefinition {
  name: string;
  dice: DiceSpec;
  damageType: DamageType;
  ability: Ability;
  proficient?: boolean;
  ranged?: boolean;
  /** Off-hand and some natural attacks leave the ability out of damage. */
  addAbilityToDamage?: boolean;
  attackBonus?: number;
  damageBonus?: number;
  secondary?: SecondaryDamage;
}

export interface Weapon {
  readonly name: string;
  readonly dice: DiceSpec;
  readonly damageType: DamageType;
  readonly ability: Ability;
  readonly proficient: boolean;
  readonly ranged: boolean;
  readonly addAbilityToDamage: boolean;
  readonly attackBonus: number;
  readonly damageBonus: number;
  readonly secondary: SecondaryDamage | null;
}

export function createWeapon(definition: WeaponDefinition): Weapon {
  return Object.freeze({
    name: definition.name,
    dice: definition.dice,
    damageType: definition.damageType,
    ability: definition.ability,
    proficient: definition.proficient ?? true,
    ranged: definition.ranged ?? false,
    addAbilityToDamage: definition.addAbilityToDamage ?? true,
    attackBonus: definition.attackBonus ?? 0,
    damageBonus: definition.damageBonus ?? 0,
    secondary: definition.secondary ?? null,
  });
}
