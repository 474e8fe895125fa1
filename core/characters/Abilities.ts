export const ABILITIES = ["str", "dex", "con", "int", "wis", "cha"] as const;

export type Ability = (typeof ABILITIES)[number];

export type AbilityModifiers = Record<Ability, number>;

export const DAMAGE_TYPES = [
  "acid",
  "bludgeoning",
  "cold",
  "fire",
  "force",
  "lightning",
  "necrotic",
  "piercing",
  "poison",
  "psychic",
  "radiant",
  "slashing",
  "thunder",
  "magic-bludgeoning",
  "magic-piercing",
  "magic-slashing",
] as const;

export type DamageType = (typeof DAMAGE_TYPES)[number];

const PHYSICAL_DAMAGE_TYPES: ReadonlySet<DamageType> = new Set<DamageType>([
  "bludgeoning",
  "piercing",
  "slashing",
  "magic-bludgeoning",
  "magic-piercing",
  "magic-slashing",
]);

export const SKILLS = ["acrobatics", "perception", "stealth"] as const;

export type Skill = (typeof SKILLS)[number];

export const SKILL_ABILITY: Record<Skill, Ability> = {
  acrobatics: "dex",
  perception: "wis",
  stealth: "dex",
};

export type ArmorType = "light" | "medium" | "heavy";

export function isAbility(value: string): value is Ability {
  return (ABILITIES as readonly string[]).includes(value);
}

export function isDamageType(value: string): value is DamageType {
  return (DAMAGE_TYPES as readonly string[]).includes(value);
}

export function isPhysicalDamage(type: DamageType): boolean {
  return PHYSICAL_DAMAGE_TYPES.has(type);
}

export function abilityModifiers(values: Partial<AbilityModifiers> = {}): AbilityModifiers {
  return {
    str: values.str ?? 0,
    dex: values.dex ?? 0,
    con: values.con ?? 0,
    int: values.int ?? 0,
    wis: values.wis ?? 0,
    cha: values.cha ?? 0,
  };
}

export function armorClassFor(base: number, armor: ArmorType, dex: number): number {
  switch (armor) {
    case "heavy":
      return base;
    case "medium":
      return base + Math.min(2, dex);
    default:
      return base + dex;
  }
}
