import type { MonsterStatBlock } from "../data/MonsterSchema";

export const TEST_CREATURE = "Test";

/** Attack modifier, armor class, damage per round, hit points, attacks per round, proficiency. */
export interface TestCreatureStats {
  attack: number;
  armorClass: number;
  damage: number;
  hitPoints: number;
  attacks: number;
  proficiency: number;
}

export const TEST_STAT_ORDER = ["attack", "armorClass", "damage", "hitPoints", "attacks", "proficiency"] as const;

/** Smallest value each stat may take; the attack modifier is unbounded. */
export const TEST_STAT_MINIMUMS: Readonly<Record<(typeof TEST_STAT_ORDER)[number], number | null>> = {
  attack: null,
  armorClass: 0,
  damage: 0,
  hitPoints: 1,
  attacks: 1,
  proficiency: 0,
};

export function testCreatureName(stats: TestCreatureStats): string {
  const fields = TEST_STAT_ORDER.map((key) => String(stats[key]).padStart(2));
  return `${TEST_CREATURE} ${fields.join(" ")}`;
}

/**
 * Abstract creature tuned to hit the requested averages: hit points come from
 * d8s plus a flat bonus, damage from d6s split across the attacks.
 */
export function testCreatureStatBlock(stats: TestCreatureStats): MonsterStatBlock {
  const perAttack = Math.floor(stats.damage / stats.attacks);
  const hp = stats.hitPoints + 2;
  const dmg = perAttack + 2;

  return {
    name: testCreatureName(stats),
    abilities: { str: 0, dex: 0, con: 0, int: 0, wis: 0, cha: 0 },
    armorBase: stats.armorClass,
    armorType: "heavy",
    hitDie: 8,
    hitDice: 2 * Math.floor(hp / 9),
    hitPointBonus: (hp % 9) - 2,
    proficiency: stats.proficiency,
    saveProficiencies: ["dex", "con", "wis"],
    skillProficiencies: ["perception"],
    skillExpertise: [],
    immunities: [],
    resistances: [],
    vulnerabilities: [],
    undeadRating: null,
    construct: false,
    tags: [],
    weapons: {
      Strike: {
        dice: `${2 * Math.floor(dmg / 7)}d6`,
        damageType: "bludgeoning",
        ability: "str",
        proficient: true,
        ranged: false,
        addAbilityToDamage: true,
        attackBonus: stats.attack - stats.proficiency,
        damageBonus: (dmg % 7) - 2,
        onHit: [],
      },
    },
    tactics: [{ type: "attack", weapons: Array.from({ length: stats.attacks }, () => "Strike") }],
    traits: [],
  };
}
