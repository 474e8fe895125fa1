import { describe, expect, it } from "vitest";
import { MonsterStatBlockSchema } from "../data/MonsterSchema";
import { ScriptedRandom } from "../test-helpers/ScriptedRandom";
import { Monster } from "./Monster";
import { testCreatureName, testCreatureStatBlock, type TestCreatureStats } from "./TestCreature";

const stats: TestCreatureStats = { attack: 5, armorClass: 13, damage: 8, hitPoints: 20, attacks: 1, proficiency: 2 };

describe("testCreatureStatBlock", () => {
  it("names the creature after its stats", () => {
    expect(testCreatureName(stats)).toBe("Test  5 13  8 20  1  2");
  });

  it("hits the requested averages with d8 hit dice and d6 damage", () => {
    const block = testCreatureStatBlock(stats);
    expect(block.hitDice).toBe(4);
    expect(block.hitPointBonus).toBe(2);
    expect(block.weapons.Strike).toMatchObject({ dice: "2d6", damageBonus: 1, attackBonus: 3 });
    expect(block.tactics).toEqual([{ type: "attack", weapons: ["Strike"] }]);
  });

  it("splits damage across several attacks", () => {
    const block = testCreatureStatBlock({ ...stats, damage: 24, attacks: 2 });
    expect(block.weapons.Strike).toMatchObject({ dice: "4d6", damageBonus: -2 });
    expect(block.tactics).toEqual([{ type: "attack", weapons: ["Strike", "Strike"] }]);
  });

  it("passes stat block validation", () => {
    expect(MonsterStatBlockSchema.safeParse(testCreatureStatBlock(stats)).success).toBe(true);
  });

  it("becomes a monster with fixed armor class and proficiency", () => {
    const monster = new Monster(testCreatureStatBlock(stats), "Test1");
    monster.initialize(new ScriptedRandom([4, 5, 4, 5]));
    expect(monster.maxHitPoints).toBe(20);
    expect(monster.armorClass).toBe(13);
    expect(monster.saveModifier("dex")).toBe(2);
    expect(monster.saveModifier("str")).toBe(0);
  });
});
