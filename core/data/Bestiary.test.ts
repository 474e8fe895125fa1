import { describe, expect, it } from "vitest";
import { Bestiary } from "./Bestiary";
import { StaticDataSource } from "./DataSource";
import { MonsterStatBlockSchema } from "./MonsterSchema";

const orc = MonsterStatBlockSchema.parse({
  name: "Orc",
  abilities: { str: 3, dex: 1, con: 3 },
  armorBase: 12,
  armorType: "medium",
  hitDie: 8,
  hitDice: 2,
  weapons: { Greataxe: { dice: "1d12", damageType: "slashing" } },
  tactics: [{ type: "attack", weapons: ["Greataxe"] }],
});

const bandit = MonsterStatBlockSchema.parse({
  name: "Bandit",
  abilities: { dex: 1, con: 1 },
  armorBase: 11,
  hitDie: 8,
  hitDice: 2,
  weapons: { Scimitar: { dice: "1d6", damageType: "slashing", ability: "dex" } },
  tactics: [{ type: "attack", weapons: ["Scimitar"] }],
});

const testStats = { attack: 4, armorClass: 12, damage: 6, hitPoints: 15, attacks: 1, proficiency: 2 };

describe("Bestiary", () => {
  it("lists registered names with the Test creature last", async () => {
    const bestiary = await Bestiary.load(new StaticDataSource({ monsters: [orc, bandit] }));
    expect(bestiary.names()).toEqual(["Bandit", "Orc", "Test"]);
  });

  it("matches names exactly", () => {
    const bestiary = Bestiary.fromStatBlocks([orc]);
    expect(bestiary.has("Orc")).toBe(true);
    expect(bestiary.has("orc")).toBe(false);
    expect(bestiary.has("Test")).toBe(true);
    expect(bestiary.statBlock("Orc")).toBe(orc);
  });

  it("builds labelled monsters", () => {
    const spawnOrc = Bestiary.fromStatBlocks([orc]).factory("Orc");
    const monster = spawnOrc("Orc2");
    expect(monster.name).toBe("Orc2");
    expect(monster.team).toBe("monsters");
  });

  it("builds the Test creature from its stats", () => {
    const spawnTest = Bestiary.fromStatBlocks([]).factory("Test", testStats);
    expect(spawnTest("Test1").name).toBe("Test1");
  });

  it("refuses unknown names and a Test creature without stats", () => {
    const bestiary = Bestiary.fromStatBlocks([orc]);
    expect(() => bestiary.factory("Dragon")).toThrow("Unknown monster 'Dragon'");
    expect(() => bestiary.factory("Test")).toThrow("The Test creature needs its six stats");
  });
});
