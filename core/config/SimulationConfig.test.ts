import { describe, expect, it } from "vitest";
import { Bestiary } from "../data/Bestiary";
import { MonsterStatBlockSchema } from "../data/MonsterSchema";
import { ConfigurationError } from "../errors";
import { parseSimulationConfig } from "./SimulationConfig";

const bestiary = Bestiary.fromStatBlocks([
  MonsterStatBlockSchema.parse({
    name: "Kobold",
    abilities: { dex: 2 },
    armorBase: 10,
    hitDie: 6,
    hitDice: 2,
    weapons: { Dagger: { dice: "1d4", damageType: "piercing", ability: "dex" } },
    tactics: [{ type: "attack", weapons: ["Dagger"] }],
  }),
]);

function issuesOf(raw: unknown): Array<{ path: string; message: string }> {
  try {
    parseSimulationConfig(raw, bestiary);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      return err.issues;
    }
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

describe("parseSimulationConfig", () => {
  it("fills defaults for a minimal request", () => {
    expect(parseSimulationConfig({ monsters: ["Kobold"], counts: [4], partyLevel: 3, seed: "abc" }, bestiary)).toEqual({
      monsters: [{ name: "Kobold", count: 4 }],
      partyLevel: 3,
      classes: ["Cleric", "Fighter", "Rogue", "Wizard"],
      days: 1000,
      seed: "abc",
      testStats: undefined,
      roundCap: 100,
    });
  });

  it("picks a seed when none is given", () => {
    const request = parseSimulationConfig({ monsters: ["Kobold"], counts: [1], partyLevel: 1 }, bestiary);
    expect(typeof request.seed).toBe("number");
  });

  it("reports every unknown name at once", () => {
    expect(
      issuesOf({ monsters: ["Dragon"], counts: [1], partyLevel: 1, classes: ["Fighter", "Bard"] })
    ).toEqual([
      { path: "classes.1", message: "Unknown class 'Bard'" },
      { path: "monsters.0", message: "Unknown monster 'Dragon'" },
    ]);
  });

  it("requires one count per monster type", () => {
    expect(issuesOf({ monsters: ["Kobold", "Kobold"], counts: [1], partyLevel: 1 })).toEqual([
      { path: "counts", message: "2 monster types but 1 counts" },
    ]);
  });

  it("requires six stats for the Test creature", () => {
    expect(issuesOf({ monsters: ["Test"], counts: [1], partyLevel: 1, testStats: [1, 2] })).toEqual([
      { path: "testStats", message: "The Test creature needs 6 integer stats" },
    ]);
  });

  it("rejects Test creature stats below their minimums", () => {
    expect(
      issuesOf({ monsters: ["Test"], counts: [1], partyLevel: 1, testStats: [3, 12, -10, 20, 0, 2] })
    ).toEqual([
      { path: "testStats.2", message: "damage must be at least 0" },
      { path: "testStats.4", message: "attacks must be at least 1" },
    ]);
    expect(
      issuesOf({ monsters: ["Test"], counts: [1], partyLevel: 1, testStats: [-3, -1, 4, 0, 1, -2] }).map(
        (issue) => issue.path
      )
    ).toEqual(["testStats.1", "testStats.3", "testStats.5"]);
  });

  it("accepts Test creature stats at their minimums", () => {
    const request = parseSimulationConfig(
      { monsters: ["Test"], counts: [1], partyLevel: 1, testStats: [-1, 0, 0, 1, 1, 0], seed: 1 },
      bestiary
    );
    expect(request.testStats).toEqual({ attack: -1, armorClass: 0, damage: 0, hitPoints: 1, attacks: 1, proficiency: 0 });
  });

  it("builds Test creature stats in order", () => {
    const request = parseSimulationConfig(
      { monsters: ["Test"], counts: [2], partyLevel: 1, testStats: [5, 13, 8, 20, 1, 2], seed: 1 },
      bestiary
    );
    expect(request.testStats).toEqual({ attack: 5, armorClass: 13, damage: 8, hitPoints: 20, attacks: 1, proficiency: 2 });
  });

  it("rejects a party level outside 1-8", () => {
    expect(issuesOf({ monsters: ["Kobold"], counts: [1], partyLevel: 9 }).map((issue) => issue.path)).toEqual([
      "partyLevel",
    ]);
  });

  it("rejects non-positive counts and day totals", () => {
    const paths = issuesOf({ monsters: ["Kobold"], counts: [0], partyLevel: 1, days: 0 }).map((issue) => issue.path);
    expect(paths).toEqual(["counts.0", "days"]);
  });

  it("summarises the issues in the error message", () => {
    expect(() => parseSimulationConfig({ monsters: ["Dragon"], counts: [1], partyLevel: 1 }, bestiary)).toThrow(
      "Invalid configuration: monsters.0: Unknown monster 'Dragon'"
    );
  });
});
