import { describe, expect, it } from "vitest";
import type { SurvivalReport } from "../runtime/SimulationRuntime";
import { formatDistribution, formatSurvivalLine, formatTraceEvent, titleCase } from "./formatting";

const report: SurvivalReport = {
  mean: 3.5,
  standardDeviation: 0.5,
  days: 4,
  distribution: [0, 0, 0, 2, 2],
  simultaneousDefeats: 0,
};

describe("formatSurvivalLine", () => {
  it("pads the level and fixes four decimals", () => {
    expect(formatSurvivalLine(1, [{ name: "Kobold", count: 4 }], report)).toBe(
      "Level  1 Kobold 4 Survival 3.5000 +/- 0.5000"
    );
  });

  it("names the Test creature by its stats", () => {
    const stats = { attack: 5, armorClass: 13, damage: 8, hitPoints: 20, attacks: 1, proficiency: 2 };
    expect(formatSurvivalLine(8, [{ name: "Test", count: 2 }, { name: "Orc", count: 1 }], report, stats)).toBe(
      "Level  8 Test  5 13  8 20  1  2 2 Orc 1 Survival 3.5000 +/- 0.5000"
    );
  });
});

describe("formatDistribution", () => {
  it("lists days per survivor count", () => {
    expect(formatDistribution(report).split("\n")).toEqual([
      "0 standing: 0 (0.0%)",
      "1 standing: 0 (0.0%)",
      "2 standing: 0 (0.0%)",
      "3 standing: 2 (50.0%)",
      "4 standing: 2 (50.0%)",
    ]);
  });
});

describe("formatTraceEvent", () => {
  it("renders attacks with advantage rolls", () => {
    expect(
      formatTraceEvent({
        type: "attack",
        round: 2,
        actor: "Kobold1",
        action: "Dagger",
        target: "Wizard",
        rolls: [3, 12],
        natural: 12,
        total: 16,
        armorClass: 15,
        result: "hit",
      })
    ).toBe("Kobold1 attacks Wizard with Dagger: [3, 12] -> 16 vs AC 15, hit");
  });

  it("renders saves and damage", () => {
    expect(
      formatTraceEvent({
        type: "save",
        round: 1,
        actor: "Rogue",
        action: "Fireball",
        ability: "dex",
        dc: 13,
        rolls: [],
        total: 0,
        success: false,
      })
    ).toBe("Rogue DEX save (Fireball) DC 13: - -> 0, failure");
    expect(
      formatTraceEvent({
        type: "damage",
        round: 1,
        actor: "Orc1",
        target: "Fighter",
        action: "Greataxe",
        amount: 9,
        damageTypes: ["slashing"],
        hpBefore: 13,
        hpAfter: 4,
      })
    ).toBe("Fighter takes 9 slashing damage from Greataxe (13 -> 4 hp)");
  });

  it("renders rests", () => {
    expect(formatTraceEvent({ type: "rest", kind: "short" })).toBe("=== Short rest ===");
    expect(formatTraceEvent({ type: "rest", kind: "end-of-day" })).toBe("=== End of day ===");
  });
});

describe("titleCase", () => {
  it("capitalises the first letter", () => {
    expect(titleCase("long")).toBe("Long");
    expect(titleCase("")).toBe("");
  });
});
