import { describe, expect, it } from "vitest";
import { ScriptedRandom } from "../test-helpers/ScriptedRandom";
import { dice, dieMean, formatDice, parseDice, rollD20, rollDice, rollDie } from "./Dice";

describe("parseDice", () => {
  it("reads count and sides", () => {
    expect(parseDice("3d6")).toEqual({ count: 3, sides: 6 });
    expect(parseDice(" 2d4 ")).toEqual({ count: 2, sides: 4 });
  });

  it("defaults a missing count to one die", () => {
    expect(parseDice("d8")).toEqual({ count: 1, sides: 8 });
  });

  it("rejects malformed expressions", () => {
    expect(() => parseDice("2x4")).toThrow("Malformed dice expression '2x4'");
    expect(() => parseDice("2d0")).toThrow("Malformed dice expression '2d0'");
  });
});

describe("dice helpers", () => {
  it("formats a spec back to notation", () => {
    expect(formatDice(dice(4, 10))).toBe("4d10");
  });

  it("uses the rounded-up average face", () => {
    expect(dieMean(6)).toBe(4);
    expect(dieMean(8)).toBe(5);
    expect(dieMean(10)).toBe(6);
  });

  it("sums every die in a spec", () => {
    expect(rollDice(new ScriptedRandom([2, 6, 5]), dice(3, 6))).toBe(13);
  });

  it("rerolls a low face once", () => {
    expect(rollDie(new ScriptedRandom([2, 1]), 6, 2)).toBe(1);
    expect(rollDie(new ScriptedRandom([3]), 6, 2)).toBe(3);
  });
});

describe("rollD20", () => {
  it("keeps the higher die with advantage", () => {
    const roll = rollD20(new ScriptedRandom([4, 17]), true);
    expect(roll.natural).toBe(17);
    expect(roll.rolls).toEqual([4, 17]);
  });

  it("keeps the lower die with disadvantage", () => {
    expect(rollD20(new ScriptedRandom([4, 17]), false, true).natural).toBe(4);
  });

  it("rolls once when advantage and disadvantage cancel", () => {
    const rng = new ScriptedRandom([9, 18]);
    const roll = rollD20(rng, true, true);
    expect(roll.rolls).toEqual([9]);
    expect(rng.pending).toBe(1);
  });
});
