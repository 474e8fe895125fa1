import { describe, expect, it } from "vitest";
import { ResourcePool } from "./ResourcePool";
import { SpellSlots } from "./SpellSlots";

describe("SpellSlots", () => {
  it("follows the full caster table", () => {
    expect(SpellSlots.forFullCaster(1).toArray()).toEqual([2]);
    expect(SpellSlots.forFullCaster(5).toArray()).toEqual([4, 3, 2]);
    expect(SpellSlots.forFullCaster(8).remaining).toBe(12);
  });

  it("finds the lowest and highest open slot", () => {
    const slots = new SpellSlots([1, 0, 2]);
    expect(slots.lowestAvailable()).toBe(1);
    expect(slots.lowestAvailable(2)).toBe(3);
    expect(slots.highestAvailable()).toBe(3);
    expect(slots.lowestAvailable(4)).toBeNull();
  });

  it("refuses to spend an empty level", () => {
    const slots = new SpellSlots([1, 0]);
    expect(slots.spend(2)).toBe(false);
    expect(slots.spend(1)).toBe(true);
    expect(slots.spend(1)).toBe(false);
    expect(slots.remaining).toBe(0);
  });

  it("recovers the highest levels that fit the budget", () => {
    const slots = new SpellSlots([4, 3, 2]);
    slots.spend(3);
    slots.spend(3);
    slots.spend(2);
    expect(slots.toArray()).toEqual([4, 2, 0]);
    expect(slots.recover(3)).toEqual([3]);
    expect(slots.toArray()).toEqual([4, 2, 1]);
  });

  it("fills lower levels with what is left of the budget", () => {
    const slots = new SpellSlots([2, 1]);
    slots.spend(1);
    slots.spend(1);
    expect(slots.recover(3)).toEqual([1, 1]);
    expect(slots.toArray()).toEqual([2, 1]);
  });
});

describe("ResourcePool", () => {
  it("spends, restores and refills", () => {
    const pool = new ResourcePool("Action Surge", 2, "short");
    expect(pool.spend(3)).toBe(false);
    expect(pool.spend()).toBe(true);
    expect(pool.spend()).toBe(true);
    expect(pool.isEmpty).toBe(true);
    pool.restore(5);
    expect(pool.remaining).toBe(2);
    pool.spend();
    pool.refill();
    expect(pool.remaining).toBe(2);
  });
});
