import { describe, expect, it } from "vitest";
import { Ration, allotmentFor, computeAllotments } from "./Rationing";
import { ResourcePool } from "./ResourcePool";

describe("allotmentFor", () => {
  it("hands everything to the last encounter", () => {
    expect(allotmentFor(3, 1, "back-loaded")).toBe(3);
  });

  it("rounds the share up or down by style", () => {
    expect(allotmentFor(4, 6, "front-loaded")).toBe(1);
    expect(allotmentFor(4, 6, "back-loaded")).toBe(0);
  });

  it("grants nothing once the resource is gone", () => {
    expect(allotmentFor(0, 3, "front-loaded")).toBe(0);
  });
});

describe("computeAllotments", () => {
  it("spreads four uses across a day", () => {
    expect(computeAllotments(4, 6, "front-loaded")).toEqual([1, 1, 1, 1, 0, 0]);
    expect(computeAllotments(4, 6, "back-loaded")).toEqual([0, 0, 1, 1, 1, 1]);
  });

  it("spreads ten uses across a day", () => {
    expect(computeAllotments(10, 6, "front-loaded")).toEqual([2, 2, 2, 2, 1, 1]);
    expect(computeAllotments(10, 6, "back-loaded")).toEqual([1, 1, 2, 2, 2, 2]);
  });

  it("splits small totals over two encounters", () => {
    expect(computeAllotments(2, 2, "front-loaded")).toEqual([1, 1]);
    expect(computeAllotments(2, 2, "back-loaded")).toEqual([1, 1]);
    expect(computeAllotments(1, 2, "front-loaded")).toEqual([1, 0]);
    expect(computeAllotments(1, 2, "back-loaded")).toEqual([0, 1]);
  });

  it("spreads across a short rest window", () => {
    expect(computeAllotments(3, 2, "front-loaded")).toEqual([2, 1]);
    expect(computeAllotments(3, 2, "back-loaded")).toEqual([1, 2]);
  });

  it("mirrors front and back loading and spends everything", () => {
    for (let total = 0; total <= 12; total++) {
      for (let encounters = 1; encounters <= 6; encounters++) {
        const front = computeAllotments(total, encounters, "front-loaded");
        const back = computeAllotments(total, encounters, "back-loaded");
        expect(back).toEqual([...front].reverse());
        expect(front.reduce((sum, value) => sum + value, 0)).toBe(total);
        expect(Math.max(...front) - Math.min(...front)).toBeLessThanOrEqual(1);
      }
    }
  });
});

describe("Ration", () => {
  it("allows spending down to the reserve", () => {
    const pool = new ResourcePool("Channel Divinity", 4, "long");
    const ration = new Ration(pool, "long", "front-loaded");
    expect(ration.begin(6)).toBe(1);
    expect(ration.allowsSpend).toBe(true);
    pool.spend();
    expect(ration.allowsSpend).toBe(false);
  });

  it("holds everything back when the share rounds down to nothing", () => {
    const pool = new ResourcePool("Sneak", 1, "short");
    const ration = new Ration(pool, "short", "back-loaded");
    expect(ration.begin(2)).toBe(0);
    expect(ration.allowsSpend).toBe(false);
  });
});
