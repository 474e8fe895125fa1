import { describe, expect, it } from "vitest";
import { histogram, mean, sampleStandardDeviation } from "./statistics";

describe("statistics", () => {
  it("averages values", () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5);
    expect(mean([])).toBe(0);
  });

  it("uses the sample standard deviation", () => {
    expect(sampleStandardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 10);
  });

  it("reports no spread for a single sample", () => {
    expect(sampleStandardDeviation([3])).toBe(0);
    expect(sampleStandardDeviation([])).toBe(0);
  });

  it("counts survivors per bucket", () => {
    expect(histogram([0, 2, 2, 4], 5)).toEqual([1, 0, 2, 0, 1]);
  });
});
