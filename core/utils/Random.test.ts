import { describe, expect, it } from "vitest";
import { createRandom, createRandomFrom, deriveSeed } from "./Random";

describe("createRandom", () => {
  it("replays the same sequence for the same seed", () => {
    const first = createRandom("test-seed");
    const second = createRandom("test-seed");
    const a = Array.from({ length: 20 }, () => first.roll(20));
    const b = Array.from({ length: 20 }, () => second.roll(20));
    expect(a).toEqual(b);
  });

  it("keeps die faces in range", () => {
    const rng = createRandom(7);
    const faces = new Set(Array.from({ length: 600 }, () => rng.roll(6)));
    expect([...faces].sort()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("samples distinct items", () => {
    const rng = createRandom("sample");
    const picked = rng.sample(["a", "b", "c", "d"], 3);
    expect(new Set(picked).size).toBe(3);
    expect(rng.sample(["a", "b"], 5)).toHaveLength(2);
  });

  it("shuffles into a permutation", () => {
    const shuffled = createRandom("shuffle").shuffle([1, 2, 3, 4, 5]);
    expect([...shuffled].sort()).toEqual([1, 2, 3, 4, 5]);
  });
});

describe("createRandomFrom", () => {
  it("maps the source value onto faces and picks", () => {
    const rng = createRandomFrom(() => 0.5);
    expect(rng.roll(6)).toBe(4);
    expect(rng.pick(["a", "b", "c"])).toBe("b");
    expect(rng.chance(0.5)).toBe(false);
    expect(rng.chance(0.75)).toBe(true);
  });

  it("refuses to pick from nothing", () => {
    expect(() => createRandomFrom(() => 0).pick([])).toThrow("Attempted to pick from an empty list.");
  });
});

describe("deriveSeed", () => {
  it("labels each trial of a batch", () => {
    expect(deriveSeed("abc", 3)).toBe("abc:3");
    expect(deriveSeed(42, 0)).toBe("42:0");
  });
});
