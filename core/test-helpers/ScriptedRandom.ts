import type { Random } from "../utils/Random";

/**
 * Random source that hands out queued die faces in order. `pick` and `sample`
 * take from the front of the list and `chance` succeeds for any positive
 * probability, so tests only script the dice.
 */
export class ScriptedRandom implements Random {
  protected readonly _faces: number[];
  protected readonly _fallback: number | null;

  constructor(faces: number[] = [], fallback: number | null = null) {
    this._faces = [...faces];
    this._fallback = fallback;
  }

  get pending(): number {
    return this._faces.length;
  }

  queue(...faces: number[]): this {
    this._faces.push(...faces);
    return this;
  }

  next(): number {
    return 0;
  }

  int(_maxExclusive: number): number {
    return 0;
  }

  roll(sides: number): number {
    const face = this._faces.shift() ?? (this._fallback === null ? undefined : Math.min(this._fallback, sides));
    if (face === undefined) {
      throw new Error(`No scripted face left for a d${sides}`);
    }
    if (face < 1 || face > sides) {
      throw new Error(`Scripted face ${face} does not fit a d${sides}`);
    }
    return face;
  }

  pick<T>(items: readonly T[]): T {
    if (!items.length) {
      throw new Error("Attempted to pick from an empty list.");
    }
    return items[0];
  }

  sample<T>(items: readonly T[], count: number): T[] {
    return items.slice(0, count);
  }

  chance(probability: number): boolean {
    return probability > 0;
  }

  shuffle<T>(items: readonly T[]): T[] {
    return [...items];
  }
}
