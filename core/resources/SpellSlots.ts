import type { Expendable } from "./ResourcePool";

/** Slots per spell level (1st first) for full casters, by character level. */
export const FULL_CASTER_SLOTS: Readonly<Record<number, readonly number[]>> = {
  1: [2],
  2: [3],
  3: [4, 2],
  4: [4, 3],
  5: [4, 3, 2],
  6: [4, 3, 3],
  7: [4, 3, 3, 1],
  8: [4, 3, 3, 2],
};

const MAX_RECOVERABLE_LEVEL = 5;

export class SpellSlots implements Expendable {
  protected readonly _max: readonly number[];
  protected _remaining: number[];

  constructor(maxByLevel: readonly number[]) {
    this._max = [...maxByLevel];
    this._remaining = [...maxByLevel];
  }

  static forFullCaster(level: number): SpellSlots {
    return new SpellSlots(FULL_CASTER_SLOTS[level] ?? []);
  }

  get remaining(): number {
    return this._remaining.reduce((sum, count) => sum + count, 0);
  }

  get highestLevel(): number {
    return this._max.length;
  }

  remainingAt(level: number): number {
    return this._remaining[level - 1] ?? 0;
  }

  /** Lowest slot level at or above `minimum` with a slot left. */
  lowestAvailable(minimum = 1): number | null {
    for (let level = Math.max(1, minimum); level <= this._remaining.length; level++) {
      if (this.remainingAt(level) > 0) {
        return level;
      }
    }
    return null;
  }

  highestAvailable(): number | null {
    for (let level = this._remaining.length; level >= 1; level--) {
      if (this.remainingAt(level) > 0) {
        return level;
      }
    }
    return null;
  }

  spend(level: number): boolean {
    if (this.remainingAt(level) <= 0) {
      return false;
    }
    this._remaining[level - 1] -= 1;
    return true;
  }

  refill(): void {
    this._remaining = [...this._max];
  }

  /**
   * Recovers expended slots whose levels add up to at most `budget`, highest
   * levels first. Returns the recovered levels.
   */
  recover(budget: number): number[] {
    const recovered: number[] = [];
    let left = budget;
    const top = Math.min(this._max.length, MAX_RECOVERABLE_LEVEL);
    for (let level = top; level >= 1; level--) {
      while (level <= left && this._remaining[level - 1] < this._max[level - 1]) {
        this._remaining[level - 1] += 1;
        left -= level;
        recovered.push(level);
      }
    }
    return recovered;
  }

  toArray(): number[] {
    return [...this._remaining];
  }
}
