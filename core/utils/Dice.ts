import type { Random } from "./Random";

export interface DiceSpec {
  count: number;
  sides: number;
  /** Dice showing this value or lower are rerolled once (Great Weapon Fighting). */
  rerollAtOrBelow?: number;
}

export interface D20Roll {
  natural: number;
  rolls: number[];
  advantage: boolean;
  disadvantage: boolean;
}

const DICE_PATTERN = /^(\d*)d(\d+)$/;

export function dice(count: number, sides: number, rerollAtOrBelow?: number): DiceSpec {
  return rerollAtOrBelow ? { count, sides, rerollAtOrBelow } : { count, sides };
}

export function parseDice(expression: string): DiceSpec {
  const match = DICE_PATTERN.exec(expression.trim());
  if (!match) {
    throw new Error(`Malformed dice expression '${expression}'`);
  }
  const count = match[1] ? Number(match[1]) : 1;
  const sides = Number(match[2]);
  if (sides < 1) {
    throw new Error(`Malformed dice expression '${expression}'`);
  }
  return { count, sides };
}

export function formatDice(spec: DiceSpec): string {
  return `${spec.count}d${spec.sides}`;
}

/** Rounded-up average face, used for fixed hit point gains. */
export function dieMean(sides: number): number {
  return Math.floor(sides / 2) + 1;
}

export function rollDie(rng: Random, sides: number, rerollAtOrBelow = 0): number {
  const face = rng.roll(sides);
  if (face <= rerollAtOrBelow) {
    return rng.roll(sides);
  }
  return face;
}

export function rollDice(rng: Random, spec: DiceSpec): number {
  let total = 0;
  for (let i = 0; i < spec.count; i++) {
    total += rollDie(rng, spec.sides, spec.rerollAtOrBelow ?? 0);
  }
  return total;
}

export function rollD20(rng: Random, advantage = false, disadvantage = false): D20Roll {
  const first = rng.roll(20);
  if (advantage === disadvantage) {
    return { natural: first, rolls: [first], advantage: false, disadvantage: false };
  }
  const second = rng.roll(20);
  return {
    natural: advantage ? Math.max(first, second) : Math.min(first, second),
    rolls: [first, second],
    advantage,
    disadvantage,
  };
}
