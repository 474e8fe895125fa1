export interface Random {
  /** Uniform float in [0, 1). */
  next(): number;
  int(maxExclusive: number): number;
  /** Face of a single die, 1..sides. */
  roll(sides: number): number;
  pick<T>(items: readonly T[]): T;
  /** Up to `count` distinct items, in draw order. */
  sample<T>(items: readonly T[], count: number): T[];
  chance(probability: number): boolean;
  shuffle<T>(items: readonly T[]): T[];
}

function hashSeed(seed: string): number {
  let h = 1779033703 ^ seed.length;
  for (let i = 0; i < seed.length; i += 1) {
    h = Math.imul(h ^ seed.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  return (h >>> 0) || 1;
}

// Mulberry32
function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandomFrom(next: () => number): Random {
  const int = (maxExclusive: number): number => {
    if (maxExclusive <= 1) {
      return 0;
    }
    return Math.floor(next() * maxExclusive);
  };

  const shuffle = <T>(items: readonly T[]): T[] => {
    const result = [...items];
    // Fisher-Yates
    for (let i = result.length - 1; i > 0; i--) {
      const j = int(i + 1);
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  };

  return {
    next,
    int,
    roll(sides: number): number {
      return int(sides) + 1;
    },
    pick<T>(items: readonly T[]): T {
      if (!items.length) {
        throw new Error("Attempted to pick from an empty list.");
      }
      return items[int(items.length)];
    },
    sample<T>(items: readonly T[], count: number): T[] {
      const pool = [...items];
      const result: T[] = [];
      while (pool.length && result.length < count) {
        result.push(pool.splice(int(pool.length), 1)[0]);
      }
      return result;
    },
    chance(probability: number): boolean {
      if (probability <= 0) return false;
      if (probability >= 1) return true;
      return next() < probability;
    },
    shuffle,
  };
}

export function createRandom(seed: string | number): Random {
  return createRandomFrom(mulberry32(hashSeed(String(seed))));
}

/** Independent stream for one trial of a batch. */
export function deriveSeed(seed: string | number, index: number): string {
  return `${seed}:${index}`;
}
