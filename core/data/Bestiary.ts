import { Monster } from "../characters/Monster";
import type { Combatant } from "../characters/Combatant";
import { TEST_CREATURE, type TestCreatureStats, testCreatureStatBlock } from "../characters/TestCreature";
import type { BestiaryDataSource } from "./DataSource";
import type { MonsterStatBlock } from "./MonsterSchema";

export type MonsterFactory = (label: string) => Combatant;

/** Monster factories by name. Lookups are case-sensitive. */
export class Bestiary {
  protected readonly _blocks = new Map<string, MonsterStatBlock>();

  static async load(source: BestiaryDataSource): Promise<Bestiary> {
    return Bestiary.fromStatBlocks(await source.loadMonsters());
  }

  static fromStatBlocks(blocks: readonly MonsterStatBlock[]): Bestiary {
    const bestiary = new Bestiary();
    blocks.forEach((block) => bestiary.register(block));
    return bestiary;
  }

  register(block: MonsterStatBlock): void {
    this._blocks.set(block.name, block);
  }

  has(name: string): boolean {
    return name === TEST_CREATURE || this._blocks.has(name);
  }

  /** Registered names, the Test creature last. */
  names(): string[] {
    return [...[...this._blocks.keys()].sort(), TEST_CREATURE];
  }

  statBlock(name: string): MonsterStatBlock | undefined {
    return this._blocks.get(name);
  }

  factory(name: string, testStats?: TestCreatureStats): MonsterFactory {
    if (name === TEST_CREATURE) {
      if (!testStats) {
        throw new Error("The Test creature needs its six stats");
      }
      const block = testCreatureStatBlock(testStats);
      return (label) => new Monster(block, label);
    }
    const block = this._blocks.get(name);
    if (!block) {
      throw new Error(`Unknown monster '${name}'`);
    }
    return (label) => new Monster(block, label);
  }
}
