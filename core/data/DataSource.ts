import type { MonsterStatBlock } from "./MonsterSchema";

export interface BestiarySnapshot {
  monsters: MonsterStatBlock[];
}

export interface BestiaryDataSource {
  loadMonsters(): Promise<MonsterStatBlock[]>;
}

export class StaticDataSource implements BestiaryDataSource {
  constructor(private readonly snapshot: BestiarySnapshot) {}

  async loadMonsters(): Promise<MonsterStatBlock[]> {
    return this.snapshot.monsters;
  }
}
