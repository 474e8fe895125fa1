import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import type { BestiaryDataSource } from "../../core/data/DataSource";
import {
  BestiaryManifestSchema,
  MonsterStatBlock,
  MonsterStatBlockSchema,
} from "../../core/data/MonsterSchema";

export interface NodeDataSourceOptions {
  /** Directory holding manifest.json; entries resolve against it. */
  baseDir?: string;
  manifestFile?: string;
  onWarn?: (message: string, error?: unknown) => void;
}

/** Shipped assets, found from the sources or from the compiled output under dist/. */
export const DEFAULT_DATA_DIR =
  [path.resolve(__dirname, "..", "..", "assets", "data"), path.resolve(__dirname, "..", "..", "..", "assets", "data")].find(
    (candidate) => existsSync(path.join(candidate, "manifest.json"))
  ) ?? path.resolve(__dirname, "..", "..", "assets", "data");

const defaultWarn = (message: string, error?: unknown) => {
  if (error === undefined) {
    console.warn(message);
  } else {
    console.warn(message, error);
  }
};

export class NodeDataSource implements BestiaryDataSource {
  protected readonly baseDir: string;
  protected readonly manifestFile: string;
  protected readonly warn: (message: string, error?: unknown) => void;

  constructor(options: NodeDataSourceOptions = {}) {
    this.baseDir = options.baseDir ?? DEFAULT_DATA_DIR;
    this.manifestFile = options.manifestFile ?? "manifest.json";
    this.warn = options.onWarn ?? defaultWarn;
  }

  async loadMonsters(): Promise<MonsterStatBlock[]> {
    const manifest = BestiaryManifestSchema.safeParse(await this.loadJson(this.manifestFile));
    if (!manifest.success) {
      this.warn(`[NodeDataSource] Invalid manifest '${this.manifestFile}'`, manifest.error);
      return [];
    }

    const monsters: MonsterStatBlock[] = [];
    for (const entry of manifest.data.monsters) {
      try {
        const block = MonsterStatBlockSchema.safeParse(await this.loadJson(entry));
        if (!block.success) {
          this.warn(`[NodeDataSource] Invalid monster '${entry}'`, block.error);
          continue;
        }
        monsters.push(block.data);
      } catch (err) {
        this.warn(`[NodeDataSource] Failed to load monster '${entry}'`, err);
      }
    }
    return monsters;
  }

  protected resolvePath(file: string): string {
    return path.isAbsolute(file) ? file : path.join(this.baseDir, file);
  }

  protected async loadJson(file: string): Promise<unknown> {
    const text = await readFile(this.resolvePath(file), "utf8");
    const data: unknown = JSON.parse(text);
    return data;
  }
}
