import { z } from "zod";
import { isPlayerClassName } from "../characters/classes";
import { MAX_PARTY_LEVEL, MIN_PARTY_LEVEL } from "../characters/PlayerCharacter";
import { TEST_CREATURE, TEST_STAT_MINIMUMS, TEST_STAT_ORDER, type TestCreatureStats } from "../characters/TestCreature";
import { DEFAULT_ROUND_CAP } from "../combat/Encounter";
import type { Bestiary } from "../data/Bestiary";
import { ConfigurationError } from "../errors";
import type { SimulationRequest } from "../runtime/SimulationRuntime";

export const DEFAULT_DAYS = 1000;
export const DEFAULT_CLASSES = ["Cleric", "Fighter", "Rogue", "Wizard"] as const;

export const SimulationConfigSchema = z.object({
  monsters: z.array(z.string().trim().min(1)).min(1, "at least one monster type is required"),
  counts: z.array(z.number().int().positive()).min(1),
  partyLevel: z.number().int().min(MIN_PARTY_LEVEL).max(MAX_PARTY_LEVEL),
  classes: z.array(z.string().trim().min(1)).min(1).default([...DEFAULT_CLASSES]),
  days: z.number().int().positive().default(DEFAULT_DAYS),
  seed: z.union([z.string().min(1), z.number().int()]).optional(),
  testStats: z.array(z.number().int()).optional(),
  roundCap: z.number().int().positive().default(DEFAULT_ROUND_CAP),
});

export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;

function withCatalogChecks(bestiary: Bestiary) {
  return SimulationConfigSchema.superRefine((config, ctx) => {
    if (config.monsters.length !== config.counts.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["counts"],
        message: `${config.monsters.length} monster types but ${config.counts.length} counts`,
      });
    }
    config.classes.forEach((className, index) => {
      if (!isPlayerClassName(className)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["classes", index],
          message: `Unknown class '${className}'`,
        });
      }
    });
    config.monsters.forEach((name, index) => {
      if (!bestiary.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["monsters", index],
          message: `Unknown monster '${name}'`,
        });
      }
    });
    if (config.monsters.includes(TEST_CREATURE) && config.testStats?.length !== TEST_STAT_ORDER.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["testStats"],
        message: `The ${TEST_CREATURE} creature needs ${TEST_STAT_ORDER.length} integer stats`,
      });
    }
    if (config.testStats?.length === TEST_STAT_ORDER.length) {
      config.testStats.forEach((value, index) => {
        const stat = TEST_STAT_ORDER[index];
        const minimum = TEST_STAT_MINIMUMS[stat];
        if (minimum !== null && value < minimum) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["testStats", index],
            message: `${stat} must be at least ${minimum}`,
          });
        }
      });
    }
  });
}

function toTestStats(values: readonly number[]): TestCreatureStats {
  const [attack, armorClass, damage, hitPoints, attacks, proficiency] = values;
  return { attack, armorClass, damage, hitPoints, attacks, proficiency };
}

function randomSeed(): number {
  return Math.floor(Math.random() * 0x100000000);
}

/**
 * Validates a raw request against the schema and the loaded catalog. Every
 * problem found is reported in one ConfigurationError.
 */
export function parseSimulationConfig(raw: unknown, bestiary: Bestiary): SimulationRequest {
  const parsed = withCatalogChecks(bestiary).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    );
  }
  const config = parsed.data;
  const usesTest = config.monsters.includes(TEST_CREATURE);
  return {
    monsters: config.monsters.map((name, index) => ({ name, count: config.counts[index] })),
    partyLevel: config.partyLevel,
    classes: config.classes.filter(isPlayerClassName),
    days: config.days,
    seed: config.seed ?? randomSeed(),
    testStats: usesTest && config.testStats ? toTestStats(config.testStats) : undefined,
    roundCap: config.roundCap,
  };
}
