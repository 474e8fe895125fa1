#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { parseSimulationConfig, type SimulationConfigInput } from "../core/config/SimulationConfig";
import { Bestiary } from "../core/data/Bestiary";
import { ConfigurationError } from "../core/errors";
import { simulateSurvival, traceDay } from "../core/runtime/SimulationRuntime";
import { formatDistribution, formatSurvivalLine, formatTraceEvent } from "../core/utils/formatting";
import { DEFAULT_DATA_DIR, NodeDataSource } from "../platforms/node/NodeDataSource";

export interface CliOptions {
  adventuringDays: number;
  classes: string;
  debug: boolean;
  monsters: string;
  numMonsters: string;
  partyLevel: number;
  testStats?: string;
  verbose: boolean;
  seed?: string;
  roundCap: number;
  data: string;
  json: boolean;
}

export function splitList(value: string): string[] {
  return value
    .replace(/^['"]|['"]$/g, "")
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function toIntegers(value: string): number[] {
  return splitList(value).map((entry) => Number(entry));
}

/** Maps command line options onto the raw configuration the schema validates. */
export function toConfigInput(options: CliOptions): SimulationConfigInput {
  return {
    monsters: splitList(options.monsters),
    counts: toIntegers(options.numMonsters),
    partyLevel: options.partyLevel,
    classes: splitList(options.classes),
    days: options.debug ? 1 : options.adventuringDays,
    seed: options.seed,
    testStats: options.testStats ? toIntegers(options.testStats) : undefined,
    roundCap: options.roundCap,
  };
}

export async function parseCliOptions(args: string[]): Promise<CliOptions> {
  const argv = await yargs(args)
    .scriptName("adventuring-day-sim")
    .usage("$0 [options]")
    .option("adventuring-days", {
      alias: "a",
      type: "number",
      default: 1000,
      describe: "Number of adventuring days to simulate",
    })
    .option("classes", {
      alias: "c",
      type: "string",
      default: "Cleric,Fighter,Rogue,Wizard",
      describe: "Comma-separated player classes",
    })
    .option("debug", {
      alias: "d",
      type: "boolean",
      default: false,
      describe: "Run a single day and print its trace",
    })
    .option("monsters", {
      alias: "m",
      type: "string",
      default: "Kobold",
      describe: "Comma-separated monster names",
    })
    .option("num-monsters", {
      alias: "n",
      type: "string",
      default: "4",
      describe: "Comma-separated count for each monster",
    })
    .option("party-level", {
      alias: "p",
      type: "number",
      default: 1,
      describe: "Level of every party member (1-8)",
    })
    .option("test-stats", {
      alias: "t",
      type: "string",
      describe: "Attack, AC, damage, hit points, attacks, proficiency of the Test creature",
    })
    .option("verbose", {
      alias: "v",
      type: "boolean",
      default: false,
      describe: "Log every encounter and day",
    })
    .option("seed", {
      type: "string",
      describe: "Seed for reproducible runs",
    })
    .option("round-cap", {
      type: "number",
      default: 100,
      describe: "Rounds before an encounter is called a stalemate",
    })
    .option("data", {
      type: "string",
      default: DEFAULT_DATA_DIR,
      describe: "Directory holding the bestiary manifest",
    })
    .option("json", {
      type: "boolean",
      default: false,
      describe: "Print the report as JSON",
    })
    .strict()
    .parse();

  return {
    adventuringDays: argv.adventuringDays,
    classes: argv.classes,
    debug: argv.debug,
    monsters: argv.monsters,
    numMonsters: argv.numMonsters,
    partyLevel: argv.partyLevel,
    testStats: argv.testStats,
    verbose: argv.verbose,
    seed: argv.seed,
    roundCap: argv.roundCap,
    data: argv.data,
    json: argv.json,
  };
}

export async function main(args: string[]): Promise<void> {
  const options = await parseCliOptions(args);
  const bestiary = await Bestiary.load(new NodeDataSource({ baseDir: options.data }));
  const request = parseSimulationConfig(toConfigInput(options), bestiary);
  const hooks = options.verbose ? { onLog: (entry: string) => console.log(entry) } : {};

  if (options.debug) {
    const trace = traceDay(request, bestiary, { hooks });
    if (options.json) {
      console.log(JSON.stringify(trace, null, 2));
      return;
    }
    trace.events.forEach((event) => console.log(formatTraceEvent(event)));
    console.log(`Survivors: ${trace.survival}`);
    return;
  }

  const report = simulateSurvival(request, bestiary, { hooks });
  if (options.json) {
    console.log(JSON.stringify({ request, report }, null, 2));
    return;
  }
  console.log(formatSurvivalLine(request.partyLevel, request.monsters, report, request.testStats));
  if (options.verbose) {
    console.log(formatDistribution(report));
    console.log(`Simultaneous defeats: ${report.simultaneousDefeats}`);
  }
}

if (require.main === module) {
  main(hideBin(process.argv)).catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      error.issues.forEach((issue) => console.error(`${issue.path || "config"}: ${issue.message}`));
    } else {
      console.error(error);
    }
    process.exit(1);
  });
}
