import { createParty } from "../characters/classes";
import type { PlayerClassName } from "../characters/PlayerCharacter";
import type { TestCreatureStats } from "../characters/TestCreature";
import type { EncounterSummary } from "../combat/Encounter";
import { EncounterOutcome, TraceEvent, TraceRecorder, TraceSink } from "../combat/Trace";
import type { Bestiary } from "../data/Bestiary";
import { createRandom, deriveSeed } from "../utils/Random";
import { histogram, mean, sampleStandardDeviation } from "../utils/statistics";
import { AdventuringDay, DayResult, MonsterGroup } from "./AdventuringDay";

export interface MonsterCount {
  name: string;
  count: number;
}

export interface SimulationRequest {
  monsters: MonsterCount[];
  partyLevel: number;
  classes: PlayerClassName[];
  days: number;
  seed: string | number;
  testStats?: TestCreatureStats;
  roundCap?: number;
}

export interface SimulationRuntimeHooks {
  onLog?(entry: string): void;
  onEncounterComplete?(summary: EncounterSummary, day: number): void;
  onDayComplete?(result: DayResult, day: number): void;
}

export interface SimulationRuntimeOptions {
  hooks?: SimulationRuntimeHooks;
}

export interface SurvivalReport {
  mean: number;
  standardDeviation: number;
  days: number;
  /** Days ending with each survivor count, indexed by that count. */
  distribution: number[];
  simultaneousDefeats: number;
}

export interface DayTrace {
  survival: number;
  outcomes: EncounterOutcome[];
  events: TraceEvent[];
}

/** Runs independent adventuring days, each on its own random stream derived from the seed. */
export class SimulationRuntime {
  protected readonly bestiary: Bestiary;
  protected readonly hooks: SimulationRuntimeHooks;

  constructor(bestiary: Bestiary, options: SimulationRuntimeOptions = {}) {
    this.bestiary = bestiary;
    this.hooks = options.hooks ?? {};
  }

  simulate(request: SimulationRequest): SurvivalReport {
    const days = Math.max(1, Math.floor(request.days));
    this.log(
      `[Simulation] ${days} days at level ${request.partyLevel}: ${request.classes.join(", ")} against ${describeMonsters(request.monsters)}`
    );
    const survival: number[] = [];
    let simultaneousDefeats = 0;
    for (let day = 0; day < days; day++) {
      const result = this.runDay(request, day);
      survival.push(result.survival);
      if (result.simultaneousDefeat) {
        simultaneousDefeats += 1;
      }
    }
    const report: SurvivalReport = {
      mean: mean(survival),
      standardDeviation: sampleStandardDeviation(survival),
      days,
      distribution: histogram(survival, request.classes.length + 1),
      simultaneousDefeats,
    };
    this.log(`[Simulation] Survival ${report.mean.toFixed(4)} +/- ${report.standardDeviation.toFixed(4)}`);
    return report;
  }

  /** Plays the first day of the batch and returns everything it recorded. */
  trace(request: SimulationRequest): DayTrace {
    const recorder = new TraceRecorder();
    const result = this.runDay(request, 0, recorder);
    return { survival: result.survival, outcomes: result.outcomes, events: [...recorder.events] };
  }

  protected runDay(request: SimulationRequest, day: number, trace?: TraceSink): DayResult {
    const adventuringDay = new AdventuringDay({
      party: createParty(request.classes, request.partyLevel),
      monsters: this.monsterGroups(request),
      rng: createRandom(deriveSeed(request.seed, day)),
      roundCap: request.roundCap,
      trace,
      onLog: (message) => this.log(message),
      onEncounterComplete: (summary) => this.hooks.onEncounterComplete?.(summary, day),
    });
    const result = adventuringDay.run();
    this.hooks.onDayComplete?.(result, day);
    return result;
  }

  protected monsterGroups(request: SimulationRequest): MonsterGroup[] {
    return request.monsters.map((entry) => ({
      name: entry.name,
      count: entry.count,
      factory: this.bestiary.factory(entry.name, request.testStats),
    }));
  }

  protected log(entry: string): void {
    this.hooks.onLog?.(entry);
  }
}

export function simulateSurvival(
  request: SimulationRequest,
  bestiary: Bestiary,
  options: SimulationRuntimeOptions = {}
): SurvivalReport {
  return new SimulationRuntime(bestiary, options).simulate(request);
}

export function traceDay(
  request: SimulationRequest,
  bestiary: Bestiary,
  options: SimulationRuntimeOptions = {}
): DayTrace {
  return new SimulationRuntime(bestiary, options).trace(request);
}

export function describeMonsters(monsters: readonly MonsterCount[]): string {
  return monsters.map((entry) => `${entry.count} ${entry.name}`).join(", ");
}
