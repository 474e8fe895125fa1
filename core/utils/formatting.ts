import type { TestCreatureStats } from "../characters/TestCreature";
import { testCreatureName, TEST_CREATURE } from "../characters/TestCreature";
import type { TraceEvent } from "../combat/Trace";
import type { MonsterCount, SurvivalReport } from "../runtime/SimulationRuntime";

export function titleCase(value: string): string {
  if (!value) {
    return "";
  }
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function formatMonsterList(monsters: readonly MonsterCount[], testStats?: TestCreatureStats): string {
  return monsters
    .map((entry) => {
      const name = entry.name === TEST_CREATURE && testStats ? testCreatureName(testStats) : entry.name;
      return `${name} ${entry.count}`;
    })
    .join(" ");
}

/** `Level  3 Kobold 4 Survival 3.9870 +/- 0.1140` */
export function formatSurvivalLine(
  partyLevel: number,
  monsters: readonly MonsterCount[],
  report: SurvivalReport,
  testStats?: TestCreatureStats
): string {
  const level = String(partyLevel).padStart(2);
  const meanText = report.mean.toFixed(4).padStart(6);
  const deviation = report.standardDeviation.toFixed(4).padStart(6);
  return `Level ${level} ${formatMonsterList(monsters, testStats)} Survival ${meanText} +/- ${deviation}`;
}

export function formatDistribution(report: SurvivalReport): string {
  return report.distribution
    .map((days, survivors) => {
      const share = report.days ? ((days / report.days) * 100).toFixed(1) : "0.0";
      return `${survivors} standing: ${days} (${share}%)`;
    })
    .join("\n");
}

function formatRolls(rolls: readonly number[]): string {
  return rolls.length > 1 ? `[${rolls.join(", ")}]` : String(rolls[0] ?? "-");
}

export function formatTraceEvent(event: TraceEvent): string {
  switch (event.type) {
    case "encounter-start":
      return `=== Encounter ${event.encounter} === initiative: ${event.initiative
        .map((entry) => `${entry.name} ${entry.roll}`)
        .join(", ")}`;
    case "round-start":
      return `-- Round ${event.round} --`;
    case "attack":
      return `${event.actor} attacks ${event.target} with ${event.action}: ${formatRolls(event.rolls)} -> ${event.total} vs AC ${event.armorClass}, ${event.result}`;
    case "save":
      return `${event.actor} ${event.ability.toUpperCase()} save (${event.action}) DC ${event.dc}: ${formatRolls(event.rolls)} -> ${event.total}, ${event.success ? "success" : "failure"}`;
    case "damage":
      return `${event.target} takes ${event.amount} ${event.damageTypes.join("+") || "untyped"} damage from ${event.action} (${event.hpBefore} -> ${event.hpAfter} hp)`;
    case "heal":
      return `${event.target} regains ${event.amount} hp from ${event.action} (${event.hpBefore} -> ${event.hpAfter} hp)`;
    case "condition":
      return `${event.target} ${event.change === "applied" ? "gains" : "loses"} ${event.condition}`;
    case "resource":
      return `${event.actor} has ${event.remaining} ${event.resource} left`;
    case "note":
      return `${event.actor} ${event.message}`;
    case "encounter-end":
      return `=== Encounter ${event.encounter} ends after ${event.rounds} rounds: ${event.outcome} ===`;
    case "rest":
      return event.kind === "end-of-day" ? "=== End of day ===" : `=== ${titleCase(event.kind)} rest ===`;
  }
}
