import type { Combatant } from "../characters/Combatant";
import type { PlayerCharacter } from "../characters/PlayerCharacter";
import type { CombatContext } from "../combat/CombatContext";
import { DEFAULT_ROUND_CAP, Encounter, EncounterSummary } from "../combat/Encounter";
import { EncounterOutcome, RestKind, SILENT_TRACE, TraceSink } from "../combat/Trace";
import type { MonsterFactory } from "../data/Bestiary";
import type { Random } from "../utils/Random";
import { DayState, ENCOUNTERS_PER_DAY, ENCOUNTERS_PER_SHORT_REST, createDayState } from "./DayState";

export interface MonsterGroup {
  name: string;
  count: number;
  factory: MonsterFactory;
}

export interface AdventuringDayConfig {
  party: PlayerCharacter[];
  monsters: readonly MonsterGroup[];
  rng: Random;
  roundCap?: number;
  trace?: TraceSink;
  onLog?: (message: string) => void;
  onEncounterComplete?: (summary: EncounterSummary) => void;
}

export interface DayResult {
  /** Party members above 0 hit points once the day is scored. */
  survival: number;
  outcomes: EncounterOutcome[];
  simultaneousDefeat: boolean;
  encounters: EncounterSummary[];
}

/**
 * Six encounters against fresh monsters with short rests after the second
 * and fourth, then end-of-day healing and scoring.
 */
export class AdventuringDay {
  protected readonly _config: AdventuringDayConfig;
  protected readonly _trace: TraceSink;
  protected readonly _day: DayState;
  protected _result: DayResult | null = null;

  constructor(config: AdventuringDayConfig) {
    this._config = config;
    this._trace = config.trace ?? SILENT_TRACE;
    this._day = createDayState(config.party);
  }

  get state(): Readonly<DayState> {
    return this._day;
  }

  run(): DayResult {
    if (this._result) {
      return this._result;
    }
    const { party, rng } = this._config;
    const outcomes: EncounterOutcome[] = [];
    const encounters: EncounterSummary[] = [];
    const restContext = this.restContext();

    party.forEach((member) => {
      member.initialize(rng);
      member.longRest();
    });
    this.recordRest("long");

    for (let index = 1; index <= ENCOUNTERS_PER_DAY; index++) {
      this._day.encounterIndex = index;
      const encounter = new Encounter(rng, this._day, this.spawnMonsters(), {
        index,
        roundCap: this._config.roundCap ?? DEFAULT_ROUND_CAP,
        trace: this._trace,
        onLog: this._config.onLog,
      });
      outcomes.push(encounter.run());
      const summary = encounter.getSummary();
      encounters.push(summary);
      this._config.onEncounterComplete?.(summary);
      this._day.encountersSinceShortRest += 1;
      this._day.encountersSinceLongRest += 1;

      if (this._day.simultaneousDefeat) {
        this.log(`Simultaneous defeat in encounter ${index}; the day scores 0`);
        break;
      }
      party.filter((member) => member.isConscious).forEach((member) => member.endEncounter(encounter));
      if (!party.some((member) => member.isConscious)) {
        this.log(`Party down after encounter ${index}`);
        break;
      }
      if (index % ENCOUNTERS_PER_SHORT_REST === 0 && index < ENCOUNTERS_PER_DAY) {
        this.recordRest("short");
        party.forEach((member) => member.shortRest(restContext));
        this._day.encountersSinceShortRest = 0;
      }
    }

    if (!this._day.simultaneousDefeat) {
      this.recordRest("end-of-day");
      party.filter((member) => member.isConscious).forEach((member) => member.endOfDay(restContext));
    }

    const survival = this._day.simultaneousDefeat
      ? 0
      : party.filter((member) => member.isConscious).length;
    this.log(`Day ended with ${survival} of ${party.length} standing`);
    this._result = {
      survival,
      outcomes,
      simultaneousDefeat: this._day.simultaneousDefeat,
      encounters,
    };
    return this._result;
  }

  protected spawnMonsters(): Combatant[] {
    const monsters: Combatant[] = [];
    this._config.monsters.forEach((group) => {
      for (let i = 1; i <= group.count; i++) {
        const monster = group.factory(`${group.name}${i}`);
        monster.initialize(this._config.rng);
        monsters.push(monster);
      }
    });
    return monsters;
  }

  /** Out-of-combat context for rests: allies are the party and there are no foes. */
  protected restContext(): CombatContext {
    const party: Combatant[] = this._config.party;
    return {
      rng: this._config.rng,
      trace: this._trace,
      round: 0,
      alliesOf: () => party,
      foesOf: () => [],
    };
  }

  protected recordRest(kind: RestKind): void {
    this._trace.record({ type: "rest", kind });
  }

  protected log(message: string): void {
    this._config.onLog?.(`[Day] ${message}`);
  }
}
