import type { Combatant } from "../characters/Combatant";
import { assertInvariant } from "../errors";
import type { DayState } from "../runtime/DayState";
import { rollD20 } from "../utils/Dice";
import type { Random } from "../utils/Random";
import type { EncounterView } from "./CombatContext";
import type { Duration } from "./Duration";
import { EncounterOutcome, SILENT_TRACE, TraceSink } from "./Trace";

export type EncounterState = "not-started" | "active" | "concluded";

export const DEFAULT_ROUND_CAP = 100;

export interface EncounterConfig {
  /** Position within the day, from 1. */
  index?: number;
  roundCap?: number;
  trace?: TraceSink;
  onLog?: (message: string) => void;
}

export interface InitiativeEntry {
  combatant: Combatant;
  roll: number;
}

export interface EncounterSummary {
  index: number;
  state: EncounterState;
  outcome: EncounterOutcome | null;
  rounds: number;
  initiative: string[];
  playersStanding: number;
  monstersStanding: number;
}

type TurnPhase = "start" | "end";

/**
 * One fight between the day's party and a fresh set of monsters, run in
 * initiative order until one side is down or the round cap is reached.
 */
export class Encounter implements EncounterView {
  readonly index: number;
  readonly day: DayState;
  readonly rng: Random;
  readonly trace: TraceSink;

  protected readonly _players: Combatant[];
  protected readonly _monsters: Combatant[];
  protected readonly _roundCap: number;
  protected readonly _logger?: (message: string) => void;

  protected _state: EncounterState = "not-started";
  protected _round = 0;
  protected _order: InitiativeEntry[] = [];
  protected _outcome: EncounterOutcome | null = null;

  constructor(rng: Random, day: DayState, monsters: Combatant[], config: EncounterConfig = {}) {
    this.rng = rng;
    this.day = day;
    this.index = config.index ?? day.encounterIndex;
    this.trace = config.trace ?? SILENT_TRACE;
    this._players = [...day.party];
    this._monsters = [...monsters];
    this._roundCap = Math.max(1, config.roundCap ?? DEFAULT_ROUND_CAP);
    this._logger = config.onLog;
  }

  get round(): number {
    return this._round;
  }

  get state(): EncounterState {
    return this._state;
  }

  get outcome(): EncounterOutcome | null {
    return this._outcome;
  }

  get initiative(): readonly InitiativeEntry[] {
    return this._order;
  }

  alliesOf(combatant: Combatant): Combatant[] {
    return combatant.team === "players" ? this._players : this._monsters;
  }

  foesOf(combatant: Combatant): Combatant[] {
    return combatant.team === "players" ? this._monsters : this._players;
  }

  start(): void {
    if (this._state !== "not-started") {
      return;
    }
    const roster = [...this._players, ...this._monsters];
    const rolled = roster.map((combatant) => ({
      combatant,
      roll: rollD20(this.rng).natural + combatant.abilities.dex + combatant.initiativeBonus,
    }));
    // Array.prototype.sort is stable: ties keep roster order, players first.
    this._order = rolled.sort((a, b) => b.roll - a.roll);
    this.trace.record({
      type: "encounter-start",
      encounter: this.index,
      initiative: this._order.map((entry) => ({ name: entry.combatant.name, roll: entry.roll })),
    });
    this._state = "active";
    this._order.forEach((entry) => entry.combatant.startEncounter(this));
    this.checkTermination();
  }

  /** Plays the encounter to its conclusion. A concluded encounter returns its stored outcome. */
  run(): EncounterOutcome {
    this.start();
    while (this._state === "active") {
      this.playRound();
    }
    return this.resolvedOutcome();
  }

  protected playRound(): void {
    this._round += 1;
    this.trace.record({ type: "round-start", encounter: this.index, round: this._round });
    for (const entry of this._order) {
      if (this._state !== "active") {
        return;
      }
      this.runTurn(entry.combatant);
      this.checkTermination();
    }
    if (this._state === "active" && this._round >= this._roundCap) {
      this.conclude("stalemate");
    }
  }

  protected runTurn(actor: Combatant): void {
    if (!actor.isConscious) {
      return;
    }
    actor.beginTurn();
    this.fireHooks(actor, "start");
    if (actor.isConscious && !actor.isIncapacitated) {
      actor.conditions.endTag("prone", this);
      actor.countDownConcentration(this);
      actor.takeTurn(this);
    }
    this.fireHooks(actor, "end");
  }

  protected fireHooks(actor: Combatant, phase: TurnPhase): void {
    const fire = (effect: Duration, bearerHook: boolean) => {
      if (effect.ended) {
        return;
      }
      if (bearerHook && phase === "start") {
        effect.onBearerTurnStart(this);
      } else if (bearerHook) {
        effect.onBearerTurnEnd(this);
      } else if (phase === "start") {
        effect.onSourceTurnStart(this);
      } else {
        effect.onSourceTurnEnd(this);
      }
    };
    actor.conditions.all().forEach((effect) => fire(effect, true));
    this._order.forEach((entry) => {
      entry.combatant.conditions.sourcedBy(actor).forEach((effect) => fire(effect, false));
    });
  }

  protected checkTermination(): void {
    if (this._state !== "active") {
      return;
    }
    const playersUp = this._players.some((player) => player.isConscious);
    const monstersUp = this._monsters.some((monster) => monster.isConscious);
    if (playersUp && monstersUp) {
      return;
    }
    if (!playersUp && !monstersUp) {
      this.day.simultaneousDefeat = true;
      this.conclude("simultaneous-defeat");
    } else {
      this.conclude(playersUp ? "players" : "monsters");
    }
  }

  protected conclude(outcome: EncounterOutcome): void {
    this._state = "concluded";
    this._outcome = outcome;
    this.trace.record({ type: "encounter-end", encounter: this.index, rounds: this._round, outcome });
    this._logger?.(`[Encounter] Encounter ${this.index} ended after ${this._round} rounds: ${outcome}`);
  }

  protected resolvedOutcome(): EncounterOutcome {
    assertInvariant(this._outcome !== null, `Encounter ${this.index} concluded without an outcome`);
    return this._outcome;
  }

  getSummary(): EncounterSummary {
    return {
      index: this.index,
      state: this._state,
      outcome: this._outcome,
      rounds: this._round,
      initiative: this._order.map((entry) => entry.combatant.name),
      playersStanding: this._players.filter((player) => player.isConscious).length,
      monstersStanding: this._monsters.filter((monster) => monster.isConscious).length,
    };
  }
}
