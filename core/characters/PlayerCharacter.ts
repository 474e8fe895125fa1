import type { CombatContext, EncounterView } from "../combat/CombatContext";
import { heal } from "../combat/ActionResolution";
import { Ration, RationStyle } from "../resources/Rationing";
import { Expendable, RechargeWindow, ResourcePool } from "../resources/ResourcePool";
import { ENCOUNTERS_PER_DAY, ENCOUNTERS_PER_SHORT_REST } from "../runtime/DayState";
import { dieMean, rollDie } from "../utils/Dice";
import type { Random } from "../utils/Random";
import { Combatant } from "./Combatant";

export type PlayerClassName = "Cleric" | "Fighter" | "Rogue" | "Wizard";

export const MIN_PARTY_LEVEL = 1;
export const MAX_PARTY_LEVEL = 8;

export function proficiencyForLevel(level: number): number {
  return Math.floor((level - 1) / 4) + 2;
}

export abstract class PlayerCharacter extends Combatant {
  abstract readonly className: PlayerClassName;
  abstract readonly hitDie: number;
  readonly level: number;

  protected _hitDiceRemaining = 0;
  protected readonly _pools = new Map<string, ResourcePool>();
  protected readonly _rations = new Map<string, Ration>();

  constructor(name: string, level: number) {
    super(name, "players");
    this.level = level;
  }

  /** Class and level features: abilities, armor, proficiencies, weapons, pools. */
  protected abstract configure(): void;

  initialize(_rng?: Random): void {
    this.proficiency = proficiencyForLevel(this.level);
    this.configure();
    this.setMaxHitPoints(this.fixedHitPoints());
    this._hitDiceRemaining = this.level;
  }

  fixedHitPoints(): number {
    const mean = dieMean(this.hitDie);
    return Math.max(1, this.hitDie - mean + this.level * (mean + this.abilities.con));
  }

  get hitDiceRemaining(): number {
    return this._hitDiceRemaining;
  }

  protected addPool(name: string, max: number, recharge: RechargeWindow): ResourcePool {
    const pool = new ResourcePool(name, max, recharge);
    this._pools.set(name, pool);
    return pool;
  }

  protected addRation(name: string, resource: Expendable, window: RechargeWindow, style: RationStyle): Ration {
    const ration = new Ration(resource, window, style);
    this._rations.set(name, ration);
    return ration;
  }

  pool(name: string): ResourcePool | undefined {
    return this._pools.get(name);
  }

  ration(name: string): Ration | undefined {
    return this._rations.get(name);
  }

  /** Whether this encounter's allotment of a rationed resource still has room. */
  withinRation(name: string): boolean {
    return this._rations.get(name)?.allowsSpend ?? false;
  }

  startEncounter(encounter: EncounterView): void {
    super.startEncounter(encounter);
    const day = encounter.day;
    this._rations.forEach((ration, name) => {
      const left =
        ration.window === "long"
          ? ENCOUNTERS_PER_DAY - day.encountersSinceLongRest
          : ENCOUNTERS_PER_SHORT_REST - day.encountersSinceShortRest;
      const allotment = ration.begin(Math.max(1, left));
      encounter.trace.record({
        type: "note",
        round: 0,
        actor: this.name,
        message: `rations ${allotment} of ${ration.resource.remaining} ${name}`,
      });
    });
  }

  /** Called on standing characters once an encounter concludes. */
  endEncounter(_encounter: EncounterView): void {}

  shortRest(ctx: CombatContext): void {
    this.resetEncounterState();
    this.onShortRest(ctx);
    this._pools.forEach((pool) => {
      if (pool.recharge === "short") {
        pool.refill();
      }
    });
    this.spendHitDice(ctx);
  }

  longRest(): void {
    this.resetEncounterState();
    this.aidBonus = 0;
    this.setMaxHitPoints(this.fixedHitPoints());
    this._hitDiceRemaining = this.level;
    this._pools.forEach((pool) => pool.refill());
    this.onLongRest();
  }

  /** Last chance to act before the day is scored. */
  endOfDay(_ctx: CombatContext): void {}

  protected onShortRest(_ctx: CombatContext): void {}

  protected onLongRest(): void {}

  /** Rolls hit dice while at or below the rest threshold. Unconscious characters cannot. */
  spendHitDice(ctx: CombatContext): number {
    const threshold = this.maxHitPoints - Math.min(Math.floor(this.maxHitPoints / 2), this.hitDie);
    let spent = 0;
    while (this.isConscious && this._hitDiceRemaining > 0 && this.hitPoints <= threshold) {
      this._hitDiceRemaining -= 1;
      spent += 1;
      heal(ctx, this, this, rollDie(ctx.rng, this.hitDie) + this.abilities.con, "Hit Die");
    }
    return spent;
  }
}
