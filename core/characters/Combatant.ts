import type { CombatContext, EncounterView } from "../combat/CombatContext";
import { Concentration, ConditionSet } from "../combat/Duration";
import { assertInvariant } from "../errors";
import { rollD20 } from "../utils/Dice";
import type { Random } from "../utils/Random";
import {
  Ability,
  AbilityModifiers,
  ArmorType,
  DamageType,
  Skill,
  SKILL_ABILITY,
  abilityModifiers,
  armorClassFor,
} from "./Abilities";

export type Team = "players" | "monsters";

export type TurnEconomy = "action" | "bonus" | "free";

export interface Tactic {
  readonly id: string;
  readonly economy: TurnEconomy;
  /** Tactics sharing a group are mutually exclusive within one turn. */
  readonly group?: string;
  when?(ctx: CombatContext): boolean;
  /** Returns false when nothing was done; the economy slot is then refunded. */
  perform(ctx: CombatContext): boolean;
}

export interface TurnState {
  action: boolean;
  bonus: boolean;
  reaction: boolean;
  leveledSpellCast: boolean;
  /** Once-per-turn features already spent this turn. */
  readonly used: Set<string>;
}

export interface CombatantFeatures {
  evasion: boolean;
  uncannyDodge: boolean;
  heavyArmorMaster: boolean;
  warCaster: boolean;
  poisonSaveAdvantage: boolean;
  undeadFortitude: boolean;
}

function createFeatures(): CombatantFeatures {
  return {
    evasion: false,
    uncannyDodge: false,
    heavyArmorMaster: false,
    warCaster: false,
    poisonSaveAdvantage: false,
    undeadFortitude: false,
  };
}

export abstract class Combatant {
  readonly name: string;
  readonly team: Team;

  abilities: AbilityModifiers = abilityModifiers();
  proficiency = 2;
  armorBase = 10;
  armorType: ArmorType = "light";
  initiativeBonus = 0;
  critThreshold = 20;
  undeadRating: number | null = null;
  construct = false;
  deathWard = false;
  /** Hit point maximum granted by Aid, lasting until a long rest. */
  aidBonus = 0;

  surprised = false;
  stealth = 0;
  concentration: Concentration | null = null;

  readonly saveProficiencies = new Set<Ability>();
  readonly skillProficiencies = new Set<Skill>();
  readonly skillExpertise = new Set<Skill>();
  readonly immunities = new Set<DamageType>();
  readonly resistances = new Set<DamageType>();
  readonly vulnerabilities = new Set<DamageType>();
  readonly tags = new Set<string>();
  readonly features: CombatantFeatures = createFeatures();
  readonly conditions: ConditionSet;
  readonly turn: TurnState = {
    action: false,
    bonus: false,
    reaction: false,
    leveledSpellCast: false,
    used: new Set<string>(),
  };

  protected _maxHitPoints = 0;
  protected _hitPoints = 0;

  constructor(name: string, team: Team) {
    this.name = name;
    this.team = team;
    this.conditions = new ConditionSet(this);
  }

  /** Sets abilities, hit points, resources and flags before the creature enters play. */
  abstract initialize(rng: Random): void;

  /** Priority list evaluated top-down each turn. */
  protected abstract tactics(ctx: CombatContext): Tactic[];

  get hitPoints(): number {
    return this._hitPoints;
  }

  get maxHitPoints(): number {
    return this._maxHitPoints;
  }

  get armorClass(): number {
    return armorClassFor(this.armorBase, this.armorType, this.abilities.dex);
  }

  get isConscious(): boolean {
    return this._hitPoints > 0;
  }

  get isIncapacitated(): boolean {
    return this.conditions.has("paralyzed");
  }

  get isUndead(): boolean {
    return this.undeadRating !== null;
  }

  startEncounter(_encounter: EncounterView): void {
    this.resetEncounterState();
  }

  protected resetEncounterState(): void {
    this.conditions.clear();
    this.concentration = null;
    this.stealth = 0;
    this.surprised = true;
    this.turn.action = false;
    this.turn.bonus = false;
    this.turn.reaction = false;
    this.turn.leveledSpellCast = false;
    this.turn.used.clear();
  }

  beginTurn(): void {
    this.surprised = false;
    this.turn.bonus = true;
    this.turn.leveledSpellCast = false;
    this.turn.used.clear();
    if (this.conditions.has("turned")) {
      this.turn.action = false;
    } else {
      this.turn.action = true;
      this.turn.reaction = true;
    }
  }

  takeTurn(ctx: CombatContext): void {
    if (!this.isConscious || this.isIncapacitated) {
      return;
    }
    const spentGroups = new Set<string>();
    for (const tactic of this.tactics(ctx)) {
      if (!this.isConscious || this.isIncapacitated) {
        break;
      }
      if (tactic.group && spentGroups.has(tactic.group)) {
        continue;
      }
      const economy = tactic.economy;
      if (economy !== "free" && !this.turn[economy]) {
        continue;
      }
      if (tactic.when && !tactic.when(ctx)) {
        continue;
      }
      if (economy !== "free") {
        this.turn[economy] = false;
      }
      if (tactic.perform(ctx)) {
        if (tactic.group) {
          spentGroups.add(tactic.group);
        }
      } else if (economy !== "free") {
        this.turn[economy] = true;
      }
    }
  }

  setMaxHitPoints(max: number): void {
    this._maxHitPoints = Math.max(1, Math.floor(max));
    this._hitPoints = this._maxHitPoints;
  }

  /** Raises or lowers the maximum, moving current hit points by the same amount where it applies. */
  adjustMaxHitPoints(delta: number): void {
    this._maxHitPoints = Math.max(0, this._maxHitPoints + delta);
    if (delta > 0) {
      this._hitPoints += delta;
    }
    this._hitPoints = Math.min(this._hitPoints, this._maxHitPoints);
  }

  loseHitPoints(amount: number): number {
    const lost = Math.min(this._hitPoints, Math.max(0, Math.floor(amount)));
    this._hitPoints -= lost;
    assertInvariant(this._hitPoints >= 0, `${this.name} fell below 0 hit points`);
    return lost;
  }

  restoreHitPoints(amount: number): number {
    const gained = Math.min(this._maxHitPoints - this._hitPoints, Math.max(0, Math.floor(amount)));
    this._hitPoints += gained;
    return gained;
  }

  setHitPoints(value: number): void {
    this._hitPoints = Math.min(this._maxHitPoints, Math.max(0, Math.floor(value)));
  }

  saveModifier(ability: Ability): number {
    return this.abilities[ability] + (this.saveProficiencies.has(ability) ? this.proficiency : 0);
  }

  skillModifier(skill: Skill): number {
    let modifier = this.abilities[SKILL_ABILITY[skill]];
    if (this.skillProficiencies.has(skill)) {
      modifier += this.proficiency;
    }
    if (this.skillExpertise.has(skill)) {
      modifier += this.proficiency;
    }
    return modifier;
  }

  passivePerception(): number {
    return 10 + this.skillModifier("perception");
  }

  isHiddenFrom(observer: Combatant): boolean {
    return this.stealth > observer.passivePerception();
  }

  hide(ctx: CombatContext): void {
    this.stealth = rollD20(ctx.rng).natural + this.skillModifier("stealth");
    ctx.trace.record({
      type: "note",
      round: ctx.round,
      actor: this.name,
      message: `hides (stealth ${this.stealth})`,
    });
  }

  reveal(): void {
    this.stealth = 0;
  }

  concentrate(ctx: CombatContext, concentration: Concentration): void {
    this.endConcentration(ctx);
    this.concentration = concentration;
  }

  endConcentration(ctx: CombatContext | null): void {
    const current = this.concentration;
    if (!current) {
      return;
    }
    this.concentration = null;
    if (ctx) {
      ctx.trace.record({
        type: "note",
        round: ctx.round,
        actor: this.name,
        message: `stops concentrating on ${current.spell}`,
      });
    }
    current.release(ctx);
  }

  countDownConcentration(ctx: CombatContext): void {
    if (this.concentration?.countDown()) {
      this.endConcentration(ctx);
    }
  }

  /** Another member of this combatant's side is still standing. */
  hasStandingAlly(ctx: CombatContext): boolean {
    return ctx.alliesOf(this).some((ally) => ally !== this && ally.isConscious);
  }

  describe(): string {
    return `${this.name} (${this._hitPoints}/${this._maxHitPoints} hp)`;
  }
}
