import type { CombatContext } from "../combat/CombatContext";
import {
  applyCondition,
  applyDamage,
  makeAttack,
  savingThrow,
  type AttackOutcome,
} from "../combat/ActionResolution";
import { Paralyzed, Prone } from "../combat/conditions";
import { chooseTarget, offensiveCandidates } from "../combat/Targeting";
import type { MonsterStatBlock, MonsterTactic, OnHitRider } from "../data/MonsterSchema";
import { assertInvariant } from "../errors";
import { DiceSpec, parseDice, rollDice } from "../utils/Dice";
import type { Random } from "../utils/Random";
import { abilityModifiers, type Ability } from "./Abilities";
import { Combatant, type Tactic } from "./Combatant";
import { Weapon, createWeapon } from "./Weapon";

interface MonsterWeapon {
  weapon: Weapon;
  riders: OnHitRider[];
}

/** A creature built from a validated stat block; its turn follows the block's tactic list. */
export class Monster extends Combatant {
  readonly statBlock: MonsterStatBlock;
  protected readonly _weapons = new Map<string, MonsterWeapon>();

  constructor(statBlock: MonsterStatBlock, name: string = statBlock.name) {
    super(name, "monsters");
    this.statBlock = statBlock;
    Object.entries(statBlock.weapons).forEach(([weaponName, data]) => {
      this._weapons.set(weaponName, {
        weapon: createWeapon({
          name: weaponName,
          dice: parseDice(data.dice),
          damageType: data.damageType,
          ability: data.ability,
          proficient: data.proficient,
          ranged: data.ranged,
          addAbilityToDamage: data.addAbilityToDamage,
          attackBonus: data.attackBonus,
          damageBonus: data.damageBonus,
          secondary: data.secondary
            ? { dice: parseDice(data.secondary.dice), damageType: data.secondary.damageType }
            : undefined,
        }),
        riders: data.onHit,
      });
    });
  }

  initialize(rng: Random): void {
    const block = this.statBlock;
    this.abilities = abilityModifiers(block.abilities);
    this.armorBase = block.armorBase;
    this.armorType = block.armorType;
    this.proficiency = block.proficiency;
    this.undeadRating = block.undeadRating;
    this.construct = block.construct;
    block.saveProficiencies.forEach((ability) => this.saveProficiencies.add(ability));
    block.skillProficiencies.forEach((skill) => this.skillProficiencies.add(skill));
    block.skillExpertise.forEach((skill) => this.skillExpertise.add(skill));
    block.immunities.forEach((type) => this.immunities.add(type));
    block.resistances.forEach((type) => this.resistances.add(type));
    block.vulnerabilities.forEach((type) => this.vulnerabilities.add(type));
    block.tags.forEach((tag) => this.tags.add(tag));
    this.features.undeadFortitude = this.hasTrait("undead-fortitude");

    const rolled = rollDice(rng, { count: block.hitDice, sides: block.hitDie });
    this.setMaxHitPoints(Math.max(1, rolled + block.hitDice * this.abilities.con + block.hitPointBonus));
  }

  hasTrait(type: MonsterStatBlock["traits"][number]["type"]): boolean {
    return this.statBlock.traits.some((trait) => trait.type === type);
  }

  weapon(name: string): Weapon {
    const entry = this._weapons.get(name);
    assertInvariant(entry, `${this.name} has no weapon named '${name}'`);
    return entry.weapon;
  }

  /** DC of a rider keyed to one of this creature's abilities. */
  riderDC(ability: Ability): number {
    return 8 + this.proficiency + this.abilities[ability];
  }

  protected tactics(_ctx: CombatContext): Tactic[] {
    return this.statBlock.tactics.map((tactic, index) => this.toTactic(tactic, index));
  }

  protected toTactic(tactic: MonsterTactic, index: number): Tactic {
    if (tactic.type === "hide") {
      return {
        id: `hide-${index}`,
        economy: "bonus",
        perform: (ctx) => {
          this.hide(ctx);
          return true;
        },
      };
    }
    return {
      id: `attack-${index}`,
      economy: "action",
      perform: (ctx) => {
        let attacked = false;
        for (const weaponName of tactic.weapons) {
          if (!this.isConscious) {
            break;
          }
          const target = this.chooseVictim(ctx);
          if (!target) {
            break;
          }
          const chosen =
            tactic.versusParalyzed && target.isIncapacitated ? tactic.versusParalyzed : weaponName;
          this.strike(ctx, target, chosen);
          attacked = true;
        }
        return attacked;
      },
    };
  }

  /** Surprise attackers go after foes who have not yet acted. */
  protected chooseVictim(ctx: CombatContext): Combatant | null {
    if (this.hasTrait("surprise-attack")) {
      const surprised = offensiveCandidates(ctx, this, { where: (foe) => foe.surprised });
      if (surprised.length) {
        return ctx.rng.pick(surprised);
      }
    }
    return chooseTarget(ctx, this);
  }

  strike(ctx: CombatContext, target: Combatant, weaponName: string): AttackOutcome {
    const entry = this._weapons.get(weaponName);
    assertInvariant(entry, `${this.name} has no weapon named '${weaponName}'`);
    const allyStanding = this.hasStandingAlly(ctx);
    const extraDice: DiceSpec[] = [];
    const spentFeatures: string[] = [];
    this.statBlock.traits.forEach((trait) => {
      if (this.turn.used.has(trait.type)) {
        return;
      }
      if (
        (trait.type === "martial-advantage" && allyStanding) ||
        (trait.type === "surprise-attack" && target.surprised)
      ) {
        extraDice.push(parseDice(trait.dice));
        spentFeatures.push(trait.type);
      }
    });

    const outcome = makeAttack(ctx, this, target, entry.weapon, {
      advantage: this.hasTrait("pack-tactics") && allyStanding,
      extraDice,
    });
    if (outcome.result === "miss") {
      return outcome;
    }
    spentFeatures.forEach((feature) => this.turn.used.add(feature));
    entry.riders.forEach((rider) => this.applyRider(ctx, target, rider, outcome, entry.weapon.name));
    this.rampage(ctx, outcome);
    return outcome;
  }

  protected applyRider(
    ctx: CombatContext,
    target: Combatant,
    rider: OnHitRider,
    outcome: AttackOutcome,
    action: string
  ): void {
    const dc = this.riderDC(rider.dcAbility);
    switch (rider.type) {
      case "condition": {
        if (!target.isConscious || rider.exemptTags.some((tag) => target.tags.has(tag))) {
          return;
        }
        if (!savingThrow(ctx, target, rider.save, dc, { action })) {
          applyCondition(ctx, target, new Paralyzed(this, rider.rounds, { ability: rider.save, dc }));
        }
        return;
      }
      case "damage": {
        if (!target.isConscious) {
          return;
        }
        if (savingThrow(ctx, target, rider.save, dc, { action, poison: rider.poison })) {
          return;
        }
        const result = applyDamage(
          ctx,
          target,
          [{ amount: rollDice(ctx.rng, parseDice(rider.dice)), type: rider.damageType }],
          { action, dealer: this }
        );
        if (rider.paralyzeOnDrop && result.dropped && !target.isIncapacitated) {
          applyCondition(ctx, target, new Paralyzed(this, null, null));
        }
        return;
      }
      case "knock-prone": {
        if (!target.isConscious || target.conditions.has("prone")) {
          return;
        }
        if (!savingThrow(ctx, target, rider.save, dc, { action })) {
          applyCondition(ctx, target, new Prone());
        }
        return;
      }
      case "drain-max-hp": {
        if (outcome.dealt <= 0) {
          return;
        }
        if (!savingThrow(ctx, target, rider.save, dc, { action })) {
          target.adjustMaxHitPoints(-outcome.dealt);
          ctx.trace.record({
            type: "note",
            round: ctx.round,
            actor: target.name,
            message: `loses ${outcome.dealt} maximum hit points`,
          });
        }
        return;
      }
    }
  }

  /** A bonus-action attack after dropping a foe. */
  protected rampage(ctx: CombatContext, outcome: AttackOutcome): void {
    if (!outcome.dropped || !this.turn.bonus) {
      return;
    }
    const trait = this.statBlock.traits.find((candidate) => candidate.type === "rampage");
    if (!trait || trait.type !== "rampage") {
      return;
    }
    const target = this.chooseVictim(ctx);
    if (!target) {
      return;
    }
    this.turn.bonus = false;
    ctx.trace.record({ type: "note", round: ctx.round, actor: this.name, message: "rampages" });
    this.strike(ctx, target, trait.weapon);
  }
}
