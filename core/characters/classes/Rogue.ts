import type { CombatContext } from "../../combat/CombatContext";
import { attackRollModes, makeAttack } from "../../combat/ActionResolution";
import { chooseTarget, offensiveCandidates } from "../../combat/Targeting";
import { DiceSpec, dice } from "../../utils/Dice";
import { abilityModifiers } from "../Abilities";
import type { Combatant, Tactic } from "../Combatant";
import { PlayerCharacter } from "../PlayerCharacter";
import { Weapon, createWeapon } from "../Weapon";

const SNEAK_ATTACK = "sneak-attack";

/** Assassin rogue; wood elf fighting with a rapier in each hand from 4th level. */
export class Rogue extends PlayerCharacter {
  readonly className = "Rogue";
  readonly hitDie = 8;

  protected _weapon: Weapon = createRapier(0, true);
  protected _offhand: Weapon = createRapier(0, false);

  protected configure(): void {
    const level = this.level;
    this.abilities = abilityModifiers({
      str: -1,
      dex: 3 + (level >= 8 ? 1 : 0),
      con: 2,
      int: 1,
      wis: 2,
      cha: 0,
    });
    this.armorType = "light";
    this.armorBase = level >= 4 ? 13 : level >= 2 ? 12 : 11;
    this.saveProficiencies.add("dex").add("int");
    this.skillProficiencies.add("acrobatics").add("perception").add("stealth");
    this.skillExpertise.add("stealth");
    if (level >= 6) {
      this.skillExpertise.add("perception");
    }
    this.tags.add("elf");
    this.features.uncannyDodge = level >= 5;
    this.features.evasion = level >= 7;
    this._weapon = createRapier(level >= 6 ? 1 : 0, true);
  }

  get sneakAttackDice(): DiceSpec {
    return dice(Math.ceil(this.level / 2), 6);
  }

  protected tactics(_ctx: CombatContext): Tactic[] {
    return [
      {
        id: "rapier",
        economy: "action",
        perform: (ctx) => this.weaponAttack(ctx, this._weapon),
      },
      {
        id: "offhand-rapier",
        economy: "bonus",
        when: () => this.level >= 4 && !this.turn.action && !this.turn.used.has(SNEAK_ATTACK),
        perform: (ctx) => this.weaponAttack(ctx, this._offhand),
      },
      {
        id: "cunning-hide",
        economy: "bonus",
        when: () => this.level >= 2,
        perform: (ctx) => {
          this.hide(ctx);
          return true;
        },
      },
    ];
  }

  protected chooseVictim(ctx: CombatContext): Combatant | null {
    const surprised = offensiveCandidates(ctx, this, { where: (foe) => foe.surprised });
    if (surprised.length) {
      return ctx.rng.pick(surprised);
    }
    return chooseTarget(ctx, this);
  }

  protected canSneakAttack(ctx: CombatContext, target: Combatant): boolean {
    if (this.turn.used.has(SNEAK_ATTACK)) {
      return false;
    }
    const modes = attackRollModes(this, target);
    if (modes.advantage && !modes.disadvantage) {
      return true;
    }
    const helpers = ctx
      .alliesOf(this)
      .filter((ally) => ally !== this && ally.isConscious && !ally.isIncapacitated);
    return helpers.length > 0 && !modes.disadvantage;
  }

  protected weaponAttack(ctx: CombatContext, weapon: Weapon): boolean {
    const target = this.chooseVictim(ctx);
    if (!target) {
      return false;
    }
    const assassinate = this.level >= 3 && target.surprised;
    const sneak = !this.turn.used.has(SNEAK_ATTACK) && (assassinate || this.canSneakAttack(ctx, target));
    const outcome = makeAttack(ctx, this, target, weapon, {
      advantage: assassinate,
      criticalOnHit: assassinate,
      extraDice: sneak ? [this.sneakAttackDice] : [],
    });
    if (sneak && outcome.result !== "miss") {
      this.turn.used.add(SNEAK_ATTACK);
    }
    return true;
  }
}

function createRapier(enhancement: number, main: boolean): Weapon {
  return createWeapon({
    name: main ? "Rapier" : "Offhand Rapier",
    dice: dice(1, 8),
    damageType: enhancement > 0 ? "magic-piercing" : "piercing",
    ability: "dex",
    addAbilityToDamage: main,
    attackBonus: enhancement,
    damageBonus: enhancement,
  });
}
