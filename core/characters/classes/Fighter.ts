import type { CombatContext } from "../../combat/CombatContext";
import { heal, makeAttack } from "../../combat/ActionResolution";
import { chooseTarget, offensiveCandidates } from "../../combat/Targeting";
import { dice, rollDie } from "../../utils/Dice";
import { abilityModifiers } from "../Abilities";
import type { Tactic } from "../Combatant";
import { PlayerCharacter } from "../PlayerCharacter";
import { Weapon, createWeapon } from "../Weapon";

const SECOND_WIND = "Second Wind";
const ACTION_SURGE = "Action Surge";

/** Champion fighter; mountain dwarf with a greatsword and Great Weapon Fighting. */
export class Fighter extends PlayerCharacter {
  readonly className = "Fighter";
  readonly hitDie = 10;

  protected _weapon: Weapon = createGreatsword(0);
  protected _attacksPerAction = 1;

  protected configure(): void {
    const level = this.level;
    this.abilities = abilityModifiers({
      str: 3 + (level >= 4 ? 1 : 0) + (level >= 8 ? 1 : 0),
      dex: 1,
      con: 3 + (level >= 6 ? 1 : 0),
      int: -1,
      wis: 1,
      cha: 0,
    });
    this.armorType = "heavy";
    this.armorBase = level >= 5 ? 18 : level >= 3 ? 17 : 16;
    this.critThreshold = level >= 3 ? 19 : 20;
    this.saveProficiencies.add("str").add("con");
    this.skillProficiencies.add("acrobatics").add("perception");
    this.tags.add("dwarf");
    this.resistances.add("poison");
    this.features.poisonSaveAdvantage = true;
    this.features.heavyArmorMaster = level >= 4;
    this._weapon = createGreatsword(level >= 6 ? 1 : 0);
    this._attacksPerAction = level >= 5 ? 2 : 1;

    this.addPool(SECOND_WIND, 1, "short");
    const surge = this.addPool(ACTION_SURGE, level >= 2 ? 1 : 0, "short");
    this.addRation(ACTION_SURGE, surge, "short", "front-loaded");
  }

  get weapon(): Weapon {
    return this._weapon;
  }

  get secondWindThreshold(): number {
    return this.maxHitPoints - Math.min(Math.floor(this.maxHitPoints / 2), 10 + this.level);
  }

  protected tactics(ctx: CombatContext): Tactic[] {
    return [
      {
        id: "second-wind",
        economy: "bonus",
        when: () => this.hitPoints <= this.secondWindThreshold,
        perform: (turnCtx) => this.useSecondWind(turnCtx),
      },
      {
        id: "attack",
        economy: "action",
        perform: (turnCtx) => this.attackAction(turnCtx),
      },
      {
        id: "action-surge",
        economy: "free",
        when: () =>
          this.withinRation(ACTION_SURGE) && offensiveCandidates(ctx, this).length > 0,
        perform: (turnCtx) => {
          if (!this.pool(ACTION_SURGE)?.spend()) {
            return false;
          }
          turnCtx.trace.record({ type: "note", round: turnCtx.round, actor: this.name, message: "uses Action Surge" });
          return this.attackAction(turnCtx);
        },
      },
    ];
  }

  protected attackAction(ctx: CombatContext): boolean {
    let attacked = false;
    for (let i = 0; i < this._attacksPerAction && this.isConscious; i++) {
      const target = chooseTarget(ctx, this);
      if (!target) {
        break;
      }
      makeAttack(ctx, this, target, this._weapon);
      attacked = true;
    }
    return attacked;
  }

  useSecondWind(ctx: CombatContext): boolean {
    const pool = this.pool(SECOND_WIND);
    if (!pool?.spend()) {
      return false;
    }
    heal(ctx, this, this, rollDie(ctx.rng, 10) + this.level, SECOND_WIND);
    return true;
  }

  protected onShortRest(ctx: CombatContext): void {
    if (this.isConscious && this.hitPoints < this.maxHitPoints) {
      this.useSecondWind(ctx);
    }
  }
}

function createGreatsword(enhancement: number): Weapon {
  return createWeapon({
    name: "Greatsword",
    dice: dice(2, 6, 2),
    damageType: enhancement > 0 ? "magic-slashing" : "slashing",
    ability: "str",
    attackBonus: enhancement,
    damageBonus: enhancement,
  });
}
