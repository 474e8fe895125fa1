import type { CombatContext } from "../combat/CombatContext";
import { Concentration } from "../combat/Duration";
import type { Combatant } from "./Combatant";
import type { Spell } from "../combat/spells";
import { SpellSlots } from "../resources/SpellSlots";
import type { DiceSpec } from "../utils/Dice";
import type { Ability, DamageType } from "./Abilities";
import { PlayerCharacter } from "./PlayerCharacter";
import { Weapon, createWeapon } from "./Weapon";

export abstract class Spellcaster extends PlayerCharacter {
  abstract readonly spellAbility: Ability;

  spellSlots = new SpellSlots([]);
  spellAttackBonus = 0;
  /** Save-based cantrips deal half damage on a successful save. */
  potentCantrip = false;

  get spellSaveDC(): number {
    return 8 + this.proficiency + this.abilities[this.spellAbility];
  }

  get cantripDice(): number {
    return this.level >= 5 ? 2 : 1;
  }

  spellAttack(name: string, damage: DiceSpec, damageType: DamageType): Weapon {
    return createWeapon({
      name,
      dice: damage,
      damageType,
      ability: this.spellAbility,
      ranged: true,
      addAbilityToDamage: false,
      attackBonus: this.spellAttackBonus,
    });
  }

  /** Extra hit points restored by healing spells cast with `slot`. */
  healingBonus(_slot: number): number {
    return 0;
  }

  /** Runs once per healing spell that restores another creature. */
  afterHealingOthers(_ctx: CombatContext, _slot: number): void {}

  castSpell(ctx: CombatContext, spell: Spell, slot: number, targets: Combatant[]): boolean {
    if (spell.level > 0) {
      if (slot < spell.level || !this.spellSlots.spend(slot)) {
        return false;
      }
      this.turn.leveledSpellCast = true;
      ctx.trace.record({
        type: "resource",
        round: ctx.round,
        actor: this.name,
        resource: "spell slots",
        remaining: this.spellSlots.remaining,
      });
    }
    ctx.trace.record({
      type: "note",
      round: ctx.round,
      actor: this.name,
      message:
        spell.level > 0 ? `casts ${spell.name} at level ${slot}` : `casts ${spell.name}`,
    });
    let concentration: Concentration | null = null;
    if (spell.concentrationRounds) {
      concentration = new Concentration(spell.name, spell.concentrationRounds);
      this.concentrate(ctx, concentration);
    }
    const effects = spell.cast(ctx, this, slot, targets);
    if (concentration) {
      for (const effect of effects) {
        concentration.link(effect);
      }
    }
    return true;
  }

  protected onLongRest(): void {
    this.spellSlots.refill();
  }
}
