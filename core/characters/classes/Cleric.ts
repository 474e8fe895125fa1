import type { CombatContext, EncounterView } from "../../combat/CombatContext";
import { applyCondition, heal, makeAttack, savingThrow, strikeDown } from "../../combat/ActionResolution";
import { SpiritualWeaponSummon, Turned } from "../../combat/conditions";
import {
  Aid,
  Bless,
  CureWounds,
  GuidingBolt,
  HealingWord,
  MassHealingWord,
  PrayerOfHealing,
  SacredFlame,
  SpiritGuardians,
  SpiritualWeapon,
  type Spell,
} from "../../combat/spells";
import {
  chooseSupportTargets,
  chooseTarget,
  chooseTargets,
  offensiveCandidates,
  unconsciousAllies,
} from "../../combat/Targeting";
import { SpellSlots } from "../../resources/SpellSlots";
import { dice } from "../../utils/Dice";
import { abilityModifiers } from "../Abilities";
import type { Combatant, Tactic } from "../Combatant";
import { Spellcaster } from "../Spellcaster";
import { Weapon, createWeapon } from "../Weapon";

const SPELL_SLOTS = "spell slots";
const CHANNEL_DIVINITY = "Channel Divinity";
const PRIORITY = "priority";

/** Life Domain cleric with a mace, heavy armor and a healer's priorities. */
export class Cleric extends Spellcaster {
  readonly className = "Cleric";
  readonly hitDie = 8;
  readonly spellAbility = "wis";

  protected _weapon: Weapon = createMace(1);
  /** Highest undead rating destroyed outright by Turn Undead. */
  protected _destroyUndead = -1;

  protected configure(): void {
    const level = this.level;
    this.abilities = abilityModifiers({
      str: 2 + (level >= 4 ? 1 : 0),
      dex: -1,
      con: 2,
      int: 0,
      wis: 3 + (level >= 8 ? 1 : 0),
      cha: 1,
    });
    this.armorType = "heavy";
    this.armorBase = level >= 5 ? 20 : 18;
    this.saveProficiencies.add("wis").add("cha");
    this.skillProficiencies.add("perception");
    this.features.warCaster = true;
    this._weapon = createMace(level);
    this._destroyUndead = level >= 8 ? 1 : level >= 5 ? 0.5 : -1;

    this.spellSlots = SpellSlots.forFullCaster(level);
    this.addRation(SPELL_SLOTS, this.spellSlots, "long", "back-loaded");
    const channel = this.addPool(CHANNEL_DIVINITY, level >= 6 ? 2 : level >= 2 ? 1 : 0, "short");
    this.addRation(CHANNEL_DIVINITY, channel, "short", "back-loaded");
  }

  get weapon(): Weapon {
    return this._weapon;
  }

  /** Disciple of Life. */
  healingBonus(slot: number): number {
    return 2 + slot;
  }

  /** Blessed Healer. */
  afterHealingOthers(ctx: CombatContext, slot: number): void {
    if (this.level >= 6) {
      heal(ctx, this, this, 2 + slot, "Blessed Healer");
    }
  }

  protected onLongRest(): void {
    super.onLongRest();
    if (this.level >= 7 && this.spellSlots.spend(4)) {
      this.deathWard = true;
    }
  }

  protected tactics(ctx: CombatContext): Tactic[] {
    const foes = offensiveCandidates(ctx, this);
    const down = unconsciousAllies(ctx, this);
    const radiantProof = foes.some((foe) => foe.immunities.has("radiant"));
    const forceProof = foes.some((foe) => foe.immunities.has("force"));
    const slots = this.spellSlots;
    const rationed = () => this.withinRation(SPELL_SLOTS);

    return [
      {
        id: "mass-healing-word",
        economy: "bonus",
        group: PRIORITY,
        when: () => down.length > 1 && slots.lowestAvailable(3) !== null,
        perform: (turnCtx) =>
          this.castLowest(
            turnCtx,
            MassHealingWord,
            chooseSupportTargets(turnCtx, this, 6, (ally) => ally.hitPoints < ally.maxHitPoints)
          ),
      },
      {
        id: "aid",
        economy: "action",
        group: PRIORITY,
        when: () =>
          down.filter((ally) => ally.aidBonus === 0).length > 1 && slots.lowestAvailable(2) !== null,
        perform: (turnCtx) =>
          this.castLowest(turnCtx, Aid, chooseSupportTargets(turnCtx, this, 3, (ally) => ally.aidBonus === 0)),
      },
      {
        id: "healing-word",
        economy: "bonus",
        group: PRIORITY,
        when: () => down.length > 0 && slots.lowestAvailable(1) !== null,
        perform: (turnCtx) => this.castLowest(turnCtx, HealingWord, [turnCtx.rng.pick(down)]),
      },
      {
        id: "healing-word-self",
        economy: "bonus",
        group: PRIORITY,
        when: () => this.hitPoints <= Math.floor(this.maxHitPoints / 4) && slots.lowestAvailable(1) !== null,
        perform: (turnCtx) => this.castLowest(turnCtx, HealingWord, [this]),
      },
      {
        id: "turn-undead",
        economy: "action",
        group: PRIORITY,
        when: () =>
          foes.filter((foe) => foe.isUndead).length > 1 && this.withinRation(CHANNEL_DIVINITY),
        perform: (turnCtx) => this.turnUndead(turnCtx),
      },
      {
        id: "spirit-guardians",
        economy: "action",
        group: PRIORITY,
        when: () =>
          rationed() &&
          !radiantProof &&
          this.concentration === null &&
          slots.lowestAvailable(3) !== null &&
          foes.filter((foe) => !foe.conditions.has("spirit-guardians")).length > 1,
        perform: (turnCtx) =>
          this.castLowest(
            turnCtx,
            SpiritGuardians,
            chooseTargets(turnCtx, this, 2, { where: (foe) => !foe.conditions.has("spirit-guardians") })
          ),
      },
      {
        id: "spiritual-weapon",
        economy: "bonus",
        group: PRIORITY,
        when: () =>
          rationed() &&
          !forceProof &&
          !this.conditions.has("spiritual-weapon") &&
          slots.lowestAvailable(2) !== null,
        perform: (turnCtx) => {
          const target = chooseTarget(turnCtx, this, { damageType: "force" });
          return target ? this.castLowest(turnCtx, SpiritualWeapon, [target]) : false;
        },
      },
      {
        id: "bless",
        economy: "action",
        group: PRIORITY,
        when: () =>
          rationed() &&
          this.concentration === null &&
          slots.lowestAvailable(1) === 1 &&
          ctx.alliesOf(this).filter((ally) => !ally.conditions.has("blessed")).length >= 3,
        perform: (turnCtx) =>
          this.castLowest(
            turnCtx,
            Bless,
            chooseSupportTargets(turnCtx, this, 3, (ally) => !ally.conditions.has("blessed"))
          ),
      },
      {
        id: "guiding-bolt",
        economy: "action",
        group: PRIORITY,
        when: () => rationed() && !radiantProof && slots.lowestAvailable(1) !== null,
        perform: (turnCtx) => {
          const target = chooseTarget(turnCtx, this);
          return target ? this.castLowest(turnCtx, GuidingBolt, [target]) : false;
        },
      },
      {
        id: "spiritual-weapon-attack",
        economy: "bonus",
        when: () => this.conditions.has("spiritual-weapon"),
        perform: (turnCtx) => this.spiritualWeaponAttack(turnCtx),
      },
      {
        id: "mace-or-sacred-flame",
        economy: "action",
        perform: (turnCtx) => {
          const target = chooseTarget(turnCtx, this);
          if (!target) {
            return false;
          }
          if (
            target.immunities.has("radiant") ||
            target.isHiddenFrom(this) ||
            turnCtx.rng.chance(0.5)
          ) {
            makeAttack(turnCtx, this, target, this._weapon);
            return true;
          }
          return this.castSpell(turnCtx, SacredFlame, 0, [target]);
        },
      },
    ];
  }

  protected castLowest(
    ctx: CombatContext,
    spell: Spell,
    targets: Combatant[]
  ): boolean {
    const slot = this.spellSlots.lowestAvailable(spell.level);
    if (slot === null || !targets.length) {
      return false;
    }
    return this.castSpell(ctx, spell, slot, targets);
  }

  protected spiritualWeaponAttack(ctx: CombatContext): boolean {
    const summon = this.conditions.find("spiritual-weapon");
    if (!(summon instanceof SpiritualWeaponSummon)) {
      return false;
    }
    const target = chooseTarget(ctx, this, { damageType: "force" });
    if (!target) {
      return false;
    }
    makeAttack(ctx, this, target, summon.weapon);
    return true;
  }

  protected turnUndead(ctx: CombatContext): boolean {
    const targets = chooseTargets(ctx, this, 2, { where: (foe) => foe.isUndead });
    if (!targets.length || !this.pool(CHANNEL_DIVINITY)?.spend()) {
      return false;
    }
    ctx.trace.record({ type: "note", round: ctx.round, actor: this.name, message: "uses Turn Undead" });
    targets.forEach((target) => {
      if (savingThrow(ctx, target, "wis", this.spellSaveDC, { action: "Turn Undead" })) {
        return;
      }
      if ((target.undeadRating ?? Infinity) <= this._destroyUndead) {
        strikeDown(ctx, target, "Destroy Undead", this);
      } else {
        applyCondition(ctx, target, new Turned(this));
      }
    });
    return true;
  }

  /** Fills the most wounded allies up to half their maximum, lowest first. */
  preserveLife(ctx: CombatContext): boolean {
    const wounded = ctx
      .alliesOf(this)
      .filter((ally) => ally.maxHitPoints > 0 && ally.hitPoints <= Math.floor(ally.maxHitPoints / 2))
      .sort((a, b) => a.hitPoints - b.hitPoints);
    if (!wounded.length || !this.pool(CHANNEL_DIVINITY)?.spend()) {
      return false;
    }
    let budget = 5 * this.level;
    for (const ally of wounded) {
      if (budget <= 0) {
        break;
      }
      const amount = Math.min(budget, Math.floor(ally.maxHitPoints / 2) - ally.hitPoints);
      if (amount > 0) {
        budget -= heal(ctx, this, ally, amount, "Preserve Life");
      }
    }
    return true;
  }

  endEncounter(encounter: EncounterView): void {
    if (this.withinRation(CHANNEL_DIVINITY)) {
      this.preserveLife(encounter);
    }
    this.reviveAllies(encounter, false);
  }

  endOfDay(ctx: CombatContext): void {
    if (this.isConscious) {
      this.reviveAllies(ctx, true);
    }
  }

  /**
   * Revives unconscious allies after a fight: Cure Wounds each when slots
   * allow, otherwise one Prayer of Healing, otherwise as many Cure Wounds as
   * possible. At the end of the day every remaining slot may go to Cure Wounds.
   */
  protected reviveAllies(ctx: CombatContext, spendAll: boolean): void {
    const down = unconsciousAllies(ctx, this);
    if (!down.length) {
      return;
    }
    const slots = this.spellSlots;
    if (!spendAll && slots.remaining < down.length) {
      const prayerSlot = slots.lowestAvailable(2);
      if (prayerSlot !== null) {
        this.castSpell(
          ctx,
          PrayerOfHealing,
          prayerSlot,
          chooseSupportTargets(ctx, this, 6, (ally) => ally.hitPoints < ally.maxHitPoints)
        );
        return;
      }
    }
    for (const ally of down) {
      if (!this.castLowest(ctx, CureWounds, [ally])) {
        break;
      }
    }
  }
}

function createMace(level: number): Weapon {
  const enhancement = level >= 6 ? 1 : 0;
  return createWeapon({
    name: "Mace",
    dice: dice(1, 6),
    damageType: enhancement > 0 ? "magic-bludgeoning" : "bludgeoning",
    ability: "str",
    attackBonus: enhancement,
    damageBonus: enhancement,
    secondary: level >= 8 ? { dice: dice(1, 8), damageType: "radiant" } : undefined,
  });
}
