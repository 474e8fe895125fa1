import type { Ability, DamageType } from "../characters/Abilities";
import type { Combatant } from "../characters/Combatant";
import type { Spellcaster } from "../characters/Spellcaster";
import { DiceSpec, dice, rollDice } from "../utils/Dice";
import {
  DamagePacket,
  applyCondition,
  applyDamage,
  damageWithSave,
  heal,
  makeAttack,
} from "./ActionResolution";
import type { CombatContext } from "./CombatContext";
import type { Duration } from "./Duration";
import { AcidBurn, Blessed, GuidingMark, SpiritGuardiansAura, SpiritualWeaponSummon } from "./conditions";
import { chooseTarget } from "./Targeting";

/** Stateless template shared by every caster; effects sustained by concentration are returned. */
export interface Spell {
  readonly name: string;
  readonly level: number;
  readonly concentrationRounds?: number;
  cast(ctx: CombatContext, caster: Spellcaster, slot: number, targets: Combatant[]): Duration[];
}

const NO_EFFECTS: Duration[] = [];

function healingSpell(name: string, level: number, sides: number, diceForSlot: (slot: number) => number): Spell {
  return {
    name,
    level,
    cast(ctx, caster, slot, targets) {
      targets.forEach((target) => {
        const amount =
          rollDice(ctx.rng, dice(diceForSlot(slot), sides)) +
          caster.abilities[caster.spellAbility] +
          caster.healingBonus(slot);
        heal(ctx, caster, target, amount, name);
      });
      if (targets.some((target) => target !== caster)) {
        caster.afterHealingOthers(ctx, slot);
      }
      return NO_EFFECTS;
    },
  };
}

function areaSaveSpell(
  name: string,
  level: number,
  ability: Ability,
  damageType: DamageType,
  damageForSlot: (slot: number) => DiceSpec
): Spell {
  return {
    name,
    level,
    cast(ctx, caster, slot, targets) {
      const amount = rollDice(ctx.rng, damageForSlot(slot));
      targets.forEach((target) => {
        damageWithSave(ctx, caster, target, {
          ability,
          dc: caster.spellSaveDC,
          packets: [{ amount, type: damageType }],
          halfOnSuccess: true,
          action: name,
        });
      });
      return NO_EFFECTS;
    },
  };
}

function saveCantrip(name: string, ability: Ability, sides: number, damageType: DamageType): Spell {
  return {
    name,
    level: 0,
    cast(ctx, caster, _slot, targets) {
      targets.forEach((target) => {
        const packets: DamagePacket[] = [
          { amount: rollDice(ctx.rng, dice(caster.cantripDice, sides)), type: damageType },
        ];
        damageWithSave(ctx, caster, target, {
          ability,
          dc: caster.spellSaveDC,
          packets,
          halfOnSuccess: caster.potentCantrip,
          action: name,
          poison: damageType === "poison",
        });
      });
      return NO_EFFECTS;
    },
  };
}

function attackSpell(
  name: string,
  level: number,
  damageType: DamageType,
  damageForSlot: (caster: Spellcaster, slot: number) => DiceSpec
): Spell {
  return {
    name,
    level,
    cast(ctx, caster, slot, targets) {
      const weapon = caster.spellAttack(name, damageForSlot(caster, slot), damageType);
      targets.forEach((target) => {
        makeAttack(ctx, caster, target, weapon);
      });
      return NO_EFFECTS;
    },
  };
}

export const SacredFlame = saveCantrip("Sacred Flame", "dex", 8, "radiant");

export const AcidSplash = saveCantrip("Acid Splash", "dex", 6, "acid");

export const PoisonSpray = saveCantrip("Poison Spray", "con", 12, "poison");

export const FireBolt = attackSpell("Fire Bolt", 0, "fire", (caster) => dice(caster.cantripDice, 10));

export const CureWounds = healingSpell("Cure Wounds", 1, 8, (slot) => slot);

export const HealingWord = healingSpell("Healing Word", 1, 4, (slot) => slot);

export const PrayerOfHealing = healingSpell("Prayer of Healing", 2, 8, (slot) => slot);

export const MassHealingWord = healingSpell("Mass Healing Word", 3, 4, (slot) => slot - 2);

export const Bless: Spell = {
  name: "Bless",
  level: 1,
  concentrationRounds: 10,
  cast(ctx, caster, _slot, targets) {
    return targets.map((target) => {
      const blessing = new Blessed(caster);
      applyCondition(ctx, target, blessing);
      return blessing;
    });
  },
};

export const GuidingBolt: Spell = {
  name: "Guiding Bolt",
  level: 1,
  cast(ctx, caster, slot, targets) {
    const weapon = caster.spellAttack("Guiding Bolt", dice(3 + slot, 6), "radiant");
    targets.forEach((target) => {
      const outcome = makeAttack(ctx, caster, target, weapon);
      if (outcome.result !== "miss" && target.isConscious) {
        applyCondition(ctx, target, new GuidingMark(caster));
      }
    });
    return NO_EFFECTS;
  },
};

export const Aid: Spell = {
  name: "Aid",
  level: 2,
  cast(ctx, caster, slot, targets) {
    const bonus = 5 * (slot - 1);
    targets.forEach((target) => {
      const hpBefore = target.hitPoints;
      target.aidBonus += bonus;
      target.adjustMaxHitPoints(bonus);
      ctx.trace.record({
        type: "heal",
        round: ctx.round,
        actor: caster.name,
        target: target.name,
        action: "Aid",
        amount: target.hitPoints - hpBefore,
        hpBefore,
        hpAfter: target.hitPoints,
      });
    });
    return NO_EFFECTS;
  },
};

/** Summons the weapon and strikes at once with it. */
export const SpiritualWeapon: Spell = {
  name: "Spiritual Weapon",
  level: 2,
  cast(ctx, caster, slot, targets) {
    caster.conditions.endTag("spiritual-weapon", ctx);
    const weapon = caster.spellAttack("Spiritual Weapon", dice(Math.floor(slot / 2), 8), "force");
    applyCondition(ctx, caster, new SpiritualWeaponSummon(caster, weapon));
    const target = targets[0] ?? chooseTarget(ctx, caster, { damageType: "force" });
    if (target) {
      makeAttack(ctx, caster, target, weapon);
    }
    return NO_EFFECTS;
  },
};

export const SpiritGuardians: Spell = {
  name: "Spirit Guardians",
  level: 3,
  concentrationRounds: 100,
  cast(ctx, caster, slot, targets) {
    return targets.map((target) => {
      const aura = new SpiritGuardiansAura(caster, slot, caster.spellSaveDC);
      applyCondition(ctx, target, aura);
      return aura;
    });
  },
};

export const BurningHands = areaSaveSpell("Burning Hands", 1, "dex", "fire", (slot) => dice(2 + slot, 6));

export const Thunderwave = areaSaveSpell("Thunderwave", 1, "con", "thunder", (slot) => dice(1 + slot, 8));

export const Fireball = areaSaveSpell("Fireball", 3, "dex", "fire", (slot) => dice(5 + slot, 6));

export const LightningBolt = areaSaveSpell("Lightning Bolt", 3, "dex", "lightning", (slot) => dice(5 + slot, 6));

export const Blight: Spell = {
  name: "Blight",
  level: 4,
  cast(ctx, caster, slot, targets) {
    targets.forEach((target) => {
      damageWithSave(ctx, caster, target, {
        ability: "con",
        dc: caster.spellSaveDC,
        packets: [{ amount: rollDice(ctx.rng, dice(4 + slot, 8)), type: "necrotic" }],
        halfOnSuccess: true,
        action: "Blight",
      });
    });
    return NO_EFFECTS;
  },
};

/** Cold unless the target shrugs off cold, then thunder. */
export const ChromaticOrb: Spell = {
  name: "Chromatic Orb",
  level: 1,
  cast(ctx, caster, slot, targets) {
    targets.forEach((target) => {
      const damageType: DamageType = target.immunities.has("cold") ? "thunder" : "cold";
      makeAttack(ctx, caster, target, caster.spellAttack("Chromatic Orb", dice(2 + slot, 8), damageType));
    });
    return NO_EFFECTS;
  },
};

/** One target per dart; all darts share a single damage roll. */
export const MagicMissile: Spell = {
  name: "Magic Missile",
  level: 1,
  cast(ctx, caster, _slot, targets) {
    const amount = ctx.rng.roll(4) + 1;
    targets.forEach((target) => {
      applyDamage(ctx, target, [{ amount, type: "force" }], { action: "Magic Missile", dealer: caster });
    });
    return NO_EFFECTS;
  },
};

export const MelfsAcidArrow: Spell = {
  name: "Melf's Acid Arrow",
  level: 2,
  cast(ctx, caster, slot, targets) {
    const damage = dice(2 + slot, 4);
    const weapon = caster.spellAttack("Melf's Acid Arrow", damage, "acid");
    targets.forEach((target) => {
      const outcome = makeAttack(ctx, caster, target, weapon);
      if (outcome.result === "miss") {
        const half = Math.floor(rollDice(ctx.rng, damage) / 2);
        applyDamage(ctx, target, [{ amount: half, type: "acid" }], {
          action: "Melf's Acid Arrow",
          dealer: caster,
        });
      } else if (target.isConscious) {
        applyCondition(ctx, target, new AcidBurn(caster, dice(slot, 4)));
      }
    });
    return NO_EFFECTS;
  },
};

/** Each ray after the first picks its target once the previous ray has resolved. */
export const ScorchingRay: Spell = {
  name: "Scorching Ray",
  level: 2,
  cast(ctx, caster, slot, targets) {
    const weapon = caster.spellAttack("Scorching Ray", dice(2, 6), "fire");
    let target: Combatant | null = targets[0] ?? null;
    for (let ray = 0; ray < slot + 1; ray++) {
      if (!target) {
        break;
      }
      makeAttack(ctx, caster, target, weapon);
      target = chooseTarget(ctx, caster, { damageType: "fire" });
    }
    return NO_EFFECTS;
  },
};
