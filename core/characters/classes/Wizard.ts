import type { CombatContext } from "../../combat/CombatContext";
import {
  AcidSplash,
  Blight,
  BurningHands,
  ChromaticOrb,
  FireBolt,
  Fireball,
  LightningBolt,
  MagicMissile,
  MelfsAcidArrow,
  PoisonSpray,
  ScorchingRay,
  Thunderwave,
  type Spell,
} from "../../combat/spells";
import {
  chooseAreaTargets,
  chooseTarget,
  chooseTargetsWithReplacement,
  offensiveCandidates,
} from "../../combat/Targeting";
import { SpellSlots } from "../../resources/SpellSlots";
import { DamageType, abilityModifiers } from "../Abilities";
import type { Combatant, Tactic } from "../Combatant";
import { Spellcaster } from "../Spellcaster";

const SPELL_SLOTS = "spell slots";
const ARCANE_RECOVERY = "Arcane Recovery";

interface SpellChoice {
  spell: Spell;
  targets: (ctx: CombatContext, slot: number) => Combatant[];
}

/** Evocation wizard; forest gnome who keeps Mage Armor up all day. */
export class Wizard extends Spellcaster {
  readonly className = "Wizard";
  readonly hitDie = 6;
  readonly spellAbility = "int";

  protected configure(): void {
    const level = this.level;
    this.abilities = abilityModifiers({
      str: -1,
      dex: 2,
      con: 2,
      int: 3 + (level >= 4 ? 1 : 0) + (level >= 8 ? 1 : 0),
      wis: 1,
      cha: 0,
    });
    this.armorType = "light";
    this.armorBase = 13;
    this.saveProficiencies.add("int").add("wis");
    this.skillProficiencies.add("perception");
    this.tags.add("gnome");
    this.potentCantrip = level >= 6;
    this.spellAttackBonus = level >= 6 ? 1 : 0;

    this.spellSlots = SpellSlots.forFullCaster(level);
    this.addRation(SPELL_SLOTS, this.spellSlots, "long", "front-loaded");
    this.addPool(ARCANE_RECOVERY, 1, "long");
  }

  protected tactics(_ctx: CombatContext): Tactic[] {
    return [
      {
        id: "leveled-spell",
        economy: "action",
        when: () => this.withinRation(SPELL_SLOTS),
        perform: (ctx) => this.castLeveledSpell(ctx),
      },
      {
        id: "cantrip",
        economy: "action",
        perform: (ctx) => this.castCantrip(ctx),
      },
    ];
  }

  protected castLeveledSpell(ctx: CombatContext): boolean {
    const foes = offensiveCandidates(ctx, this);
    if (!foes.length) {
      return false;
    }
    const visible = offensiveCandidates(ctx, this, { requiresSight: true });
    const immune = (type: DamageType) => foes.some((foe) => foe.immunities.has(type));
    const slots = this.spellSlots;
    const area = (type: DamageType) => (turnCtx: CombatContext) =>
      chooseAreaTargets(turnCtx, this, { damageType: type });
    const single = (type: DamageType) => (turnCtx: CombatContext) => {
      const target = chooseTarget(turnCtx, this, { damageType: type });
      return target ? [target] : [];
    };

    const tiers: Array<{ level: number; choices: SpellChoice[] }> = [
      {
        level: 4,
        choices:
          foes.length === 1 && visible.length > 0 && !immune("necrotic") && !foes.some((foe) => foe.isUndead || foe.construct)
            ? [{ spell: Blight, targets: () => [visible[0]] }]
            : [],
      },
      {
        level: 3,
        choices:
          foes.length > 1
            ? [
                ...(immune("fire") ? [] : [{ spell: Fireball, targets: area("fire") }]),
                ...(immune("lightning") ? [] : [{ spell: LightningBolt, targets: area("lightning") }]),
              ]
            : [],
      },
      {
        level: 2,
        choices: [
          ...(immune("acid") ? [] : [{ spell: MelfsAcidArrow, targets: single("acid") }]),
          ...(immune("fire") ? [] : [{ spell: ScorchingRay, targets: single("fire") }]),
        ],
      },
      {
        level: 1,
        choices:
          foes.length === 1 && visible.length > 0
            ? [
                {
                  spell: ChromaticOrb,
                  targets: (turnCtx: CombatContext) => {
                    const target = chooseTarget(turnCtx, this, { requiresSight: true });
                    return target ? [target] : [];
                  },
                },
              ]
            : [
                ...(immune("fire") ? [] : [{ spell: BurningHands, targets: area("fire") }]),
                ...(immune("force") || !visible.length
                  ? []
                  : [
                      {
                        spell: MagicMissile,
                        targets: (turnCtx: CombatContext, slot: number) =>
                          chooseTargetsWithReplacement(turnCtx, this, slot + 2, {
                            damageType: "force",
                            requiresSight: true,
                          }),
                      },
                    ]),
                ...(immune("thunder") ? [] : [{ spell: Thunderwave, targets: area("thunder") }]),
              ],
      },
    ];

    for (const tier of tiers) {
      const slot = slots.lowestAvailable(tier.level);
      if (slot === null || !tier.choices.length) {
        continue;
      }
      const choice = ctx.rng.pick(tier.choices);
      const targets = choice.targets(ctx, slot);
      if (targets.length && this.castSpell(ctx, choice.spell, slot, targets)) {
        return true;
      }
    }
    return false;
  }

  protected castCantrip(ctx: CombatContext): boolean {
    const visible = offensiveCandidates(ctx, this, { requiresSight: true });
    const choices: SpellChoice[] = [];
    if (visible.length) {
      if (!visible.some((foe) => foe.immunities.has("acid"))) {
        choices.push({
          spell: AcidSplash,
          targets: (turnCtx) => chooseAreaTargets(turnCtx, this, { damageType: "acid", requiresSight: true }),
        });
      }
      if (!visible.some((foe) => foe.immunities.has("poison"))) {
        choices.push({
          spell: PoisonSpray,
          targets: (turnCtx) => {
            const target = chooseTarget(turnCtx, this, { damageType: "poison", requiresSight: true });
            return target ? [target] : [];
          },
        });
      }
    }
    const fireBolt: SpellChoice = {
      spell: FireBolt,
      targets: (turnCtx) => {
        const target = chooseTarget(turnCtx, this, { damageType: "fire" }) ?? chooseTarget(turnCtx, this);
        return target ? [target] : [];
      },
    };
    if (!offensiveCandidates(ctx, this).some((foe) => foe.immunities.has("fire")) || !choices.length) {
      choices.push(fireBolt);
    }
    const choice = ctx.rng.pick(choices);
    const targets = choice.targets(ctx, 0);
    if (!targets.length) {
      return false;
    }
    return this.castSpell(ctx, choice.spell, 0, targets);
  }

  protected onShortRest(ctx: CombatContext): void {
    const recovery = this.pool(ARCANE_RECOVERY);
    if (!this.isConscious || !recovery || recovery.isEmpty) {
      return;
    }
    if (this.spellSlots.remaining === this.totalSpellSlots()) {
      return;
    }
    recovery.spend();
    const recovered = this.spellSlots.recover(Math.ceil(this.level / 2));
    ctx.trace.record({
      type: "note",
      round: ctx.round,
      actor: this.name,
      message: `uses Arcane Recovery (levels ${recovered.join(", ") || "none"})`,
    });
  }

  protected totalSpellSlots(): number {
    return SpellSlots.forFullCaster(this.level).remaining;
  }
}
