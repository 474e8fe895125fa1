import { Ability, DamageType, isPhysicalDamage } from "../characters/Abilities";
import type { Combatant } from "../characters/Combatant";
import type { Weapon } from "../characters/Weapon";
import { DiceSpec, rollD20, rollDice } from "../utils/Dice";
import type { CombatContext } from "./CombatContext";
import type { Duration } from "./Duration";
import type { AttackResultKind } from "./Trace";
import { Prone } from "./conditions";

export interface DamagePacket {
  amount: number;
  type: DamageType;
}

export interface DamageOptions {
  action: string;
  dealer?: Combatant | null;
  /** Attack damage can be halved by Uncanny Dodge. */
  fromAttack?: boolean;
}

export interface DamageOutcome {
  dealt: number;
  /** The hit took the target from above 0 to 0 hit points. */
  dropped: boolean;
}

export interface AttackOptions {
  action?: string;
  advantage?: boolean;
  disadvantage?: boolean;
  /** Extra dice of the weapon's damage type, doubled on a critical hit. */
  extraDice?: DiceSpec[];
  /** Any hit becomes a critical hit (Assassinate). */
  criticalOnHit?: boolean;
}

export interface AttackOutcome extends DamageOutcome {
  result: AttackResultKind;
  natural: number;
  total: number;
}

export interface SaveOptions {
  action: string;
  advantage?: boolean;
  poison?: boolean;
}

export interface SaveForDamage {
  ability: Ability;
  dc: number;
  packets: DamagePacket[];
  /** Success halves the damage; otherwise success negates it. */
  halfOnSuccess: boolean;
  action: string;
  poison?: boolean;
}

export interface SavedDamageOutcome extends DamageOutcome {
  success: boolean;
}

const NO_DAMAGE: DamageOutcome = { dealt: 0, dropped: false };

export function adjustDamage(target: Combatant, amount: number, type: DamageType): number {
  let damage = amount;
  if (target.features.heavyArmorMaster && isPhysicalDamage(type)) {
    damage -= 3;
  }
  if (target.resistances.has(type)) {
    damage = Math.floor(damage / 2);
  }
  if (target.vulnerabilities.has(type)) {
    damage *= 2;
  }
  if (damage <= 0 || target.immunities.has(type)) {
    return 0;
  }
  return damage;
}

export function applyDamage(
  ctx: CombatContext,
  target: Combatant,
  packets: DamagePacket[],
  options: DamageOptions
): DamageOutcome {
  if (!packets.length) {
    return NO_DAMAGE;
  }
  const dealer = options.dealer ?? null;
  let incoming = packets;
  if (options.fromAttack && canUncannyDodge(target, dealer)) {
    target.turn.reaction = false;
    incoming = packets.map((packet) => ({ ...packet, amount: Math.floor(packet.amount / 2) }));
    ctx.trace.record({
      type: "note",
      round: ctx.round,
      actor: target.name,
      message: "halves the damage with Uncanny Dodge",
    });
  }

  const hpBefore = target.hitPoints;
  const total = incoming.reduce((sum, packet) => sum + adjustDamage(target, packet.amount, packet.type), 0);
  target.loseHitPoints(total);
  ctx.trace.record({
    type: "damage",
    round: ctx.round,
    actor: dealer?.name ?? null,
    target: target.name,
    action: options.action,
    amount: total,
    damageTypes: incoming.map((packet) => packet.type),
    hpBefore,
    hpAfter: target.hitPoints,
  });
  if (total <= 0) {
    return NO_DAMAGE;
  }

  if (hpBefore > 0 && target.hitPoints === 0) {
    dropToZero(ctx, target, incoming, total);
  }
  if (target.isConscious && target.concentration) {
    const dc = Math.max(10, Math.floor(total / 2));
    const held = savingThrow(ctx, target, "con", dc, {
      action: "Concentration",
      advantage: target.features.warCaster,
    });
    if (!held) {
      target.endConcentration(ctx);
    }
  }
  target.conditions.endTag("turned", ctx);
  return { dealt: total, dropped: hpBefore > 0 && target.hitPoints === 0 };
}

function canUncannyDodge(target: Combatant, dealer: Combatant | null): boolean {
  return (
    target.features.uncannyDodge &&
    target.turn.reaction &&
    target.isConscious &&
    !target.isIncapacitated &&
    dealer !== null &&
    !dealer.isHiddenFrom(target)
  );
}

function dropToZero(
  ctx: CombatContext,
  target: Combatant,
  packets: DamagePacket[],
  amount: number
): void {
  if (
    target.features.undeadFortitude &&
    !packets.some((packet) => packet.type === "radiant") &&
    savingThrow(ctx, target, "con", 5 + amount, { action: "Undead Fortitude" })
  ) {
    target.setHitPoints(1);
    return;
  }
  if (target.deathWard) {
    target.deathWard = false;
    target.setHitPoints(1);
    ctx.trace.record({
      type: "note",
      round: ctx.round,
      actor: target.name,
      message: "is saved by Death Ward",
    });
    return;
  }
  fallUnconscious(ctx, target);
}

export function fallUnconscious(ctx: CombatContext, target: Combatant): void {
  ctx.trace.record({
    type: "note",
    round: ctx.round,
    actor: target.name,
    message: "falls unconscious",
  });
  if (!target.conditions.has("prone")) {
    applyCondition(ctx, target, new Prone());
  }
  target.endConcentration(ctx);
}

/** Removes every remaining hit point outright (Destroy Undead). */
export function strikeDown(ctx: CombatContext, target: Combatant, action: string, dealer: Combatant): void {
  const hpBefore = target.hitPoints;
  target.loseHitPoints(hpBefore);
  ctx.trace.record({
    type: "damage",
    round: ctx.round,
    actor: dealer.name,
    target: target.name,
    action,
    amount: hpBefore,
    damageTypes: [],
    hpBefore,
    hpAfter: 0,
  });
  if (hpBefore > 0) {
    fallUnconscious(ctx, target);
  }
}

export function savingThrow(
  ctx: CombatContext,
  target: Combatant,
  ability: Ability,
  dc: number,
  options: SaveOptions
): boolean {
  if (target.isIncapacitated && (ability === "str" || ability === "dex")) {
    ctx.trace.record({
      type: "save",
      round: ctx.round,
      actor: target.name,
      action: options.action,
      ability,
      dc,
      rolls: [],
      total: 0,
      success: false,
    });
    return false;
  }
  const advantage =
    Boolean(options.advantage) || (Boolean(options.poison) && target.features.poisonSaveAdvantage);
  const roll = rollD20(ctx.rng, advantage, false);
  const bless = target.conditions.has("blessed") ? ctx.rng.roll(4) : 0;
  const total = roll.natural + target.saveModifier(ability) + bless;
  const success = total >= dc;
  ctx.trace.record({
    type: "save",
    round: ctx.round,
    actor: target.name,
    action: options.action,
    ability,
    dc,
    rolls: roll.rolls,
    total,
    success,
  });
  return success;
}

export function damageWithSave(
  ctx: CombatContext,
  source: Combatant | null,
  target: Combatant,
  effect: SaveForDamage
): SavedDamageOutcome {
  const success = savingThrow(ctx, target, effect.ability, effect.dc, {
    action: effect.action,
    poison: effect.poison,
  });
  const evasion = effect.halfOnSuccess && effect.ability === "dex" && target.features.evasion;
  let factor: number;
  if (success) {
    factor = effect.halfOnSuccess && !evasion ? 0.5 : 0;
  } else {
    factor = evasion ? 0.5 : 1;
  }
  if (factor === 0) {
    return { success, ...NO_DAMAGE };
  }
  const packets = effect.packets.map((packet) => ({
    ...packet,
    amount: Math.floor(packet.amount * factor),
  }));
  const outcome = applyDamage(ctx, target, packets, { action: effect.action, dealer: source });
  return { success, ...outcome };
}

export function attackModifier(attacker: Combatant, weapon: Weapon): number {
  return (
    attacker.abilities[weapon.ability] +
    (weapon.proficient ? attacker.proficiency : 0) +
    weapon.attackBonus
  );
}

export function attackRollModes(
  attacker: Combatant,
  target: Combatant
): { advantage: boolean; disadvantage: boolean } {
  const advantage =
    target.conditions.has("guided") ||
    target.isIncapacitated ||
    target.conditions.has("prone") ||
    attacker.isHiddenFrom(target);
  const disadvantage = attacker.conditions.has("prone") || target.isHiddenFrom(attacker);
  return { advantage, disadvantage };
}

export function rollWeaponDamage(
  ctx: CombatContext,
  attacker: Combatant,
  weapon: Weapon,
  critical: boolean,
  extraDice: DiceSpec[] = []
): DamagePacket[] {
  const repeats = critical ? 2 : 1;
  let amount = weapon.damageBonus + (weapon.addAbilityToDamage ? attacker.abilities[weapon.ability] : 0);
  let secondary = 0;
  for (let i = 0; i < repeats; i++) {
    amount += rollDice(ctx.rng, weapon.dice);
    extraDice.forEach((spec) => {
      amount += rollDice(ctx.rng, spec);
    });
    if (weapon.secondary) {
      secondary += rollDice(ctx.rng, weapon.secondary.dice);
    }
  }
  const packets: DamagePacket[] = [{ amount, type: weapon.damageType }];
  if (weapon.secondary) {
    packets.push({ amount: secondary, type: weapon.secondary.damageType });
  }
  return packets;
}

export function makeAttack(
  ctx: CombatContext,
  attacker: Combatant,
  target: Combatant,
  weapon: Weapon,
  options: AttackOptions = {}
): AttackOutcome {
  const action = options.action ?? weapon.name;
  const modes = attackRollModes(attacker, target);
  target.conditions.endTag("guided", ctx);
  attacker.reveal();

  const roll = rollD20(
    ctx.rng,
    Boolean(options.advantage) || modes.advantage,
    Boolean(options.disadvantage) || modes.disadvantage
  );
  const bless = attacker.conditions.has("blessed") ? ctx.rng.roll(4) : 0;
  const total = roll.natural + attackModifier(attacker, weapon) + bless;

  let result: AttackResultKind = "miss";
  if (roll.natural >= attacker.critThreshold) {
    result = "critical";
  } else if (roll.natural > 1 && total >= target.armorClass) {
    result = target.isIncapacitated || options.criticalOnHit ? "critical" : "hit";
  }
  ctx.trace.record({
    type: "attack",
    round: ctx.round,
    actor: attacker.name,
    action,
    target: target.name,
    rolls: roll.rolls,
    natural: roll.natural,
    total,
    armorClass: target.armorClass,
    result,
  });

  if (result === "miss") {
    return { result, natural: roll.natural, total, ...NO_DAMAGE };
  }
  const packets = rollWeaponDamage(ctx, attacker, weapon, result === "critical", options.extraDice);
  const outcome = applyDamage(ctx, target, packets, { action, dealer: attacker, fromAttack: true });
  return { result, natural: roll.natural, total, ...outcome };
}

export function heal(
  ctx: CombatContext,
  healer: Combatant | null,
  target: Combatant,
  amount: number,
  action: string
): number {
  const hpBefore = target.hitPoints;
  const gained = target.restoreHitPoints(amount);
  ctx.trace.record({
    type: "heal",
    round: ctx.round,
    actor: healer?.name ?? null,
    target: target.name,
    action,
    amount: gained,
    hpBefore,
    hpAfter: target.hitPoints,
  });
  return gained;
}

export function applyCondition(ctx: CombatContext, target: Combatant, effect: Duration): void {
  target.conditions.add(effect);
  ctx.trace.record({
    type: "condition",
    round: ctx.round,
    target: target.name,
    condition: effect.tag,
    change: "applied",
    source: effect.source?.name ?? null,
  });
}
