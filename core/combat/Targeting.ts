import type { DamageType } from "../characters/Abilities";
import type { Combatant } from "../characters/Combatant";
import type { CombatContext } from "./CombatContext";

export const AREA_TARGET_LIMIT = 2;

export interface TargetFilter {
  /** Candidates immune to this type are left out. */
  damageType?: DamageType;
  /** Candidates hidden from the chooser are left out. */
  requiresSight?: boolean;
  where?: (candidate: Combatant) => boolean;
}

export function offensiveCandidates(
  ctx: CombatContext,
  chooser: Combatant,
  filter: TargetFilter = {}
): Combatant[] {
  return ctx.foesOf(chooser).filter((foe) => {
    if (!foe.isConscious) {
      return false;
    }
    if (filter.damageType && foe.immunities.has(filter.damageType)) {
      return false;
    }
    if (filter.requiresSight && foe.isHiddenFrom(chooser)) {
      return false;
    }
    return filter.where ? filter.where(foe) : true;
  });
}

export function chooseTarget(
  ctx: CombatContext,
  chooser: Combatant,
  filter: TargetFilter = {}
): Combatant | null {
  const candidates = offensiveCandidates(ctx, chooser, filter);
  if (!candidates.length) {
    return null;
  }
  return ctx.rng.pick(candidates);
}

/** Distinct targets, or every candidate when there are no more than `count`. */
export function chooseTargets(
  ctx: CombatContext,
  chooser: Combatant,
  count: number,
  filter: TargetFilter = {}
): Combatant[] {
  const candidates = offensiveCandidates(ctx, chooser, filter);
  if (candidates.length <= count) {
    return candidates;
  }
  return ctx.rng.sample(candidates, count);
}

export function chooseAreaTargets(
  ctx: CombatContext,
  chooser: Combatant,
  filter: TargetFilter = {}
): Combatant[] {
  return chooseTargets(ctx, chooser, AREA_TARGET_LIMIT, filter);
}

/** Independent picks that may repeat a target (Magic Missile darts). */
export function chooseTargetsWithReplacement(
  ctx: CombatContext,
  chooser: Combatant,
  count: number,
  filter: TargetFilter = {}
): Combatant[] {
  const candidates = offensiveCandidates(ctx, chooser, filter);
  if (!candidates.length) {
    return [];
  }
  return Array.from({ length: count }, () => ctx.rng.pick(candidates));
}

export function unconsciousAllies(ctx: CombatContext, chooser: Combatant): Combatant[] {
  return ctx.alliesOf(chooser).filter((ally) => !ally.isConscious && ally.maxHitPoints > 0);
}

/**
 * Up to `count` allies, unconscious ones first, then wounded or otherwise
 * eligible conscious ones at random.
 */
export function chooseSupportTargets(
  ctx: CombatContext,
  chooser: Combatant,
  count: number,
  eligible: (ally: Combatant) => boolean
): Combatant[] {
  const pool = ctx.alliesOf(chooser).filter((ally) => ally.maxHitPoints > 0 && eligible(ally));
  if (pool.length <= count) {
    return pool;
  }
  const down = pool.filter((ally) => !ally.isConscious);
  if (down.length >= count) {
    return ctx.rng.sample(down, count);
  }
  const standing = pool.filter((ally) => ally.isConscious);
  return [...down, ...ctx.rng.sample(standing, count - down.length)];
}
