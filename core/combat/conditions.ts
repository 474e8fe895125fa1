import type { Ability } from "../characters/Abilities";
import type { Combatant } from "../characters/Combatant";
import type { Weapon } from "../characters/Weapon";
import { DiceSpec, dice, rollDice } from "../utils/Dice";
import { applyDamage, damageWithSave, savingThrow } from "./ActionResolution";
import type { CombatContext } from "./CombatContext";
import { Duration } from "./Duration";

export interface SaveToEnd {
  ability: Ability;
  dc: number;
}

export class Prone extends Duration {
  readonly tag = "prone";

  constructor() {
    super(null, null);
  }
}

/** Counts down on the source's turns; a save at the end of each of the bearer's turns may end it early. */
export class Paralyzed extends Duration {
  readonly tag = "paralyzed";
  protected readonly _save: SaveToEnd | null;

  constructor(source: Combatant | null, rounds: number | null, save: SaveToEnd | null) {
    super(source, rounds);
    this._save = save;
  }

  onBearerTurnEnd(ctx: CombatContext): void {
    if (!this._save) {
      return;
    }
    if (savingThrow(ctx, this.bearer, this._save.ability, this._save.dc, { action: "Paralysis" })) {
      this.end(ctx);
    }
  }

  onSourceTurnStart(ctx: CombatContext): void {
    this.tick(ctx);
  }
}

/** Sustained by the caster's concentration. */
export class Blessed extends Duration {
  readonly tag = "blessed";

  constructor(source: Combatant) {
    super(source, null);
  }
}

/** Next attack against the bearer has advantage, until the end of the source's next turn. */
export class GuidingMark extends Duration {
  readonly tag = "guided";

  constructor(source: Combatant) {
    super(source, 2);
  }

  onSourceTurnEnd(ctx: CombatContext): void {
    this.tick(ctx);
  }
}

export class AcidBurn extends Duration {
  readonly tag = "acid-burn";
  protected readonly _dice: DiceSpec;

  constructor(source: Combatant, burn: DiceSpec) {
    super(source, 1);
    this._dice = burn;
  }

  onBearerTurnEnd(ctx: CombatContext): void {
    const amount = rollDice(ctx.rng, this._dice);
    applyDamage(ctx, this.bearer, [{ amount, type: "acid" }], {
      action: "Melf's Acid Arrow",
      dealer: this.source,
    });
    this.end(ctx);
  }
}

/** Ends early when the bearer takes damage. */
export class Turned extends Duration {
  readonly tag = "turned";

  constructor(source: Combatant) {
    super(source, 10);
  }

  onSourceTurnStart(ctx: CombatContext): void {
    this.tick(ctx);
  }
}

export class SpiritGuardiansAura extends Duration {
  readonly tag = "spirit-guardians";
  protected readonly _slot: number;
  protected readonly _dc: number;

  constructor(source: Combatant, slot: number, dc: number) {
    super(source, null);
    this._slot = slot;
    this._dc = dc;
  }

  onBearerTurnStart(ctx: CombatContext): void {
    if (!this.bearer.isConscious) {
      return;
    }
    damageWithSave(ctx, this.source, this.bearer, {
      ability: "wis",
      dc: this._dc,
      packets: [{ amount: rollDice(ctx.rng, dice(this._slot, 8)), type: "radiant" }],
      halfOnSuccess: true,
      action: "Spirit Guardians",
    });
  }
}

/** Carried by the caster; grants a bonus-action attack with the summoned weapon. */
export class SpiritualWeaponSummon extends Duration {
  readonly tag = "spiritual-weapon";
  readonly weapon: Weapon;

  constructor(caster: Combatant, weapon: Weapon) {
    super(caster, 10);
    this.weapon = weapon;
  }

  onBearerTurnStart(ctx: CombatContext): void {
    this.tick(ctx);
  }
}
