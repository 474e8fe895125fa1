import type { Combatant } from "../characters/Combatant";
import { InvariantViolation } from "../errors";
import type { CombatContext } from "./CombatContext";

export type ConditionTag =
  | "paralyzed"
  | "prone"
  | "blessed"
  | "guided"
  | "acid-burn"
  | "turned"
  | "spirit-guardians"
  | "spiritual-weapon";

/**
 * A timed or triggered effect carried in a bearer's condition set.
 *
 * `remainingRounds` is null for effects that last until removed or until the
 * encounter ends. Subclasses decide which turn boundary counts a round down.
 */
export abstract class Duration {
  abstract readonly tag: ConditionTag;
  readonly source: Combatant | null;

  protected _remaining: number | null;
  protected _bearer: Combatant | null = null;
  protected _ended = false;

  constructor(source: Combatant | null, rounds: number | null) {
    this.source = source;
    this._remaining = rounds;
  }

  get bearer(): Combatant {
    if (!this._bearer) {
      throw new InvariantViolation(`Duration '${this.tag}' has no bearer`);
    }
    return this._bearer;
  }

  get remainingRounds(): number | null {
    return this._remaining;
  }

  get ended(): boolean {
    return this._ended;
  }

  attach(bearer: Combatant): void {
    this._bearer = bearer;
  }

  tick(ctx: CombatContext): void {
    if (this._remaining === null || this._ended) {
      return;
    }
    this._remaining -= 1;
    if (this._remaining <= 0) {
      this.end(ctx);
    }
  }

  end(ctx: CombatContext | null): void {
    if (this._ended) {
      return;
    }
    this._ended = true;
    const bearer = this.bearer;
    bearer.conditions.remove(this);
    ctx?.trace.record({
      type: "condition",
      round: ctx.round,
      target: bearer.name,
      condition: this.tag,
      change: "removed",
      source: this.source?.name ?? null,
    });
    this.onEnd(ctx);
  }

  /** Discards the effect without firing end behavior, as at an encounter boundary. */
  discard(): void {
    this._ended = true;
  }

  protected onEnd(_ctx: CombatContext | null): void {}

  onBearerTurnStart(_ctx: CombatContext): void {}

  onBearerTurnEnd(_ctx: CombatContext): void {}

  onSourceTurnStart(_ctx: CombatContext): void {}

  onSourceTurnEnd(_ctx: CombatContext): void {}
}

export class ConditionSet {
  protected readonly _owner: Combatant;
  protected _effects: Duration[] = [];

  constructor(owner: Combatant) {
    this._owner = owner;
  }

  add(effect: Duration): void {
    effect.attach(this._owner);
    this._effects.push(effect);
  }

  remove(effect: Duration): void {
    this._effects = this._effects.filter((entry) => entry !== effect);
  }

  has(tag: ConditionTag): boolean {
    return this._effects.some((effect) => effect.tag === tag);
  }

  find(tag: ConditionTag): Duration | undefined {
    return this._effects.find((effect) => effect.tag === tag);
  }

  ofTag(tag: ConditionTag): Duration[] {
    return this._effects.filter((effect) => effect.tag === tag);
  }

  sourcedBy(source: Combatant): Duration[] {
    return this._effects.filter((effect) => effect.source === source);
  }

  /** Snapshot safe to iterate while hooks end effects. */
  all(): Duration[] {
    return [...this._effects];
  }

  endTag(tag: ConditionTag, ctx: CombatContext | null): void {
    this.ofTag(tag).forEach((effect) => effect.end(ctx));
  }

  clear(): void {
    this._effects.forEach((effect) => effect.discard());
    this._effects = [];
  }

  get size(): number {
    return this._effects.length;
  }
}

/** A concentration spell held by its caster, with the effects it sustains. */
export class Concentration {
  readonly spell: string;
  protected _remaining: number;
  protected readonly _effects: Duration[] = [];

  constructor(spell: string, rounds: number) {
    this.spell = spell;
    this._remaining = rounds;
  }

  get remainingRounds(): number {
    return this._remaining;
  }

  get effects(): readonly Duration[] {
    return this._effects;
  }

  link(effect: Duration): void {
    this._effects.push(effect);
  }

  /** Returns true once the spell has run its course. */
  countDown(): boolean {
    this._remaining -= 1;
    return this._remaining <= 0;
  }

  release(ctx: CombatContext | null): void {
    this._effects.forEach((effect) => effect.end(ctx));
  }
}
