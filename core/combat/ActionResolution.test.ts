import { describe, expect, it } from "vitest";
import { createWeapon } from "../characters/Weapon";
import { Dummy, createTestContext } from "../test-helpers/fixtures";
import { ScriptedRandom } from "../test-helpers/ScriptedRandom";
import { dice } from "../utils/Dice";
import {
  adjustDamage,
  applyDamage,
  damageWithSave,
  makeAttack,
  savingThrow,
} from "./ActionResolution";
import { Blessed, Paralyzed } from "./conditions";
import { Concentration } from "./Duration";

const longsword = createWeapon({ name: "Longsword", dice: dice(1, 8), damageType: "slashing", ability: "str" });

function duel(faces: number[]) {
  const attacker = new Dummy("Hero", "players");
  attacker.abilities.str = 3;
  const target = new Dummy("Orc1", "monsters", 20);
  target.armorBase = 15;
  const ctx = createTestContext({ rng: new ScriptedRandom(faces), players: [attacker], monsters: [target] });
  return { attacker, target, ctx };
}

describe("makeAttack", () => {
  it("hits when the total meets armor class", () => {
    const { attacker, target, ctx } = duel([12, 5]);
    const outcome = makeAttack(ctx, attacker, target, longsword);
    expect(outcome.result).toBe("hit");
    expect(outcome.total).toBe(17);
    expect(outcome.dealt).toBe(8);
    expect(target.hitPoints).toBe(12);
  });

  it("misses on a natural 1", () => {
    const { attacker, target, ctx } = duel([1]);
    expect(makeAttack(ctx, attacker, target, longsword).result).toBe("miss");
    expect(target.hitPoints).toBe(20);
  });

  it("doubles the dice on a natural 20", () => {
    const { attacker, target, ctx } = duel([20, 4, 6]);
    const outcome = makeAttack(ctx, attacker, target, longsword);
    expect(outcome.result).toBe("critical");
    expect(outcome.dealt).toBe(13);
    expect(target.hitPoints).toBe(7);
  });

  it("turns any hit on a paralyzed target into a critical", () => {
    const { attacker, target, ctx } = duel([8, 14, 3, 3]);
    target.conditions.add(new Paralyzed(null, null, null));
    const outcome = makeAttack(ctx, attacker, target, longsword);
    expect(outcome.natural).toBe(14);
    expect(outcome.result).toBe("critical");
    expect(target.hitPoints).toBe(11);
  });

  it("records the attack in the trace", () => {
    const { attacker, target, ctx } = duel([12, 5]);
    makeAttack(ctx, attacker, target, longsword);
    expect(ctx.trace.ofType("attack")).toEqual([
      {
        type: "attack",
        round: 1,
        actor: "Hero",
        action: "Longsword",
        target: "Orc1",
        rolls: [12],
        natural: 12,
        total: 17,
        armorClass: 15,
        result: "hit",
      },
    ]);
  });

  it("halves attack damage with Uncanny Dodge and spends the reaction", () => {
    const { attacker, target, ctx } = duel([12, 8]);
    target.features.uncannyDodge = true;
    target.turn.reaction = true;
    makeAttack(ctx, attacker, target, longsword);
    expect(target.hitPoints).toBe(15);
    expect(target.turn.reaction).toBe(false);
  });
});

describe("adjustDamage", () => {
  it("applies reduction, resistance, vulnerability and immunity", () => {
    const target = new Dummy("Target");
    target.features.heavyArmorMaster = true;
    target.resistances.add("necrotic");
    target.vulnerabilities.add("fire");
    target.immunities.add("poison");
    expect(adjustDamage(target, 5, "slashing")).toBe(2);
    expect(adjustDamage(target, 5, "magic-slashing")).toBe(2);
    expect(adjustDamage(target, 2, "piercing")).toBe(0);
    expect(adjustDamage(target, 7, "necrotic")).toBe(3);
    expect(adjustDamage(target, 4, "fire")).toBe(8);
    expect(adjustDamage(target, 9, "poison")).toBe(0);
  });
});

describe("applyDamage", () => {
  it("spends Death Ward instead of dropping", () => {
    const target = new Dummy("Cleric", "players", 5);
    target.deathWard = true;
    const ctx = createTestContext();
    const outcome = applyDamage(ctx, target, [{ amount: 9, type: "slashing" }], { action: "Greataxe" });
    expect(target.hitPoints).toBe(1);
    expect(target.deathWard).toBe(false);
    expect(outcome.dropped).toBe(false);
  });

  it("lets Undead Fortitude hold at 1 hit point", () => {
    const zombie = new Dummy("Zombie1", "monsters", 5);
    zombie.features.undeadFortitude = true;
    const ctx = createTestContext({ rng: new ScriptedRandom([12]) });
    applyDamage(ctx, zombie, [{ amount: 7, type: "slashing" }], { action: "Mace" });
    expect(ctx.trace.ofType("save")[0]).toMatchObject({ action: "Undead Fortitude", dc: 12, success: true });
    expect(zombie.hitPoints).toBe(1);
  });

  it("skips Undead Fortitude against radiant damage", () => {
    const zombie = new Dummy("Zombie1", "monsters", 5);
    zombie.features.undeadFortitude = true;
    const ctx = createTestContext();
    const outcome = applyDamage(ctx, zombie, [{ amount: 7, type: "radiant" }], { action: "Sacred Flame" });
    expect(outcome).toEqual({ dealt: 7, dropped: true });
    expect(zombie.hitPoints).toBe(0);
    expect(zombie.conditions.has("prone")).toBe(true);
  });

  it("breaks concentration on a failed save", () => {
    const caster = new Dummy("Cleric", "players", 30);
    const ally = new Dummy("Fighter", "players");
    const concentration = new Concentration("Bless", 10);
    const blessing = new Blessed(caster);
    ally.conditions.add(blessing);
    concentration.link(blessing);
    caster.concentration = concentration;
    const ctx = createTestContext({ rng: new ScriptedRandom([11]) });

    applyDamage(ctx, caster, [{ amount: 24, type: "bludgeoning" }], { action: "Greatclub" });

    expect(ctx.trace.ofType("save")[0]).toMatchObject({ dc: 12, total: 11, success: false });
    expect(caster.concentration).toBeNull();
    expect(ally.conditions.has("blessed")).toBe(false);
  });
});

describe("savingThrow", () => {
  it("fails strength and dexterity saves while paralyzed without rolling", () => {
    const target = new Dummy("Rogue", "players");
    target.conditions.add(new Paralyzed(null, null, null));
    const ctx = createTestContext();
    expect(savingThrow(ctx, target, "dex", 5, { action: "Fireball" })).toBe(false);
    expect(ctx.trace.ofType("save")[0].rolls).toEqual([]);
  });

  it("rolls poison saves with advantage when the feature is present", () => {
    const target = new Dummy("Fighter", "players");
    target.features.poisonSaveAdvantage = true;
    const ctx = createTestContext({ rng: new ScriptedRandom([3, 17]) });
    expect(savingThrow(ctx, target, "con", 11, { action: "Bite", poison: true })).toBe(true);
    expect(ctx.trace.ofType("save")[0].total).toBe(17);
  });

  it("adds the bless die", () => {
    const target = new Dummy("Fighter", "players");
    target.saveProficiencies.add("wis");
    target.conditions.add(new Blessed(target));
    const ctx = createTestContext({ rng: new ScriptedRandom([9, 3]) });
    savingThrow(ctx, target, "wis", 13, { action: "Fear" });
    expect(ctx.trace.ofType("save")[0].total).toBe(14);
  });
});

describe("damageWithSave", () => {
  const fireball = {
    ability: "dex" as const,
    dc: 15,
    packets: [{ amount: 10, type: "fire" as const }],
    halfOnSuccess: true,
    action: "Fireball",
  };

  it("halves on a success", () => {
    const target = new Dummy("Orc1");
    const ctx = createTestContext({ rng: new ScriptedRandom([15]) });
    expect(damageWithSave(ctx, null, target, fireball)).toEqual({ success: true, dealt: 5, dropped: false });
  });

  it("lets Evasion negate on a success and halve on a failure", () => {
    const rogue = new Dummy("Rogue", "players");
    rogue.features.evasion = true;
    const ctx = createTestContext({ rng: new ScriptedRandom([15, 2]) });
    expect(damageWithSave(ctx, null, rogue, fireball).dealt).toBe(0);
    expect(damageWithSave(ctx, null, rogue, fireball).dealt).toBe(5);
    expect(rogue.hitPoints).toBe(15);
  });
});
