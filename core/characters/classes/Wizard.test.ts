import { describe, expect, it } from "vitest";
import { Dummy, createTestContext } from "../../test-helpers/fixtures";
import { ScriptedRandom } from "../../test-helpers/ScriptedRandom";
import { Wizard } from "./Wizard";

function createWizard(level: number): Wizard {
  const wizard = new Wizard("Wizard", level);
  wizard.initialize();
  return wizard;
}

describe("Wizard", () => {
  it("keeps Mage Armor up", () => {
    const wizard = createWizard(1);
    expect(wizard.maxHitPoints).toBe(8);
    expect(wizard.armorClass).toBe(15);
    expect(wizard.spellSaveDC).toBe(13);
  });

  it("throws a chromatic orb at a lone foe", () => {
    const wizard = createWizard(1);
    const orc = new Dummy("Orc1", "monsters", 20);
    const ctx = createTestContext({ rng: new ScriptedRandom([15, 1, 2, 3]), players: [wizard], monsters: [orc] });
    wizard.beginTurn();
    wizard.takeTurn(ctx);

    expect(orc.hitPoints).toBe(14);
    expect(wizard.spellSlots.remaining).toBe(1);
    expect(ctx.trace.ofType("note").map((event) => event.message)).toEqual(["casts Chromatic Orb at level 1"]);
    expect(ctx.trace.ofType("damage")[0].damageTypes).toEqual(["cold"]);
  });

  it("falls back to a cantrip once out of slots", () => {
    const wizard = createWizard(1);
    wizard.spellSlots.spend(1);
    wizard.spellSlots.spend(1);
    const orc = new Dummy("Orc1", "monsters", 20);
    const ctx = createTestContext({ rng: new ScriptedRandom([4, 5]), players: [wizard], monsters: [orc] });
    wizard.beginTurn();
    wizard.takeTurn(ctx);

    expect(ctx.trace.ofType("note").map((event) => event.message)).toEqual(["casts Acid Splash"]);
    expect(orc.hitPoints).toBe(16);
  });

  it("recovers spell slots once per day on a short rest", () => {
    const wizard = createWizard(2);
    wizard.spellSlots.spend(1);
    wizard.spellSlots.spend(1);
    const ctx = createTestContext({ players: [wizard] });

    wizard.shortRest(ctx);
    expect(wizard.spellSlots.remaining).toBe(2);
    expect(ctx.trace.ofType("note").map((event) => event.message)).toEqual(["uses Arcane Recovery (levels 1)"]);

    wizard.spellSlots.spend(1);
    wizard.shortRest(ctx);
    expect(wizard.spellSlots.remaining).toBe(1);
    expect(wizard.pool("Arcane Recovery")?.remaining).toBe(0);
  });
});
