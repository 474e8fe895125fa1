import { describe, expect, it } from "vitest";
import type { Tactic } from "../characters/Combatant";
import { createDayState } from "../runtime/DayState";
import { Dummy, ScriptedHero, smiteAll } from "../test-helpers/fixtures";
import { ScriptedRandom } from "../test-helpers/ScriptedRandom";
import { Paralyzed } from "./conditions";
import { Encounter } from "./Encounter";
import { TraceRecorder } from "./Trace";

function createHero(): ScriptedHero {
  const hero = new ScriptedHero("Hero");
  hero.initialize();
  return hero;
}

describe("Encounter", () => {
  it("ends as soon as one side is down", () => {
    const hero = createHero();
    hero.script = [smiteAll(hero)];
    const orc = new Dummy("Orc1");
    const trace = new TraceRecorder();
    const encounter = new Encounter(new ScriptedRandom([10, 5]), createDayState([hero]), [orc], { index: 1, trace });

    expect(encounter.run()).toBe("players");
    expect(encounter.getSummary()).toEqual({
      index: 1,
      state: "concluded",
      outcome: "players",
      rounds: 1,
      initiative: ["Hero", "Orc1"],
      playersStanding: 1,
      monstersStanding: 0,
    });
    expect(trace.events.map((event) => event.type)).toEqual(["encounter-start", "round-start", "encounter-end"]);
  });

  it("acts in descending initiative", () => {
    const hero = createHero();
    hero.script = [smiteAll(hero)];
    const orc = new Dummy("Orc1");
    orc.script = [smiteAll(orc)];
    const encounter = new Encounter(new ScriptedRandom([3, 15]), createDayState([hero]), [orc]);

    expect(encounter.run()).toBe("monsters");
    expect(encounter.initiative.map((entry) => entry.roll)).toEqual([15, 3]);
  });

  it("lets the party win initiative ties", () => {
    const hero = createHero();
    hero.script = [smiteAll(hero)];
    const orc = new Dummy("Orc1");
    orc.script = [smiteAll(orc)];
    const encounter = new Encounter(new ScriptedRandom([7, 7]), createDayState([hero]), [orc]);
    expect(encounter.run()).toBe("players");
  });

  it("returns the stored outcome when run again", () => {
    const hero = createHero();
    hero.script = [smiteAll(hero)];
    const rng = new ScriptedRandom([10, 5]);
    const encounter = new Encounter(rng, createDayState([hero]), [new Dummy("Orc1")]);
    encounter.run();
    expect(encounter.run()).toBe("players");
    expect(encounter.round).toBe(1);
  });

  it("flags a simultaneous defeat on the day", () => {
    const hero = createHero();
    const bomb: Tactic = {
      id: "bomb",
      economy: "action",
      perform: (ctx) => {
        ctx.foesOf(hero).forEach((foe) => foe.loseHitPoints(foe.hitPoints));
        hero.loseHitPoints(hero.hitPoints);
        return true;
      },
    };
    hero.script = [bomb];
    const day = createDayState([hero]);
    const encounter = new Encounter(new ScriptedRandom([10, 5]), day, [new Dummy("Orc1")]);

    expect(encounter.run()).toBe("simultaneous-defeat");
    expect(day.simultaneousDefeat).toBe(true);
  });

  it("calls a stalemate at the round cap", () => {
    const encounter = new Encounter(new ScriptedRandom([10, 5]), createDayState([createHero()]), [new Dummy("Orc1")], {
      roundCap: 3,
    });
    expect(encounter.run()).toBe("stalemate");
    expect(encounter.round).toBe(3);
  });

  it("counts a paralysis down on its source's turns", () => {
    const hero = createHero();
    hero.script = [smiteAll(hero)];
    const orc = new Dummy("Orc1");
    const encounter = new Encounter(new ScriptedRandom([10, 5]), createDayState([hero]), [orc]);
    encounter.start();
    hero.conditions.add(new Paralyzed(orc, 1, null));

    expect(encounter.run()).toBe("players");
    expect(encounter.round).toBe(2);
  });

  it("logs the conclusion", () => {
    const hero = createHero();
    hero.script = [smiteAll(hero)];
    const logs: string[] = [];
    const encounter = new Encounter(new ScriptedRandom([10, 5]), createDayState([hero]), [new Dummy("Orc1")], {
      index: 4,
      onLog: (message) => logs.push(message),
    });
    encounter.run();
    expect(logs).toEqual(["[Encounter] Encounter 4 ended after 1 rounds: players"]);
  });
});
