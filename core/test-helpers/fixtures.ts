import type { Tactic, Team } from "../characters/Combatant";
import { Combatant } from "../characters/Combatant";
import { PlayerCharacter } from "../characters/PlayerCharacter";
import type { CombatContext } from "../combat/CombatContext";
import { TraceRecorder } from "../combat/Trace";
import type { Random } from "../utils/Random";
import { ScriptedRandom } from "./ScriptedRandom";

/** Bare combatant with all modifiers at 0 and a scripted tactic list. */
export class Dummy extends Combatant {
  script: Tactic[] = [];

  constructor(name: string, team: Team = "monsters", hitPoints = 20) {
    super(name, team);
    this.setMaxHitPoints(hitPoints);
  }

  initialize(_rng: Random): void {
    // stats are set by the test
  }

  protected tactics(_ctx: CombatContext): Tactic[] {
    return this.script;
  }
}

/** Level 1 party member with no class features and a scripted tactic list. */
export class ScriptedHero extends PlayerCharacter {
  readonly className = "Fighter";
  readonly hitDie = 8;
  script: Tactic[] = [];

  constructor(name: string) {
    super(name, 1);
  }

  protected configure(): void {
    this.armorBase = 10;
  }

  protected tactics(_ctx: CombatContext): Tactic[] {
    return this.script;
  }
}

export interface TestContext extends CombatContext {
  readonly trace: TraceRecorder;
}

export function createTestContext(
  options: { rng?: Random; players?: Combatant[]; monsters?: Combatant[]; round?: number } = {}
): TestContext {
  const players = options.players ?? [];
  const monsters = options.monsters ?? [];
  return {
    rng: options.rng ?? new ScriptedRandom(),
    trace: new TraceRecorder(),
    round: options.round ?? 1,
    alliesOf: (combatant) => (combatant.team === "players" ? players : monsters),
    foesOf: (combatant) => (combatant.team === "players" ? monsters : players),
  };
}

/** Tactic that removes every standing foe's hit points without rolling. */
export function smiteAll(actor: Combatant): Tactic {
  return {
    id: "smite",
    economy: "action",
    perform: (ctx) => {
      const foes = ctx.foesOf(actor).filter((foe) => foe.isConscious);
      foes.forEach((foe) => {
        foe.loseHitPoints(foe.hitPoints);
      });
      return foes.length > 0;
    },
  };
}
