import type { Combatant } from "../characters/Combatant";
import type { DayState } from "../runtime/DayState";
import type { Random } from "../utils/Random";
import type { TraceSink } from "./Trace";

/** What resolution code may see of the battlefield around an actor. */
export interface CombatContext {
  readonly rng: Random;
  readonly trace: TraceSink;
  readonly round: number;
  /** Allies of the combatant, the combatant included. */
  alliesOf(combatant: Combatant): Combatant[];
  foesOf(combatant: Combatant): Combatant[];
}

export interface EncounterView extends CombatContext {
  readonly index: number;
  readonly day: DayState;
}
