export * from "./errors";
export * from "./utils/Random";
export * from "./utils/Dice";
export * from "./utils/statistics";
export * from "./utils/formatting";
export * from "./characters/Abilities";
export { Combatant } from "./characters/Combatant";
export type { Tactic, Team, TurnEconomy, TurnState, CombatantFeatures } from "./characters/Combatant";
export * from "./characters/Weapon";
export {
  PlayerCharacter,
  MIN_PARTY_LEVEL,
  MAX_PARTY_LEVEL,
  proficiencyForLevel,
  type PlayerClassName,
} from "./characters/PlayerCharacter";
export { Spellcaster } from "./characters/Spellcaster";
export * from "./characters/classes";
export { Monster } from "./characters/Monster";
export * from "./characters/TestCreature";
export * from "./combat/Trace";
export type { CombatContext, EncounterView } from "./combat/CombatContext";
export {
  DEFAULT_ROUND_CAP,
  Encounter,
  type EncounterConfig,
  type EncounterState,
  type EncounterSummary,
  type InitiativeEntry,
} from "./combat/Encounter";
export * from "./resources/Rationing";
export * from "./resources/ResourcePool";
export * from "./resources/SpellSlots";
export * from "./data/MonsterSchema";
export * from "./data/DataSource";
export * from "./data/Bestiary";
export * from "./config/SimulationConfig";
export * from "./runtime/DayState";
export * from "./runtime/AdventuringDay";
export * from "./runtime/SimulationRuntime";
