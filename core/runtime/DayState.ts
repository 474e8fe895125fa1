import type { PlayerCharacter } from "../characters/PlayerCharacter";

export const ENCOUNTERS_PER_DAY = 6;
export const ENCOUNTERS_PER_SHORT_REST = 2;

/** Shared by reference with every encounter of one adventuring day. */
export interface DayState {
  readonly party: PlayerCharacter[];
  encounterIndex: number;
  encountersSinceShortRest: number;
  encountersSinceLongRest: number;
  simultaneousDefeat: boolean;
}

export function createDayState(party: PlayerCharacter[]): DayState {
  return {
    party,
    encounterIndex: 0,
    encountersSinceShortRest: 0,
    encountersSinceLongRest: 0,
    simultaneousDefeat: false,
  };
}
