import type { Ability, DamageType } from "../characters/Abilities";
import type { ConditionTag } from "./Duration";

export type AttackResultKind = "miss" | "hit" | "critical";

export type EncounterOutcome = "players" | "monsters" | "simultaneous-defeat" | "stalemate";

export type RestKind = "short" | "long" | "end-of-day";

export type TraceEvent =
  | {
      type: "encounter-start";
      encounter: number;
      initiative: Array<{ name: string; roll: number }>;
    }
  | { type: "round-start"; encounter: number; round: number }
  | {
      type: "attack";
      round: number;
      actor: string;
      action: string;
      target: string;
      rolls: number[];
      natural: number;
      total: number;
      armorClass: number;
      result: AttackResultKind;
    }
  | {
      type: "save";
      round: number;
      actor: string;
      action: string;
      ability: Ability;
      dc: number;
      rolls: number[];
      total: number;
      success: boolean;
    }
  | {
      type: "damage";
      round: number;
      actor: string | null;
      target: string;
      action: string;
      amount: number;
      damageTypes: DamageType[];
      hpBefore: number;
      hpAfter: number;
    }
  | {
      type: "heal";
      round: number;
      actor: string | null;
      target: string;
      action: string;
      amount: number;
      hpBefore: number;
      hpAfter: number;
    }
  | {
      type: "condition";
      round: number;
      target: string;
      condition: ConditionTag;
      change: "applied" | "removed";
      source: string | null;
    }
  | { type: "resource"; round: number; actor: string; resource: string; remaining: number }
  | { type: "note"; round: number; actor: string; message: string }
  | { type: "encounter-end"; encounter: number; rounds: number; outcome: EncounterOutcome }
  | { type: "rest"; kind: RestKind };

export type TraceEventType = TraceEvent["type"];

export interface TraceSink {
  readonly enabled: boolean;
  record(event: TraceEvent): void;
}

export const SILENT_TRACE: TraceSink = {
  enabled: false,
  record() {
    // discarded
  },
};

export class TraceRecorder implements TraceSink {
  readonly enabled = true;
  protected readonly _events: TraceEvent[] = [];

  record(event: TraceEvent): void {
    this._events.push(event);
  }

  get events(): readonly TraceEvent[] {
    return this._events;
  }

  ofType<K extends TraceEventType>(type: K): Array<Extract<TraceEvent, { type: K }>> {
    const matches: Array<Extract<TraceEvent, { type: K }>> = [];
    for (const event of this._events) {
      if (isTraceEventOfType(event, type)) {
        matches.push(event);
      }
    }
    return matches;
  }
}

export function isTraceEventOfType<K extends TraceEventType>(
  event: TraceEvent,
  type: K
): event is Extract<TraceEvent, { type: K }> {
  return event.type === type;
}
