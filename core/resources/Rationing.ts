import { assertInvariant } from "../errors";
import type { Expendable, RechargeWindow } from "./ResourcePool";

export type RationStyle = "front-loaded" | "back-loaded";

/** Uses granted to the next encounter out of what remains before the rest. */
export function allotmentFor(remaining: number, encountersLeft: number, style: RationStyle): number {
  if (remaining <= 0) {
    return 0;
  }
  if (encountersLeft <= 1) {
    return remaining;
  }
  const share = remaining / encountersLeft;
  return style === "front-loaded" ? Math.ceil(share) : Math.floor(share);
}

/** Full allotment sequence for a rest window, assuming every allotment is spent. */
export function computeAllotments(total: number, encounters: number, style: RationStyle): number[] {
  const allotments: number[] = [];
  let remaining = total;
  for (let i = 0; i < encounters; i++) {
    const allotment = allotmentFor(remaining, encounters - i, style);
    allotments.push(allotment);
    remaining -= allotment;
  }
  const sum = allotments.reduce((acc, value) => acc + value, 0);
  assertInvariant(
    encounters <= 0 || sum === total,
    `Allotments ${allotments.join(",")} do not sum to ${total}`
  );
  return allotments;
}

/**
 * Gate on an expendable resource: spending is allowed while more remains than
 * the reserve set aside for later encounters in the window.
 */
export class Ration {
  readonly resource: Expendable;
  readonly window: RechargeWindow;
  readonly style: RationStyle;
  protected _reserve = 0;
  protected _allotment = 0;

  constructor(resource: Expendable, window: RechargeWindow, style: RationStyle) {
    this.resource = resource;
    this.window = window;
    this.style = style;
  }

  begin(encountersLeft: number): number {
    const remaining = this.resource.remaining;
    this._allotment = allotmentFor(remaining, encountersLeft, this.style);
    this._reserve = remaining - this._allotment;
    return this._allotment;
  }

  get allotment(): number {
    return this._allotment;
  }

  get allowsSpend(): boolean {
    return this.resource.remaining > this._reserve;
  }
}
