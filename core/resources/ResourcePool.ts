export type RechargeWindow = "short" | "long";

/** Anything whose remaining uses can be rationed. */
export interface Expendable {
  readonly remaining: number;
}

export class ResourcePool implements Expendable {
  readonly name: string;
  readonly recharge: RechargeWindow;
  protected _max: number;
  protected _remaining: number;

  constructor(name: string, max: number, recharge: RechargeWindow) {
    this.name = name;
    this.recharge = recharge;
    this._max = Math.max(0, Math.floor(max));
    this._remaining = this._max;
  }

  get max(): number {
    return this._max;
  }

  get remaining(): number {
    return this._remaining;
  }

  get isEmpty(): boolean {
    return this._remaining <= 0;
  }

  spend(amount = 1): boolean {
    if (amount > this._remaining) {
      return false;
    }
    this._remaining -= amount;
    return true;
  }

  restore(amount: number): void {
    this._remaining = Math.min(this._max, this._remaining + Math.max(0, amount));
  }

  refill(): void {
    this._remaining = this._max;
  }
}
