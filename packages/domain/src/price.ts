import type { Energy } from "./energy";

/** Price of one unit of energy, held per kWh. */
export class EnergyPrice {
  private readonly _perKwh: number;

  private constructor(perKwh: number) {
    if (!Number.isFinite(perKwh)) {
      throw new TypeError("EnergyPrice requires a finite numeric value");
    }
    this._perKwh = perKwh;
  }

  static fromPerKwh(value: number): EnergyPrice {
    return new EnergyPrice(value);
  }

  /** Wholesale feeds quote per MWh. */
  static fromPerMwh(value: number): EnergyPrice {
    return new EnergyPrice(value / 1000);
  }

  get perKwh(): number {
    return this._perKwh;
  }

  add(other: EnergyPrice): EnergyPrice {
    return new EnergyPrice(this._perKwh + other._perKwh);
  }

  costFor(energy: Energy): number {
    return energy.kilowattHours * this._perKwh;
  }
}
