import type { Duration } from "./duration";
import type { Power } from "./power";

export class Energy {
  private readonly _wattHours: number;

  private constructor(wattHours: number) {
    if (!Number.isFinite(wattHours)) {
      throw new TypeError("Energy requires a finite numeric value in watt-hours");
    }
    this._wattHours = wattHours;
  }

  static fromPowerAndDuration(power: Power, duration: Duration): Energy {
    return new Energy(power.watts * duration.hours);
  }

  get kilowattHours(): number {
    return this._wattHours / 1000;
  }
}
