import type { Duration } from "./duration";
import { Energy } from "./energy";

/** Instantaneous draw of one device, in watts. */
export class Power {
  private readonly _watts: number;

  private constructor(watts: number) {
    if (!Number.isFinite(watts)) {
      throw new TypeError("Power requires a finite numeric value in watts");
    }
    this._watts = watts;
  }

  static fromWatts(value: number): Power {
    return new Power(value);
  }

  /**
   * Readings from devices are untrusted: anything that is not a finite,
   * non-negative number is treated as "no reading".
   */
  static fromReading(value: unknown): Power | null {
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      return null;
    }
    return new Power(value);
  }

  get watts(): number {
    return this._watts;
  }

  forDuration(duration: Duration): Energy {
    return Energy.fromPowerAndDuration(this, duration);
  }

  exceeds(threshold: Power): boolean {
    return this._watts > threshold._watts;
  }
}
