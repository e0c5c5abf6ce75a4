export class Duration {
  private readonly _milliseconds: number;

  private constructor(milliseconds: number) {
    if (!Number.isFinite(milliseconds)) {
      throw new TypeError("Duration requires a finite numeric value in milliseconds");
    }
    this._milliseconds = milliseconds;
  }

  static fromMilliseconds(value: number): Duration {
    return new Duration(value);
  }

  static fromSeconds(value: number): Duration {
    return new Duration(value * 1000);
  }

  /** Elapsed time from `start` to `end`; negative when `end` is earlier. */
  static between(start: Date | number, end: Date | number): Duration {
    const startMs = start instanceof Date ? start.getTime() : start;
    const endMs = end instanceof Date ? end.getTime() : end;
    return new Duration(endMs - startMs);
  }

  get hours(): number {
    return this._milliseconds / 3_600_000;
  }

  isAtLeast(other: Duration): boolean {
    return this._milliseconds >= other._milliseconds;
  }
}
