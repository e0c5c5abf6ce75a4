export interface ScheduledTask {
  cancel(): void;
}

/**
 * Source of "now" and of timers for everything that schedules work.
 * Tests swap in a virtual clock and advance it by hand.
 */
export interface Clock {
  now(): Date;
  schedule(callback: () => void, delayMs: number): ScheduledTask;
}

export const CLOCK = Symbol("CLOCK");

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  schedule(callback: () => void, delayMs: number): ScheduledTask {
    const handle = setTimeout(callback, delayMs);
    return {cancel: () => clearTimeout(handle)};
  }
}
