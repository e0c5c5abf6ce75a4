import type { Clock, ScheduledTask } from "../../src/clock/clock";

interface PendingTask {
  at: number;
  callback: () => void;
  cancelled: boolean;
}

/** Manually advanced clock; scheduled callbacks fire inside `advance`. */
export class VirtualClock implements Clock {
  private current: number;
  private readonly pending: PendingTask[] = [];

  constructor(start: Date | string) {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  schedule(callback: () => void, delayMs: number): ScheduledTask {
    const task: PendingTask = {at: this.current + delayMs, callback, cancelled: false};
    this.pending.push(task);
    return {
      cancel: () => {
        task.cancelled = true;
      },
    };
  }

  set(instant: Date | string): void {
    this.current = new Date(instant).getTime();
  }

  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const due = this.pending
        .filter((task) => !task.cancelled && task.at <= target)
        .sort((a, b) => a.at - b.at)[0];
      if (!due) {
        break;
      }
      due.cancelled = true;
      this.current = due.at;
      due.callback();
    }
    this.current = target;
  }

  pendingCount(): number {
    return this.pending.filter((task) => !task.cancelled).length;
  }
}
