import { floorToBucket, PRICE_BUCKET_MS } from "@wattkeeper/domain";
import type { DeviceReading, PowerState, StatusChange, UsageRecord } from "@wattkeeper/domain";

const PERIOD_MS = PRICE_BUCKET_MS;

interface BufferedInterval {
  timestamp: number;
  power_w: number | null;
  state: PowerState;
  online: boolean;
}

/** Rolls 30 s readings into five-minute averages stamped at the period end. */
export class UsageAggregator {
  private readonly buffer = new Map<string, BufferedInterval[]>();

  record(reading: DeviceReading, timestamp: number): void {
    const intervals = this.buffer.get(reading.device_id) ?? [];
    intervals.push({timestamp, power_w: reading.power_w, state: reading.state, online: reading.online});
    this.buffer.set(reading.device_id, intervals);
  }

  /** Emits every period that has fully elapsed by `now` and drops its intervals. */
  flush(now: number): UsageRecord[] {
    const cutoff = floorToBucket(now, PERIOD_MS);
    const records: UsageRecord[] = [];
    for (const [deviceId, intervals] of this.buffer) {
      const byPeriod = new Map<number, BufferedInterval[]>();
      const remaining: BufferedInterval[] = [];
      for (const interval of intervals) {
        const periodEnd = floorToBucket(interval.timestamp, PERIOD_MS) + PERIOD_MS;
        if (periodEnd > cutoff) {
          remaining.push(interval);
          continue;
        }
        const bucket = byPeriod.get(periodEnd) ?? [];
        bucket.push(interval);
        byPeriod.set(periodEnd, bucket);
      }
      for (const [periodEnd, bucket] of [...byPeriod.entries()].sort(([a], [b]) => a - b)) {
        records.push(summarize(deviceId, periodEnd, bucket));
      }
      if (remaining.length) {
        this.buffer.set(deviceId, remaining);
      } else {
        this.buffer.delete(deviceId);
      }
    }
    return records;
  }
}

function summarize(deviceId: string, periodEnd: number, intervals: BufferedInterval[]): UsageRecord {
  const powers = intervals.map((interval) => interval.power_w).filter((value): value is number => value !== null);
  const average = powers.length ? powers.reduce((sum, value) => sum + value, 0) / powers.length : null;
  const switched = intervals.map((interval) => interval.state).filter((state) => state !== "unknown");
  const first = switched[0];
  const last = switched[switched.length - 1];
  let change: StatusChange | null = null;
  if (first && last && first !== last) {
    change = first === "on" ? "on_to_off" : "off_to_on";
  }
  return {
    device_id: deviceId,
    period_end: new Date(periodEnd).toISOString(),
    average_power_w: average === null ? null : Math.round(average * 100) / 100,
    sample_count: intervals.length,
    state: intervals[intervals.length - 1]?.state ?? "unknown",
    online: intervals.some((interval) => interval.online),
    status_changed: new Set(switched).size > 1,
    status_change: change,
  };
}
