import { Injectable, Logger } from "@nestjs/common";

import { MAX_SERIES_POINTS, Power, toTelemetryBucket } from "@wattkeeper/domain";
import type { Sample, Series } from "@wattkeeper/domain";

interface DeviceSeries {
  name: string;
  samples: Sample[];
}

/**
 * Bounded per-device history on the 30 s grid. A bucket holds one sample; a
 * later write to the same bucket replaces it. Oldest samples are evicted once a
 * device exceeds the cap.
 */
@Injectable()
export class TimeseriesStore {
  private readonly logger = new Logger(TimeseriesStore.name);
  private readonly series = new Map<string, DeviceSeries>();

  constructor(private readonly maxPoints: number = MAX_SERIES_POINTS) {
    if (!Number.isInteger(maxPoints) || maxPoints <= 0) {
      throw new RangeError("maxPoints must be a positive integer");
    }
  }

  append(deviceId: string, name: string, power: number | null, rawTimestamp: Date | number): Sample {
    const timestamp = toTelemetryBucket(rawTimestamp);
    const sample: Sample = {device_id: deviceId, timestamp, power_w: Power.fromReading(power)?.watts ?? null};
    let entry = this.series.get(deviceId);
    if (!entry) {
      entry = {name, samples: []};
      this.series.set(deviceId, entry);
    }
    entry.name = name;

    const samples = entry.samples;
    const last = samples[samples.length - 1];
    if (!last || last.timestamp < timestamp) {
      samples.push(sample);
    } else if (last.timestamp === timestamp) {
      samples[samples.length - 1] = sample;
    } else {
      const index = lowerBound(samples, timestamp);
      if (samples[index]?.timestamp === timestamp) {
        samples[index] = sample;
      } else {
        samples.splice(index, 0, sample);
      }
    }

    const overflow = samples.length - this.maxPoints;
    if (overflow > 0) {
      samples.splice(0, overflow);
      this.logger.verbose(`Evicted ${overflow} sample(s) from ${deviceId}`);
    }
    return {...sample};
  }

  query(deviceId: string, since?: Date | number): Sample[] {
    const entry = this.series.get(deviceId);
    if (!entry) {
      return [];
    }
    if (since === undefined) {
      return entry.samples.map((sample) => ({...sample}));
    }
    const sinceMs = since instanceof Date ? since.getTime() : since;
    return entry.samples.slice(lowerBound(entry.samples, sinceMs)).map((sample) => ({...sample}));
  }

  getSeries(deviceId: string, since?: Date | number): Series | null {
    const entry = this.series.get(deviceId);
    if (!entry) {
      return null;
    }
    return {device_id: deviceId, name: entry.name, samples: this.query(deviceId, since)};
  }

  devices(): string[] {
    return [...this.series.keys()];
  }

  size(deviceId: string): number {
    return this.series.get(deviceId)?.samples.length ?? 0;
  }

  clear(deviceId?: string): void {
    if (deviceId === undefined) {
      this.series.clear();
      return;
    }
    this.series.delete(deviceId);
  }
}

function lowerBound(samples: Sample[], timestamp: number): number {
  let low = 0;
  let high = samples.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (samples[mid].timestamp < timestamp) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}
