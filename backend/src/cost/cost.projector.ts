import { Injectable } from "@nestjs/common";

import {
  Duration,
  EnergyPrice,
  floorToBucket,
  Power,
  PRICE_BUCKET_MS,
  TELEMETRY_BUCKET_MS,
  toTelemetryBucket,
} from "@wattkeeper/domain";
import type { CostBucket, CostSummary, CostTotals, CostWindowTotal, RateSource, Sample } from "@wattkeeper/domain";
import { FORECAST_HORIZON_POINTS } from "../forecast/forecast.engine";

export interface ResolvedRate {
  price: EnergyPrice;
  source: RateSource;
}

export type RateResolver = (timestamp: number) => ResolvedRate;

export interface CostWindow {
  label: string;
  start: Date;
  end: Date;
}

export interface CostProjectionInput {
  now: Date;
  currency: string;
  rateMode: CostSummary["rate_mode"];
  series: readonly { device_id: string; samples: readonly Sample[] }[];
  forecasts: readonly { device_id: string; forecast_w: number | null }[];
  rate: RateResolver;
  windows: readonly CostWindow[];
}

const BUCKET_DURATION = Duration.fromMilliseconds(TELEMETRY_BUCKET_MS);

/**
 * Power is summed across devices per bucket before it is priced, so the
 * aggregate cost is the cost of the aggregate load.
 */
@Injectable()
export class CostProjector {
  project(input: CostProjectionInput): CostSummary {
    const realizedPower = new Map<number, number>();
    let latest: number | null = null;
    for (const {samples} of input.series) {
      for (const sample of samples) {
        realizedPower.set(sample.timestamp, (realizedPower.get(sample.timestamp) ?? 0) + (sample.power_w ?? 0));
        if (latest === null || sample.timestamp > latest) {
          latest = sample.timestamp;
        }
      }
    }

    const realized = [...realizedPower.entries()]
      .sort(([a], [b]) => a - b)
      .map(([timestamp, watts]) => priceBucket(timestamp, watts, false, input.rate));

    const forecastWatts = input.forecasts.reduce((sum, entry) => sum + (entry.forecast_w ?? 0), 0);
    const anchor = latest ?? toTelemetryBucket(input.now);
    const projected = Array.from({length: FORECAST_HORIZON_POINTS}, (_, index) =>
      priceBucket(anchor + (index + 1) * TELEMETRY_BUCKET_MS, forecastWatts, true, input.rate),
    );

    const windows: CostWindowTotal[] = input.windows.map((window) => {
      const start = window.start.getTime();
      const end = window.end.getTime();
      const totals = sumBuckets(realized.filter((bucket) => bucket.timestamp >= start && bucket.timestamp < end));
      return {label: window.label, start: window.start.toISOString(), end: window.end.toISOString(), ...totals};
    });

    const buckets = [...realized, ...projected];
    return {
      generated_at: input.now.toISOString(),
      currency: input.currency,
      rate_mode: input.rateMode,
      device_ids: input.series.map((entry) => entry.device_id),
      buckets,
      rollup: rollupBuckets(buckets, PRICE_BUCKET_MS),
      realized: sumBuckets(realized),
      projected: sumBuckets(projected),
      windows,
    };
  }
}

export function priceBucket(timestamp: number, watts: number, forecast: boolean, rate: RateResolver): CostBucket {
  const energy = Power.fromWatts(watts).forDuration(BUCKET_DURATION);
  const {price, source} = rate(timestamp);
  return {
    timestamp,
    power_w: watts,
    energy_kwh: energy.kilowattHours,
    rate_per_kwh: price.perKwh,
    rate_source: source,
    cost: price.costFor(energy),
    forecast,
  };
}

export function sumBuckets(buckets: readonly CostBucket[]): CostTotals {
  let energyKwh = 0;
  let cost = 0;
  for (const bucket of buckets) {
    energyKwh += bucket.energy_kwh;
    cost += bucket.cost;
  }
  return {energy_kwh: energyKwh, cost};
}

/** Groups buckets by floored period; realized and forecast buckets never share a group. */
export function rollupBuckets(buckets: readonly CostBucket[], periodMs: number): CostBucket[] {
  const groups = new Map<string, CostBucket[]>();
  for (const bucket of buckets) {
    const key = `${floorToBucket(bucket.timestamp, periodMs)}:${bucket.forecast ? "f" : "r"}`;
    const group = groups.get(key) ?? [];
    group.push(bucket);
    groups.set(key, group);
  }

  const hoursPerBucket = BUCKET_DURATION.hours;
  return [...groups.values()]
    .map((group): CostBucket => {
      const first = group[0];
      const {energy_kwh, cost} = sumBuckets(group);
      const fallback = group.some((bucket) => bucket.rate_source === "tariff_fallback");
      return {
        timestamp: floorToBucket(first.timestamp, periodMs),
        power_w: (energy_kwh * 1000) / (hoursPerBucket * group.length),
        energy_kwh,
        rate_per_kwh: energy_kwh > 0 ? cost / energy_kwh : first.rate_per_kwh,
        rate_source: fallback ? "tariff_fallback" : first.rate_source,
        cost,
        forecast: first.forecast,
      };
    })
    .sort((a, b) => a.timestamp - b.timestamp || Number(a.forecast) - Number(b.forecast));
}
