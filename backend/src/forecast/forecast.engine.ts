import { Injectable } from "@nestjs/common";

import { TELEMETRY_BUCKET_MS, toTelemetryBucket } from "@wattkeeper/domain";
import type { ForecastMethod, ForecastProjection, Sample } from "@wattkeeper/domain";

export const FORECAST_HORIZON_POINTS = 60;
export const QUIESCENT_SAMPLES = 3;
export const STEP_WINDOW = 4;
export const STEP_CHANGE_RATIO = 1.05;
export const RECENT_WINDOW_MS = 30 * 60_000;

export interface ForecastEstimate {
  forecastW: number | null;
  method: ForecastMethod;
}

/**
 * Flat near-term projection per device. Rules, first match wins:
 * the three newest samples all zero/null → excluded; the newest four average
 * more than 5 % above the four before them → hold the new level; otherwise the
 * mean of the last 30 minutes, then the mean of all positive samples.
 */
@Injectable()
export class ForecastEngine {
  estimate(samples: readonly Sample[], now: Date): ForecastEstimate {
    const newestFirst = [...samples].sort((a, b) => b.timestamp - a.timestamp);

    if (newestFirst.length >= QUIESCENT_SAMPLES) {
      const quiet = newestFirst.slice(0, QUIESCENT_SAMPLES).every((sample) => !sample.power_w);
      if (quiet) {
        return {forecastW: null, method: "quiescent"};
      }
    }

    if (newestFirst.length >= STEP_WINDOW * 2) {
      const recent = meanOf(newestFirst.slice(0, STEP_WINDOW));
      const prior = meanOf(newestFirst.slice(STEP_WINDOW, STEP_WINDOW * 2));
      if (prior > 0 && recent > prior * STEP_CHANGE_RATIO) {
        return {forecastW: recent, method: "step_change"};
      }
    }

    const windowStart = now.getTime() - RECENT_WINDOW_MS;
    const recentWindow = newestFirst.filter((sample) => sample.timestamp >= windowStart);
    if (recentWindow.length) {
      return {forecastW: meanOf(recentWindow), method: "recent_window"};
    }

    const positive = newestFirst
      .map((sample) => sample.power_w)
      .filter((value): value is number => value !== null && value > 0);
    if (positive.length) {
      return {forecastW: positive.reduce((sum, value) => sum + value, 0) / positive.length, method: "historical_mean"};
    }
    return {forecastW: 0, method: "no_data"};
  }

  project(deviceId: string, samples: readonly Sample[], now: Date): ForecastProjection {
    const {forecastW, method} = this.estimate(samples, now);
    const anchor = horizonAnchor(samples, now);
    const points = forecastW === null
      ? []
      : Array.from({length: FORECAST_HORIZON_POINTS}, (_, index) => ({
        timestamp: anchor + (index + 1) * TELEMETRY_BUCKET_MS,
        power_w: forecastW,
      }));
    return {
      device_id: deviceId,
      generated_at: now.toISOString(),
      forecast_w: forecastW,
      method,
      points,
    };
  }
}

/** The horizon starts one bucket after the newest sample, or after "now" for an empty series. */
export function horizonAnchor(samples: readonly Sample[], now: Date): number {
  let latest: number | null = null;
  for (const sample of samples) {
    if (latest === null || sample.timestamp > latest) {
      latest = sample.timestamp;
    }
  }
  return latest ?? toTelemetryBucket(now);
}

function meanOf(samples: readonly Sample[]): number {
  if (!samples.length) {
    return 0;
  }
  return samples.reduce((sum, sample) => sum + (sample.power_w ?? 0), 0) / samples.length;
}
