import type { PowerState } from "./telemetry";

export interface DeviceReading {
  device_id: string;
  name: string;
  kind: string;
  online: boolean;
  state: PowerState;
  power_w: number | null;
  observed_at: string | null;
  pending: boolean;
  last_error: string | null;
}

export type ControlAction = "on" | "off" | "toggle";

export type ForecastMethod = "quiescent" | "step_change" | "recent_window" | "historical_mean" | "no_data";

export interface ForecastPoint {
  timestamp: number;
  power_w: number;
}

export interface ForecastProjection {
  device_id: string;
  generated_at: string;
  forecast_w: number | null;
  method: ForecastMethod;
  points: ForecastPoint[];
}

export type RateSource = "tariff" | "market" | "tariff_fallback";

export interface CostBucket {
  timestamp: number;
  power_w: number;
  energy_kwh: number;
  rate_per_kwh: number;
  rate_source: RateSource;
  cost: number;
  forecast: boolean;
}

export interface CostTotals {
  energy_kwh: number;
  cost: number;
}

export interface CostWindowTotal extends CostTotals {
  label: string;
  start: string;
  end: string;
}

export interface CostSummary {
  generated_at: string;
  currency: string;
  rate_mode: "flat" | "market";
  device_ids: string[];
  buckets: CostBucket[];
  rollup: CostBucket[];
  realized: CostTotals;
  projected: CostTotals;
  windows: CostWindowTotal[];
}
