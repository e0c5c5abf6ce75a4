import { z } from "zod";

export const PRICE_TIERS = ["historical", "five_min_forecast", "thirty_min_forecast"] as const;
export type PriceTier = (typeof PRICE_TIERS)[number];

export const FORECAST_TIERS: readonly PriceTier[] = ["five_min_forecast", "thirty_min_forecast"];

export const GENERATION_ID_PATTERN = /^\d{12}$/;

export const priceTierValueSchema = z.object({
  value: z.number(),
  generation_id: z.string().regex(GENERATION_ID_PATTERN),
  fetched_at: z.string(),
  source: z.string().default("unknown"),
});

export type PriceTierValue = z.infer<typeof priceTierValueSchema>;

export const priceRecordSchema = z.object({
  region: z.string().min(1),
  timestamp: z.string(),
  historical: priceTierValueSchema.nullable().default(null),
  five_min_forecast: priceTierValueSchema.nullable().default(null),
  thirty_min_forecast: priceTierValueSchema.nullable().default(null),
  effective_price: z.number().nullable().default(null),
  forecast_price: z.number().nullable().default(null),
  last_updated: z.string().nullable().default(null),
});

export type PriceRecord = z.infer<typeof priceRecordSchema>;

/** `future`: a settled price for a bucket that has not happened yet, refused. */
export type UpsertOutcome = "inserted" | "updated" | "unchanged" | "stale" | "future";

export function compareGenerationIds(left: string, right: string): number {
  return Number(left) - Number(right);
}

/** historical → five_min_forecast → thirty_min_forecast */
export function deriveEffectivePrice(record: Pick<PriceRecord, PriceTier>): number | null {
  for (const tier of PRICE_TIERS) {
    const entry = record[tier];
    if (entry) {
      return entry.value;
    }
  }
  return null;
}

export function deriveForecastPrice(record: Pick<PriceRecord, PriceTier>): number | null {
  for (const tier of FORECAST_TIERS) {
    const entry = record[tier];
    if (entry) {
      return entry.value;
    }
  }
  return null;
}

export interface RetentionSweepResult {
  deleted: number;
  trimmed: number;
  untouched: number;
}

export interface PriceSyncFailure {
  region: string;
  tier: PriceTier;
  message: string;
}

export interface PriceSyncResult {
  success: boolean;
  started_at: string;
  finished_at: string;
  inserted: number;
  updated: number;
  unchanged: number;
  skipped: number;
  skipped_artifacts: number;
  errors: PriceSyncFailure[];
  retention: RetentionSweepResult | null;
}
