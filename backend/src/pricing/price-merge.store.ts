import { Inject, Injectable, Logger } from "@nestjs/common";

import {
  compareGenerationIds,
  deriveEffectivePrice,
  deriveForecastPrice,
  FORECAST_TIERS,
  GENERATION_ID_PATTERN,
  MalformedFeedError,
  toPriceBucket,
} from "@wattkeeper/domain";
import type {
  PriceRecord,
  PriceTier,
  PriceTierValue,
  RetentionSweepResult,
  UpsertOutcome,
} from "@wattkeeper/domain";
import { CLOCK } from "../clock/clock";
import type { Clock } from "../clock/clock";
import { StorageService } from "../storage/storage.service";
import { extractGenerationId } from "./generation-id";

const HOUR_MS = 3_600_000;
export const FORECAST_RETENTION_MS = 2 * HOUR_MS;
export const RECORD_RETENTION_MS = 48 * HOUR_MS;
/** Dispatch prices are published shortly before their interval ends; anything further ahead is bogus. */
export const HISTORICAL_LEAD_MS = 15 * 60_000;

export interface PriceUpsert {
  region: string;
  timestamp: Date | number;
  tier: PriceTier;
  value: number;
  generationId: string;
  source?: string;
  fetchedAt?: Date;
}

/**
 * Tiered price records keyed by region and 5-minute bucket. A tier is only
 * overwritten by data from the same or a newer feed generation, so replaying
 * an older artifact can never clobber fresher data.
 */
@Injectable()
export class PriceMergeStore {
  private readonly logger = new Logger(PriceMergeStore.name);

  constructor(
    @Inject(StorageService) private readonly storage: StorageService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
  }

  extractGenerationId(artifactName: string): string | null {
    return extractGenerationId(artifactName);
  }

  upsert(entry: PriceUpsert): UpsertOutcome {
    if (!GENERATION_ID_PATTERN.test(entry.generationId)) {
      throw new MalformedFeedError(`Invalid generation id '${entry.generationId}'`, entry.source ?? null);
    }
    if (!Number.isFinite(entry.value)) {
      throw new MalformedFeedError(`Non-numeric price for ${entry.region}/${entry.tier}`, entry.source ?? null);
    }
    const bucket = toPriceBucket(entry.timestamp);
    if (entry.tier === "historical" && bucket - this.clock.now().getTime() > HISTORICAL_LEAD_MS) {
      this.logger.verbose(`Refusing historical price for ${entry.region}@${new Date(bucket).toISOString()}: bucket is in the future`);
      return "future";
    }
    const now = (entry.fetchedAt ?? this.clock.now()).toISOString();
    const incoming: PriceTierValue = {
      value: entry.value,
      generation_id: entry.generationId,
      fetched_at: now,
      source: entry.source ?? "unknown",
    };

    return this.storage.transaction((): UpsertOutcome => {
      const existing = this.storage.getPriceRecord(entry.region, bucket);
      if (!existing) {
        const record: PriceRecord = {
          region: entry.region,
          timestamp: new Date(bucket).toISOString(),
          historical: null,
          five_min_forecast: null,
          thirty_min_forecast: null,
          effective_price: null,
          forecast_price: null,
          last_updated: now,
        };
        record[entry.tier] = incoming;
        this.storage.savePriceRecord(withDerived(record), bucket);
        return "inserted";
      }

      const current = existing[entry.tier];
      if (current && compareGenerationIds(entry.generationId, current.generation_id) < 0) {
        this.logger.verbose(
          `Stale ${entry.tier} for ${entry.region}@${existing.timestamp}: ${entry.generationId} < ${current.generation_id}; preserved`,
        );
        return "stale";
      }
      if (current && current.generation_id === entry.generationId && current.value === entry.value) {
        return "unchanged";
      }

      const record: PriceRecord = {...existing, last_updated: now};
      record[entry.tier] = incoming;
      this.storage.savePriceRecord(withDerived(record), bucket);
      return "updated";
    });
  }

  getRecord(region: string, timestamp: Date | number): PriceRecord | null {
    return this.storage.getPriceRecord(region, toPriceBucket(timestamp));
  }

  effectivePrice(region: string, timestamp: Date | number): number | null {
    const record = this.getRecord(region, timestamp);
    return record ? deriveEffectivePrice(record) : null;
  }

  list(region: string, from: Date | number, to: Date | number): PriceRecord[] {
    return this.storage.listPriceRecords(region, toPriceBucket(from), toPriceBucket(to));
  }

  /**
   * Older than 48 h: deleted. Between 2 h and 48 h: forecast tiers cleared,
   * the historical tier kept. A historical tier more than 15 min ahead of now
   * is cleared. Each record is handled in its own transaction.
   */
  retentionSweep(now: Date = this.clock.now()): RetentionSweepResult {
    const result: RetentionSweepResult = {deleted: 0, trimmed: 0, untouched: 0};
    for (const key of this.storage.listPriceKeys()) {
      const outcome = this.storage.transaction((): keyof RetentionSweepResult => {
        const age = now.getTime() - key.timestamp;
        if (age > RECORD_RETENTION_MS) {
          return this.storage.deletePriceRecord(key.region, key.timestamp) ? "deleted" : "untouched";
        }
        if (-age > HISTORICAL_LEAD_MS) {
          const ahead = this.storage.getPriceRecord(key.region, key.timestamp);
          if (!ahead?.historical) {
            return "untouched";
          }
          this.storage.savePriceRecord(withDerived({...ahead, historical: null}), key.timestamp);
          return "trimmed";
        }
        if (age <= FORECAST_RETENTION_MS) {
          return "untouched";
        }
        const record = this.storage.getPriceRecord(key.region, key.timestamp);
        if (!record || (FORECAST_TIERS.every((tier) => record[tier] === null) && record.forecast_price === null)) {
          return "untouched";
        }
        const trimmed = withDerived({...record, five_min_forecast: null, thirty_min_forecast: null});
        this.storage.savePriceRecord(trimmed, key.timestamp);
        return "trimmed";
      });
      result[outcome] += 1;
    }
    if (result.deleted || result.trimmed) {
      this.logger.log(`Retention sweep: deleted=${result.deleted}, trimmed=${result.trimmed}, untouched=${result.untouched}`);
    }
    return result;
  }
}

function withDerived(record: PriceRecord): PriceRecord {
  return {
    ...record,
    effective_price: deriveEffectivePrice(record),
    forecast_price: deriveForecastPrice(record),
  };
}
