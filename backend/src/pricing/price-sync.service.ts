import { Inject, Injectable, Logger, OnModuleDestroy } from "@nestjs/common";

import { compareGenerationIds, describeError } from "@wattkeeper/domain";
import type { PriceSyncFailure, PriceSyncResult, RetentionSweepResult } from "@wattkeeper/domain";
import { CLOCK } from "../clock/clock";
import type { Clock, ScheduledTask } from "../clock/clock";
import { RuntimeConfigService } from "../config/runtime-config.service";
import { StorageService } from "../storage/storage.service";
import { PRICE_FEED_PROVIDERS } from "./feeds/feed.types";
import type { PriceFeedProvider } from "./feeds/feed.types";
import { PriceMergeStore } from "./price-merge.store";

export interface PriceSyncOptions {
  /** Re-apply artifacts even when they are not newer than the last one applied. */
  force?: boolean;
  regions?: string[];
}

/**
 * Pulls every configured feed for every region into the merge store. A failing
 * region/tier pair is recorded and the rest of the batch carries on; whatever
 * succeeded stays persisted.
 */
@Injectable()
export class PriceSyncService implements OnModuleDestroy {
  private readonly logger = new Logger(PriceSyncService.name);
  private schedulerTimer: ScheduledTask | null = null;
  private runInProgress = false;
  private stopped = false;
  private lastResult: PriceSyncResult | null = null;

  constructor(
    @Inject(PRICE_FEED_PROVIDERS) private readonly providers: PriceFeedProvider[],
    @Inject(PriceMergeStore) private readonly store: PriceMergeStore,
    @Inject(StorageService) private readonly storage: StorageService,
    @Inject(RuntimeConfigService) private readonly configState: RuntimeConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
  }

  getLastResult(): PriceSyncResult | null {
    return this.lastResult;
  }

  start(): void {
    const pricing = this.configState.getDocumentRef().pricing;
    if (!this.providers.length) {
      this.logger.log("No price feeds configured; periodic sync disabled.");
      return;
    }
    if (pricing.sync_on_startup) {
      this.runScheduled();
    } else {
      this.scheduleNextRun();
    }
  }

  async sync(options: PriceSyncOptions = {}): Promise<PriceSyncResult | null> {
    if (this.runInProgress) {
      this.logger.warn("Price sync already running; skipping new request.");
      return null;
    }
    this.runInProgress = true;
    try {
      const result = await this.runBatch(options);
      this.lastResult = result;
      return result;
    } finally {
      this.runInProgress = false;
    }
  }

  onModuleDestroy(): void {
    this.stopped = true;
    if (this.schedulerTimer) {
      this.schedulerTimer.cancel();
      this.schedulerTimer = null;
    }
  }

  private async runBatch(options: PriceSyncOptions): Promise<PriceSyncResult> {
    const force = options.force ?? false;
    const regions = options.regions ?? this.configState.getDocumentRef().pricing.regions;
    const startedAt = this.clock.now().toISOString();
    const errors: PriceSyncFailure[] = [];
    const counts = {inserted: 0, updated: 0, unchanged: 0, skipped: 0, skipped_artifacts: 0};

    this.logger.log(`Syncing ${this.providers.length} feed(s) across ${regions.length} region(s) (force=${force})`);
    for (const provider of this.providers) {
      for (const region of regions) {
        try {
          const last = this.storage.getSyncArtifact(region, provider.tier);
          const artifact = await provider.fetchArtifact(region, force ? null : last?.generation_id ?? null);
          if (!force && last && compareGenerationIds(artifact.generationId, last.generation_id) <= 0) {
            this.logger.verbose(
              `${provider.key} ${region}: artifact ${artifact.generationId} not newer than ${last.generation_id}; skipped`,
            );
            counts.skipped_artifacts += 1;
            continue;
          }

          const fetchedAt = this.clock.now();
          for (const point of artifact.points) {
            const outcome = this.store.upsert({
              region,
              timestamp: point.timestamp,
              tier: provider.tier,
              value: point.value,
              generationId: artifact.generationId,
              source: artifact.artifact,
              fetchedAt,
            });
            if (outcome === "stale" || outcome === "future") {
              counts.skipped += 1;
            } else {
              counts[outcome] += 1;
            }
          }
          this.storage.saveSyncArtifact({
            region,
            tier: provider.tier,
            generation_id: artifact.generationId,
            artifact: artifact.artifact,
            applied_at: fetchedAt.toISOString(),
          });
          this.logger.verbose(`${provider.key} ${region}: applied ${artifact.points.length} point(s) from ${artifact.artifact}`);
        } catch (error) {
          const message = describeError(error);
          this.logger.warn(`${provider.key} ${region} failed: ${message}`);
          errors.push({region, tier: provider.tier, message});
        }
      }
    }

    let retention: RetentionSweepResult | null = null;
    try {
      retention = this.store.retentionSweep(this.clock.now());
    } catch (error) {
      this.logger.error(`Retention sweep failed: ${describeError(error)}`);
    }

    const result: PriceSyncResult = {
      success: errors.length === 0,
      started_at: startedAt,
      finished_at: this.clock.now().toISOString(),
      ...counts,
      errors,
      retention,
    };
    this.logger.log(
      `Price sync ${result.success ? "complete" : "partial"}: inserted=${result.inserted}, updated=${result.updated}, ` +
      `skipped=${result.skipped}, artifacts_skipped=${result.skipped_artifacts}, errors=${errors.length}`,
    );
    return result;
  }

  private runScheduled(): void {
    void this.sync()
      .catch((error) => this.logger.error(`Scheduled price sync failed: ${describeError(error)}`))
      .finally(() => this.scheduleNextRun());
  }

  private scheduleNextRun(): void {
    if (this.schedulerTimer) {
      this.schedulerTimer.cancel();
      this.schedulerTimer = null;
    }
    if (this.stopped) {
      return;
    }
    const intervalSeconds = this.configState.getDocumentRef().pricing.sync_interval_seconds;
    const delayMs = Math.max(1, intervalSeconds) * 1000;
    this.schedulerTimer = this.clock.schedule(() => this.runScheduled(), delayMs);
    this.logger.verbose(`Next price sync scheduled in ${(delayMs / 60000).toFixed(2)} minutes`);
  }
}
