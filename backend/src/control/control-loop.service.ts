import { Inject, Injectable, Logger, OnModuleDestroy } from "@nestjs/common";

import { describeError, toTelemetryBucket } from "@wattkeeper/domain";
import type { AutomationView, CostSummary, DeviceReading, ForecastProjection } from "@wattkeeper/domain";
import { AutomationController } from "../automation/automation.controller";
import { CLOCK } from "../clock/clock";
import type { Clock, ScheduledTask } from "../clock/clock";
import { CostService } from "../cost/cost.service";
import { RuntimeConfigService } from "../config/runtime-config.service";
import { DeviceRegistryService } from "../devices/device-registry.service";
import { ForecastEngine } from "../forecast/forecast.engine";
import { StorageService } from "../storage/storage.service";
import { TimeseriesStore } from "../telemetry/timeseries.store";
import { UsageAggregator } from "../telemetry/usage-aggregator";

export interface TickReport {
  started_at: string;
  readings: DeviceReading[];
  forecasts: ForecastProjection[];
  cost: CostSummary | null;
  automation: AutomationView[];
}

/**
 * One tick: poll every device, append fresh readings, re-project, re-cost and
 * let automation act on the live readings. A tick never overlaps the previous
 * one; a tick that comes due while another runs is dropped.
 */
@Injectable()
export class ControlLoopService implements OnModuleDestroy {
  private readonly logger = new Logger(ControlLoopService.name);
  private readonly usage = new UsageAggregator();
  private readonly forecasts = new Map<string, ForecastProjection>();
  private schedulerTimer: ScheduledTask | null = null;
  private runInProgress = false;
  private stopped = false;
  private latestCost: CostSummary | null = null;

  constructor(
    @Inject(DeviceRegistryService) private readonly devices: DeviceRegistryService,
    @Inject(TimeseriesStore) private readonly timeseries: TimeseriesStore,
    @Inject(ForecastEngine) private readonly forecastEngine: ForecastEngine,
    @Inject(CostService) private readonly costService: CostService,
    @Inject(AutomationController) private readonly automation: AutomationController,
    @Inject(StorageService) private readonly storage: StorageService,
    @Inject(RuntimeConfigService) private readonly configState: RuntimeConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
  }

  start(): void {
    this.logger.log(`Control loop starting (tick=${this.tickSeconds()}s, devices=${this.devices.ids().length})`);
    this.runScheduled();
  }

  getForecast(deviceId: string): ForecastProjection | null {
    return this.forecasts.get(deviceId) ?? null;
  }

  getLatestCost(): CostSummary | null {
    return this.latestCost;
  }

  async tick(): Promise<TickReport | null> {
    if (this.runInProgress) {
      this.logger.warn("Control tick already running; skipping.");
      return null;
    }
    this.runInProgress = true;
    try {
      const now = this.clock.now();
      const readings = await this.pollAll(now);
      const forecasts = this.projectAll(now);
      const cost = this.costAll(now);
      const automation = await this.automateAll(readings, now);
      this.flushUsage(now);
      return {started_at: now.toISOString(), readings, forecasts, cost, automation};
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

  private async pollAll(now: Date): Promise<DeviceReading[]> {
    const outcomes = await Promise.all(this.devices.ids().map((deviceId) => this.devices.poll(deviceId)));
    for (const {reading, fresh} of outcomes) {
      if (!fresh) {
        continue;
      }
      const sample = this.timeseries.append(reading.device_id, reading.name, reading.online ? reading.power_w : null, now);
      this.usage.record(reading, sample.timestamp);
    }
    return outcomes.map(({reading}) => reading);
  }

  private projectAll(now: Date): ForecastProjection[] {
    return this.devices.ids().map((deviceId) => {
      const projection = this.forecastEngine.project(deviceId, this.timeseries.query(deviceId), now);
      this.forecasts.set(deviceId, projection);
      return projection;
    });
  }

  private costAll(now: Date): CostSummary | null {
    try {
      this.latestCost = this.costService.summarize({now, forecasts: this.forecasts});
      return this.latestCost;
    } catch (error) {
      this.logger.warn(`Cost projection failed: ${describeError(error)}`);
      return null;
    }
  }

  private async automateAll(readings: DeviceReading[], now: Date): Promise<AutomationView[]> {
    const views: AutomationView[] = [];
    for (const reading of readings) {
      try {
        const view = await this.automation.evaluate(reading, now);
        if (view) {
          views.push(view);
        }
      } catch (error) {
        this.logger.error(`Automation for ${reading.device_id} failed: ${describeError(error)}`);
      }
    }
    return views;
  }

  private flushUsage(now: Date): void {
    const records = this.usage.flush(toTelemetryBucket(now));
    if (!records.length) {
      return;
    }
    try {
      this.storage.appendUsageRecords(records);
    } catch (error) {
      this.logger.warn(`Persisting ${records.length} usage record(s) failed: ${describeError(error)}`);
    }
  }

  private runScheduled(): void {
    void this.tick()
      .catch((error) => this.logger.error(`Scheduled tick failed: ${describeError(error)}`))
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
    this.schedulerTimer = this.clock.schedule(() => this.runScheduled(), this.tickSeconds() * 1000);
  }

  private tickSeconds(): number {
    return this.configState.getDocumentRef().control.tick_seconds;
  }
}
