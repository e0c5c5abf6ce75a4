import { Inject, Injectable, Logger } from "@nestjs/common";

import { EnergyPrice, toPriceBucket } from "@wattkeeper/domain";
import type { CostSummary, ForecastProjection } from "@wattkeeper/domain";
import { CLOCK } from "../clock/clock";
import type { Clock } from "../clock/clock";
import { localDateTimeToInstant, parseClockTime, startOfLocalDay, toLocalParts } from "../clock/local-time";
import { RuntimeConfigService } from "../config/runtime-config.service";
import { SettingsService } from "../config/settings.service";
import type { Settings } from "../config/settings.service";
import { ForecastEngine } from "../forecast/forecast.engine";
import { PriceMergeStore } from "../pricing/price-merge.store";
import { TimeseriesStore } from "../telemetry/timeseries.store";
import { CostProjector } from "./cost.projector";
import type { CostWindow, RateResolver, ResolvedRate } from "./cost.projector";

const DAY_MS = 86_400_000;

@Injectable()
export class CostService {
  private readonly logger = new Logger(CostService.name);

  constructor(
    @Inject(TimeseriesStore) private readonly timeseries: TimeseriesStore,
    @Inject(ForecastEngine) private readonly forecastEngine: ForecastEngine,
    @Inject(CostProjector) private readonly projector: CostProjector,
    @Inject(PriceMergeStore) private readonly prices: PriceMergeStore,
    @Inject(SettingsService) private readonly settings: SettingsService,
    @Inject(RuntimeConfigService) private readonly configState: RuntimeConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
  }

  /**
   * Cost of the selected devices (all by default). Forecasts are recomputed
   * unless the caller already has them for the same instant.
   */
  summarize(
    options: { deviceIds?: string[]; now?: Date; forecasts?: ReadonlyMap<string, ForecastProjection> } = {},
  ): CostSummary {
    const now = options.now ?? this.clock.now();
    const settings = this.settings.get();
    const deviceIds = options.deviceIds ?? this.timeseries.devices();

    const series = deviceIds.map((deviceId) => ({device_id: deviceId, samples: this.timeseries.query(deviceId)}));
    const forecasts = series.map(({device_id, samples}) => {
      const cached = options.forecasts?.get(device_id);
      return cached ?? this.forecastEngine.project(device_id, samples, now);
    });

    const summary = this.projector.project({
      now,
      currency: settings.currency,
      rateMode: settings.rate_mode,
      series,
      forecasts,
      rate: this.rateResolver(settings),
      windows: this.reportingWindows(now, settings),
    });
    const fallbacks = summary.buckets.filter((bucket) => bucket.rate_source === "tariff_fallback").length;
    if (fallbacks > 0) {
      this.logger.verbose(`${fallbacks} bucket(s) priced at the flat tariff for lack of market data`);
    }
    return summary;
  }

  rateResolver(settings: Settings): RateResolver {
    const tariff: ResolvedRate = {price: EnergyPrice.fromPerKwh(settings.tariff_rate_per_kwh), source: "tariff"};
    if (settings.rate_mode === "flat") {
      return () => tariff;
    }

    const pricing = this.configState.getDocumentRef().pricing;
    const networkFee = EnergyPrice.fromPerKwh(pricing.network_fee_per_kwh);
    const fallback: ResolvedRate = {price: tariff.price, source: "tariff_fallback"};
    const byBucket = new Map<number, ResolvedRate>();
    return (timestamp) => {
      const bucket = toPriceBucket(timestamp);
      let resolved = byBucket.get(bucket);
      if (!resolved) {
        const market = this.prices.effectivePrice(settings.region, bucket);
        if (market === null) {
          resolved = fallback;
        } else {
          const price = pricing.unit === "per_mwh" ? EnergyPrice.fromPerMwh(market) : EnergyPrice.fromPerKwh(market);
          resolved = {price: price.add(networkFee), source: "market"};
        }
        byBucket.set(bucket, resolved);
      }
      return resolved;
    };
  }

  reportingWindows(now: Date, settings: Settings): CostWindow[] {
    const timezone = this.configState.timezone;
    const dayStart = startOfLocalDay(now, timezone);
    const nextDayStart = startOfLocalDay(new Date(dayStart.getTime() + DAY_MS + 3_600_000), timezone);
    const today = toLocalParts(now, timezone);
    const peakStart = parseClockTime(settings.peak_window.start);
    const peakEnd = parseClockTime(settings.peak_window.end);
    return [
      {label: "today", start: dayStart, end: nextDayStart},
      {
        label: settings.peak_window.label,
        start: localDateTimeToInstant(today, peakStart.hour, peakStart.minute, timezone),
        end: localDateTimeToInstant(today, peakEnd.hour, peakEnd.minute, timezone),
      },
    ];
  }
}
