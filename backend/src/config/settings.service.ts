import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import { ConfigurationError, describeError, RESTART_TIME_PATTERN } from "@wattkeeper/domain";
import { StorageService } from "../storage/storage.service";
import { RuntimeConfigService } from "./runtime-config.service";
import { formatIssues, reportingWindowSchema } from "./schemas";

export const settingsSchema = z.object({
  tariff_rate_per_kwh: z.number().nonnegative(),
  currency: z.string().trim().min(1),
  rate_mode: z.enum(["flat", "market"]),
  region: z.string().trim().min(1),
  threshold_w: z.number().nonnegative(),
  sustain_seconds: z.number().positive(),
  default_restart_time: z.string().trim().regex(RESTART_TIME_PATTERN, "expected HH:MM (24h)"),
  peak_window: reportingWindowSchema,
});

export const settingsPatchSchema = settingsSchema.partial().strict();

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsPatch = z.infer<typeof settingsPatchSchema>;

/**
 * User-editable settings layered over the config file. Updates are validated
 * as a whole; a rejected update leaves the current settings in place.
 */
@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);
  private readonly defaults: Settings;
  private readonly regions: readonly string[];
  private current: Settings;

  constructor(
    @Inject(RuntimeConfigService) configState: RuntimeConfigService,
    @Inject(StorageService) private readonly storage: StorageService,
  ) {
    const document = configState.getDocumentRef();
    this.regions = document.pricing.regions;
    this.defaults = {
      tariff_rate_per_kwh: document.tariff.rate_per_kwh,
      currency: document.tariff.currency,
      rate_mode: document.pricing.mode,
      region: document.pricing.region,
      threshold_w: document.automation.threshold_w,
      sustain_seconds: document.automation.sustain_seconds,
      default_restart_time: document.automation.default_restart_time,
      peak_window: document.reporting.peak_window,
    };
    this.current = this.loadPersisted();
  }

  get(): Settings {
    return structuredClone(this.current);
  }

  update(patch: unknown): Settings {
    const parsedPatch = settingsPatchSchema.safeParse(patch);
    if (!parsedPatch.success) {
      throw new ConfigurationError(`Invalid settings: ${formatIssues(parsedPatch.error.issues)}`);
    }
    const candidate = this.validate({...this.current, ...parsedPatch.data});
    this.storage.saveSettings(candidate);
    this.current = candidate;
    this.logger.log(`Settings updated: ${Object.keys(parsedPatch.data).join(", ") || "no changes"}`);
    return this.get();
  }

  reset(): Settings {
    this.storage.saveSettings(this.defaults);
    this.current = structuredClone(this.defaults);
    this.logger.log("Settings reset to configuration defaults");
    return this.get();
  }

  private validate(raw: unknown): Settings {
    const parsed = settingsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid settings: ${formatIssues(parsed.error.issues)}`);
    }
    if (!this.regions.includes(parsed.data.region)) {
      throw new ConfigurationError(
        `Unknown region '${parsed.data.region}'; expected one of ${this.regions.join(", ")}`,
        "region",
      );
    }
    return parsed.data;
  }

  private loadPersisted(): Settings {
    const stored = this.storage.getSettings();
    if (stored === null || typeof stored !== "object") {
      return structuredClone(this.defaults);
    }
    try {
      return this.validate({...this.defaults, ...stored});
    } catch (error) {
      this.logger.warn(`Ignoring stored settings: ${describeError(error)}`);
      return structuredClone(this.defaults);
    }
  }
}
