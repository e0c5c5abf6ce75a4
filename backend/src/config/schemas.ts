import { z } from "zod";

import { ConfigurationError, PRICE_TIERS, RESTART_TIME_PATTERN } from "@wattkeeper/domain";

const restartTimeSchema = z.string().trim().regex(RESTART_TIME_PATTERN, "expected HH:MM (24h)");

const timezoneSchema = z
  .string()
  .trim()
  .min(1)
  .refine(isKnownTimezone, {message: "unknown IANA timezone"});

export function isKnownTimezone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-AU", {timeZone: value});
    return true;
  } catch {
    return false;
  }
}

const loggingSchema = z.object({
  level: z.string().optional(),
});

const controlSchema = z.object({
  tick_seconds: z.number().positive().default(10),
  command_timeout_seconds: z.number().positive().default(5),
});

const telemetrySchema = z.object({
  max_points: z.number().int().positive().default(2880),
});

const automationSchema = z.object({
  threshold_w: z.number().nonnegative().default(5),
  sustain_seconds: z.number().positive().default(30),
  default_restart_time: restartTimeSchema.default("12:00"),
});

const tariffSchema = z.object({
  rate_per_kwh: z.number().nonnegative().default(0.15),
  currency: z.string().trim().min(1).default("AUD"),
});

export const reportingWindowSchema = z
  .object({
    label: z.string().trim().min(1).default("peak"),
    start: restartTimeSchema.default("12:00"),
    end: restartTimeSchema.default("15:00"),
  })
  .refine((window) => window.start < window.end, {message: "window start must be before end"});

const reportingSchema = z.object({
  peak_window: reportingWindowSchema.default({}),
});

export const priceTierSchema = z.enum(PRICE_TIERS);

const httpJsonFeedSchema = z.object({
  kind: z.literal("http_json"),
  tier: priceTierSchema,
  url: z.string().url(),
  enabled: z.boolean().default(true),
});

const nemCsvFeedSchema = z.object({
  kind: z.literal("nem_csv"),
  tier: priceTierSchema,
  url: z.string().url(),
  table: z.string().trim().min(1).optional(),
  listing: z.boolean().optional(),
  enabled: z.boolean().default(true),
});

export const priceFeedSchema = z.discriminatedUnion("kind", [httpJsonFeedSchema, nemCsvFeedSchema]);

const pricingSchema = z.object({
  mode: z.enum(["flat", "market"]).default("flat"),
  region: z.string().trim().min(1).default("VIC1"),
  regions: z.array(z.string().trim().min(1)).default(["VIC1", "NSW1", "QLD1", "SA1", "TAS1"]),
  unit: z.enum(["per_mwh", "per_kwh"]).default("per_mwh"),
  network_fee_per_kwh: z.number().default(0),
  sync_interval_seconds: z.number().positive().default(300),
  sync_on_startup: z.boolean().default(true),
  request_timeout_seconds: z.number().positive().default(15),
  feeds: z.array(priceFeedSchema).default([]),
});

const simulatedDeviceSchema = z.object({
  kind: z.literal("simulated"),
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  initial_state: z.enum(["on", "off"]).default("off"),
  power_w: z.number().nonnegative().default(0),
});

const httpJsonDeviceSchema = z.object({
  kind: z.literal("http_json"),
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  base_url: z.string().url(),
  token: z.string().optional(),
});

export const deviceConfigSchema = z.discriminatedUnion("kind", [simulatedDeviceSchema, httpJsonDeviceSchema]);

export const configDocumentSchema = z
  .object({
    dry_run: z.boolean().default(false),
    timezone: timezoneSchema.default("Australia/Sydney"),
    logging: loggingSchema.default({}),
    control: controlSchema.default({}),
    telemetry: telemetrySchema.default({}),
    automation: automationSchema.default({}),
    tariff: tariffSchema.default({}),
    pricing: pricingSchema.default({}),
    reporting: reportingSchema.default({}),
    devices: z.array(deviceConfigSchema).default([]),
  })
  .superRefine((document, ctx) => {
    const seen = new Set<string>();
    document.devices.forEach((device, index) => {
      if (seen.has(device.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["devices", index, "id"],
          message: `duplicate device id '${device.id}'`,
        });
      }
      seen.add(device.id);
    });
  });

export type ConfigDocument = z.infer<typeof configDocumentSchema>;
export type ConfigDocumentInput = z.input<typeof configDocumentSchema>;
export type DeviceConfig = z.infer<typeof deviceConfigSchema>;

export function parseConfigDocument(raw: unknown): ConfigDocument {
  const result = configDocumentSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

export function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
