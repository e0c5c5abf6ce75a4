import { z } from "zod";

export const MAX_SERIES_POINTS = 2880;

const powerStateSchema = z.enum(["on", "off", "unknown"]);

export type PowerState = z.infer<typeof powerStateSchema>;

export interface Sample {
  device_id: string;
  timestamp: number;
  power_w: number | null;
}

export interface Series {
  device_id: string;
  name: string;
  samples: Sample[];
}

const statusChangeSchema = z.enum(["on_to_off", "off_to_on"]);

export type StatusChange = z.infer<typeof statusChangeSchema>;

/** Five-minute rollup, stamped at the end of its period. */
export const usageRecordSchema = z.object({
  device_id: z.string(),
  period_end: z.string(),
  average_power_w: z.number().nullable(),
  sample_count: z.number().int().nonnegative(),
  state: powerStateSchema,
  online: z.boolean(),
  status_changed: z.boolean(),
  status_change: statusChangeSchema.nullable(),
});

export type UsageRecord = z.infer<typeof usageRecordSchema>;
