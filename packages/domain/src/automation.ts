import { z } from "zod";

export const RESTART_TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

export const automationStateSchema = z.object({
  device_id: z.string().min(1),
  enabled: z.boolean().default(false),
  restart_time: z.string().regex(RESTART_TIME_PATTERN).default("12:00"),
  device_on_since: z.string().nullable().default(null),
  threshold_met_since: z.string().nullable().default(null),
  turned_off_at: z.string().nullable().default(null),
  last_message: z.string().nullable().default(null),
  epoch: z.number().int().nonnegative().default(0),
});

export type AutomationState = z.infer<typeof automationStateSchema>;

export type AutomationPhase = "disabled" | "monitoring" | "standby";

export function deriveAutomationPhase(state: AutomationState): AutomationPhase {
  if (!state.enabled) {
    return "disabled";
  }
  return state.turned_off_at ? "standby" : "monitoring";
}

export function createAutomationState(deviceId: string, restartTime: string): AutomationState {
  return automationStateSchema.parse({device_id: deviceId, restart_time: restartTime});
}

export interface AutomationView extends AutomationState {
  phase: AutomationPhase;
  status_text: string;
}
