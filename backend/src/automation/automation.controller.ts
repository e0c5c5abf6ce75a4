import { Inject, Injectable, Logger } from "@nestjs/common";

import {
  ConfigurationError,
  createAutomationState,
  deriveAutomationPhase,
  describeError,
  Duration,
  Power,
  RESTART_TIME_PATTERN,
} from "@wattkeeper/domain";
import type { AutomationState, AutomationView, DeviceReading } from "@wattkeeper/domain";
import { CLOCK } from "../clock/clock";
import type { Clock } from "../clock/clock";
import { formatLocalTime, nextOccurrence } from "../clock/local-time";
import { RuntimeConfigService } from "../config/runtime-config.service";
import { SettingsService } from "../config/settings.service";
import { DeviceRegistryService } from "../devices/device-registry.service";
import { StorageService } from "../storage/storage.service";

/**
 * Single-shot power cycle per device: while monitoring, a device that has been
 * on and above the power threshold for the sustain duration is switched off;
 * at the next restart time it is switched back on and automation disables
 * itself.
 *
 * Commands are awaited outside the state update. Each state carries an epoch
 * that enable/disable/reset bump, and a command result is dropped when the
 * epoch moved while it was in flight.
 */
@Injectable()
export class AutomationController {
  private readonly logger = new Logger(AutomationController.name);
  private readonly states = new Map<string, AutomationState>();
  private readonly inFlight = new Set<string>();

  constructor(
    @Inject(StorageService) private readonly storage: StorageService,
    @Inject(DeviceRegistryService) private readonly devices: DeviceRegistryService,
    @Inject(SettingsService) private readonly settings: SettingsService,
    @Inject(RuntimeConfigService) private readonly configState: RuntimeConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
  }

  list(): AutomationView[] {
    return this.devices.ids().map((deviceId) => this.view(deviceId));
  }

  view(deviceId: string): AutomationView {
    this.devices.get(deviceId);
    const state = this.load(deviceId) ?? createAutomationState(deviceId, this.settings.get().default_restart_time);
    return this.toView(state);
  }

  enable(deviceId: string): AutomationView {
    const state = this.loadOrCreate(deviceId);
    const next = this.save({
      ...clearTransient(state),
      enabled: true,
      last_message: null,
      epoch: state.epoch + 1,
    });
    this.logger.log(`Automation enabled for ${deviceId} (restart at ${next.restart_time})`);
    return this.toView(next);
  }

  disable(deviceId: string): AutomationView {
    const state = this.loadOrCreate(deviceId);
    const next = this.save({...clearTransient(state), enabled: false, epoch: state.epoch + 1});
    this.logger.log(`Automation disabled for ${deviceId}`);
    return this.toView(next);
  }

  setRestartTime(deviceId: string, restartTime: string): AutomationView {
    const trimmed = restartTime.trim();
    if (!RESTART_TIME_PATTERN.test(trimmed)) {
      throw new ConfigurationError(`Invalid restart time '${restartTime}'; expected HH:MM`, "restart_time");
    }
    const state = this.loadOrCreate(deviceId);
    const next = this.save({...state, restart_time: trimmed});
    this.logger.log(`Restart time for ${deviceId} set to ${trimmed}`);
    return this.toView(next);
  }

  reset(deviceId: string): AutomationView {
    this.devices.get(deviceId);
    this.states.delete(deviceId);
    this.storage.deleteAutomationState(deviceId);
    this.logger.log(`Automation state for ${deviceId} reset`);
    return this.view(deviceId);
  }

  /** Advances one device by one tick. Offline or unknown devices do not advance. */
  async evaluate(reading: DeviceReading, now: Date = this.clock.now()): Promise<AutomationView | null> {
    const deviceId = reading.device_id;
    const state = this.load(deviceId);
    if (!state?.enabled || this.inFlight.has(deviceId)) {
      return null;
    }
    if (!reading.online || reading.state === "unknown") {
      return null;
    }

    if (state.turned_off_at) {
      return this.evaluateStandby(state, now);
    }
    return this.evaluateMonitoring(state, reading, now);
  }

  private async evaluateStandby(state: AutomationState, now: Date): Promise<AutomationView | null> {
    const timezone = this.configState.timezone;
    const turnedOffAt = new Date(state.turned_off_at ?? now.toISOString());
    const due = nextOccurrence(turnedOffAt, state.restart_time, timezone);
    if (now.getTime() < due.getTime()) {
      return null;
    }

    this.logger.log(`Restarting ${state.device_id} at ${state.restart_time}`);
    const latest = await this.command(state, "on");
    if (!latest) {
      return null;
    }
    const next = this.save({
      ...clearTransient(latest),
      enabled: false,
      epoch: latest.epoch + 1,
      last_message:
        `Turned off at ${formatLocalTime(turnedOffAt, timezone)}, turned back on at ${formatLocalTime(now, timezone)}. Automation disabled.`,
    });
    return this.toView(next);
  }

  private async evaluateMonitoring(
    state: AutomationState,
    reading: DeviceReading,
    now: Date,
  ): Promise<AutomationView | null> {
    const nowIso = now.toISOString();
    if (reading.state === "off") {
      if (state.device_on_since || state.threshold_met_since) {
        this.logger.verbose(`${state.device_id} switched off externally; timers reset`);
        return this.toView(this.save(clearTransient(state)));
      }
      return null;
    }

    const {threshold_w, sustain_seconds} = this.settings.get();
    const aboveThreshold = Power.fromWatts(reading.power_w ?? 0).exceeds(Power.fromWatts(threshold_w));
    const tracked: AutomationState = {
      ...state,
      device_on_since: state.device_on_since ?? nowIso,
      threshold_met_since: aboveThreshold ? state.threshold_met_since ?? nowIso : null,
    };
    if (tracked.device_on_since !== state.device_on_since || tracked.threshold_met_since !== state.threshold_met_since) {
      this.save(tracked);
    }

    const sustain = Duration.fromSeconds(sustain_seconds);
    const onFor = Duration.between(new Date(tracked.device_on_since ?? nowIso), now);
    const aboveFor = tracked.threshold_met_since ? Duration.between(new Date(tracked.threshold_met_since), now) : null;
    if (!onFor.isAtLeast(sustain) || !aboveFor?.isAtLeast(sustain)) {
      return this.toView(tracked);
    }

    this.logger.log(`Turning off ${state.device_id} after ${sustain_seconds}s with power > ${threshold_w}W`);
    const latest = await this.command(tracked, "off");
    if (!latest) {
      return null;
    }
    const timezone = this.configState.timezone;
    const next = this.save({
      ...clearTransient(latest),
      turned_off_at: nowIso,
      last_message: `Turned off at ${formatLocalTime(now, timezone)}, turning back on at ${latest.restart_time}`,
    });
    return this.toView(next);
  }

  /**
   * Issues a power command and returns the state to build on, or null when the
   * command failed or the automation changed underneath it.
   */
  private async command(state: AutomationState, target: "on" | "off"): Promise<AutomationState | null> {
    const deviceId = state.device_id;
    if (this.configState.dryRun) {
      this.logger.log(`Dry run enabled; skipping automation command ${target} for ${deviceId}.`);
      return null;
    }
    this.inFlight.add(deviceId);
    try {
      await this.devices.control(deviceId, target);
    } catch (error) {
      this.logger.warn(`Automation command ${target} for ${deviceId} failed; will retry: ${describeError(error)}`);
      return null;
    } finally {
      this.inFlight.delete(deviceId);
    }
    const latest = this.load(deviceId);
    if (!latest?.enabled || latest.epoch !== state.epoch) {
      this.logger.warn(`Discarding ${target} result for ${deviceId}: automation changed while the command was in flight`);
      return null;
    }
    return latest;
  }

  private toView(state: AutomationState): AutomationView {
    const phase = deriveAutomationPhase(state);
    const {threshold_w, sustain_seconds} = this.settings.get();
    let statusText: string;
    switch (phase) {
      case "disabled":
        statusText = state.last_message ?? "Automation off";
        break;
      case "standby":
        statusText = `Standby until ${state.restart_time}`;
        break;
      case "monitoring":
        statusText =
          `Monitoring - Will turn off after ${sustain_seconds}s with power > ${threshold_w}W, restart at ${state.restart_time}`;
        break;
    }
    return {...state, phase, status_text: statusText};
  }

  private load(deviceId: string): AutomationState | null {
    const cached = this.states.get(deviceId);
    if (cached) {
      return cached;
    }
    const stored = this.storage.getAutomationState(deviceId);
    if (stored) {
      this.states.set(deviceId, stored);
    }
    return stored;
  }

  private loadOrCreate(deviceId: string): AutomationState {
    this.devices.get(deviceId);
    return this.load(deviceId) ?? createAutomationState(deviceId, this.settings.get().default_restart_time);
  }

  private save(state: AutomationState): AutomationState {
    this.storage.saveAutomationState(state);
    this.states.set(state.device_id, state);
    return state;
  }
}

function clearTransient(state: AutomationState): AutomationState {
  return {...state, device_on_since: null, threshold_met_since: null, turned_off_at: null};
}
