import { Inject, Injectable, Logger } from "@nestjs/common";

import {
  CapabilityFailureError,
  describeError,
  TransientIoError,
  UnknownDeviceError,
} from "@wattkeeper/domain";
import type { ControlAction, DeviceReading, PowerState } from "@wattkeeper/domain";
import { CLOCK } from "../clock/clock";
import type { Clock } from "../clock/clock";
import { RuntimeConfigService } from "../config/runtime-config.service";
import { DEVICE_CAPABILITIES } from "./device-capability";
import type { DeviceCapability } from "./device-capability";
import { withTimeout } from "./with-timeout";

export interface PollOutcome {
  reading: DeviceReading;
  fresh: boolean;
}

/**
 * Owns the device adapters and the last confirmed reading of each. Reads that
 * fail keep the previous reading; commands update the reading optimistically
 * and roll back when the device does not confirm.
 */
@Injectable()
export class DeviceRegistryService {
  private readonly logger = new Logger(DeviceRegistryService.name);
  private readonly devices = new Map<string, DeviceCapability>();
  private readonly readings = new Map<string, DeviceReading>();
  private readonly timeoutMs: number;

  constructor(
    @Inject(DEVICE_CAPABILITIES) capabilities: DeviceCapability[],
    @Inject(RuntimeConfigService) configState: RuntimeConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.timeoutMs = configState.getDocumentRef().control.command_timeout_seconds * 1000;
    for (const capability of capabilities) {
      this.devices.set(capability.id, capability);
      this.readings.set(capability.id, {
        device_id: capability.id,
        name: capability.name,
        kind: capability.kind,
        online: false,
        state: "unknown",
        power_w: null,
        observed_at: null,
        pending: false,
        last_error: null,
      });
    }
    this.logger.log(`Registered ${this.devices.size} device(s)`);
  }

  ids(): string[] {
    return [...this.devices.keys()];
  }

  list(): DeviceReading[] {
    return [...this.readings.values()].map((reading) => ({...reading}));
  }

  get(deviceId: string): DeviceReading {
    const reading = this.readings.get(deviceId);
    if (!reading) {
      throw new UnknownDeviceError(deviceId);
    }
    return {...reading};
  }

  async poll(deviceId: string): Promise<PollOutcome> {
    const device = this.require(deviceId);
    const previous = this.get(deviceId);
    try {
      const online = await withTimeout(device.isOnline(), this.timeoutMs, `${deviceId} online probe`);
      let state: PowerState = "unknown";
      let power: number | null = null;
      if (online) {
        state = await withTimeout(device.powerState(), this.timeoutMs, `${deviceId} state read`);
        power = await withTimeout(device.readPower(), this.timeoutMs, `${deviceId} power read`);
      }
      const reading: DeviceReading = {
        ...previous,
        online,
        state: previous.pending ? previous.state : state,
        power_w: power,
        observed_at: this.clock.now().toISOString(),
        last_error: null,
      };
      this.readings.set(deviceId, reading);
      return {reading: {...reading}, fresh: true};
    } catch (error) {
      const message = describeError(error);
      if (error instanceof TransientIoError) {
        this.logger.warn(`Poll of ${deviceId} failed; keeping last reading: ${message}`);
      } else {
        this.logger.error(`Poll of ${deviceId} failed unexpectedly: ${message}`);
      }
      const reading: DeviceReading = {...previous, last_error: message};
      this.readings.set(deviceId, reading);
      return {reading: {...reading}, fresh: false};
    }
  }

  async control(deviceId: string, action: ControlAction): Promise<DeviceReading> {
    const device = this.require(deviceId);
    const previous = this.get(deviceId);
    const target = resolveTarget(action, previous.state);
    this.logger.log(`Switching ${deviceId} ${target} (action=${action}, was=${previous.state})`);

    this.readings.set(deviceId, {...previous, state: target, pending: true});
    try {
      await withTimeout(device.setPower(target), this.timeoutMs, `${deviceId} power ${target}`);
    } catch (error) {
      const message = describeError(error);
      const current = this.readings.get(deviceId) ?? previous;
      this.readings.set(deviceId, {...current, state: previous.state, pending: false, last_error: message});
      this.logger.warn(`Command ${target} for ${deviceId} failed; reverted to ${previous.state}: ${message}`);
      if (error instanceof CapabilityFailureError) {
        throw error;
      }
      throw new CapabilityFailureError(deviceId, message, {cause: error});
    }

    const current = this.readings.get(deviceId) ?? previous;
    const confirmed: DeviceReading = {
      ...current,
      state: target,
      online: true,
      power_w: target === "off" ? 0 : current.power_w,
      pending: false,
      last_error: null,
      observed_at: this.clock.now().toISOString(),
    };
    this.readings.set(deviceId, confirmed);
    return {...confirmed};
  }

  private require(deviceId: string): DeviceCapability {
    const device = this.devices.get(deviceId);
    if (!device) {
      throw new UnknownDeviceError(deviceId);
    }
    return device;
  }
}

function resolveTarget(action: ControlAction, current: PowerState): "on" | "off" {
  if (action === "toggle") {
    return current === "on" ? "off" : "on";
  }
  return action;
}
