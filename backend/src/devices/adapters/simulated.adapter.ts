import type { PowerState } from "@wattkeeper/domain";

import type { DeviceCapability } from "../device-capability";

export interface SimulatedDeviceOptions {
  id: string;
  name: string;
  initialState: "on" | "off";
  powerW: number;
}

/** In-process stand-in for dry runs: draws a constant load while on. */
export class SimulatedDeviceAdapter implements DeviceCapability {
  readonly kind = "simulated";
  readonly id: string;
  readonly name: string;
  private state: "on" | "off";
  private readonly powerW: number;

  constructor(options: SimulatedDeviceOptions) {
    this.id = options.id;
    this.name = options.name;
    this.state = options.initialState;
    this.powerW = options.powerW;
  }

  powerState(): Promise<PowerState> {
    return Promise.resolve(this.state);
  }

  setPower(state: "on" | "off"): Promise<void> {
    this.state = state;
    return Promise.resolve();
  }

  readPower(): Promise<number | null> {
    return Promise.resolve(this.state === "on" ? this.powerW : 0);
  }

  isOnline(): Promise<boolean> {
    return Promise.resolve(true);
  }
}
