import { CapabilityFailureError } from "@wattkeeper/domain";
import type { PowerState } from "@wattkeeper/domain";

import type { DeviceCapability } from "../../src/devices/device-capability";

/** Scriptable device: tests set its readings and can make commands fail or hang. */
export class FakeDevice implements DeviceCapability {
  readonly kind = "fake";
  state: PowerState;
  power: number | null;
  online = true;
  failCommands = false;
  readonly commands: ("on" | "off")[] = [];
  private held: (() => void) | null = null;
  private holdNext = false;

  constructor(
    readonly id: string,
    readonly name: string = id,
    initial: { state?: PowerState; power?: number | null } = {},
  ) {
    this.state = initial.state ?? "off";
    this.power = initial.power ?? 0;
  }

  powerState(): Promise<PowerState> {
    return Promise.resolve(this.state);
  }

  readPower(): Promise<number | null> {
    return Promise.resolve(this.power);
  }

  isOnline(): Promise<boolean> {
    return Promise.resolve(this.online);
  }

  setPower(state: "on" | "off"): Promise<void> {
    this.commands.push(state);
    if (this.failCommands) {
      return Promise.reject(new CapabilityFailureError(this.id, `device refused ${state}`));
    }
    if (this.holdNext) {
      this.holdNext = false;
      return new Promise<void>((resolve) => {
        this.held = () => {
          this.apply(state);
          resolve();
        };
      });
    }
    this.apply(state);
    return Promise.resolve();
  }

  /** The next command stays in flight until `release` is called. */
  holdNextCommand(): void {
    this.holdNext = true;
  }

  release(): void {
    const held = this.held;
    this.held = null;
    held?.();
  }

  private apply(state: "on" | "off"): void {
    this.state = state;
    if (state === "off") {
      this.power = 0;
    }
  }
}
