import type { PowerState } from "@wattkeeper/domain";

/**
 * What the control loop needs from a device. Vendor protocols live behind
 * adapters; nothing upstream of this interface looks at the vendor.
 */
export interface DeviceCapability {
  readonly id: string;
  readonly name: string;
  readonly kind: string;

  powerState(): Promise<PowerState>;

  /** Resolves once the device confirmed the command; rejects otherwise. */
  setPower(state: Exclude<PowerState, "unknown">): Promise<void>;

  readPower(): Promise<number | null>;

  isOnline(): Promise<boolean>;
}

export const DEVICE_CAPABILITIES = Symbol("DEVICE_CAPABILITIES");
