import type { ConfigDocument, DeviceConfig } from "../../config/schemas";
import type { DeviceCapability } from "../device-capability";
import { HttpJsonDeviceAdapter } from "./http-json.adapter";
import { SimulatedDeviceAdapter } from "./simulated.adapter";

export function createDeviceAdapter(device: DeviceConfig, timeoutMs: number): DeviceCapability {
  switch (device.kind) {
    case "simulated":
      return new SimulatedDeviceAdapter({
        id: device.id,
        name: device.name,
        initialState: device.initial_state,
        powerW: device.power_w,
      });
    case "http_json":
      return new HttpJsonDeviceAdapter({
        id: device.id,
        name: device.name,
        baseUrl: device.base_url,
        token: device.token,
        timeoutMs,
      });
  }
}

export function createDeviceAdapters(document: Readonly<ConfigDocument>): DeviceCapability[] {
  const timeoutMs = document.control.command_timeout_seconds * 1000;
  return document.devices.map((device) => createDeviceAdapter(device, timeoutMs));
}
