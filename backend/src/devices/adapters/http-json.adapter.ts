import { Logger } from "@nestjs/common";
import { z } from "zod";

import { CapabilityFailureError, describeError, TransientIoError } from "@wattkeeper/domain";
import type { PowerState } from "@wattkeeper/domain";
import type { DeviceCapability } from "../device-capability";

const STATUS_REUSE_MS = 1000;

const statusSchema = z.object({
  online: z.boolean().default(true),
  state: z.enum(["on", "off", "unknown"]).catch("unknown"),
  power_w: z.number().nullable().catch(null),
});

type DeviceStatus = z.infer<typeof statusSchema>;

export interface HttpJsonDeviceOptions {
  id: string;
  name: string;
  baseUrl: string;
  token?: string;
  timeoutMs: number;
}

/**
 * Talks to a local relay that fronts a vendor protocol:
 * `GET {base}/status` returns `{online, state, power_w}` and
 * `POST {base}/power` with `{state}` switches the outlet.
 */
export class HttpJsonDeviceAdapter implements DeviceCapability {
  readonly kind = "http_json";
  readonly id: string;
  readonly name: string;
  private readonly logger: Logger;
  private cachedStatus: { at: number; status: Promise<DeviceStatus> } | null = null;

  constructor(private readonly options: HttpJsonDeviceOptions) {
    this.id = options.id;
    this.name = options.name;
    this.logger = new Logger(`${HttpJsonDeviceAdapter.name}:${options.id}`);
  }

  async powerState(): Promise<PowerState> {
    return (await this.readStatus()).state;
  }

  async readPower(): Promise<number | null> {
    return (await this.readStatus()).power_w;
  }

  async isOnline(): Promise<boolean> {
    try {
      return (await this.readStatus()).online;
    } catch (error) {
      if (error instanceof TransientIoError) {
        this.logger.verbose(`Status probe failed: ${describeError(error)}`);
        return false;
      }
      throw error;
    }
  }

  async setPower(state: "on" | "off"): Promise<void> {
    const url = this.endpoint("power");
    this.logger.verbose(`POST ${url} state=${state}`);
    this.cachedStatus = null;
    let response: Response;
    try {
      response = await this.request(url, {
        method: "POST",
        headers: {"content-type": "application/json"},
        body: JSON.stringify({state}),
      });
    } catch (error) {
      throw new CapabilityFailureError(this.id, `Power ${state} failed: ${describeError(error)}`, {cause: error});
    }
    if (!response.ok) {
      throw new CapabilityFailureError(this.id, `Power ${state} rejected: HTTP ${response.status} ${response.statusText}`);
    }
  }

  private readStatus(): Promise<DeviceStatus> {
    const now = Date.now();
    if (this.cachedStatus && now - this.cachedStatus.at < STATUS_REUSE_MS) {
      return this.cachedStatus.status;
    }
    const status = this.fetchStatus();
    this.cachedStatus = {at: now, status};
    void status.catch(() => {
      this.cachedStatus = null;
    });
    return status;
  }

  private async fetchStatus(): Promise<DeviceStatus> {
    const response = await this.request(this.endpoint("status"), {method: "GET"});
    if (!response.ok) {
      throw new TransientIoError(`HTTP ${response.status} ${response.statusText}`);
    }
    return statusSchema.parse(await response.json());
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const headers = new Headers(init.headers);
    if (this.options.token) {
      headers.set("authorization", `Bearer ${this.options.token}`);
    }
    try {
      return await fetch(url, {...init, headers, signal: controller.signal});
    } catch (error) {
      throw new TransientIoError(`${init.method ?? "GET"} ${url} failed: ${describeError(error)}`, {cause: error});
    } finally {
      clearTimeout(timer);
    }
  }

  private endpoint(path: string): string {
    return `${this.options.baseUrl.replace(/\/+$/, "")}/${path}`;
  }
}
