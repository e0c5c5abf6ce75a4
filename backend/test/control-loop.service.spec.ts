import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { AutomationController } from "../src/automation/automation.controller";
import { RuntimeConfigService } from "../src/config/runtime-config.service";
import { SettingsService } from "../src/config/settings.service";
import { ControlLoopService } from "../src/control/control-loop.service";
import { CostProjector } from "../src/cost/cost.projector";
import { CostService } from "../src/cost/cost.service";
import { DeviceRegistryService } from "../src/devices/device-registry.service";
import { ForecastEngine } from "../src/forecast/forecast.engine";
import { PriceMergeStore } from "../src/pricing/price-merge.store";
import { StorageService } from "../src/storage/storage.service";
import { TimeseriesStore } from "../src/telemetry/timeseries.store";
import { buildConfig } from "./support/config";
import { FakeDevice } from "./support/fake-device";
import { VirtualClock } from "./support/virtual-clock";

describe("ControlLoopService", () => {
  let storage: StorageService;
  let clock: VirtualClock;
  let kettle: FakeDevice;
  let timeseries: TimeseriesStore;
  let automation: AutomationController;
  let loop: ControlLoopService;

  beforeEach(() => {
    const config = buildConfig({
      control: {tick_seconds: 30},
      tariff: {rate_per_kwh: 0.2, currency: "AUD"},
    });
    storage = new StorageService();
    clock = new VirtualClock("2025-05-05T10:00:00Z");
    const configState = new RuntimeConfigService(config);
    const settings = new SettingsService(configState, storage);
    kettle = new FakeDevice("kettle", "Kettle", {state: "on", power: 1800});
    const registry = new DeviceRegistryService([kettle], configState, clock);
    timeseries = new TimeseriesStore();
    const engine = new ForecastEngine();
    const prices = new PriceMergeStore(storage, clock);
    const cost = new CostService(timeseries, engine, new CostProjector(), prices, settings, configState, clock);
    automation = new AutomationController(storage, registry, settings, configState, clock);
    loop = new ControlLoopService(registry, timeseries, engine, cost, automation, storage, configState, clock);
  });

  afterEach(() => {
    loop.onModuleDestroy();
    storage.onModuleDestroy();
  });

  it("polls, records, projects and prices in one tick", async () => {
    const report = await loop.tick();

    expect(report?.readings.map((reading) => [reading.device_id, reading.state, reading.power_w])).toEqual([
      ["kettle", "on", 1800],
    ]);
    expect(timeseries.query("kettle")).toEqual([
      {device_id: "kettle", timestamp: Date.parse("2025-05-05T10:00:00Z"), power_w: 1800},
    ]);
    expect(loop.getForecast("kettle")?.forecast_w).toBe(1800);
    expect(report?.cost?.realized.cost).toBeCloseTo(0.015 * 0.2, 12);
    expect(loop.getLatestCost()).toBe(report?.cost);
    expect(report?.automation).toEqual([]);
  });

  it("skips a tick while the previous one is still running", async () => {
    const first = loop.tick();
    expect(await loop.tick()).toBeNull();
    expect(await first).not.toBeNull();
  });

  it("hands live readings to automation", async () => {
    automation.enable("kettle");
    await loop.tick();
    clock.advance(30_000);
    const report = await loop.tick();

    expect(kettle.commands).toEqual(["off"]);
    expect(report?.automation[0]?.phase).toBe("standby");
  });

  it("persists five-minute usage once the period closes", async () => {
    for (let tick = 0; tick < 10; tick += 1) {
      await loop.tick();
      clock.advance(30_000);
    }
    expect(storage.listUsageRecords("kettle")).toEqual([]);

    await loop.tick();
    const [record] = storage.listUsageRecords("kettle");
    expect(record).toMatchObject({
      period_end: "2025-05-05T10:05:00.000Z",
      average_power_w: 1800,
      sample_count: 10,
      status_changed: false,
    });
  });

  it("reschedules itself until destroyed", async () => {
    loop.start();
    await vi.waitFor(() => expect(clock.pendingCount()).toBe(1));
    expect(timeseries.size("kettle")).toBe(1);

    clock.advance(30_000);
    await vi.waitFor(() => expect(timeseries.size("kettle")).toBe(2));
    await vi.waitFor(() => expect(clock.pendingCount()).toBe(1));

    loop.onModuleDestroy();
    expect(clock.pendingCount()).toBe(0);
  });
});
