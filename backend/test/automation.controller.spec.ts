import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigurationError, UnknownDeviceError } from "@wattkeeper/domain";
import type { AutomationView } from "@wattkeeper/domain";
import { AutomationController } from "../src/automation/automation.controller";
import { RuntimeConfigService } from "../src/config/runtime-config.service";
import { SettingsService } from "../src/config/settings.service";
import { DeviceRegistryService } from "../src/devices/device-registry.service";
import { StorageService } from "../src/storage/storage.service";
import type { ConfigDocumentInput } from "../src/config/schemas";
import { buildConfig } from "./support/config";
import { FakeDevice } from "./support/fake-device";
import { VirtualClock } from "./support/virtual-clock";

interface Harness {
  clock: VirtualClock;
  device: FakeDevice;
  storage: StorageService;
  registry: DeviceRegistryService;
  automation: AutomationController;
  step: () => Promise<AutomationView | null>;
}

describe("AutomationController", () => {
  const storages: StorageService[] = [];

  function createHarness(start: string, overrides: ConfigDocumentInput = {}, storage = new StorageService()): Harness {
    const config = buildConfig({
      automation: {threshold_w: 5, sustain_seconds: 30, default_restart_time: "12:00"},
      ...overrides,
    });
    if (!storages.includes(storage)) {
      storages.push(storage);
    }
    const clock = new VirtualClock(start);
    const configState = new RuntimeConfigService(config);
    const settings = new SettingsService(configState, storage);
    const device = new FakeDevice("heater", "Study heater", {state: "on", power: 100});
    const registry = new DeviceRegistryService([device], configState, clock);
    const automation = new AutomationController(storage, registry, settings, configState, clock);
    const step = async () => {
      const {reading} = await registry.poll("heater");
      return automation.evaluate(reading, clock.now());
    };
    return {clock, device, storage, registry, automation, step};
  }

  let h: Harness;

  beforeEach(() => {
    h = createHarness("2025-06-01T08:00:00Z");
  });

  afterEach(() => {
    for (const storage of storages.splice(0)) {
      storage.onModuleDestroy();
    }
  });

  it("stays passive until enabled", async () => {
    expect(await h.step()).toBeNull();
    expect(h.automation.view("heater").status_text).toBe("Automation off");
    expect(h.device.commands).toEqual([]);
  });

  it("runs one full power cycle and then disables itself", async () => {
    h.automation.enable("heater");

    const monitoring = await h.step();
    expect(monitoring?.phase).toBe("monitoring");
    expect(monitoring?.device_on_since).toBe("2025-06-01T08:00:00.000Z");
    expect(monitoring?.threshold_met_since).toBe("2025-06-01T08:00:00.000Z");
    expect(monitoring?.status_text).toBe("Monitoring - Will turn off after 30s with power > 5W, restart at 12:00");

    h.clock.advance(30_000);
    const standby = await h.step();
    expect(h.device.commands).toEqual(["off"]);
    expect(standby?.phase).toBe("standby");
    expect(standby?.turned_off_at).toBe("2025-06-01T08:00:30.000Z");
    expect(standby?.last_message).toBe("Turned off at 08:00:30, turning back on at 12:00");
    expect(standby?.status_text).toBe("Standby until 12:00");

    h.clock.set("2025-06-01T11:59:30Z");
    expect(await h.step()).toBeNull();
    expect(h.device.commands).toEqual(["off"]);

    h.clock.set("2025-06-01T12:00:00Z");
    const done = await h.step();
    expect(h.device.commands).toEqual(["off", "on"]);
    expect(done?.phase).toBe("disabled");
    expect(done?.enabled).toBe(false);
    expect(done?.status_text).toBe("Turned off at 08:00:30, turned back on at 12:00:00. Automation disabled.");

    h.clock.advance(60_000);
    expect(await h.step()).toBeNull();
    expect(h.device.commands).toEqual(["off", "on"]);
  });

  it("needs power above the threshold for the whole sustain period", async () => {
    h.automation.enable("heater");
    await h.step();

    h.clock.advance(20_000);
    h.device.power = 2;
    expect((await h.step())?.threshold_met_since).toBeNull();

    h.clock.advance(20_000);
    h.device.power = 100;
    expect((await h.step())?.threshold_met_since).toBe("2025-06-01T08:00:40.000Z");

    h.clock.advance(20_000);
    await h.step();
    expect(h.device.commands).toEqual([]);

    h.clock.advance(10_000);
    await h.step();
    expect(h.device.commands).toEqual(["off"]);
  });

  it("resets its timers when the device is switched off by hand", async () => {
    h.automation.enable("heater");
    await h.step();

    h.clock.advance(20_000);
    h.device.state = "off";
    h.device.power = 0;
    const reset = await h.step();
    expect(reset?.device_on_since).toBeNull();
    expect(reset?.threshold_met_since).toBeNull();

    h.clock.advance(20_000);
    h.device.state = "on";
    h.device.power = 100;
    expect((await h.step())?.device_on_since).toBe("2025-06-01T08:00:40.000Z");
  });

  it("does not advance while the device is offline", async () => {
    h.automation.enable("heater");
    h.device.online = false;
    expect(await h.step()).toBeNull();

    h.clock.advance(60_000);
    expect(await h.step()).toBeNull();
    expect(h.automation.view("heater").device_on_since).toBeNull();
    expect(h.device.commands).toEqual([]);
  });

  it("keeps monitoring and retries after a refused command", async () => {
    h.automation.enable("heater");
    await h.step();

    h.clock.advance(30_000);
    h.device.failCommands = true;
    expect(await h.step()).toBeNull();
    expect(h.automation.view("heater").phase).toBe("monitoring");
    expect(h.registry.get("heater").state).toBe("on");

    h.clock.advance(10_000);
    h.device.failCommands = false;
    expect((await h.step())?.phase).toBe("standby");
    expect(h.device.commands).toEqual(["off", "off"]);
  });

  it("discards a command result when automation was disabled meanwhile", async () => {
    h.automation.enable("heater");
    await h.step();

    h.clock.advance(30_000);
    const {reading} = await h.registry.poll("heater");
    h.device.holdNextCommand();
    const pending = h.automation.evaluate(reading, h.clock.now());
    h.automation.disable("heater");
    h.device.release();

    expect(await pending).toBeNull();
    const view = h.automation.view("heater");
    expect(view.phase).toBe("disabled");
    expect(view.turned_off_at).toBeNull();
  });

  it("restarts on the next day when the restart time has already passed", async () => {
    h = createHarness("2025-06-01T22:00:00Z");
    h.automation.setRestartTime("heater", "06:00");
    h.automation.enable("heater");
    await h.step();
    h.clock.advance(30_000);
    expect((await h.step())?.status_text).toBe("Standby until 06:00");

    h.clock.set("2025-06-02T05:59:30Z");
    expect(await h.step()).toBeNull();

    h.clock.set("2025-06-02T06:00:00Z");
    const done = await h.step();
    expect(done?.last_message).toBe("Turned off at 22:00:30, turned back on at 06:00:00. Automation disabled.");
  });

  it("restarts at the end of a DST gap when the restart time falls inside it", async () => {
    h = createHarness("2025-10-04T13:00:00Z", {timezone: "Australia/Sydney"});
    h.automation.setRestartTime("heater", "02:30");
    h.automation.enable("heater");
    await h.step();
    h.clock.advance(30_000);
    expect((await h.step())?.last_message).toBe("Turned off at 23:00:30, turning back on at 02:30");

    h.clock.set("2025-10-04T15:30:00Z");
    expect(await h.step()).toBeNull();
    h.clock.set("2025-10-04T15:59:30Z");
    expect(await h.step()).toBeNull();
    expect(h.device.commands).toEqual(["off"]);

    h.clock.set("2025-10-04T16:00:00Z");
    const done = await h.step();
    expect(h.device.commands).toEqual(["off", "on"]);
    expect(done?.last_message).toBe("Turned off at 23:00:30, turned back on at 03:00:00. Automation disabled.");
  });

  it("picks up a persisted standby after a restart of the process", async () => {
    h.automation.enable("heater");
    await h.step();
    h.clock.advance(30_000);
    await h.step();

    const revived = createHarness("2025-06-01T12:00:05Z", {}, h.storage);
    revived.device.state = "off";
    expect(revived.automation.view("heater").phase).toBe("standby");
    const done = await revived.step();
    expect(done?.phase).toBe("disabled");
    expect(revived.device.commands).toEqual(["on"]);
  });

  it("issues no commands in dry-run mode", async () => {
    h = createHarness("2025-06-01T08:00:00Z", {dry_run: true});
    h.automation.enable("heater");
    await h.step();
    h.clock.advance(30_000);
    expect(await h.step()).toBeNull();
    expect(h.device.commands).toEqual([]);
    expect(h.automation.view("heater").phase).toBe("monitoring");
  });

  it("validates restart times and device ids", () => {
    expect(() => h.automation.setRestartTime("heater", "25:00")).toThrow(ConfigurationError);
    expect(() => h.automation.setRestartTime("heater", "7:30")).toThrow(ConfigurationError);
    expect(h.automation.setRestartTime("heater", " 07:30 ").restart_time).toBe("07:30");
    expect(() => h.automation.enable("fridge")).toThrow(UnknownDeviceError);
  });

  it("reset returns the device to defaults", async () => {
    h.automation.setRestartTime("heater", "07:30");
    h.automation.enable("heater");
    await h.step();

    const view = h.automation.reset("heater");
    expect(view.enabled).toBe(false);
    expect(view.restart_time).toBe("12:00");
    expect(view.device_on_since).toBeNull();
  });
});
