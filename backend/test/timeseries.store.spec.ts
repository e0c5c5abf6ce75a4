import { describe, expect, it } from "vitest";

import { toPriceBucket, toTelemetryBucket } from "@wattkeeper/domain";
import { TimeseriesStore } from "../src/telemetry/timeseries.store";

const at = (iso: string) => Date.parse(iso);

describe("toTelemetryBucket", () => {
  it("rounds seconds onto the 30 s grid", () => {
    expect(toTelemetryBucket(at("2025-01-01T10:00:14.999Z"))).toBe(at("2025-01-01T10:00:00.000Z"));
    expect(toTelemetryBucket(at("2025-01-01T10:00:15.000Z"))).toBe(at("2025-01-01T10:00:30.000Z"));
    expect(toTelemetryBucket(at("2025-01-01T10:00:44.900Z"))).toBe(at("2025-01-01T10:00:30.000Z"));
    expect(toTelemetryBucket(at("2025-01-01T10:00:45.000Z"))).toBe(at("2025-01-01T10:01:00.000Z"));
  });

  it("rolls over hour and day boundaries", () => {
    expect(toTelemetryBucket(new Date("2025-01-01T23:59:50Z"))).toBe(at("2025-01-02T00:00:00.000Z"));
  });

  it("rejects invalid timestamps", () => {
    expect(() => toTelemetryBucket(Number.NaN)).toThrow(RangeError);
  });
});

describe("toPriceBucket", () => {
  it("floors to five minutes", () => {
    expect(toPriceBucket(at("2025-01-01T10:04:59Z"))).toBe(at("2025-01-01T10:00:00Z"));
    expect(toPriceBucket(at("2025-01-01T10:05:00Z"))).toBe(at("2025-01-01T10:05:00Z"));
  });
});

describe("TimeseriesStore", () => {
  it("keeps one sample per bucket, last write wins", () => {
    const store = new TimeseriesStore();
    store.append("kettle", "Kettle", 10, at("2025-01-01T10:00:05Z"));
    store.append("kettle", "Kettle", 20, at("2025-01-01T10:00:10Z"));

    expect(store.query("kettle")).toEqual([
      {device_id: "kettle", timestamp: at("2025-01-01T10:00:00Z"), power_w: 20},
    ]);
  });

  it("inserts late arrivals in timestamp order", () => {
    const store = new TimeseriesStore();
    store.append("kettle", "Kettle", 3, at("2025-01-01T10:01:00Z"));
    store.append("kettle", "Kettle", 1, at("2025-01-01T10:00:00Z"));
    store.append("kettle", "Kettle", 2, at("2025-01-01T10:00:30Z"));
    store.append("kettle", "Kettle", 9, at("2025-01-01T10:00:31Z"));

    expect(store.query("kettle").map((sample) => [sample.timestamp, sample.power_w])).toEqual([
      [at("2025-01-01T10:00:00Z"), 1],
      [at("2025-01-01T10:00:30Z"), 9],
      [at("2025-01-01T10:01:00Z"), 3],
    ]);
  });

  it("evicts the oldest samples beyond the cap", () => {
    const store = new TimeseriesStore(3);
    const start = at("2025-01-01T10:00:00Z");
    for (let index = 0; index < 5; index += 1) {
      store.append("heater", "Heater", index * 100, start + index * 30_000);
    }

    expect(store.size("heater")).toBe(3);
    expect(store.query("heater").map((sample) => sample.power_w)).toEqual([200, 300, 400]);
  });

  it("stores unreadable power as a gap", () => {
    const store = new TimeseriesStore();
    const sample = store.append("heater", "Heater", -12, at("2025-01-01T10:00:00Z"));
    expect(sample.power_w).toBeNull();
  });

  it("filters by a since timestamp and keeps devices apart", () => {
    const store = new TimeseriesStore();
    store.append("a", "A", 1, at("2025-01-01T10:00:00Z"));
    store.append("a", "A", 2, at("2025-01-01T10:00:30Z"));
    store.append("b", "B", 5, at("2025-01-01T10:00:00Z"));

    expect(store.query("a", at("2025-01-01T10:00:30Z")).map((sample) => sample.power_w)).toEqual([2]);
    expect(store.devices()).toEqual(["a", "b"]);
    expect(store.getSeries("missing")).toBeNull();
    expect(store.getSeries("b")?.name).toBe("B");
  });

  it("refuses a non-positive cap", () => {
    expect(() => new TimeseriesStore(0)).toThrow(RangeError);
  });
});
