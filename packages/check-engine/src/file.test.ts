import { describe, it, expect } from "vitest";
import type { ConfigurationFile } from "shared-types";
import { DataCache } from "./cache";
import { DEFAULT_ENGINE_CONFIG } from "./config";
import { PREPARE_FAILURE_REASON } from "./prepared";
import { getByDevice, getByPoint, getByTag, PreparedFile, walkConfigs, walkFileConfigs } from "./file";
import { silentLogger } from "./log";
import { equalsComparison, fakeDevice, fakeDeviceDatabase, FakeSignal } from "./testFakes";

function sampleFile(): ConfigurationFile {
  return {
    version: 0,
    root: {
      type: "group",
      name: "beamline",
      mode: "all",
      configs: [
        {
          type: "group",
          name: "vacuum",
          tags: ["vacuum"],
          mode: "all",
          configs: [
            { type: "point", name: "gauges", tags: ["vacuum", "gauge"], by_point: { "TST:GAUGE": [equalsComparison(1)] }, shared: [] },
          ],
        },
        { type: "device", name: "motors", tags: ["motion"], devices: ["MOTOR1"], by_attr: { readback: [equalsComparison(0)] }, shared: [] },
      ],
    },
  };
}

function names(iter: Iterable<{ name?: string }>): (string | undefined)[] {
  return [...iter].map((c) => c.name);
}

describe("configuration walks", () => {
  it("walkConfigs yields descendants pre-order", () => {
    const file = sampleFile();
    expect(names(walkConfigs(file.root))).toEqual(["vacuum", "gauges", "motors"]);
  });

  it("walkFileConfigs starts at the root and is restartable", () => {
    const file = sampleFile();
    const first = names(walkFileConfigs(file));
    expect(first).toEqual(["beamline", "vacuum", "gauges", "motors"]);
    expect(names(walkFileConfigs(file))).toEqual(first);
  });
});

describe("configuration lookups", () => {
  it("filters by device and point", () => {
    const file = sampleFile();
    expect(names(getByDevice(file, "MOTOR1"))).toEqual(["motors"]);
    expect(names(getByDevice(file, "MOTOR2"))).toEqual([]);
    expect(names(getByPoint(file, "TST:GAUGE"))).toEqual(["gauges"]);
  });

  it("filters by any shared tag", () => {
    const file = sampleFile();
    expect(names(getByTag(file, "vacuum"))).toEqual(["vacuum", "gauges"]);
    expect(names(getByTag(file, "gauge", "motion"))).toEqual(["gauges", "motors"]);
    expect(names(getByTag(file))).toEqual([]);
  });
});

describe("PreparedFile", () => {
  const motor = fakeDevice("MOTOR1", { readback: new FakeSignal("MOTOR1:RBV", { value: 0 }) });

  it("prepares and compares the whole file", async () => {
    const gauge = new FakeSignal("TST:GAUGE", { value: 1 });
    const prepared = await PreparedFile.fromConfig(sampleFile(), {
      devices: fakeDeviceDatabase([motor]),
      signalFactory: () => gauge,
      config: DEFAULT_ENGINE_CONFIG,
      logger: silentLogger,
    });

    expect(await prepared.compare()).toEqual({ severity: "success" });
    expect(prepared.root.result).toEqual({ severity: "success" });
    expect(names([...prepared.walkGroups()].map((g) => g.config))).toEqual(["beamline", "vacuum"]);
    expect([...prepared.walkComparisons()]).toHaveLength(2);
  });

  it("starts every pass with fresh data", async () => {
    const gauge = new FakeSignal("TST:GAUGE", { values: [1, 5] });
    const prepared = await PreparedFile.fromConfig(sampleFile(), {
      devices: fakeDeviceDatabase([motor]),
      cache: new DataCache({ signalFactory: () => gauge }),
      config: { ...DEFAULT_ENGINE_CONFIG, parallel: false },
      logger: silentLogger,
    });

    expect((await prepared.compare()).severity).toBe("success");
    expect((await prepared.compare()).severity).toBe("error");
    expect(gauge.reads).toBe(2);
  });

  it("fillCache fetches every leaf without running comparisons", async () => {
    const gauge = new FakeSignal("TST:GAUGE", { values: [1, 5] });
    const prepared = await PreparedFile.fromConfig(sampleFile(), {
      devices: fakeDeviceDatabase([motor]),
      signalFactory: () => gauge,
      config: DEFAULT_ENGINE_CONFIG,
      logger: silentLogger,
    });

    await prepared.fillCache();

    expect(gauge.reads).toBe(1);
    expect(prepared.root.leaves().map((l) => l.result)).toEqual([undefined, undefined]);

    expect(await prepared.compare({ fresh: false })).toEqual({ severity: "success" });
    expect(gauge.reads).toBe(1);
  });

  it("fillCache keeps going past unreachable sources, one at a time", async () => {
    const gauge = new FakeSignal("TST:GAUGE", { connectError: new Error("channel not found") });
    const prepared = await PreparedFile.fromConfig(sampleFile(), {
      devices: fakeDeviceDatabase([motor]),
      signalFactory: () => gauge,
      config: DEFAULT_ENGINE_CONFIG,
      logger: silentLogger,
    });

    await expect(prepared.fillCache({ parallel: false })).resolves.toBeUndefined();
    expect(gauge.connects).toBe(1);

    const result = await prepared.compare({ fresh: false });
    expect(result).toEqual({ severity: "error" });
    expect(gauge.connects).toBe(1);
    expect(prepared.root.leaves().map((l) => l.result?.severity)).toEqual(["error", "success"]);
  });

  it("reports preparation failures at the root", async () => {
    const prepared = await PreparedFile.fromConfig(sampleFile(), {
      devices: fakeDeviceDatabase([]),
      signalFactory: (name) => new FakeSignal(name, { value: 1 }),
      config: DEFAULT_ENGINE_CONFIG,
      logger: silentLogger,
    });

    expect(await prepared.compare()).toEqual({ severity: "error", reason: PREPARE_FAILURE_REASON });
    expect(prepared.root.prepareFailures.map((f) => f.config.name)).toEqual(["motors"]);
  });
});
