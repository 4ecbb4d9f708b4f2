import { describe, it, expect } from "vitest";
import { DataCache } from "./cache";
import { PreparedGroup } from "./prepared";
import { formatLeafResults, listLeafResults, pathOf } from "./report";
import { equalsComparison, fakeDeviceDatabase, FakeSignal } from "./testFakes";

async function prepareSample(): Promise<PreparedGroup> {
  const cache = new DataCache({ signalFactory: (name) => new FakeSignal(name, { value: 2 }) });
  return PreparedGroup.fromGroup(
    {
      type: "group",
      name: "root",
      mode: "all",
      configs: [
        {
          type: "group",
          mode: "all",
          configs: [{ type: "point", name: "pressure", by_point: { "TST:P": [equalsComparison(2)] }, shared: [] }],
        },
        { type: "device", name: "motors", devices: ["GHOST"], by_attr: {}, shared: [] },
      ],
    },
    { cache, devices: fakeDeviceDatabase([]) }
  );
}

describe("pathOf", () => {
  it("names unnamed nodes by type and ends at the leaf identifier", async () => {
    const root = await prepareSample();
    const [leaf] = root.leaves();
    expect(leaf && pathOf(leaf)).toEqual(["root", "group", "pressure", "TST:P"]);
    expect(root.subgroups[0] && pathOf(root.subgroups[0])).toEqual(["root", "group"]);
  });
});

describe("listLeafResults", () => {
  it("lists failures and leaves in walk order", async () => {
    const root = await prepareSample();
    await root.compare();

    const rows = listLeafResults(root);
    expect(rows).toEqual([
      {
        path: ["root", "motors"],
        identifier: undefined,
        severity: "error",
        reason: "Failed to load device: GHOST",
      },
      { path: ["root", "group", "pressure", "TST:P"], identifier: "TST:P", severity: "success", reason: undefined },
    ]);
    expect(formatLeafResults(rows)).toBe(
      "[error] root / motors: Failed to load device: GHOST\n[success] root / group / pressure / TST:P"
    );
  });

  it("marks leaves that never ran", async () => {
    const root = await prepareSample();
    const rows = listLeafResults(root);
    expect(rows[1]?.severity).toBe("internal_error");
    expect(rows[1]?.reason).toBe("no result available (comparison not run?)");
  });
});
