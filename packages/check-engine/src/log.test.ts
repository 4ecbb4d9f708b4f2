import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger, silentLogger } from "./log";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints debug output only when enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    createLogger({ debug: false }).debug("hidden");
    createLogger({ debug: true }).debug("shown", 1);

    expect(debug.mock.calls).toEqual([["checktree:", "shown", 1]]);
  });

  it("always prints warnings with the prefix", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    createLogger({ debug: false, prefix: "[run]" }).warn("slow source");

    expect(warn.mock.calls).toEqual([["[run]", "slow source"]]);
  });

  it("silentLogger prints nothing", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    silentLogger.warn("nothing");
    expect(warn).not.toHaveBeenCalled();
  });
});
