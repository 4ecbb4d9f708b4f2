import { describe, it, expect } from "vitest";
import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from "./config";
import { ConfigError } from "./errors";

describe("resolveEngineConfig", () => {
  it("falls back to defaults with an empty environment", () => {
    expect(resolveEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it("reads every setting from the environment", () => {
    const cfg = resolveEngineConfig({
      CHECKTREE_PARALLEL: "false",
      CHECKTREE_MAX_CONCURRENCY: "4",
      CHECKTREE_CONNECT_TIMEOUT_MS: "250",
      CHECKTREE_SAMPLE_INTERVAL_MS: "20",
      CHECKTREE_DEBUG: "yes",
    });
    expect(cfg).toEqual({
      parallel: false,
      maxConcurrency: 4,
      connectTimeoutMs: 250,
      sampleIntervalMs: 20,
      debug: true,
    });
  });

  it("treats empty values as unset", () => {
    expect(resolveEngineConfig({ CHECKTREE_CONNECT_TIMEOUT_MS: "" }).connectTimeoutMs).toBe(5000);
  });

  it("explicit overrides win over the environment", () => {
    const cfg = resolveEngineConfig({ CHECKTREE_MAX_CONCURRENCY: "4" }, { maxConcurrency: 1 });
    expect(cfg.maxConcurrency).toBe(1);
  });

  it("rejects malformed integers", () => {
    expect(() => resolveEngineConfig({ CHECKTREE_MAX_CONCURRENCY: "-1" })).toThrow(ConfigError);
    expect(() => resolveEngineConfig({ CHECKTREE_CONNECT_TIMEOUT_MS: "soon" })).toThrow(
      "Invalid integer for CHECKTREE_CONNECT_TIMEOUT_MS: soon"
    );
  });

  it("requires a sample interval of at least 1 ms", () => {
    expect(() => resolveEngineConfig({ CHECKTREE_SAMPLE_INTERVAL_MS: "0" })).toThrow(
      "Invalid integer for CHECKTREE_SAMPLE_INTERVAL_MS: 0"
    );
    expect(() => resolveEngineConfig({}, { sampleIntervalMs: 0 })).toThrow("Invalid sampleIntervalMs: 0");
    expect(resolveEngineConfig({ CHECKTREE_SAMPLE_INTERVAL_MS: "1" }).sampleIntervalMs).toBe(1);
  });

  it("rejects malformed booleans", () => {
    expect(() => resolveEngineConfig({ CHECKTREE_PARALLEL: "maybe" })).toThrow(
      "Invalid boolean for CHECKTREE_PARALLEL: maybe"
    );
  });
});
