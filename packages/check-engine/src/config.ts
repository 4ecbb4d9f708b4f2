// packages/check-engine/src/config.ts
//
// Engine settings: defaults, environment overrides, explicit overrides (in
// increasing precedence).

import { ConfigError } from "./errors";

export type EngineConfig = {
  /** Fan leaves out concurrently; false awaits them one at a time. */
  parallel: boolean;
  /** Upper bound on in-flight leaves when parallel; 0 means unbounded. */
  maxConcurrency: number;
  connectTimeoutMs: number;
  /** Poll interval for reduced reads on signals without a monitor; at least 1. */
  sampleIntervalMs: number;
  debug: boolean;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  parallel: true,
  maxConcurrency: 0,
  connectTimeoutMs: 5000,
  sampleIntervalMs: 100,
  debug: false,
};

const ENV_PARALLEL = "CHECKTREE_PARALLEL";
const ENV_MAX_CONCURRENCY = "CHECKTREE_MAX_CONCURRENCY";
const ENV_CONNECT_TIMEOUT_MS = "CHECKTREE_CONNECT_TIMEOUT_MS";
const ENV_SAMPLE_INTERVAL_MS = "CHECKTREE_SAMPLE_INTERVAL_MS";
const ENV_DEBUG = "CHECKTREE_DEBUG";

type Env = Record<string, string | undefined>;

function isTruthy(val: string | undefined): boolean {
  return val === "1" || val === "true" || val === "yes";
}

function isFalsy(val: string | undefined): boolean {
  return val === "0" || val === "false" || val === "no";
}

function parseBoolEnv(env: Env, name: string, def: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === "") return def;
  if (isTruthy(raw)) return true;
  if (isFalsy(raw)) return false;
  throw new ConfigError(`Invalid boolean for ${name}: ${raw}`);
}

function parseIntEnv(env: Env, name: string, def: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return def;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n < min) throw new ConfigError(`Invalid integer for ${name}: ${raw}`);
  return n;
}

export function resolveEngineConfig(env: Env = process.env, overrides: Partial<EngineConfig> = {}): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;
  const cfg: EngineConfig = {
    parallel: parseBoolEnv(env, ENV_PARALLEL, d.parallel),
    maxConcurrency: parseIntEnv(env, ENV_MAX_CONCURRENCY, d.maxConcurrency),
    connectTimeoutMs: parseIntEnv(env, ENV_CONNECT_TIMEOUT_MS, d.connectTimeoutMs),
    sampleIntervalMs: parseIntEnv(env, ENV_SAMPLE_INTERVAL_MS, d.sampleIntervalMs, 1),
    debug: parseBoolEnv(env, ENV_DEBUG, d.debug),
    ...overrides,
  };
  if (!(cfg.sampleIntervalMs >= 1)) throw new ConfigError(`Invalid sampleIntervalMs: ${cfg.sampleIntervalMs}`);
  return cfg;
}
