// packages/check-engine/src/file.ts
//
// Read-only lookups over a configuration file, and the prepared counterpart
// that owns the session's cache and runs whole-file passes.

import type {
  AnyConfiguration,
  ConfigurationFile,
  ConfigurationGroup,
  DeviceConfiguration,
  DeviceDatabase,
  PointConfiguration,
  Result,
  SignalFactory,
} from "shared-types";
import { DataCache } from "./cache";
import type { PreparedComparison } from "./comparison";
import { resolveEngineConfig, type EngineConfig } from "./config";
import { laneLimit, runBounded, runComparisons, type RunOptions } from "./execute";
import { describeError } from "./errors";
import { createLogger, type Logger } from "./log";
import { PreparedGroup, type CompareOptions, type WalkedComparison } from "./prepared";

/** Descendants of `group`, pre-order. The group itself is not yielded. */
export function* walkConfigs(group: ConfigurationGroup): Generator<AnyConfiguration, void, undefined> {
  for (const config of group.configs) {
    yield config;
    if (config.type === "group") yield* walkConfigs(config);
  }
}

/** Every configuration in the file, starting with the root group. */
export function* walkFileConfigs(file: ConfigurationFile): Generator<AnyConfiguration, void, undefined> {
  yield file.root;
  yield* walkConfigs(file.root);
}

export function* getByDevice(file: ConfigurationFile, name: string): Generator<DeviceConfiguration, void, undefined> {
  for (const config of walkFileConfigs(file)) {
    if (config.type === "device" && config.devices.includes(name)) yield config;
  }
}

export function* getByPoint(file: ConfigurationFile, pointName: string): Generator<PointConfiguration, void, undefined> {
  for (const config of walkFileConfigs(file)) {
    if (config.type === "point" && Object.prototype.hasOwnProperty.call(config.by_point, pointName)) yield config;
  }
}

/** Configurations sharing at least one tag with `tags`. No tags, no matches. */
export function* getByTag(file: ConfigurationFile, ...tags: string[]): Generator<AnyConfiguration, void, undefined> {
  if (tags.length === 0) return;
  const tagSet = new Set(tags);
  for (const config of walkFileConfigs(file)) {
    if ((config.tags ?? []).some((t) => tagSet.has(t))) yield config;
  }
}

export type PrepareFileOptions = {
  devices?: DeviceDatabase;
  /** Share a cache between files; a fresh one is built otherwise. */
  cache?: DataCache;
  signalFactory?: SignalFactory;
  config?: EngineConfig;
  logger?: Logger;
};

export class PreparedFile {
  private constructor(
    public readonly file: ConfigurationFile,
    public readonly cache: DataCache,
    public readonly root: PreparedGroup,
    public readonly engineConfig: EngineConfig,
    private readonly log: Logger
  ) {}

  static async fromConfig(file: ConfigurationFile, opts: PrepareFileOptions = {}): Promise<PreparedFile> {
    const engineConfig = opts.config ?? resolveEngineConfig();
    const logger = opts.logger ?? createLogger({ debug: engineConfig.debug });
    const cache =
      opts.cache ??
      new DataCache({
        signalFactory: opts.signalFactory,
        connectTimeoutMs: engineConfig.connectTimeoutMs,
        sampleIntervalMs: engineConfig.sampleIntervalMs,
        logger,
      });

    const root = await PreparedGroup.fromGroup(file.root, { cache, devices: opts.devices, logger });
    return new PreparedFile(file, cache, root, engineConfig, logger);
  }

  *walkComparisons(): Generator<WalkedComparison, void, undefined> {
    yield* this.root.walkComparisons();
  }

  /** The root group, then every descendant group, pre-order. */
  *walkGroups(): Generator<PreparedGroup, void, undefined> {
    yield this.root;
    yield* this.root.walkGroups();
  }

  /**
   * Fetch every leaf's data into the cache without running any comparison.
   * A failed fetch stays cached as a rejection for the leaf to report.
   */
  async fillCache(opts: RunOptions = {}): Promise<void> {
    const leaves = this.root.leaves();
    const fetch = async (leaf: PreparedComparison): Promise<void> => {
      try {
        await leaf.getDataAsync();
      } catch (err) {
        this.log.debug(`Prefetch for ${leaf.identifier} failed: ${describeError(err)}`);
      }
    };

    if (!(opts.parallel ?? this.engineConfig.parallel)) {
      for (const leaf of leaves) await fetch(leaf);
      return;
    }
    await runBounded(leaves, laneLimit(leaves.length, opts.maxConcurrency ?? this.engineConfig.maxConcurrency), fetch);
  }

  /**
   * One full pass: drop cached data, run every leaf, fold the root. The
   * root's result is the file verdict. Pass `fresh: false` to compare against
   * data loaded by `fillCache`.
   */
  async compare(opts: CompareOptions = {}): Promise<Result> {
    if (opts.fresh ?? true) this.cache.clear();
    await runComparisons(this.root.leaves(), {
      parallel: opts.parallel ?? this.engineConfig.parallel,
      maxConcurrency: opts.maxConcurrency ?? this.engineConfig.maxConcurrency,
    });
    return this.root.fold();
  }
}
