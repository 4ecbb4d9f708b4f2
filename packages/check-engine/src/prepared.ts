// packages/check-engine/src/prepared.ts
//
// Lowers a configuration tree into a prepared tree of the same shape, bound to
// live resources. A node that cannot bind becomes a FailedConfiguration in its
// parent's `prepareFailures`; its siblings are prepared as usual.

import type {
  AnyConfiguration,
  Comparison,
  ConfigurationGroup,
  DeviceConfiguration,
  DeviceDatabase,
  DeviceHandle,
  GroupResultMode,
  PointConfiguration,
  Result,
  Tool,
  ToolConfiguration,
} from "shared-types";
import type { DataCache } from "./cache";
import {
  comparisonLabel,
  PreparedSignalComparison,
  PreparedToolComparison,
  type PreparedComparison,
} from "./comparison";
import { describeError } from "./errors";
import { runComparisons, type RunOptions } from "./execute";
import { silentLogger, type Logger } from "./log";
import { combineSeverity, type FoldInput } from "./severity";

export type PrepareContext = {
  cache: DataCache;
  devices?: DeviceDatabase;
  logger?: Logger;
};

export type CompareOptions = RunOptions & {
  /** Drop cached data before running. */
  fresh?: boolean;
};

export type FailedConfiguration = {
  kind: "failed";
  parent: PreparedGroup | PreparedCheckNode | undefined;
  config: AnyConfiguration;
  /** Set when a single comparison failed to bind, rather than the whole node. */
  identifier?: string;
  reason: Result;
  error?: unknown;
};

export type WalkedComparison = PreparedComparison | FailedConfiguration;

export type AnyPreparedConfiguration =
  | PreparedGroup
  | PreparedDeviceConfiguration
  | PreparedPointConfiguration
  | PreparedToolConfiguration;

export type PreparedCheckNode = PreparedDeviceConfiguration | PreparedPointConfiguration | PreparedToolConfiguration;

export const PREPARE_FAILURE_REASON = "At least one configuration failed to initialize";

function typeTag(value: unknown): string {
  if (typeof value !== "object" || value === null || !("type" in value)) return "unknown";
  return String(value.type);
}

function foldResults(mode: GroupResultMode, results: FoldInput[], failures: FailedConfiguration[]): Result {
  if (failures.length > 0) return { severity: "error", reason: PREPARE_FAILURE_REASON };
  return { severity: combineSeverity(mode, results) };
}

function leafFailure(
  parent: PreparedCheckNode,
  identifier: string,
  comparison: Comparison,
  err: unknown,
  log: Logger
): FailedConfiguration {
  log.warn(`Failed to prepare comparison ${comparisonLabel(comparison)} for ${identifier}: ${describeError(err)}`);
  return {
    kind: "failed",
    parent,
    config: parent.config,
    identifier,
    reason: {
      severity: "error",
      reason: `Failed to prepare comparison ${comparisonLabel(comparison)} for ${identifier}: ${describeError(err)}`,
    },
    error: err,
  };
}

abstract class PreparedNode<TConfig extends AnyConfiguration> {
  prepareFailures: FailedConfiguration[] = [];
  /** Latest folded outcome; undefined until the first fold. */
  result: Result | undefined = undefined;

  constructor(
    public readonly cache: DataCache,
    public readonly config: TConfig,
    /** Non-owning; used for path reconstruction only. */
    public readonly parent: PreparedGroup | undefined
  ) {}

  abstract walkComparisons(): Generator<WalkedComparison, void, undefined>;

  abstract fold(): Result;

  /** Leaves reachable from this node, in walk order. */
  leaves(): PreparedComparison[] {
    const out: PreparedComparison[] = [];
    for (const item of this.walkComparisons()) {
      if (item.kind === "comparison") out.push(item);
    }
    return out;
  }

  /**
   * Run every reachable leaf, then fold this subtree. Data already in the
   * shared cache is reused unless `fresh` is set, which clears the cache first.
   */
  async compare(opts: CompareOptions = {}): Promise<Result> {
    if (opts.fresh) this.cache.clear();
    await runComparisons(this.leaves(), opts);
    return this.fold();
  }

  protected finish(result: Result): Result {
    this.result = result;
    return result;
  }
}

abstract class PreparedChecks<
  TConfig extends DeviceConfiguration | PointConfiguration | ToolConfiguration,
  TLeaf extends PreparedComparison
> extends PreparedNode<TConfig> {
  comparisons: TLeaf[] = [];

  *walkComparisons(): Generator<WalkedComparison, void, undefined> {
    yield* this.prepareFailures;
    yield* this.comparisons;
  }

  /** Leaves always combine in "all" mode. */
  fold(): Result {
    return this.finish(foldResults("all", this.comparisons.map((c) => c.result), this.prepareFailures));
  }
}

export class PreparedDeviceConfiguration extends PreparedChecks<DeviceConfiguration, PreparedSignalComparison> {
  readonly kind = "device" as const;

  constructor(
    cache: DataCache,
    config: DeviceConfiguration,
    parent: PreparedGroup | undefined,
    public readonly devices: DeviceHandle[]
  ) {
    super(cache, config, parent);
  }

  static async fromConfig(
    config: DeviceConfiguration,
    ctx: PrepareContext,
    parent?: PreparedGroup
  ): Promise<PreparedDeviceConfiguration | FailedConfiguration> {
    const log = ctx.logger ?? silentLogger;
    const devices: DeviceHandle[] = [];

    for (const devName of config.devices) {
      try {
        if (!ctx.devices) throw new Error("No device database configured");
        devices.push(await ctx.devices.resolve(devName));
      } catch (err) {
        log.warn(`Failed to load device ${devName}: ${describeError(err)}`);
        return {
          kind: "failed",
          parent,
          config,
          reason: { severity: "error", reason: `Failed to load device: ${devName}` },
          error: err,
        };
      }
    }

    return PreparedDeviceConfiguration.bind(config, devices, ctx, parent);
  }

  /** Prepare checks against device handles the caller already holds. */
  static fromDevices(
    devices: DeviceHandle[],
    byAttr: Record<string, Comparison[]>,
    shared: Comparison[],
    ctx: PrepareContext,
    parent?: PreparedGroup
  ): PreparedDeviceConfiguration {
    const config: DeviceConfiguration = { type: "device", devices: [], by_attr: byAttr, shared };
    return PreparedDeviceConfiguration.bind(config, devices, ctx, parent);
  }

  private static bind(
    config: DeviceConfiguration,
    devices: DeviceHandle[],
    ctx: PrepareContext,
    parent: PreparedGroup | undefined
  ): PreparedDeviceConfiguration {
    const log = ctx.logger ?? silentLogger;
    const prepared = new PreparedDeviceConfiguration(ctx.cache, config, parent, devices);

    for (const device of devices) {
      for (const [attr, comparisons] of Object.entries(config.by_attr)) {
        for (const comparison of [...comparisons, ...config.shared]) {
          try {
            prepared.comparisons.push(
              PreparedSignalComparison.fromDevice(device, attr, comparison, {
                cache: ctx.cache,
                parent: prepared,
                logger: log,
              })
            );
          } catch (err) {
            prepared.prepareFailures.push(leafFailure(prepared, `${device.name}.${attr}`, comparison, err, log));
          }
        }
      }
    }
    return prepared;
  }
}

export class PreparedPointConfiguration extends PreparedChecks<PointConfiguration, PreparedSignalComparison> {
  readonly kind = "point" as const;

  static fromConfig(config: PointConfiguration, ctx: PrepareContext, parent?: PreparedGroup): PreparedPointConfiguration {
    const log = ctx.logger ?? silentLogger;
    const prepared = new PreparedPointConfiguration(ctx.cache, config, parent);

    for (const [pointName, comparisons] of Object.entries(config.by_point)) {
      for (const comparison of [...comparisons, ...config.shared]) {
        try {
          prepared.comparisons.push(
            PreparedSignalComparison.fromPoint(pointName, comparison, { cache: ctx.cache, parent: prepared, logger: log })
          );
        } catch (err) {
          prepared.prepareFailures.push(leafFailure(prepared, pointName, comparison, err, log));
        }
      }
    }
    return prepared;
  }

  static fromPoints(
    byPoint: Record<string, Comparison[]>,
    shared: Comparison[],
    ctx: PrepareContext,
    parent?: PreparedGroup
  ): PreparedPointConfiguration {
    return PreparedPointConfiguration.fromConfig({ type: "point", by_point: byPoint, shared }, ctx, parent);
  }
}

export class PreparedToolConfiguration extends PreparedChecks<ToolConfiguration, PreparedToolComparison> {
  readonly kind = "tool" as const;

  /** Every leaf shares `config.tool`, so the cache runs it once per pass. */
  static fromConfig(config: ToolConfiguration, ctx: PrepareContext, parent?: PreparedGroup): PreparedToolConfiguration {
    const log = ctx.logger ?? silentLogger;
    const prepared = new PreparedToolConfiguration(ctx.cache, config, parent);

    for (const [resultKey, comparisons] of Object.entries(config.by_attr)) {
      for (const comparison of [...comparisons, ...config.shared]) {
        try {
          prepared.comparisons.push(
            PreparedToolComparison.fromTool(config.tool, resultKey, comparison, { cache: ctx.cache, parent: prepared, logger: log })
          );
        } catch (err) {
          prepared.prepareFailures.push(leafFailure(prepared, resultKey, comparison, err, log));
        }
      }
    }
    return prepared;
  }

  static fromTool(
    tool: Tool,
    byAttr: Record<string, Comparison[]>,
    shared: Comparison[],
    ctx: PrepareContext,
    parent?: PreparedGroup
  ): PreparedToolConfiguration {
    return PreparedToolConfiguration.fromConfig({ type: "tool", tool, by_attr: byAttr, shared }, ctx, parent);
  }
}

export class PreparedGroup extends PreparedNode<ConfigurationGroup> {
  readonly kind = "group" as const;
  configs: AnyPreparedConfiguration[] = [];

  static async fromGroup(group: ConfigurationGroup, ctx: PrepareContext, parent?: PreparedGroup): Promise<PreparedGroup> {
    const log = ctx.logger ?? silentLogger;
    const prepared = new PreparedGroup(ctx.cache, group, parent);

    for (const config of group.configs) {
      let child: AnyPreparedConfiguration | FailedConfiguration;
      try {
        child = await prepareConfiguration(config, ctx, prepared);
      } catch (err) {
        log.warn(`Failed to prepare configuration ${config.name ?? config.type}: ${describeError(err)}`);
        child = {
          kind: "failed",
          parent: prepared,
          config,
          reason: { severity: "internal_error", reason: `Preparation raised ${describeError(err)}` },
          error: err,
        };
      }

      if (child.kind === "failed") prepared.prepareFailures.push(child);
      else prepared.configs.push(child);
    }
    return prepared;
  }

  /** Direct child groups. */
  get subgroups(): PreparedGroup[] {
    return this.configs.filter((c): c is PreparedGroup => c.kind === "group");
  }

  /** Descendant groups, pre-order; this group itself is not included. */
  *walkGroups(): Generator<PreparedGroup, void, undefined> {
    for (const config of this.configs) {
      if (config.kind === "group") {
        yield config;
        yield* config.walkGroups();
      }
    }
  }

  *walkComparisons(): Generator<WalkedComparison, void, undefined> {
    yield* this.prepareFailures;
    for (const config of this.configs) {
      yield* config.walkComparisons();
    }
  }

  fold(): Result {
    const results = this.configs.map((c) => c.fold());
    return this.finish(foldResults(this.config.mode, results, this.prepareFailures));
  }
}

/** Dispatch over the closed set of configuration variants. */
export async function prepareConfiguration(
  config: AnyConfiguration,
  ctx: PrepareContext,
  parent?: PreparedGroup
): Promise<AnyPreparedConfiguration | FailedConfiguration> {
  switch (config.type) {
    case "group":
      return PreparedGroup.fromGroup(config, ctx, parent);
    case "device":
      return PreparedDeviceConfiguration.fromConfig(config, ctx, parent);
    case "point":
      return PreparedPointConfiguration.fromConfig(config, ctx, parent);
    case "tool":
      return PreparedToolConfiguration.fromConfig(config, ctx, parent);
    default: {
      const unsupported: never = config;
      return {
        kind: "failed",
        parent,
        config: unsupported,
        reason: {
          severity: "internal_error",
          reason: `Configuration type unsupported: ${typeTag(unsupported)}`,
        },
      };
    }
  }
}
