// packages/check-engine/src/comparison.ts
//
// Leaf execution units: one identifier, one comparison, one live source.

import type { Comparison, DeviceHandle, Result, SignalHandle, Tool, ToolResult } from "shared-types";
import type { DataCache } from "./cache";
import { AttributeResolutionError, describeError, isDisconnectError } from "./errors";
import { silentLogger, type Logger } from "./log";
import { isNoData } from "./reduce";
import type {
  PreparedDeviceConfiguration,
  PreparedPointConfiguration,
  PreparedToolConfiguration,
} from "./prepared";

export type ComparisonParent = PreparedDeviceConfiguration | PreparedPointConfiguration | PreparedToolConfiguration;

export type BindOptions = {
  cache: DataCache;
  parent?: ComparisonParent;
  name?: string;
  logger?: Logger;
};

export function comparisonLabel(c: Comparison): string {
  return c.name ? `"${c.name}"` : "(unnamed)";
}

export function isDeviceHandle(c: SignalHandle | DeviceHandle): c is DeviceHandle {
  return "components" in c;
}

/** Walk a dotted attribute path ("sub_device.component") down to a signal. */
export function resolveComponent(device: DeviceHandle, attr: string): SignalHandle {
  const fullAttr = `${device.name}.${attr}`;
  let current: SignalHandle | DeviceHandle = device;

  for (const part of attr.split(".")) {
    if (!isDeviceHandle(current)) {
      throw new AttributeResolutionError(`Attribute ${fullAttr} does not exist: ${current.name} has no components`);
    }
    const next: SignalHandle | DeviceHandle | undefined = Object.prototype.hasOwnProperty.call(current.components, part)
      ? current.components[part]
      : undefined;
    if (!next) {
      throw new AttributeResolutionError(`Attribute ${fullAttr} does not exist on device ${device.name}`);
    }
    current = next;
  }

  if (isDeviceHandle(current)) {
    throw new AttributeResolutionError(`Attribute ${fullAttr} is a device, not a signal`);
  }
  return current;
}

export abstract class PreparedComparison<TData = unknown> {
  readonly kind = "comparison" as const;
  /** Latest outcome; overwritten on every run. */
  result: Result | undefined = undefined;
  data: TData | undefined = undefined;

  constructor(
    public readonly cache: DataCache,
    public readonly identifier: string,
    public readonly comparison: Comparison,
    public readonly parent: ComparisonParent | undefined,
    public readonly name: string | undefined
  ) {}

  abstract getDataAsync(): Promise<TData>;

  protected abstract compareData(data: TData): Promise<Result>;

  async compare(): Promise<Result> {
    const label = comparisonLabel(this.comparison);
    this.data = undefined;

    let data: TData;
    try {
      data = await this.getDataAsync();
    } catch (err) {
      if (isDisconnectError(err)) {
        return this.finish({
          severity: this.comparison.if_disconnected,
          reason: `Unable to retrieve data for comparison: ${this.identifier}`,
        });
      }
      return this.finish({
        severity: "internal_error",
        reason: `Getting data for "${this.identifier}" comparison ${label} raised ${describeError(err)}`,
      });
    }

    this.data = data;
    if (isNoData(data)) {
      return this.finish({
        severity: this.comparison.if_disconnected,
        reason: `No data available for "${this.identifier}" in comparison ${label}`,
      });
    }

    try {
      return this.finish(await this.compareData(data));
    } catch (err) {
      return this.finish({
        severity: "internal_error",
        reason: `Failed to run "${this.identifier}" comparison ${label}: ${describeError(err)}`,
      });
    }
  }

  private finish(result: Result): Result {
    this.result = result;
    return result;
  }
}

export class PreparedSignalComparison extends PreparedComparison<unknown> {
  constructor(
    cache: DataCache,
    identifier: string,
    comparison: Comparison,
    public readonly signal: SignalHandle,
    public readonly device: DeviceHandle | undefined,
    parent: ComparisonParent | undefined,
    name: string | undefined
  ) {
    super(cache, identifier, comparison, parent, name);
  }

  getDataAsync(): Promise<unknown> {
    return this.cache.getSignalData(this.signal, {
      reducePeriod: this.comparison.reduce_period,
      reduceMethod: this.comparison.reduce_method,
      string: this.comparison.string ?? false,
    });
  }

  protected async compareData(data: unknown): Promise<Result> {
    return this.comparison.evaluate(data, this.identifier);
  }

  /** Throws AttributeResolutionError when the attribute is absent. */
  static fromDevice(device: DeviceHandle, attr: string, comparison: Comparison, opts: BindOptions): PreparedSignalComparison {
    const identifier = `${device.name}.${attr}`;
    (opts.logger ?? silentLogger).debug(`Checking ${identifier} with comparison ${comparisonLabel(comparison)}`);
    const signal = resolveComponent(device, attr);
    return new PreparedSignalComparison(opts.cache, identifier, comparison, signal, device, opts.parent, opts.name);
  }

  /** The point's existence is only checked when its data is fetched. */
  static fromPoint(pointName: string, comparison: Comparison, opts: BindOptions): PreparedSignalComparison {
    const signal = opts.cache.signalFor(pointName);
    return new PreparedSignalComparison(opts.cache, pointName, comparison, signal, undefined, opts.parent, opts.name);
  }
}

export class PreparedToolComparison extends PreparedComparison<ToolResult> {
  constructor(
    cache: DataCache,
    identifier: string,
    comparison: Comparison,
    public readonly tool: Tool,
    parent: ComparisonParent | undefined,
    name: string | undefined
  ) {
    super(cache, identifier, comparison, parent, name);
  }

  getDataAsync(): Promise<ToolResult> {
    return this.cache.getToolData(this.tool);
  }

  /** Any throw from `lookup` counts as a missing key. */
  protected async compareData(data: ToolResult): Promise<Result> {
    let value: unknown;
    try {
      value = data.lookup(this.identifier);
    } catch (err) {
      return {
        severity: this.comparison.severity_on_failure,
        reason: `Provided key is invalid for tool result ${this.tool.type} "${this.identifier}": ${describeError(err)} (in comparison ${comparisonLabel(this.comparison)})`,
      };
    }
    return this.comparison.evaluate(value, this.identifier);
  }

  /** Validates the result key up front; an illegal key throws. */
  static fromTool(tool: Tool, resultKey: string, comparison: Comparison, opts: BindOptions): PreparedToolComparison {
    tool.validateResultKey(resultKey);
    return new PreparedToolComparison(opts.cache, resultKey, comparison, tool, opts.parent, opts.name);
  }
}
