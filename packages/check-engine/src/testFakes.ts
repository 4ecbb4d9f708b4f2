// packages/check-engine/src/testFakes.ts
//
// In-process stand-ins for signals, devices, tools and comparisons. Test-only.

import type { SchemaObject } from "ajv";
import type { Comparison, DeviceDatabase, DeviceHandle, Result, Severity, SignalHandle } from "shared-types";
import { SchemaTool } from "./tools";

export type FakeSignalOptions = {
  /** Returned by every read unless `values` is set. */
  value?: unknown;
  /** Returned in order; the last one repeats. */
  values?: unknown[];
  delayMs?: number;
  connectError?: unknown;
  readError?: unknown;
  /** connect() never settles. */
  hangConnect?: boolean;
  /** Values pushed to subscribers, one every `emitEveryMs`. */
  emit?: unknown[];
  emitEveryMs?: number;
};

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export class FakeSignal implements SignalHandle {
  connects = 0;
  reads = 0;
  subscriptions = 0;
  subscribe?: (listener: (value: unknown) => void) => () => void;

  constructor(
    public readonly name: string,
    private readonly opts: FakeSignalOptions = {}
  ) {
    const emit = opts.emit;
    if (emit) {
      this.subscribe = (listener) => {
        this.subscriptions += 1;
        const every = opts.emitEveryMs ?? 5;
        const timers = emit.map((v, i) => setTimeout(() => listener(v), every * (i + 1)));
        return () => timers.forEach((t) => clearTimeout(t));
      };
    }
  }

  async connect(_timeoutMs: number): Promise<void> {
    this.connects += 1;
    if (this.opts.hangConnect) return new Promise<void>(() => undefined);
    if (this.opts.connectError !== undefined) throw this.opts.connectError;
  }

  async read(): Promise<unknown> {
    const idx = this.reads;
    this.reads += 1;
    if (this.opts.delayMs) await sleep(this.opts.delayMs);
    if (this.opts.readError !== undefined) throw this.opts.readError;
    const values = this.opts.values;
    if (values && values.length > 0) return values[Math.min(idx, values.length - 1)];
    return this.opts.value;
  }
}

export function fakeDevice(name: string, components: DeviceHandle["components"]): DeviceHandle {
  return { name, components };
}

export function fakeDeviceDatabase(devices: DeviceHandle[]): DeviceDatabase & { lookups: string[] } {
  const lookups: string[] = [];
  return {
    lookups,
    resolve(name: string): DeviceHandle {
      lookups.push(name);
      const found = devices.find((d) => d.name === name);
      if (!found) throw new Error(`Device not found: ${name}`);
      return found;
    },
  };
}

export class FakeTool extends SchemaTool {
  runs = 0;

  constructor(
    type: string,
    resultSchema: SchemaObject,
    private readonly produce: () => unknown | Promise<unknown>
  ) {
    super(type, resultSchema);
  }

  protected async execute(): Promise<unknown> {
    this.runs += 1;
    return this.produce();
  }
}

type ComparisonPolicy = Partial<Pick<Comparison, "name" | "if_disconnected" | "severity_on_failure" | "reduce_period" | "reduce_method" | "string">>;

/** Always reports `severity`, whatever the value. */
export function fixedComparison(severity: Severity, policy: ComparisonPolicy = {}): Comparison {
  return {
    if_disconnected: "error",
    severity_on_failure: "error",
    ...policy,
    evaluate: (): Result => ({ severity }),
  };
}

/** success when the value equals `expected`, else error; records every value it sees. */
export function equalsComparison(expected: unknown, policy: ComparisonPolicy = {}): Comparison & { seen: unknown[] } {
  const seen: unknown[] = [];
  return {
    if_disconnected: "error",
    severity_on_failure: "error",
    ...policy,
    seen,
    evaluate: (value: unknown, identifier: string): Result => {
      seen.push(value);
      if (value === expected) return { severity: "success" };
      return { severity: "error", reason: `${identifier}: ${String(value)} != ${String(expected)}` };
    },
  };
}

export function throwingComparison(message: string, policy: ComparisonPolicy = {}): Comparison {
  return {
    if_disconnected: "error",
    severity_on_failure: "error",
    ...policy,
    evaluate: (): Result => {
      throw new Error(message);
    },
  };
}
