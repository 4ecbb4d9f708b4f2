// packages/check-engine/src/cache.ts
//
// Single point of truth for "fetch the current value of X" within one session.
// Overlapping requests for the same source share one in-flight fetch.

import type { ReduceMethod, SignalFactory, SignalHandle, Tool, ToolResult } from "shared-types";
import { DEFAULT_ENGINE_CONFIG } from "./config";
import { ConnectionError, ConnectionTimeoutError, describeError } from "./errors";
import { silentLogger, type Logger } from "./log";
import { DEFAULT_REDUCE_METHOD, isNoData, reduceSamples } from "./reduce";

export type SignalReadOptions = {
  /** Seconds; unset or 0 reads a single value. */
  reducePeriod?: number;
  reduceMethod?: ReduceMethod;
  string?: boolean;
};

export type DataCacheOptions = {
  signalFactory?: SignalFactory;
  connectTimeoutMs?: number;
  sampleIntervalMs?: number;
  logger?: Logger;
};

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

async function withTimeout<T>(p: Promise<T>, ms: number, message: string): Promise<T> {
  let t: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    t = setTimeout(() => reject(new ConnectionTimeoutError(message)), ms);
  });
  try {
    return await Promise.race([p, timeout]);
  } finally {
    clearTimeout(t);
  }
}

function windowKey(opts: SignalReadOptions): string {
  const period = opts.reducePeriod && opts.reducePeriod > 0 ? opts.reducePeriod : 0;
  const method = period > 0 ? opts.reduceMethod ?? DEFAULT_REDUCE_METHOD : "single";
  return `${period}|${method}|${opts.string === true ? "string" : "raw"}`;
}

export class DataCache {
  readonly connectTimeoutMs: number;
  readonly sampleIntervalMs: number;

  private readonly signalFactory: SignalFactory | undefined;
  private readonly log: Logger;
  private readonly signals = new Map<string, SignalHandle>();
  private readonly signalData = new Map<SignalHandle, Map<string, Promise<unknown>>>();
  private readonly toolData = new Map<Tool, Promise<ToolResult>>();

  constructor(opts: DataCacheOptions = {}) {
    this.signalFactory = opts.signalFactory;
    this.connectTimeoutMs = opts.connectTimeoutMs ?? DEFAULT_ENGINE_CONFIG.connectTimeoutMs;
    this.sampleIntervalMs = Math.max(1, opts.sampleIntervalMs ?? DEFAULT_ENGINE_CONFIG.sampleIntervalMs);
    this.log = opts.logger ?? silentLogger;
  }

  /** The session's handle for a point name, created on first use. */
  signalFor(name: string): SignalHandle {
    const existing = this.signals.get(name);
    if (existing) return existing;
    if (!this.signalFactory) throw new Error(`No signal factory configured; cannot create signal ${name}`);
    const signal = this.signalFactory(name);
    this.signals.set(name, signal);
    return signal;
  }

  /**
   * Lookup and insert happen in the same synchronous turn, so concurrent
   * callers with the same key always receive the same promise.
   */
  getSignalData(signal: SignalHandle, opts: SignalReadOptions = {}): Promise<unknown> {
    const key = windowKey(opts);
    let byWindow = this.signalData.get(signal);
    if (!byWindow) {
      byWindow = new Map();
      this.signalData.set(signal, byWindow);
    }

    const pending = byWindow.get(key);
    if (pending) return pending;

    const fetched = this.fetchSignal(signal, opts);
    byWindow.set(key, fetched);
    return fetched;
  }

  getToolData(tool: Tool): Promise<ToolResult> {
    const pending = this.toolData.get(tool);
    if (pending) return pending;

    this.log.debug("running tool", tool.type);
    const ran = (async () => tool.run())();
    this.toolData.set(tool, ran);
    return ran;
  }

  /** Drop every fetched value; the next request fetches again. */
  clear(): void {
    this.signalData.clear();
    this.toolData.clear();
  }

  private async fetchSignal(signal: SignalHandle, opts: SignalReadOptions): Promise<unknown> {
    this.log.debug("fetching", signal.name, windowKey(opts));
    await this.connect(signal);

    const period = opts.reducePeriod ?? 0;
    const value =
      period > 0
        ? reduceSamples(await this.collectSamples(signal, period * 1000), opts.reduceMethod ?? DEFAULT_REDUCE_METHOD)
        : await signal.read();

    if (opts.string === true && !isNoData(value)) return String(value);
    return value;
  }

  /** Every connect failure surfaces as a disconnect-class error. */
  private async connect(signal: SignalHandle): Promise<void> {
    try {
      await withTimeout(
        signal.connect(this.connectTimeoutMs),
        this.connectTimeoutMs,
        `Timed out after ${this.connectTimeoutMs} ms connecting to ${signal.name}`
      );
    } catch (err) {
      if (err instanceof ConnectionTimeoutError || err instanceof ConnectionError) throw err;
      throw new ConnectionError(`Unable to connect to ${signal.name}: ${describeError(err)}`, { cause: err });
    }
  }

  private async collectSamples(signal: SignalHandle, periodMs: number): Promise<unknown[]> {
    const samples: unknown[] = [await signal.read()];

    if (signal.subscribe) {
      const unsubscribe = signal.subscribe((v) => {
        samples.push(v);
      });
      try {
        await sleep(periodMs);
      } finally {
        unsubscribe();
      }
      return samples;
    }

    const deadline = Date.now() + periodMs;
    while (Date.now() + this.sampleIntervalMs <= deadline) {
      await sleep(this.sampleIntervalMs);
      samples.push(await signal.read());
    }
    return samples;
  }
}
