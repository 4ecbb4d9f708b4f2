// packages/check-engine/src/reduce.ts
//
// Time-window reduction of signal samples into a single comparison value.

import type { ReduceMethod } from "shared-types";
import { ReductionError } from "./errors";

export const DEFAULT_REDUCE_METHOD: ReduceMethod = "average";

export function isNoData(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

function asNumbers(samples: unknown[], method: ReduceMethod): number[] {
  return samples.map((s) => {
    const n = typeof s === "boolean" ? Number(s) : s;
    if (typeof n !== "number" || Number.isNaN(n)) {
      throw new ReductionError(`Cannot apply reduce method "${method}" to non-numeric sample: ${String(s)}`);
    }
    return n;
  });
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid] ?? 0;
  return ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2;
}

/** Population standard deviation. */
function std(values: number[]): number {
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  const variance = values.reduce((s, v) => s + (v - mean) * (v - mean), 0) / values.length;
  return Math.sqrt(variance);
}

/** Reduce samples; an empty window has no data. */
export function reduceSamples(samples: unknown[], method: ReduceMethod): unknown {
  const present = samples.filter((s) => !isNoData(s));
  if (present.length === 0) return undefined;
  if (method === "latest") return present[present.length - 1];

  const values = asNumbers(present, method);
  switch (method) {
    case "average":
      return values.reduce((s, v) => s + v, 0) / values.length;
    case "median":
      return median(values);
    case "sum":
      return values.reduce((s, v) => s + v, 0);
    case "min":
      return Math.min(...values);
    case "max":
      return Math.max(...values);
    case "std":
      return std(values);
    default: {
      const unknownMethod: never = method;
      throw new ReductionError(`Unknown reduce method: ${String(unknownMethod)}`);
    }
  }
}
