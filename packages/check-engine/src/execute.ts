// packages/check-engine/src/execute.ts
//
// Leaf fan-out. Every leaf turns its own fault into a Result before the join,
// so one failing leaf never cancels its siblings.

import type { Result } from "shared-types";
import type { PreparedComparison } from "./comparison";
import { DEFAULT_ENGINE_CONFIG } from "./config";
import type { FailedConfiguration } from "./prepared";
import { resultFromError } from "./severity";

export type RunOptions = {
  parallel?: boolean;
  /** 0 or unset: no bound. */
  maxConcurrency?: number;
};

/**
 * Drain `items` through at most `limit` lanes. The lanes share one iterator,
 * so each item is taken exactly once; results keep input order.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, idx: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.entries();
  const lanes = Math.max(1, Math.min(Math.floor(limit), items.length));

  const drain = async (): Promise<void> => {
    for (const [idx, item] of queue) results[idx] = await fn(item, idx);
  };
  await Promise.all(Array.from({ length: lanes }, drain));
  return results;
}

/** Lane count for a parallel run: `maxConcurrency`, or one lane per item when unset or 0. */
export function laneLimit(count: number, maxConcurrency: number | undefined): number {
  return maxConcurrency && maxConcurrency > 0 ? maxConcurrency : count;
}

async function runLeaf(leaf: PreparedComparison): Promise<Result> {
  try {
    return await leaf.compare();
  } catch (err) {
    const result = resultFromError(err);
    leaf.result = result;
    return result;
  }
}

/** Run leaves concurrently, or one at a time when `parallel` is false. Results keep input order. */
export async function runComparisons(leaves: PreparedComparison[], opts: RunOptions = {}): Promise<Result[]> {
  const parallel = opts.parallel ?? DEFAULT_ENGINE_CONFIG.parallel;
  if (!parallel) {
    const out: Result[] = [];
    for (const leaf of leaves) out.push(await runLeaf(leaf));
    return out;
  }

  return runBounded(leaves, laneLimit(leaves.length, opts.maxConcurrency), (leaf) => runLeaf(leaf));
}

const NOT_RUN: Result = { severity: "internal_error", reason: "no result available (comparison not run?)" };

/** The result carried by a walked item, with a stand-in for items that never ran. */
export function getResultFromComparison(
  item: PreparedComparison | FailedConfiguration | undefined
): [PreparedComparison | undefined, Result] {
  if (item === undefined) return [undefined, { ...NOT_RUN }];
  if (item.kind === "failed") return [undefined, item.reason];
  if (item.result === undefined) return [item, { ...NOT_RUN }];
  return [item, item.result];
}
