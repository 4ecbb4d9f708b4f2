// packages/check-engine/src/severity.ts
//
// Severity ordering and the group fold rule. Pure functions, no I/O.

import type { GroupResultMode, Result, Severity } from "shared-types";
import { describeError } from "./errors";

export const SEVERITIES: readonly Severity[] = ["success", "warning", "error", "internal_error"];

export function severityRank(s: Severity): number {
  if (s === "internal_error") return 3;
  if (s === "error") return 2;
  if (s === "warning") return 1;
  return 0;
}

export function maxSeverity(severities: Severity[]): Severity {
  let best: Severity = "success";
  for (const s of severities) {
    if (severityRank(s) > severityRank(best)) best = s;
  }
  return best;
}

/** Minimum of a non-empty list; an empty list is success. */
export function minSeverity(severities: Severity[]): Severity {
  if (severities.length === 0) return "success";
  let best: Severity = "internal_error";
  for (const s of severities) {
    if (severityRank(s) < severityRank(best)) best = s;
  }
  return best;
}

export type FoldInput = Result | Error | undefined;

/**
 * Fold child outcomes by mode. An Error or missing entry forces "error";
 * "all" takes the worst severity, "any" the best.
 */
export function combineSeverity(mode: GroupResultMode, results: FoldInput[]): Severity {
  if (results.some((r) => r === undefined || r instanceof Error)) return "error";

  const severities = results.filter((r): r is Result => r !== undefined && !(r instanceof Error)).map((r) => r.severity);

  if (mode === "all") return maxSeverity(severities);
  if (mode === "any") return minSeverity(severities);
  return "internal_error";
}

export function resultFromError(e: unknown): Result {
  return { severity: "internal_error", reason: describeError(e) };
}
