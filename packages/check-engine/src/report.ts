// packages/check-engine/src/report.ts
//
// Flat listing of leaf outcomes, each with the path of configuration names
// leading to it.

import type { Severity } from "shared-types";
import type { PreparedComparison } from "./comparison";
import { getResultFromComparison } from "./execute";
import type { AnyPreparedConfiguration, FailedConfiguration } from "./prepared";

export type LeafResultRow = {
  path: string[];
  identifier: string | undefined;
  severity: Severity;
  reason: string | undefined;
};

function nodeName(node: AnyPreparedConfiguration): string {
  return node.config.name ?? node.config.type;
}

/** Configuration names from the root down to `item`, ending with its identifier when it has one. */
export function pathOf(item: AnyPreparedConfiguration | PreparedComparison | FailedConfiguration): string[] {
  const path: string[] = [];
  let node: AnyPreparedConfiguration | undefined;

  if (item.kind === "comparison") {
    path.push(item.identifier);
    node = item.parent;
  } else if (item.kind === "failed") {
    path.push(item.identifier ?? item.config.name ?? item.config.type);
    node = item.parent;
  } else {
    node = item;
  }

  while (node) {
    path.push(nodeName(node));
    node = node.parent;
  }
  return path.reverse();
}

/** One row per walked item under `node`, in walk order. */
export function listLeafResults(node: AnyPreparedConfiguration): LeafResultRow[] {
  const rows: LeafResultRow[] = [];
  for (const item of node.walkComparisons()) {
    const [, result] = getResultFromComparison(item);
    rows.push({
      path: pathOf(item),
      identifier: item.identifier,
      severity: result.severity,
      reason: result.reason,
    });
  }
  return rows;
}

export function formatLeafResults(rows: LeafResultRow[]): string {
  return rows
    .map((r) => `[${r.severity}] ${r.path.join(" / ")}${r.reason ? `: ${r.reason}` : ""}`)
    .join("\n");
}
