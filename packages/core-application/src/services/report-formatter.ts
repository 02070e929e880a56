import { STATUS_ORDER, type SyncStatus, type TimestampOrder } from "@deploy-guard/core-domain";

import type { ClassifiedRecord } from "../value-objects/classification";
import { isFailure, type DeployOutcome } from "../value-objects/deploy-outcome";

const STATUS_WIDTH = 15;
const MIN_PATH_WIDTH = 40;

export const STATUS_LABELS: Record<SyncStatus, string> = {
  MATCH_LOCAL: "MATCH LOCAL",
  MATCH_REFERENCE: "MATCH REF",
  MATCH_LAST_DEPLOY: "MATCH DEPLOY",
  DIFF_HASH: "DIFF HASH",
  MISSING: "MISSING",
  MATCH_SIZE: "MATCH (Size)",
  DIFF_SIZE: "DIFF SIZE",
  UNKNOWN: "UNKNOWN",
};

const ORDER_SYMBOLS: Record<TimestampOrder, string> = {
  newer: ">",
  older: "<",
  equal: "=",
  unknown: "?",
};

function pad2(n: number) {
  return String(n).padStart(2, "0");
}

/** `YYYY-MM-DD HH:MM:SS` in UTC, or `N/A`. */
export function formatReportTimestamp(d: Date | null): string {
  if (!d || Number.isNaN(d.getTime())) return "N/A";
  const date = `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}`;
  return `${date} ${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}:${pad2(d.getUTCSeconds())}`;
}

export function formatDetails(c: ClassifiedRecord): string {
  const { details } = c;

  switch (c.status) {
    case "MISSING":
      return "";
    case "MATCH_SIZE":
      return `Size: ${details.localSize ?? "?"}`;
    case "DIFF_SIZE":
      return `Local: ${details.localSize ?? "?"} vs Remote: ${details.remoteSize ?? "?"} (possible line-ending diff)`;
    case "UNKNOWN":
      return "Cannot compare size";
    case "DIFF_HASH":
    case "MATCH_LOCAL":
    case "MATCH_REFERENCE":
    case "MATCH_LAST_DEPLOY": {
      const local = formatReportTimestamp(details.localModifiedAt);
      const remote = formatReportTimestamp(details.remoteModifiedAt);
      let out = `[L: ${local} ${ORDER_SYMBOLS[details.timestampOrder]} R: ${remote}]`;

      const { localSize, remoteSize } = details;
      if (c.status !== "DIFF_HASH" && localSize !== null && remoteSize !== null && localSize !== remoteSize) {
        out += ` (sizes differ: local ${localSize}, remote ${remoteSize}; line endings only)`;
      }
      return out;
    }
  }
}

export class ReportTable {
  readonly pathWidth: number;

  constructor(paths: readonly string[]) {
    this.pathWidth = Math.max(MIN_PATH_WIDTH, ...paths.map((p) => p.length + 2));
  }

  header(): string[] {
    const head = `${"File".padEnd(this.pathWidth)} | ${"Status".padEnd(STATUS_WIDTH)} | Details`;
    return [head, "-".repeat(head.length)];
  }

  row(c: ClassifiedRecord): string {
    const label = STATUS_LABELS[c.status].padEnd(STATUS_WIDTH);
    const details = formatDetails(c);
    const line = `${c.record.path.padEnd(this.pathWidth)} | ${label}`;
    return details ? `${line} | ${details}` : line.trimEnd();
  }
}

export function countStatuses(classified: readonly ClassifiedRecord[]): Map<SyncStatus, number> {
  const counts = new Map<SyncStatus, number>();
  for (const c of classified) counts.set(c.status, (counts.get(c.status) ?? 0) + 1);
  return counts;
}

export function formatSummary(counts: ReadonlyMap<SyncStatus, number>): string[] {
  const lines = ["Summary:"];
  for (const status of STATUS_ORDER) {
    const n = counts.get(status) ?? 0;
    if (n > 0) lines.push(`  ${STATUS_LABELS[status]}: ${n}`);
  }
  return lines;
}

export function formatFailures(outcomes: readonly DeployOutcome[]): string[] {
  const failures = outcomes.filter(isFailure);
  if (failures.length === 0) return [];

  return [
    `Failures (${failures.length}):`,
    ...failures.map((f) =>
      f.kind === "failed" ? `  ${f.path}: [${f.stage}] ${f.reason}` : `  ${f.path}: [not attempted] ${f.reason}`
    ),
  ];
}
