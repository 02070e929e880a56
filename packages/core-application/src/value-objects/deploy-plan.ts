import type { ContentFingerprint } from "@deploy-guard/core-domain";

export type DeployableStatus = "MATCH_REFERENCE" | "MATCH_LAST_DEPLOY" | "MISSING" | "DIFF_HASH";

export type DeployItem = {
  path: string;
  remotePath: string;
  status: DeployableStatus;

  // probed before planning; null only for MISSING
  remoteSize: number | null;
  remoteModifiedAt: Date | null;

  // operator chose "replace" over an unexplained remote
  forced: boolean;
};

/** Remote left as is; its current content is copied aside for inspection. */
export type BackupOnlyItem = {
  path: string;
  remotePath: string;
  remoteSize: number;
  remoteModifiedAt: Date | null;
};

export type ProvenanceBackfill = {
  path: string;
  fingerprint: ContentFingerprint;
};

export type SkippedItem = {
  path: string;
  reason: string;
};

export type DeployPlan = {
  deploys: DeployItem[];
  keepBackups: BackupOnlyItem[];
  backfills: ProvenanceBackfill[];
  skipped: SkippedItem[];
};

export type GatekeeperResult =
  | { kind: "plan"; plan: DeployPlan }
  | { kind: "aborted"; path: string; reason: string }
  | { kind: "inspection_only" };

export function emptyPlan(): DeployPlan {
  return { deploys: [], keepBackups: [], backfills: [], skipped: [] };
}
