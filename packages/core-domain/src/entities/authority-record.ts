import type { ContentFingerprint } from "./fingerprint";

export type DeployProvenance = {
  fingerprint: ContentFingerprint;
  timestamp: string;
};

/**
 * What is known about one tracked path across the working copy, the
 * version-control reference and this tool's own last deploy.  Every field
 * except `path` may be absent; absence means "unknown", never an error.
 */
export interface AuthorityRecord {
  path: string;

  localFingerprint?: ContentFingerprint;
  localSize?: number;
  localTimestamp?: string;

  referenceFingerprint?: ContentFingerprint;
  referenceTimestamp?: string;

  lastDeploy?: DeployProvenance;
}

/** Keyed by `path`; iteration order is the order paths were first seen. */
export type AuthorityRecordCollection = Map<string, AuthorityRecord>;

export function normalizeRecordPath(p: string): string {
  let out = p.replaceAll("\\", "/").replace(/\/{2,}/g, "/");
  while (out.startsWith("./")) out = out.slice(2);
  return out;
}

/** Relative, non-empty, and never climbing out of its root. */
export function isSafeRecordPath(p: string): boolean {
  if (p.length === 0 || p.startsWith("/") || /^[A-Za-z]:/.test(p)) return false;
  return p.split("/").every((segment) => segment !== ".." && segment !== "");
}

export function createAuthorityRecord(path: string): AuthorityRecord {
  return { path: normalizeRecordPath(path) };
}

export function clearLocalFields(record: AuthorityRecord): void {
  delete record.localFingerprint;
  delete record.localSize;
  delete record.localTimestamp;
}

export function clearReferenceFields(record: AuthorityRecord): void {
  delete record.referenceFingerprint;
  delete record.referenceTimestamp;
}
