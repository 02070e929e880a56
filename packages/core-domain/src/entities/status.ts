export const HASH_STATUSES = [
  "MATCH_LOCAL",
  "MATCH_REFERENCE",
  "MATCH_LAST_DEPLOY",
  "DIFF_HASH",
  "MISSING",
] as const;

export const SIZE_STATUSES = ["MATCH_SIZE", "DIFF_SIZE", "UNKNOWN"] as const;

export type HashStatus = (typeof HASH_STATUSES)[number];
export type SizeStatus = (typeof SIZE_STATUSES)[number];

// MISSING is shared by both modes
export type SyncStatus = HashStatus | SizeStatus;

export const STATUS_ORDER: readonly SyncStatus[] = [...HASH_STATUSES, ...SIZE_STATUSES];

const SIZE_STATUS_SET: ReadonlySet<SyncStatus> = new Set(SIZE_STATUSES);

export function isSizeOnlyStatus(status: SyncStatus): status is SizeStatus {
  return SIZE_STATUS_SET.has(status);
}

/** Local modification time relative to the remote one. Advisory only. */
export type TimestampOrder = "newer" | "older" | "equal" | "unknown";

/**
 * Compares at whole-second precision, since most remote listings do not
 * report anything finer.
 */
export function compareTimestamps(
  local: Date | null | undefined,
  remote: Date | null | undefined
): TimestampOrder {
  if (!local || !remote) return "unknown";
  const l = Math.floor(local.getTime() / 1000);
  const r = Math.floor(remote.getTime() / 1000);
  if (Number.isNaN(l) || Number.isNaN(r)) return "unknown";
  if (l > r) return "newer";
  if (l < r) return "older";
  return "equal";
}
