import type { ConflictDecision, RemoteConflict } from "@deploy-guard/core-domain";

export interface ConflictResolver {
  resolve(conflict: RemoteConflict): Promise<ConflictDecision>;
}
