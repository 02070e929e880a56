import { isSizeOnlyStatus, type RemoteConflict } from "@deploy-guard/core-domain";

import type { ConflictResolver } from "../ports/conflict-resolver";
import type { Logger } from "../ports/logger";
import type { ClassifiedRecord } from "../value-objects/classification";
import {
  emptyPlan,
  type DeployPlan,
  type DeployableStatus,
  type GatekeeperResult,
} from "../value-objects/deploy-plan";

function toConflict(c: ClassifiedRecord): RemoteConflict {
  return {
    path: c.record.path,
    remotePath: c.remotePath,
    remoteFingerprint: c.details.remoteFingerprint ?? "",
    remoteSize: c.details.remoteSize ?? 0,
    localFingerprint: c.record.localFingerprint,
    localSize: c.record.localSize,
    referenceFingerprint: c.record.referenceFingerprint,
    lastDeployFingerprint: c.record.lastDeploy?.fingerprint,
  };
}

/**
 * Safety policy over classified paths:
 * - MATCH_LOCAL: nothing to send; backfill provenance when it is missing
 * - MATCH_REFERENCE / MATCH_LAST_DEPLOY / MISSING: safe, planned
 * - DIFF_HASH: the operator replaces, keeps (with a backup) or aborts everything
 * A plan is either complete or not produced at all.
 */
export class DeployGatekeeper {
  constructor(
    private readonly deps: {
      resolver: ConflictResolver;
      logger: Logger;
    }
  ) {}

  private addDeploy(plan: DeployPlan, c: ClassifiedRecord, status: DeployableStatus, forced: boolean) {
    if (!c.record.localFingerprint) {
      plan.skipped.push({ path: c.record.path, reason: "local file missing" });
      return;
    }
    plan.deploys.push({
      path: c.record.path,
      remotePath: c.remotePath,
      status,
      remoteSize: c.details.remoteSize,
      remoteModifiedAt: c.details.remoteModifiedAt,
      forced,
    });
  }

  async plan(classified: readonly ClassifiedRecord[]): Promise<GatekeeperResult> {
    const { resolver, logger } = this.deps;

    // size mode only inspects; it must not reach a prompt
    if (classified.some((c) => isSizeOnlyStatus(c.status))) return { kind: "inspection_only" };

    const plan = emptyPlan();

    for (const c of classified) {
      const path = c.record.path;

      switch (c.status) {
        case "MATCH_LOCAL":
          logger.info(`Skipping ${path} (already matches local)`);
          if (!c.record.lastDeploy && c.record.localFingerprint) {
            plan.backfills.push({ path, fingerprint: c.record.localFingerprint });
          }
          break;

        case "MATCH_REFERENCE":
        case "MATCH_LAST_DEPLOY":
        case "MISSING":
          this.addDeploy(plan, c, c.status, false);
          break;

        case "DIFF_HASH": {
          logger.warn(
            `WARNING: ${path} matches neither the local copy, the reference nor the last deploy. Unknown remote state.`
          );
          const decision = await resolver.resolve(toConflict(c));

          if (decision === "replace") {
            this.addDeploy(plan, c, "DIFF_HASH", true);
          } else if (decision === "keep") {
            plan.keepBackups.push({
              path,
              remotePath: c.remotePath,
              remoteSize: c.details.remoteSize ?? 0,
              remoteModifiedAt: c.details.remoteModifiedAt,
            });
          } else {
            return {
              kind: "aborted",
              path,
              reason: decision === "abort" ? "aborted by operator" : `unrecognized decision "${String(decision)}"`,
            };
          }
          break;
        }

        case "MATCH_SIZE":
        case "DIFF_SIZE":
        case "UNKNOWN":
          return { kind: "inspection_only" };
      }
    }

    return { kind: "plan", plan };
  }
}
