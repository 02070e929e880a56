import type { AuthorityRecordCollection } from "@deploy-guard/core-domain";

import type { Clock } from "../ports/clock";
import type { DeployOutcome } from "../value-objects/deploy-outcome";
import type { ProvenanceBackfill } from "../value-objects/deploy-plan";

export type ProvenanceUpdate = {
  dirty: boolean;
  updatedPaths: string[];
};

/**
 * Records what this tool put on the remote.  Only verified deploys and
 * remotes already equal to the working copy count as provenance.
 */
export class ProvenanceWriter {
  constructor(private readonly clock: Clock) {}

  /** Fills `lastDeploy` where it is absent; existing provenance is kept. */
  backfill(records: AuthorityRecordCollection, backfills: readonly ProvenanceBackfill[]): ProvenanceUpdate {
    const timestamp = this.clock.now().toISOString();
    const updatedPaths: string[] = [];

    for (const b of backfills) {
      const record = records.get(b.path);
      if (!record || record.lastDeploy) continue;
      record.lastDeploy = { fingerprint: b.fingerprint, timestamp };
      updatedPaths.push(b.path);
    }

    return { dirty: updatedPaths.length > 0, updatedPaths };
  }

  recordOutcomes(records: AuthorityRecordCollection, outcomes: readonly DeployOutcome[]): ProvenanceUpdate {
    const updatedPaths: string[] = [];

    for (const o of outcomes) {
      if (o.kind !== "deployed") continue;
      const record = records.get(o.path);
      if (!record) continue;
      record.lastDeploy = { fingerprint: o.fingerprint, timestamp: o.deployedAtIso };
      updatedPaths.push(o.path);
    }

    return { dirty: updatedPaths.length > 0, updatedPaths };
  }
}
