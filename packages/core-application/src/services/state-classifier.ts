import { finished } from "node:stream/promises";
import {
  compareTimestamps,
  joinRemotePath,
  type AuthorityRecord,
  type ContentFingerprint,
  type HashStatus,
  type SizeStatus,
} from "@deploy-guard/core-domain";

import type { RemoteFileStore } from "../ports/remote-file-store";
import type { ClassificationDetails, ClassifiedRecord } from "../value-objects/classification";
import { FingerprintSink } from "./content-fingerprinter";

export type ClassificationMode = "hash" | "size";

function parseTimestamp(iso: string | undefined): Date | null {
  if (!iso) return null;
  const d = new Date(iso);
  return Number.isNaN(d.getTime()) ? null : d;
}

/**
 * First match wins: the working copy, then the version-control reference,
 * then this tool's own last deploy.
 */
export function matchRemoteFingerprint(
  record: AuthorityRecord,
  remoteFingerprint: ContentFingerprint
): HashStatus {
  if (record.localFingerprint === remoteFingerprint) return "MATCH_LOCAL";
  if (record.referenceFingerprint === remoteFingerprint) return "MATCH_REFERENCE";
  if (record.lastDeploy?.fingerprint === remoteFingerprint) return "MATCH_LAST_DEPLOY";
  return "DIFF_HASH";
}

export function compareSizes(localSize: number | null, remoteSize: number | null): SizeStatus {
  if (localSize === null || remoteSize === null) return "UNKNOWN";
  return localSize === remoteSize ? "MATCH_SIZE" : "DIFF_SIZE";
}

export class StateClassifier {
  constructor(
    private readonly deps: {
      remote: RemoteFileStore;
      remoteRoot: string;
      mode: ClassificationMode;
    }
  ) {}

  async classify(record: AuthorityRecord): Promise<ClassifiedRecord> {
    const { remote, remoteRoot, mode } = this.deps;
    const remotePath = joinRemotePath(remoteRoot, record.path);

    const details: ClassificationDetails = {
      timestampOrder: "unknown",
      localModifiedAt: parseTimestamp(record.localTimestamp),
      remoteModifiedAt: null,
      localSize: record.localSize ?? null,
      remoteSize: null,
      remoteFingerprint: null,
    };

    const remoteSize = await remote.probeSize(remotePath);
    if (remoteSize === null) {
      return { record, remotePath, status: "MISSING", details };
    }
    details.remoteSize = remoteSize;

    if (mode === "size") {
      return { record, remotePath, status: compareSizes(details.localSize, remoteSize), details };
    }

    details.remoteModifiedAt = await remote.probeModifiedTime(remotePath);
    details.timestampOrder = compareTimestamps(details.localModifiedAt, details.remoteModifiedAt);

    const sink = new FingerprintSink();
    const found = await remote.retrieve(remotePath, sink);
    if (!found) {
      // removed between the probe and the fetch
      details.remoteSize = null;
      return { record, remotePath, status: "MISSING", details };
    }
    await finished(sink);

    const { fingerprint } = sink.digest();
    details.remoteFingerprint = fingerprint;

    return { record, remotePath, status: matchRemoteFingerprint(record, fingerprint), details };
  }
}
