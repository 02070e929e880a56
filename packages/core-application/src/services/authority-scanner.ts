import {
  clearLocalFields,
  clearReferenceFields,
  createAuthorityRecord,
  isSafeRecordPath,
  normalizeRecordPath,
  type AuthorityRecord,
  type AuthorityRecordCollection,
} from "@deploy-guard/core-domain";

import type { Logger } from "../ports/logger";
import type { VersionControlProvider } from "../ports/version-control-provider";
import type { WorkingCopy } from "../ports/working-copy";
import { fingerprintBytes, fingerprintStream } from "./content-fingerprinter";

/**
 * snapshot: local and reference fields of the dirty paths, which become the working set
 * refresh:  local fields only, working set is every record
 * load:     no scan at all
 */
export type ScanMode = "snapshot" | "refresh" | "load";

export type PathSource = { kind: "dirty" } | { kind: "commit"; commitRef: string };

export type ScanOptions = {
  mode: ScanMode;
  source: PathSource;
  referenceRef: string;
};

/** `<commit>^` unless the operator named a reference explicitly. */
export function defaultReferenceRef(source: PathSource, explicitRef?: string): string {
  if (explicitRef) return explicitRef;
  return source.kind === "commit" ? `${source.commitRef}^` : "HEAD";
}

export class AuthorityScanner {
  constructor(
    private readonly deps: {
      vcs: VersionControlProvider;
      workingCopy: WorkingCopy;
      logger: Logger;
    }
  ) {}

  /** Source paths, normalized, de-duplicated and in source order. */
  async listPaths(source: PathSource): Promise<string[]> {
    const { vcs, logger } = this.deps;
    const raw = source.kind === "commit" ? await vcs.changedPathsInCommit(source.commitRef) : await vcs.listDirtyPaths();

    const seen = new Set<string>();
    const out: string[] = [];
    for (const p of raw) {
      const normalized = normalizeRecordPath(p);
      if (!isSafeRecordPath(normalized)) {
        logger.warn(`Ignoring unsafe path ${JSON.stringify(p)}`);
        continue;
      }
      if (seen.has(normalized)) continue;
      seen.add(normalized);
      out.push(normalized);
    }
    return out;
  }

  /** Returns false, leaving the record as it was, when the path is absent locally. */
  private async refreshLocal(record: AuthorityRecord): Promise<boolean> {
    const { workingCopy } = this.deps;

    const info = await workingCopy.stat(record.path);
    if (!info) return false;

    const digest = await fingerprintStream(workingCopy.openRead(record.path));
    record.localFingerprint = digest.fingerprint;
    record.localSize = digest.rawSize;
    record.localTimestamp = info.modifiedAt.toISOString();
    return true;
  }

  private async refreshReference(record: AuthorityRecord, ref: string): Promise<void> {
    const { vcs } = this.deps;

    const content = await vcs.readFileAt(record.path, ref);
    if (!content) {
      clearReferenceFields(record);
      return;
    }

    record.referenceFingerprint = fingerprintBytes(content).fingerprint;
    const ts = await vcs.lastCommitTimestamp(record.path, ref);
    if (ts) record.referenceTimestamp = ts;
    else delete record.referenceTimestamp;
  }

  private obtain(records: AuthorityRecordCollection, path: string): AuthorityRecord {
    let record = records.get(path);
    if (!record) {
      record = createAuthorityRecord(path);
      records.set(path, record);
    }
    return record;
  }

  /**
   * Updates `records` in place and returns the working set, the paths the
   * run classifies, in report order.  `lastDeploy` is never touched here.
   */
  async scan(records: AuthorityRecordCollection, options: ScanOptions): Promise<string[]> {
    const { logger } = this.deps;

    if (options.mode === "load") {
      logger.info(`Loaded ${records.size} records.`);
      return [...records.keys()];
    }

    const paths = await this.listPaths(options.source);

    if (options.mode === "snapshot") {
      for (const p of paths) {
        const record = this.obtain(records, p);
        if (!(await this.refreshLocal(record))) clearLocalFields(record);
        await this.refreshReference(record, options.referenceRef);
        logger.info(
          `${p.padEnd(50)} | Ref: ${record.referenceTimestamp ?? "N/A"} | Local: ${record.localTimestamp ?? "N/A"}`
        );
      }
      logger.info(`Scanned ${paths.length} paths against ${options.referenceRef}.`);
      return paths;
    }

    for (const p of paths) {
      const existing = records.get(p);
      const record = existing ?? createAuthorityRecord(p);
      if (!(await this.refreshLocal(record))) {
        logger.debug(`Skipping ${p} (not present locally)`);
        continue;
      }
      if (!existing) records.set(p, record);
      logger.info(`${p.padEnd(50)} | ${record.localTimestamp ?? "N/A"}`);
    }
    logger.info(`Updated local fields. Total records: ${records.size}`);
    return [...records.keys()];
  }
}
