import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  isSafeRecordPath,
  normalizeRecordPath,
  type AuthorityRecord,
  type AuthorityRecordCollection,
  type DeployProvenance,
} from "@deploy-guard/core-domain";

import type { AuthorityRecordStore, ReleaseLock } from "../ports/authority-record-store";
import type { Logger } from "../ports/logger";
import { ConfigError, describeError, isErrnoCode } from "../application/errors";
import { acquireRunLock } from "./run-lock";

// older snapshot files mark unknown values with "N/A"
const absent = (v: unknown) => (v === "N/A" || v === null || v === "" ? undefined : v);

const text = z.preprocess(absent, z.string().optional());
const size = z.preprocess(absent, z.number().int().nonnegative().optional());

const ProvenanceSchema = z.preprocess(
  absent,
  z
    .union([
      z.object({ fingerprint: z.string(), timestamp: z.string() }),
      z
        .object({ hash: z.string(), timestamp: z.string() })
        .transform((p): DeployProvenance => ({ fingerprint: p.hash, timestamp: p.timestamp })),
    ])
    .optional()
);

/** Current field names first, then the names earlier releases wrote. */
export const StoredRecordSchema = z.object({
  path: text,

  localFingerprint: text,
  local_hash: text,
  hash: text,
  localSize: size,
  local_size: size,
  size: size,
  localTimestamp: text,
  local_ts: text,
  timestamp: text,

  referenceFingerprint: text,
  git_hash: text,
  referenceTimestamp: text,
  git_ts: text,

  lastDeploy: ProvenanceSchema,
  last_deploy: ProvenanceSchema,
});

type StoredRecord = z.infer<typeof StoredRecordSchema>;

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function toAuthorityRecord(p: string, s: StoredRecord): AuthorityRecord {
  const record: AuthorityRecord = { path: p };

  const localFingerprint = s.localFingerprint ?? s.local_hash ?? s.hash;
  const localSize = s.localSize ?? s.local_size ?? s.size;
  const localTimestamp = s.localTimestamp ?? s.local_ts ?? s.timestamp;
  const referenceFingerprint = s.referenceFingerprint ?? s.git_hash;
  const referenceTimestamp = s.referenceTimestamp ?? s.git_ts;
  const lastDeploy = s.lastDeploy ?? s.last_deploy;

  if (localFingerprint !== undefined) record.localFingerprint = localFingerprint;
  if (localSize !== undefined) record.localSize = localSize;
  if (localTimestamp !== undefined) record.localTimestamp = localTimestamp;
  if (referenceFingerprint !== undefined) record.referenceFingerprint = referenceFingerprint;
  if (referenceTimestamp !== undefined) record.referenceTimestamp = referenceTimestamp;
  if (lastDeploy !== undefined) record.lastDeploy = lastDeploy;
  return record;
}

/**
 * The snapshot file: `{ "files": { "<path>": record } }`.  Bare arrays of
 * records from earlier releases are read as well; they are rewritten in
 * the keyed layout on the next save.
 */
export class NodeAuthorityRecordStore implements AuthorityRecordStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger
  ) {}

  private entries(raw: unknown): Array<[string | undefined, unknown]> {
    if (Array.isArray(raw)) return raw.map((e): [undefined, unknown] => [undefined, e]);
    if (isPlainObject(raw) && isPlainObject(raw.files)) return Object.entries(raw.files);
    throw new ConfigError(`${this.filePath} is not a snapshot file (expected {"files": {...}})`);
  }

  async load(): Promise<AuthorityRecordCollection | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return null;
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new ConfigError(`${this.filePath} is not valid JSON: ${describeError(err)}`, err);
    }

    const records: AuthorityRecordCollection = new Map();
    for (const [key, value] of this.entries(raw)) {
      const parsed = StoredRecordSchema.safeParse(value);
      if (!parsed.success) {
        const where = parsed.error.issues.map((i) => i.path.join(".")).join(", ");
        this.logger.warn(`Skipping invalid record ${key ?? "(unnamed)"}: bad ${where}`);
        continue;
      }

      const rawPath = key ?? parsed.data.path;
      if (!rawPath) {
        this.logger.warn("Skipping record without a path");
        continue;
      }
      const p = normalizeRecordPath(rawPath);
      if (!isSafeRecordPath(p)) {
        this.logger.warn(`Skipping record with unsafe path ${JSON.stringify(rawPath)}`);
        continue;
      }
      if (records.has(p)) {
        this.logger.warn(`Skipping duplicate record ${p}`);
        continue;
      }

      records.set(p, toAuthorityRecord(p, parsed.data));
    }
    return records;
  }

  async save(records: AuthorityRecordCollection): Promise<void> {
    const files: Record<string, AuthorityRecord> = {};
    for (const [p, record] of records) files[p] = record;

    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true });

    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, `${JSON.stringify({ files }, null, 2)}\n`, "utf-8");
    await fs.rename(tmp, this.filePath);
  }

  async lock(): Promise<ReleaseLock> {
    return acquireRunLock(this.filePath);
  }
}
