import { describe, it, expect } from "vitest";
import type { AuthorityRecord, ConflictDecision } from "@deploy-guard/core-domain";

import { ReconcileService, type ReconcileOptions } from "./reconcile-service.js";
import { fingerprintBytes } from "./content-fingerprinter.js";
import { ConfigError, RemoteFileError, TransportError } from "../application/errors.js";
import { FixedClock } from "../testing/fixed-clock.js";
import { InMemoryAuthorityRecordStore } from "../testing/in-memory-authority-record-store.js";
import { InMemoryBackupStore } from "../testing/in-memory-backup-store.js";
import { InMemoryRemoteFileStore } from "../testing/in-memory-remote-file-store.js";
import { InMemoryVersionControl } from "../testing/in-memory-version-control.js";
import { InMemoryWorkingCopy } from "../testing/in-memory-working-copy.js";
import { MemoryLogger } from "../testing/memory-logger.js";
import { ScriptedOperator } from "../testing/scripted-operator.js";

const fp = (content: string) => fingerprintBytes(content).fingerprint;

const snapshotRun: ReconcileOptions = {
  scan: { mode: "snapshot", source: { kind: "dirty" }, referenceRef: "HEAD" },
  remoteRoot: "/www",
  mode: "hash",
  deploy: true,
};

const loadRun: ReconcileOptions = {
  ...snapshotRun,
  scan: { mode: "load", source: { kind: "dirty" }, referenceRef: "HEAD" },
};

function setup(opts: {
  records?: AuthorityRecord[] | null;
  decisions?: Record<string, ConflictDecision>;
  confirm?: boolean;
  withRemote?: boolean;
} = {}) {
  const store = new InMemoryAuthorityRecordStore(opts.records ?? null);
  const vcs = new InMemoryVersionControl();
  const workingCopy = new InMemoryWorkingCopy();
  const remote = new InMemoryRemoteFileStore();
  const backups = new InMemoryBackupStore();
  const operator = new ScriptedOperator(opts.decisions ?? {}, opts.confirm ?? true);
  const logger = new MemoryLogger();

  const service = new ReconcileService({
    store,
    vcs,
    workingCopy,
    remote: opts.withRemote === false ? null : remote,
    backups,
    resolver: operator,
    confirmer: operator,
    clock: new FixedClock(),
    logger,
  });
  return { store, vcs, workingCopy, remote, backups, operator, logger, service };
}

const stores = (remote: InMemoryRemoteFileStore) => remote.operations.filter((o) => o.op === "store");

describe("ReconcileService", () => {
  it("deploys safe paths, backfills provenance and persists", async () => {
    const { store, vcs, workingCopy, remote, backups, service } = setup();
    vcs.dirtyPaths = ["a.txt", "new.txt", "same.txt"];
    vcs.commit("HEAD", "a.txt", "v1", "2024-05-01T00:00:00Z");
    workingCopy.put("a.txt", "v2").put("new.txt", "fresh").put("same.txt", "same");
    remote.put("/www/a.txt", "v1", new Date("2024-05-01T08:09:10Z")).put("/www/same.txt", "same");

    const result = await service.run(snapshotRun);

    expect(result.exitCode).toBe(0);
    expect(result.classified.map((c) => c.status)).toEqual(["MATCH_REFERENCE", "MISSING", "MATCH_LOCAL"]);
    expect(remote.contentOf("/www/a.txt")).toBe("v2");
    expect(remote.contentOf("/www/new.txt")).toBe("fresh");
    expect(remote.storesTo("/www/same.txt")).toBe(0);
    expect(backups.contentOf("backups/a.txt.20240501_080910")).toBe("v1");

    expect(store.saveCount).toBe(2);
    expect(store.saved?.get("a.txt")?.lastDeploy).toEqual({
      fingerprint: fp("v2"),
      timestamp: "2024-06-01T12:30:00.000Z",
    });
    expect(store.saved?.get("same.txt")?.lastDeploy?.fingerprint).toBe(fp("same"));
    expect(store.locked).toBe(false);
    expect(remote.operations.at(-1)).toEqual({ op: "close" });
  });

  it("runs no transfer and saves nothing when the operator aborts", async () => {
    const { store, remote, operator, service } = setup({
      records: [
        { path: "a.txt", localFingerprint: fp("v2"), referenceFingerprint: fp("v1") },
        { path: "b.txt", localFingerprint: fp("mine"), referenceFingerprint: fp("ref") },
        { path: "c.txt", localFingerprint: fp("same") },
      ],
      decisions: { "b.txt": "abort" },
    });
    remote.put("/www/a.txt", "v1").put("/www/b.txt", "theirs").put("/www/c.txt", "same");

    const result = await service.run(loadRun);

    expect(result.exitCode).toBe(2);
    expect(result.aborted).toEqual({ path: "b.txt", reason: "aborted by operator" });
    expect(stores(remote)).toEqual([]);
    expect(store.saveCount).toBe(0);
    expect(operator.plansSeen).toEqual([]);
  });

  it("prints the partial report and stops on a transport error", async () => {
    const { store, remote, operator, logger, service } = setup({
      records: [{ path: "a.txt", localFingerprint: fp("x") }, { path: "b.txt" }, { path: "c.txt" }],
    });
    remote.put("/www/a.txt", "x");
    remote.failOn = (op) =>
      op.op === "probeSize" && op.path === "/www/b.txt" ? new TransportError("connection reset") : null;

    const result = await service.run(loadRun);

    expect(result.exitCode).toBe(1);
    expect(result.classified.map((c) => c.record.path)).toEqual(["a.txt"]);
    expect(logger.lines("info")).toContain("  MATCH LOCAL: 1");
    expect(logger.lines("error")).toContain("Remote error while checking b.txt: connection reset");
    expect(stores(remote)).toEqual([]);
    expect(operator.plansSeen).toEqual([]);
    expect(store.saveCount).toBe(0);
    expect(remote.operations.at(-1)).toEqual({ op: "close" });
  });

  it("stops remote work when the server refuses a read during the check", async () => {
    const { remote, logger, service } = setup({
      records: [{ path: "a.txt", localFingerprint: fp("x") }, { path: "b.txt" }],
    });
    remote.put("/www/a.txt", "x").put("/www/b.txt", "y");
    remote.failOn = (op) =>
      op.op === "retrieve" && op.path === "/www/b.txt"
        ? new RemoteFileError("RETR /www/b.txt: 450 File busy", 450)
        : null;

    const result = await service.run(loadRun);

    expect(result.exitCode).toBe(1);
    expect(result.classified.map((c) => c.record.path)).toEqual(["a.txt"]);
    expect(logger.lines("error")).toContain("Remote error while checking b.txt: RETR /www/b.txt: 450 File busy");
    expect(stores(remote)).toEqual([]);
  });

  it("still backs up kept remotes when the deploy is declined", async () => {
    const { store, remote, backups, service } = setup({
      records: [
        { path: "a.txt", localFingerprint: fp("v2"), referenceFingerprint: fp("v1") },
        { path: "k.txt", localFingerprint: fp("mine") },
      ],
      decisions: { "k.txt": "keep" },
      confirm: false,
    });
    remote.put("/www/a.txt", "v1").put("/www/k.txt", "theirs");

    const result = await service.run(loadRun);

    expect(result.exitCode).toBe(0);
    expect(result.outcomes).toEqual([
      { kind: "backed_up", path: "k.txt", backupLocation: "backups/k.txt.20240601123000" },
    ]);
    expect(backups.contentOf("backups/k.txt.20240601123000")).toBe("theirs");
    expect(stores(remote)).toEqual([]);
    expect(store.saveCount).toBe(0);
  });

  it("exits with a failure when an item could not be deployed", async () => {
    const { remote, workingCopy, logger, service } = setup({
      records: [{ path: "a.txt", localFingerprint: fp("v2"), referenceFingerprint: fp("v1") }],
    });
    workingCopy.put("a.txt", "v2");
    remote.put("/www/a.txt", "v1");
    remote.transformUpload = () => Buffer.from("garbled");

    const result = await service.run(loadRun);

    expect(result.exitCode).toBe(1);
    expect(remote.storesTo("/www/a.txt")).toBe(4);
    expect(logger.lines("warn")).toContain("Failures (1):");
  });

  it("never prompts in size-only mode", async () => {
    const { remote, operator, service } = setup({
      records: [{ path: "a.txt", localSize: 3 }, { path: "b.txt", localSize: 9 }],
    });
    remote.put("/www/a.txt", "abc").put("/www/b.txt", "abc");

    const result = await service.run({ ...loadRun, mode: "size" });

    expect(result.exitCode).toBe(0);
    expect(result.classified.map((c) => c.status)).toEqual(["MATCH_SIZE", "DIFF_SIZE"]);
    expect(operator.conflictsSeen).toEqual([]);
    expect(operator.plansSeen).toEqual([]);
    expect(remote.operations.some((o) => o.op === "retrieve")).toBe(false);
  });

  it("refuses to load a snapshot that does not exist and releases the lock", async () => {
    const { store, service } = setup();

    await expect(service.run(loadRun)).rejects.toBeInstanceOf(ConfigError);
    expect(store.locked).toBe(false);
  });

  it("only scans when no remote is configured", async () => {
    const { store, vcs, workingCopy, service } = setup({ withRemote: false });
    vcs.dirtyPaths = ["a.txt"];
    workingCopy.put("a.txt", "x");

    const result = await service.run(snapshotRun);

    expect(result.workingSet).toEqual(["a.txt"]);
    expect(result.classified).toEqual([]);
    expect(store.saved?.get("a.txt")?.localFingerprint).toBe(fp("x"));
  });
});
