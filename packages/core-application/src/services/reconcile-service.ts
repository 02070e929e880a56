import type { AuthorityRecordCollection } from "@deploy-guard/core-domain";

import type { AuthorityRecordStore } from "../ports/authority-record-store";
import type { BackupStore } from "../ports/backup-store";
import type { Clock } from "../ports/clock";
import type { ConflictResolver } from "../ports/conflict-resolver";
import type { DeployConfirmer } from "../ports/deploy-confirmer";
import type { Logger } from "../ports/logger";
import type { RemoteFileStore } from "../ports/remote-file-store";
import type { RetryPolicy } from "../ports/retry-policy";
import type { VersionControlProvider } from "../ports/version-control-provider";
import type { WorkingCopy } from "../ports/working-copy";
import type { ClassifiedRecord } from "../value-objects/classification";
import type { DeployOutcome } from "../value-objects/deploy-outcome";
import type { DeployPlan } from "../value-objects/deploy-plan";

import { ConfigError, RemoteFileError, TransferTimeoutError, TransportError } from "../application/errors";
import { AuthorityScanner, type ScanOptions } from "./authority-scanner";
import { DeployExecutor } from "./deploy-executor";
import { DeployGatekeeper } from "./deploy-gatekeeper";
import { ProvenanceWriter } from "./provenance-writer";
import { ReportTable, countStatuses, formatFailures, formatSummary } from "./report-formatter";
import { StateClassifier, type ClassificationMode } from "./state-classifier";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_ABORTED = 2;

export type ExitCode = typeof EXIT_OK | typeof EXIT_FAILURE | typeof EXIT_ABORTED;

export type ReconcileOptions = {
  scan: ScanOptions;
  remoteRoot: string;
  mode: ClassificationMode;
  deploy: boolean;
};

export type ReconcileResult = {
  exitCode: ExitCode;
  workingSet: string[];
  classified: ClassifiedRecord[];
  outcomes: DeployOutcome[];
  aborted: { path: string; reason: string } | null;
};

export type ReconcileDeps = {
  store: AuthorityRecordStore;
  vcs: VersionControlProvider;
  workingCopy: WorkingCopy;

  // null runs the scan only
  remote: RemoteFileStore | null;

  backups: BackupStore;
  resolver: ConflictResolver;
  confirmer: DeployConfirmer;
  clock: Clock;
  logger: Logger;
  retryPolicy?: RetryPolicy;
};

function describePlan(plan: DeployPlan): string[] {
  return plan.deploys.map((d) => `  ${d.path} (${d.status}${d.forced ? ", forced" : ""})`);
}

/**
 * One run, strictly sequential: scan, classify, plan, deploy, persist.
 * The snapshot store is locked for the whole run.
 */
export class ReconcileService {
  private readonly scanner: AuthorityScanner;
  private readonly provenance: ProvenanceWriter;

  constructor(private readonly deps: ReconcileDeps) {
    this.scanner = new AuthorityScanner({ vcs: deps.vcs, workingCopy: deps.workingCopy, logger: deps.logger });
    this.provenance = new ProvenanceWriter(deps.clock);
  }

  async run(options: ReconcileOptions): Promise<ReconcileResult> {
    const release = await this.deps.store.lock();
    try {
      return await this.runLocked(options);
    } finally {
      await release();
    }
  }

  private async runLocked(options: ReconcileOptions): Promise<ReconcileResult> {
    const { store, remote, logger } = this.deps;

    const loaded = await store.load();
    if (!loaded && options.scan.mode === "load") {
      throw new ConfigError("Snapshot file not found");
    }
    const records: AuthorityRecordCollection = loaded ?? new Map();

    const workingSet = await this.scanner.scan(records, options.scan);
    if (options.scan.mode !== "load") {
      await store.save(records);
      logger.info(`Saved ${records.size} records.`);
    }

    const result: ReconcileResult = {
      exitCode: EXIT_OK,
      workingSet,
      classified: [],
      outcomes: [],
      aborted: null,
    };

    if (!remote) return result;
    if (workingSet.length === 0) {
      logger.info("No file data to compare with the remote.");
      await remote.close();
      return result;
    }

    try {
      await this.reconcile(remote, records, options, result);
    } finally {
      await remote.close();
    }
    return result;
  }

  private async classifyAll(
    remote: RemoteFileStore,
    records: AuthorityRecordCollection,
    options: ReconcileOptions,
    result: ReconcileResult
  ): Promise<boolean> {
    const { logger } = this.deps;
    const classifier = new StateClassifier({ remote, remoteRoot: options.remoteRoot, mode: options.mode });
    const table = new ReportTable(result.workingSet);

    for (const line of table.header()) logger.info(line);

    for (const path of result.workingSet) {
      const record = records.get(path);
      if (!record) continue;

      try {
        const c = await classifier.classify(record);
        result.classified.push(c);
        logger.info(table.row(c));
      } catch (err) {
        const remoteFailure =
          err instanceof TransportError || err instanceof TransferTimeoutError || err instanceof RemoteFileError;
        if (!remoteFailure) throw err;
        logger.error(`Remote error while checking ${path}: ${err.message}`);
        return false;
      }
    }
    return true;
  }

  private async reconcile(
    remote: RemoteFileStore,
    records: AuthorityRecordCollection,
    options: ReconcileOptions,
    result: ReconcileResult
  ): Promise<void> {
    const { store, resolver, confirmer, logger } = this.deps;

    const complete = await this.classifyAll(remote, records, options, result);

    logger.info("");
    for (const line of formatSummary(countStatuses(result.classified))) logger.info(line);

    if (!complete) {
      logger.error("Remote comparison stopped; no deployment was attempted.");
      result.exitCode = EXIT_FAILURE;
      return;
    }

    if (!options.deploy) return;
    if (options.mode === "size") {
      logger.info("Size-only mode is inspection-only; skipping deployment.");
      return;
    }

    const gate = await new DeployGatekeeper({ resolver, logger }).plan(result.classified);
    if (gate.kind === "inspection_only") return;
    if (gate.kind === "aborted") {
      logger.warn(`Deployment aborted at ${gate.path}: ${gate.reason}. Nothing was deployed.`);
      result.aborted = { path: gate.path, reason: gate.reason };
      result.exitCode = EXIT_ABORTED;
      return;
    }

    const { plan } = gate;
    let dirty = this.provenance.backfill(records, plan.backfills).dirty;

    for (const s of plan.skipped) logger.warn(`Not deploying ${s.path}: ${s.reason}`);

    let confirmed = false;
    if (plan.deploys.length > 0) {
      logger.info("");
      logger.info(`Files to deploy (${plan.deploys.length}):`);
      for (const line of describePlan(plan)) logger.info(line);
      confirmed = await confirmer.confirmDeploy(plan);
      if (!confirmed) logger.info("Deployment cancelled.");
    } else {
      logger.info("No files to deploy.");
    }

    // kept remotes are backed up even when the deploy itself is declined
    const executable: DeployPlan = confirmed ? plan : { ...plan, deploys: [] };
    if (executable.deploys.length > 0 || executable.keepBackups.length > 0) {
      const executor = new DeployExecutor({
        remote,
        workingCopy: this.deps.workingCopy,
        backups: this.deps.backups,
        clock: this.deps.clock,
        logger,
        retryPolicy: this.deps.retryPolicy,
      });
      result.outcomes = await executor.execute(executable, result.workingSet);
      dirty = this.provenance.recordOutcomes(records, result.outcomes).dirty || dirty;
    }

    if (dirty) {
      await store.save(records);
      logger.info("Updated deploy provenance.");
    }

    const failures = formatFailures(result.outcomes);
    if (failures.length > 0) {
      logger.info("");
      for (const line of failures) logger.warn(line);
      result.exitCode = EXIT_FAILURE;
    }
  }
}
