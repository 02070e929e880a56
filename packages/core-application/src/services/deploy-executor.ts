import { once } from "node:events";
import { finished } from "node:stream/promises";
import type { ContentDigest } from "@deploy-guard/core-domain";

import type { BackupStore } from "../ports/backup-store";
import type { Clock } from "../ports/clock";
import type { Logger } from "../ports/logger";
import type { RemoteFileStore } from "../ports/remote-file-store";
import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import type { WorkingCopy } from "../ports/working-copy";
import type { BackupOnlyItem, DeployItem, DeployPlan } from "../value-objects/deploy-plan";
import type { DeployFailureStage, DeployOutcome } from "../value-objects/deploy-outcome";

import {
  BackupVerificationError,
  TransportError,
  VerificationMismatchError,
  describeError,
} from "../application/errors";
import { withRetry } from "../application/with-retry";
import { sleep } from "../infra/sleep";
import { FingerprintSink, fingerprintStream } from "./content-fingerprinter";

/** One upload plus three retries, re-verified each time. */
export const VERIFY_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 0,
  maxDelayMs: 0,
  jitterRatio: 0,
  shouldRetry: (err) => err instanceof VerificationMismatchError,
};

function pad2(n: number) {
  return String(n).padStart(2, "0");
}

function ymd(d: Date) {
  return `${d.getUTCFullYear()}${pad2(d.getUTCMonth() + 1)}${pad2(d.getUTCDate())}`;
}

function hms(d: Date) {
  return `${pad2(d.getUTCHours())}${pad2(d.getUTCMinutes())}${pad2(d.getUTCSeconds())}`;
}

/**
 * `YYYYMMDD_HHMMSS` from the remote modification time, or `YYYYMMDDHHMMSS`
 * from the current time when the server reported none.  Both in UTC.
 */
export function formatBackupSuffix(remoteModifiedAt: Date | null, now: Date): string {
  if (remoteModifiedAt) return `${ymd(remoteModifiedAt)}_${hms(remoteModifiedAt)}`;
  return `${ymd(now)}${hms(now)}`;
}

type Job = {
  path: string;
  run: () => Promise<DeployOutcome>;
};

export class DeployExecutor {
  private readonly retryPolicy: RetryPolicy;
  private readonly sleeper: Sleeper;

  constructor(
    private readonly deps: {
      remote: RemoteFileStore;
      workingCopy: WorkingCopy;
      backups: BackupStore;
      clock: Clock;
      logger: Logger;
      retryPolicy?: RetryPolicy;
      sleeper?: Sleeper;
    }
  ) {
    this.retryPolicy = deps.retryPolicy ?? VERIFY_RETRY_POLICY;
    this.sleeper = deps.sleeper ?? sleep;
  }

  /**
   * Runs every item, in `order` when given (the report order), otherwise
   * deploys first.  A failing item is reported and the next one runs; only
   * a broken remote session stops the batch.
   */
  async execute(plan: DeployPlan, order: readonly string[] = []): Promise<DeployOutcome[]> {
    const { logger } = this.deps;

    const jobs: Job[] = [
      ...plan.deploys.map((item) => ({ path: item.path, run: () => this.deployOne(item) })),
      ...plan.keepBackups.map((item) => ({ path: item.path, run: () => this.backupOnly(item) })),
    ];
    const position = new Map(order.map((p, i) => [p, i]));
    const rank = (job: Job) => position.get(job.path) ?? order.length;
    jobs.sort((a, b) => rank(a) - rank(b));

    const outcomes: DeployOutcome[] = [];
    let halted: string | null = null;

    for (const job of jobs) {
      if (halted !== null) {
        outcomes.push({ kind: "not_attempted", path: job.path, reason: `remote session failed: ${halted}` });
        continue;
      }

      try {
        outcomes.push(await job.run());
      } catch (err) {
        if (!(err instanceof TransportError)) throw err;
        halted = err.message;
        logger.error(`Remote session failed while processing ${job.path}: ${err.message}`);
        outcomes.push({ kind: "failed", path: job.path, stage: "transport", reason: err.message });
      }
    }

    return outcomes;
  }

  private async backup(
    path: string,
    remotePath: string,
    expectedBytes: number | null,
    remoteModifiedAt: Date | null
  ): Promise<string> {
    const { remote, backups, clock, logger } = this.deps;

    const target = await backups.create(path, formatBackupSuffix(remoteModifiedAt, clock.now()));
    logger.debug(`Backing up ${path} -> ${target.location}`);

    let found: boolean;
    try {
      found = await remote.retrieve(remotePath, target.sink);
    } catch (err) {
      if (!target.sink.closed) {
        // a file stream still opening would recreate the file after discard
        const closed = once(target.sink, "close");
        target.sink.destroy();
        await closed;
      }
      await backups.discard(target.location);
      throw err;
    }
    if (!found) {
      target.sink.end();
      await finished(target.sink);
      await backups.discard(target.location);
      throw new BackupVerificationError(`${remotePath} disappeared before it could be backed up`, expectedBytes ?? 0, 0);
    }
    await finished(target.sink);

    const actual = await backups.sizeOf(target.location);
    if (expectedBytes === null || actual !== expectedBytes) {
      throw new BackupVerificationError(
        `Backup verification failed: size mismatch (remote: ${expectedBytes ?? "unknown"}, backup: ${actual})`,
        expectedBytes ?? 0,
        actual
      );
    }

    logger.debug(`Backup of ${path} verified (${actual} bytes)`);
    return target.location;
  }

  private async verify(item: DeployItem): Promise<ContentDigest> {
    const { remote, workingCopy } = this.deps;

    // the local file as it is now, not as it was scanned
    const local = await fingerprintStream(workingCopy.openRead(item.path));

    const sink = new FingerprintSink();
    const found = await remote.retrieve(item.remotePath, sink);
    if (!found) {
      throw new VerificationMismatchError(`${item.remotePath} is missing after upload`, item.remotePath);
    }
    await finished(sink);

    const uploaded = sink.digest();
    if (uploaded.fingerprint !== local.fingerprint) {
      throw new VerificationMismatchError(
        `remote fingerprint ${uploaded.fingerprint} differs from local ${local.fingerprint}`,
        item.remotePath
      );
    }
    return local;
  }

  private async deployOne(item: DeployItem): Promise<DeployOutcome> {
    const { remote, workingCopy, clock, logger } = this.deps;
    const { maxAttempts } = this.retryPolicy;

    let stage: DeployFailureStage = "backup";
    let attempts = 0;

    try {
      const backupLocation =
        item.status === "MISSING"
          ? null
          : await this.backup(item.path, item.remotePath, item.remoteSize, item.remoteModifiedAt);

      stage = "upload";
      await remote.ensureDirectories(item.remotePath);

      const digest = await withRetry(
        async (ctx) => {
          attempts = ctx.attempt;
          if (ctx.attempt > 1) {
            logger.warn(
              `Verification FAILED for ${item.path} (attempt ${ctx.attempt - 1}/${maxAttempts}). Retrying upload...`
            );
          }

          stage = "upload";
          logger.debug(`Uploading ${item.path} -> ${item.remotePath}`);
          await remote.store(item.remotePath, workingCopy.openRead(item.path));

          stage = "verify";
          return this.verify(item);
        },
        this.retryPolicy,
        this.sleeper
      );

      logger.info(`Deployed ${item.path}${attempts > 1 ? ` after ${attempts} attempts` : ""} (verified)`);
      return {
        kind: "deployed",
        path: item.path,
        fingerprint: digest.fingerprint,
        deployedAtIso: clock.now().toISOString(),
        attempts,
        backupLocation,
      };
    } catch (err) {
      if (err instanceof TransportError) throw err;

      const reason =
        err instanceof VerificationMismatchError
          ? `verification failed after ${attempts} attempts: ${err.message}`
          : describeError(err);
      logger.warn(`Error processing ${item.path}: ${reason}`);
      return { kind: "failed", path: item.path, stage, reason };
    }
  }

  private async backupOnly(item: BackupOnlyItem): Promise<DeployOutcome> {
    const { logger } = this.deps;
    try {
      const location = await this.backup(item.path, item.remotePath, item.remoteSize, item.remoteModifiedAt);
      logger.info(`Kept remote ${item.path}; saved a copy to ${location}`);
      return { kind: "backed_up", path: item.path, backupLocation: location };
    } catch (err) {
      if (err instanceof TransportError) throw err;
      const reason = describeError(err);
      logger.warn(`Error backing up ${item.path}: ${reason}`);
      return { kind: "failed", path: item.path, stage: "backup", reason };
    }
  }
}
