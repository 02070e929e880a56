import fs from "node:fs/promises";
import type { Command } from "commander";
import {
  BasicFtpRemoteFileStore,
  ConfigError,
  ConsoleLogger,
  GitVersionControlProvider,
  NodeAuthorityRecordStore,
  NodeBackupStore,
  NodeWorkingCopy,
  ReadlineOperatorPrompt,
  ReconcileService,
  SystemClock,
  isErrnoCode,
  loadFtpConfig,
  type ExitCode,
} from "@deploy-guard/core-application";

import { resolveCheckOptions, type CheckCliOptions } from "../options.js";

async function requireDirectory(dir: string): Promise<void> {
  try {
    const st = await fs.stat(dir);
    if (st.isDirectory()) return;
  } catch (err) {
    if (!isErrnoCode(err, "ENOENT", "ENOTDIR")) throw err;
  }
  throw new ConfigError(`Working directory ${dir} does not exist.`);
}

async function executeCheck(options: CheckCliOptions): Promise<ExitCode> {
  const resolved = resolveCheckOptions(options, process.cwd());
  await requireDirectory(resolved.workingDir);

  const logger = new ConsoleLogger(resolved.logLevel);
  const ftp = resolved.ftpConfigPath ? await loadFtpConfig(resolved.ftpConfigPath) : null;
  const prompt = new ReadlineOperatorPrompt();

  const service = new ReconcileService({
    store: new NodeAuthorityRecordStore(resolved.snapshotPath, logger),
    vcs: new GitVersionControlProvider(resolved.workingDir),
    workingCopy: new NodeWorkingCopy(resolved.workingDir),
    remote: ftp ? new BasicFtpRemoteFileStore(ftp, logger) : null,
    backups: new NodeBackupStore(resolved.backupRoot, resolved.project),
    resolver: prompt,
    confirmer: prompt,
    clock: new SystemClock(),
    logger,
  });

  logger.debug(`Snapshot ${resolved.snapshotPath} (${resolved.scan.mode})`);
  const result = await service.run({
    scan: resolved.scan,
    remoteRoot: ftp?.remoteRoot ?? "/",
    mode: resolved.mode,
    deploy: resolved.deploy,
  });
  return result.exitCode;
}

export function registerCheckCommand(program: Command): void {
  program
    .command("check", { isDefault: true })
    .description("Compare the working copy, the git reference and the FTP remote; optionally deploy")
    .requiredOption("-w, --working-dir <dir>", "Local project directory with a git repository")
    .option("--vs-git <file>", "Snapshot the dirty files with their git reference into <file>")
    .option("--vs-hash-file <file>", "Compare using an existing snapshot file")
    .option("--update-hash-file <file>", "Refresh the local fields of an existing snapshot file")
    .option("--ftp-config <file>", "FTP connection settings (JSON)")
    .option("--check-size-only", "Compare sizes only; never fetches content and never deploys")
    .option("--deploy-on-clean", "Deploy files whose remote copy is explained by git or a previous deploy")
    .option("--ref <ref>", "Git reference to compare against (default HEAD, or <commit>^ with --commit)")
    .option("--commit <ref>", "Take the file list from this commit instead of the dirty files")
    .option("--backup-dir <dir>", "Where remote copies are saved before overwriting", "backups")
    .option("--project <name>", "Backup subdirectory (default: working directory name)")
    .option("-v, --verbose", "Show every transfer step")
    .option("-q, --quiet", "Only warnings and errors")
    .action(async (options: CheckCliOptions) => {
      process.exitCode = await executeCheck(options);
    });
}
