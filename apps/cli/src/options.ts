import path from "node:path";
import {
  ConfigError,
  defaultReferenceRef,
  type ClassificationMode,
  type LogLevel,
  type PathSource,
  type ScanOptions,
} from "@deploy-guard/core-application";
import { normalizeRecordPath } from "@deploy-guard/core-domain";

export interface CheckCliOptions {
  readonly workingDir: string;
  readonly vsGit?: string;
  readonly vsHashFile?: string;
  readonly updateHashFile?: string;
  readonly ftpConfig?: string;
  readonly checkSizeOnly?: boolean;
  readonly deployOnClean?: boolean;
  readonly ref?: string;
  readonly commit?: string;
  readonly backupDir?: string;
  readonly project?: string;
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}

export type ResolvedCheck = {
  workingDir: string;
  snapshotPath: string;
  scan: ScanOptions;
  ftpConfigPath: string | null;
  mode: ClassificationMode;
  deploy: boolean;
  backupRoot: string;
  project: string;
  logLevel: LogLevel;
};

export function resolveLogLevel(o: { verbose?: boolean; quiet?: boolean }): LogLevel {
  if (o.verbose) return "debug";
  if (o.quiet) return "warn";
  return "info";
}

export function resolveCheckOptions(o: CheckCliOptions, cwd: string): ResolvedCheck {
  const modes = [
    { mode: "snapshot", file: o.vsGit },
    { mode: "load", file: o.vsHashFile },
    { mode: "refresh", file: o.updateHashFile },
  ] as const;
  const chosen = modes.filter((m) => m.file !== undefined);
  if (chosen.length !== 1) {
    throw new ConfigError("Exactly one of --vs-git, --vs-hash-file or --update-hash-file is required");
  }
  const [{ mode: scanMode, file }] = chosen;
  if (!file) throw new ConfigError("The snapshot file path must not be empty");

  if (o.deployOnClean && !o.ftpConfig) {
    throw new ConfigError("--deploy-on-clean needs --ftp-config");
  }

  const workingDir = path.resolve(cwd, o.workingDir);
  const source: PathSource = o.commit ? { kind: "commit", commitRef: o.commit } : { kind: "dirty" };

  return {
    workingDir,
    snapshotPath: path.resolve(cwd, file),
    scan: { mode: scanMode, source, referenceRef: defaultReferenceRef(source, o.ref) },
    ftpConfigPath: o.ftpConfig ? path.resolve(cwd, o.ftpConfig) : null,
    mode: o.checkSizeOnly ? "size" : "hash",
    deploy: o.deployOnClean ?? false,
    backupRoot: path.resolve(cwd, o.backupDir ?? "backups"),
    project: o.project ?? path.basename(workingDir),
    logLevel: resolveLogLevel(o),
  };
}

/**
 * A path inside the repository becomes repository-relative with forward
 * slashes; anything else is passed through as given.
 */
export function toRepoPath(filePath: string, repoRoot: string, cwd: string): string {
  const rel = path.relative(path.resolve(repoRoot), path.resolve(cwd, filePath));
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) return normalizeRecordPath(filePath);
  return normalizeRecordPath(rel.split(path.sep).join("/"));
}
