import { execFile } from "node:child_process";
import { promisify } from "node:util";

import type { VersionControlProvider } from "../ports/version-control-provider";
import { VersionControlError, describeError, isErrnoCode } from "../application/errors";

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 256 * 1024 * 1024;

/**
 * Paths from `git status --porcelain=v1 -z`.  Entries are `XY path`; a
 * rename or copy is followed by its origin path, which is dropped.
 */
export function parsePorcelainZ(output: string): string[] {
  const fields = output.split("\0");
  const paths: string[] = [];

  for (let i = 0; i < fields.length; i++) {
    const entry = fields[i];
    if (entry.length < 4) continue;

    const status = entry.slice(0, 2);
    paths.push(entry.slice(3));
    if (status.includes("R") || status.includes("C")) i++;
  }
  return paths;
}

function exitCodeOf(err: unknown): number | null {
  if (!err || typeof err !== "object" || !("code" in err)) return null;
  return typeof err.code === "number" ? err.code : null;
}

export class GitVersionControlProvider implements VersionControlProvider {
  constructor(private readonly repoRoot: string) {}

  private async git(args: string[]): Promise<Buffer> {
    try {
      const { stdout } = await execFileAsync("git", args, {
        cwd: this.repoRoot,
        encoding: "buffer",
        maxBuffer: MAX_BUFFER,
      });
      return stdout;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) {
        throw new VersionControlError(`Cannot run git in ${this.repoRoot}: is git installed?`, err);
      }
      throw new VersionControlError(`git ${args[0]} failed: ${describeError(err)}`, err);
    }
  }

  /** null when git exits non-zero, e.g. for a path absent at `ref` */
  private async gitOrNull(args: string[]): Promise<Buffer | null> {
    try {
      return await this.git(args);
    } catch (err) {
      if (err instanceof VersionControlError && exitCodeOf(err.cause) !== null) return null;
      throw err;
    }
  }

  async listDirtyPaths(): Promise<string[]> {
    const out = await this.git(["status", "--porcelain=v1", "-z", "-uall"]);
    return parsePorcelainZ(out.toString("utf-8"));
  }

  async readFileAt(path: string, ref: string): Promise<Buffer | null> {
    return this.gitOrNull(["show", `${ref}:${path}`]);
  }

  async lastCommitTimestamp(path: string, ref: string): Promise<string | null> {
    const out = await this.gitOrNull(["log", "-1", "--format=%aI", ref, "--", path]);
    const ts = out?.toString("utf-8").trim();
    return ts ? ts : null;
  }

  async changedPathsInCommit(commitRef: string): Promise<string[]> {
    const out = await this.git(["diff-tree", "--root", "--no-commit-id", "--name-only", "-r", "-z", commitRef]);
    return out
      .toString("utf-8")
      .split("\0")
      .filter((p) => p.length > 0);
  }
}
