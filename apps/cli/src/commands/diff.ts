import path from "node:path";
import type { Command } from "commander";
import { GitVersionControlProvider, NormalizedDiffService, readLocalFile } from "@deploy-guard/core-application";

import { toRepoPath } from "../options.js";

interface DiffOptions {
  readonly ref: string;
  readonly workingDir?: string;
}

async function executeDiff(targets: string[], options: DiffOptions): Promise<number> {
  const cwd = process.cwd();
  const repoRoot = path.resolve(cwd, options.workingDir ?? ".");

  const service = new NormalizedDiffService({
    vcs: new GitVersionControlProvider(repoRoot),
    readLocal: (p) => readLocalFile(path.resolve(cwd, p)),
    toRepoPath: (p) => toRepoPath(p, repoRoot, cwd),
  });

  const results = await service.compareAll(targets, options.ref);
  for (const line of results) console.log(line);

  return results.some((line) => !line.startsWith("[MATCH]")) ? 1 : 0;
}

export function registerDiffCommand(program: Command): void {
  program
    .command("diff")
    .description("Compare files ignoring line endings and per-line indentation")
    .argument("<paths...>", "Files to compare with git, or a::b pairs of local files")
    .option("--ref <ref>", "Git reference for single paths", "HEAD")
    .option("-w, --working-dir <dir>", "Git repository root (default: current directory)")
    .action(async (targets: string[], options: DiffOptions) => {
      process.exitCode = await executeDiff(targets, options);
    });
}
