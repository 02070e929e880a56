import { createHash } from "node:crypto";

import type { VersionControlProvider } from "../ports/version-control-provider";
import { fingerprintBytes } from "./content-fingerprinter";

export type DiffTarget =
  | { kind: "pair"; left: string; right: string }
  | { kind: "reference"; path: string };

export function parseDiffTarget(arg: string): DiffTarget {
  const sep = arg.indexOf("::");
  if (sep === -1) return { kind: "reference", path: arg };
  return { kind: "pair", left: arg.slice(0, sep), right: arg.slice(sep + 2) };
}

const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Looser than the deploy fingerprint: every line is trimmed before the
 * lines are joined, so indentation-only edits compare equal.  Content that
 * is not UTF-8 gets the plain line-break stripping.
 */
export function normalizedTextFingerprint(content: Uint8Array): string {
  let text: string;
  try {
    text = decoder.decode(content);
  } catch (err) {
    if (!(err instanceof TypeError)) throw err;
    return fingerprintBytes(content).fingerprint;
  }

  const joined = text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .join("");
  return createHash("md5").update(joined, "utf-8").digest("hex");
}

export class NormalizedDiffService {
  constructor(
    private readonly deps: {
      vcs: VersionControlProvider;
      readLocal: (filePath: string) => Promise<Buffer | null>;

      // path as given on the command line -> path inside the repository
      toRepoPath: (filePath: string) => string;
    }
  ) {}

  async compare(target: DiffTarget, ref: string): Promise<string> {
    const { vcs, readLocal, toRepoPath } = this.deps;

    if (target.kind === "pair") {
      const [left, right] = await Promise.all([readLocal(target.left), readLocal(target.right)]);
      if (!left) return `[ERROR] File not found: ${target.left}`;
      if (!right) return `[ERROR] File not found: ${target.right}`;
      return verdict(left, right, `${target.left} vs ${target.right}`);
    }

    const local = await readLocal(target.path);
    if (!local) return `[ERROR] Local file not found: ${target.path}`;

    const repoPath = toRepoPath(target.path);
    const reference = await vcs.readFileAt(repoPath, ref);
    if (!reference) return `[ERROR] ${repoPath} not found at ${ref}`;

    return verdict(local, reference, `${target.path} vs ${ref}`);
  }

  /** All results are collected first, then returned in argument order. */
  async compareAll(args: readonly string[], ref: string): Promise<string[]> {
    const out: string[] = [];
    for (const arg of args) out.push(await this.compare(parseDiffTarget(arg), ref));
    return out;
  }
}

function verdict(a: Uint8Array, b: Uint8Array, label: string): string {
  return normalizedTextFingerprint(a) === normalizedTextFingerprint(b)
    ? `[MATCH] ${label}`
    : `[DIFF ] ${label} (different hash)`;
}
