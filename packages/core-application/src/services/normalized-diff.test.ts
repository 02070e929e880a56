import { describe, it, expect } from "vitest";

import { NormalizedDiffService, normalizedTextFingerprint, parseDiffTarget } from "./normalized-diff.js";
import { fingerprintBytes } from "./content-fingerprinter.js";
import { InMemoryVersionControl } from "../testing/in-memory-version-control.js";

describe("parseDiffTarget", () => {
  it("splits pairs on the first separator", () => {
    expect(parseDiffTarget("a.txt::b::c.txt")).toEqual({ kind: "pair", left: "a.txt", right: "b::c.txt" });
  });

  it("treats anything else as a reference comparison", () => {
    expect(parseDiffTarget("src/a.php")).toEqual({ kind: "reference", path: "src/a.php" });
  });
});

describe("normalizedTextFingerprint", () => {
  it("ignores indentation and line endings", () => {
    const a = Buffer.from("<div>\r\n    <p>x</p>\r\n</div>\r\n");
    const b = Buffer.from("<div>\n\t<p>x</p>\n</div>");
    expect(normalizedTextFingerprint(a)).toBe(normalizedTextFingerprint(b));
  });

  it("still sees changes inside a line", () => {
    expect(normalizedTextFingerprint(Buffer.from("a b"))).not.toBe(normalizedTextFingerprint(Buffer.from("ab")));
  });

  it("falls back to line-break stripping for binary content", () => {
    const bytes = Buffer.from([0xff, 0xfe, 0x0d, 0x0a, 0x20]);
    expect(normalizedTextFingerprint(bytes)).toBe(fingerprintBytes(bytes).fingerprint);
  });
});

describe("NormalizedDiffService", () => {
  function service(files: Record<string, string>, vcs = new InMemoryVersionControl()) {
    return new NormalizedDiffService({
      vcs,
      readLocal: async (p) => (p in files ? Buffer.from(files[p]) : null),
      toRepoPath: (p) => p.replace(/^\/repo\//, ""),
    });
  }

  it("compares local pairs", async () => {
    const svc = service({ "a.txt": "x\n  y\n", "b.txt": "x\r\ny", "c.txt": "z" });

    expect(await svc.compareAll(["a.txt::b.txt", "a.txt::c.txt", "a.txt::nope.txt"], "HEAD")).toEqual([
      "[MATCH] a.txt vs b.txt",
      "[DIFF ] a.txt vs c.txt (different hash)",
      "[ERROR] File not found: nope.txt",
    ]);
  });

  it("compares a working file with the reference", async () => {
    const vcs = new InMemoryVersionControl().commit("v1", "src/a.txt", "  one\n", "2024-01-01T00:00:00Z");
    const svc = service({ "/repo/src/a.txt": "one", "/repo/src/b.txt": "two" }, vcs);

    expect(await svc.compareAll(["/repo/src/a.txt", "/repo/src/b.txt", "/repo/none.txt"], "v1")).toEqual([
      "[MATCH] /repo/src/a.txt vs v1",
      "[ERROR] src/b.txt not found at v1",
      "[ERROR] Local file not found: /repo/none.txt",
    ]);
  });
});
