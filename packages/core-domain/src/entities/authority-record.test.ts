import { describe, it, expect } from "vitest";
import { createAuthorityRecord, isSafeRecordPath, normalizeRecordPath } from "./authority-record.js";

describe("record paths", () => {
  it("normalizes separators", () => {
    expect(normalizeRecordPath("src\\lib\\a.php")).toBe("src/lib/a.php");
    expect(normalizeRecordPath("./src//a.php")).toBe("src/a.php");
  });

  it("creates records keyed by the normalized path", () => {
    expect(createAuthorityRecord("a\\b.txt")).toEqual({ path: "a/b.txt" });
  });

  it("rejects paths that escape the root", () => {
    expect(isSafeRecordPath("a/b.txt")).toBe(true);
    expect(isSafeRecordPath("../etc/passwd")).toBe(false);
    expect(isSafeRecordPath("a/../../b")).toBe(false);
    expect(isSafeRecordPath("/abs/path")).toBe(false);
    expect(isSafeRecordPath("C:/x")).toBe(false);
    expect(isSafeRecordPath("")).toBe(false);
  });
});
