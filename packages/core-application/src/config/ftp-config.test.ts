import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";

import { loadFtpConfig, parseFtpConfig } from "./ftp-config.js";
import { ConfigError } from "../application/errors.js";

describe("parseFtpConfig", () => {
  it("fills in defaults and ignores unknown keys", () => {
    expect(parseFtpConfig({ host: "ftp.example.test", user: "deploy", password: "test-secret", comment: "x" })).toEqual({
      host: "ftp.example.test",
      port: 21,
      user: "deploy",
      password: "test-secret",
      remoteRoot: "/",
      secure: true,
      timeoutMs: 30000,
      verbose: false,
    });
  });

  it("accepts implicit TLS and a remote root", () => {
    const c = parseFtpConfig({ host: "h", port: 990, secure: "implicit", remote_root: "/public_html" });
    expect(c.secure).toBe("implicit");
    expect(c.port).toBe(990);
    expect(c.remoteRoot).toBe("/public_html");
  });

  it("names every invalid field", () => {
    expect(() => parseFtpConfig({ port: "21" })).toThrow(ConfigError);
    expect(() => parseFtpConfig({ port: "21" })).toThrow(/host: Required; port: Expected number, received string/);
  });
});

describe("loadFtpConfig", () => {
  it("reports a missing file and malformed JSON as configuration errors", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "ftp-config-"));
    try {
      await expect(loadFtpConfig(path.join(dir, "none.json"))).rejects.toBeInstanceOf(ConfigError);

      const bad = path.join(dir, "bad.json");
      await fs.writeFile(bad, "{ host: ", "utf-8");
      await expect(loadFtpConfig(bad)).rejects.toThrow(/is not valid JSON/);

      const good = path.join(dir, "ftp.json");
      await fs.writeFile(good, JSON.stringify({ host: "h", secure: false }), "utf-8");
      expect((await loadFtpConfig(good)).secure).toBe(false);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
