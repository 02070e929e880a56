import fs from "node:fs/promises";
import { z } from "zod";

import { ConfigError, describeError, isErrnoCode } from "../application/errors";

export const FtpConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(21),
  user: z.string().default("anonymous"),
  password: z.string().default(""),
  remote_root: z.string().min(1).default("/"),

  // true: explicit FTPS (AUTH TLS, protected data channel)
  secure: z.union([z.boolean(), z.literal("implicit")]).default(true),

  timeout_ms: z.number().int().positive().default(30_000),
  verbose: z.boolean().default(false),
});

export type FtpConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  remoteRoot: string;
  secure: boolean | "implicit";
  timeoutMs: number;
  verbose: boolean;
};

export function parseFtpConfig(data: unknown, source = "FTP config"): FtpConfig {
  const result = FtpConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid ${source}: ${issues}`, result.error);
  }

  const c = result.data;
  return {
    host: c.host,
    port: c.port,
    user: c.user,
    password: c.password,
    remoteRoot: c.remote_root,
    secure: c.secure,
    timeoutMs: c.timeout_ms,
    verbose: c.verbose,
  };
}

export async function loadFtpConfig(filePath: string): Promise<FtpConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) throw new ConfigError(`FTP config not found: ${filePath}`, err);
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`FTP config ${filePath} is not valid JSON: ${describeError(err)}`, err);
  }
  return parseFtpConfig(data, filePath);
}
