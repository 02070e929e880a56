import { createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import type { BackupStore, BackupTarget } from "../ports/backup-store";

/**
 * Backups live under `<root>/<project>/<relative dir>/<name>.<suffix>`, one
 * file per remote revision replaced.
 */
export class NodeBackupStore implements BackupStore {
  constructor(
    private readonly rootAbs: string,
    private readonly project: string
  ) {}

  private backupPath(relativePath: string, suffix: string) {
    const dir = path.posix.dirname(relativePath);
    const name = `${path.posix.basename(relativePath)}.${suffix}`;
    return path.join(this.rootAbs, this.project, ...(dir === "." ? [] : dir.split("/")), name);
  }

  async create(relativePath: string, suffix: string): Promise<BackupTarget> {
    const location = this.backupPath(relativePath, suffix);
    await fs.mkdir(path.dirname(location), { recursive: true });
    return { location, sink: createWriteStream(location) };
  }

  async sizeOf(location: string): Promise<number> {
    const st = await fs.stat(location);
    return st.size;
  }

  async discard(location: string): Promise<void> {
    await fs.rm(location, { force: true });
  }
}
