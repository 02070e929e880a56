import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { Readable } from "node:stream";

import type { LocalFileInfo, WorkingCopy } from "../ports/working-copy";
import { isErrnoCode } from "../application/errors";

/** null when the file does not exist. */
export async function readLocalFile(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (isErrnoCode(err, "ENOENT", "ENOTDIR")) return null;
    throw err;
  }
}

export class NodeWorkingCopy implements WorkingCopy {
  readonly rootAbs: string;

  constructor(root: string) {
    this.rootAbs = path.resolve(root);
  }

  private abs(relativePath: string) {
    return path.join(this.rootAbs, ...relativePath.split("/"));
  }

  async stat(relativePath: string): Promise<LocalFileInfo | null> {
    try {
      const st = await fs.stat(this.abs(relativePath));
      if (!st.isFile()) return null;
      return { sizeBytes: st.size, modifiedAt: st.mtime };
    } catch (err) {
      if (isErrnoCode(err, "ENOENT", "ENOTDIR")) return null;
      throw err;
    }
  }

  openRead(relativePath: string): Readable {
    return createReadStream(this.abs(relativePath));
  }
}
