import fs from "node:fs/promises";
import path from "node:path";

import type { ReleaseLock } from "../ports/authority-record-store";
import { RunLockedError, isErrnoCode } from "../application/errors";

export function runLockPath(guardedFile: string) {
  return `${guardedFile}.lock`;
}

/**
 * Creates the lock file exclusively.  A lock left behind by a crashed run
 * has to be removed by hand; its content says who took it.
 */
export async function acquireRunLock(guardedFile: string): Promise<ReleaseLock> {
  const fp = runLockPath(guardedFile);
  await fs.mkdir(path.dirname(fp), { recursive: true });

  try {
    await fs.writeFile(fp, `${process.pid} ${new Date().toISOString()}\n`, { encoding: "utf-8", flag: "wx" });
  } catch (err) {
    if (isErrnoCode(err, "EEXIST")) {
      const holder = (await fs.readFile(fp, "utf-8")).trim();
      throw new RunLockedError(`Another run holds ${fp} (${holder || "no owner recorded"})`, fp);
    }
    throw err;
  }

  let released = false;
  return async () => {
    if (released) return;
    released = true;
    await fs.rm(fp, { force: true });
  };
}
