import type { Readable, Writable } from "node:stream";

/**
 * The deployment target.  Every call goes over one session, so callers must
 * never run two of them at once.
 *
 * Failures that are not "not found" surface as TransportError, or as
 * TransferTimeoutError when a single operation runs out of time.
 */
export interface RemoteFileStore {
  /** null when the object does not exist */
  probeSize(remotePath: string): Promise<number | null>;

  /** null when the server cannot tell */
  probeModifiedTime(remotePath: string): Promise<Date | null>;

  /**
   * Streams the object into `destination` and ends it.  Resolves false, and
   * leaves `destination` untouched, when the object does not exist.
   */
  retrieve(remotePath: string, destination: Writable): Promise<boolean>;

  store(remotePath: string, source: Readable): Promise<void>;

  /** Creates every missing parent directory of `remotePath`. Idempotent. */
  ensureDirectories(remotePath: string): Promise<void>;

  close(): Promise<void>;
}
