import { Client, FTPError } from "basic-ftp";
import type { Readable, Writable } from "node:stream";
import { remoteDirname } from "@deploy-guard/core-domain";

import type { FtpConfig } from "../config/ftp-config";
import type { Logger } from "../ports/logger";
import type { RemoteFileStore } from "../ports/remote-file-store";
import {
  RemoteFileError,
  TransferTimeoutError,
  TransportError,
  describeError,
  isErrnoCode,
} from "../application/errors";

const FILE_UNAVAILABLE = 550;

// replies about one file or directory; the control connection stays usable
const FILE_LEVEL_REPLIES = new Set([450, 451, 452, 550, 552, 553]);

// errors from the local side of a transfer, not from the session
const LOCAL_ERRNO = ["ENOENT", "ENOTDIR", "EISDIR", "EACCES", "EPERM", "EMFILE"];

export function isNotFound(err: unknown): boolean {
  return err instanceof FTPError && err.code === FILE_UNAVAILABLE;
}

/** Maps a failed operation onto the transport taxonomy. */
export function translateFtpError(err: unknown, what: string): Error {
  if (err instanceof TransportError || err instanceof TransferTimeoutError) return err;
  if (isErrnoCode(err, ...LOCAL_ERRNO) && err instanceof Error) return err;

  const message = describeError(err);
  if (err instanceof FTPError && FILE_LEVEL_REPLIES.has(err.code)) {
    return new RemoteFileError(`${what}: ${message}`, err.code, err);
  }
  if (/timeout/i.test(message)) return new TransferTimeoutError(`${what}: ${message}`, err);
  return new TransportError(`${what}: ${message}`, err);
}

/**
 * One control connection, opened on first use and reopened after a timeout
 * or a dropped session.  Callers must not overlap operations.
 */
export class BasicFtpRemoteFileStore implements RemoteFileStore {
  private client: Client | null = null;

  constructor(
    private readonly config: FtpConfig,
    private readonly logger: Logger
  ) {}

  private async connect(): Promise<Client> {
    if (this.client && !this.client.closed) return this.client;

    const { host, port, user, password, secure, timeoutMs, verbose } = this.config;
    const client = new Client(timeoutMs);
    client.ftp.verbose = verbose;

    try {
      await client.access({ host, port, user, password, secure });
    } catch (err) {
      client.close();
      throw new TransportError(`Could not connect to ${host}:${port}: ${describeError(err)}`, err);
    }

    this.logger.debug(`Connected to ${host}:${port}${secure ? " (TLS)" : ""}`);
    this.client = client;
    return client;
  }

  private async run<T>(what: string, op: (client: Client) => Promise<T>): Promise<T> {
    const client = await this.connect();
    try {
      return await op(client);
    } catch (err) {
      const translated = translateFtpError(err, what);
      // a timed-out session is in an unknown state; the next call reconnects
      if (translated instanceof TransferTimeoutError) client.close();
      throw translated;
    }
  }

  async probeSize(remotePath: string): Promise<number | null> {
    return this.run(`SIZE ${remotePath}`, async (client) => {
      try {
        return await client.size(remotePath);
      } catch (err) {
        if (isNotFound(err)) return null;
        throw err;
      }
    });
  }

  async probeModifiedTime(remotePath: string): Promise<Date | null> {
    return this.run(`MDTM ${remotePath}`, async (client) => {
      try {
        return await client.lastMod(remotePath);
      } catch (err) {
        // servers without MDTM answer 500/502, a vanished file 550
        if (err instanceof FTPError) return null;
        throw err;
      }
    });
  }

  async retrieve(remotePath: string, destination: Writable): Promise<boolean> {
    return this.run(`RETR ${remotePath}`, async (client) => {
      try {
        await client.downloadTo(destination, remotePath);
      } catch (err) {
        if (isNotFound(err)) return false;
        throw err;
      }
      if (!destination.writableEnded) destination.end();
      return true;
    });
  }

  async store(remotePath: string, source: Readable): Promise<void> {
    await this.run(`STOR ${remotePath}`, async (client) => {
      await client.uploadFrom(source, remotePath);
    });
  }

  async ensureDirectories(remotePath: string): Promise<void> {
    const dir = remoteDirname(remotePath);
    if (!dir) return;

    await this.run(`MKD ${dir}`, async (client) => {
      // ensureDir changes the working directory; put it back
      const start = await client.pwd();
      try {
        await client.ensureDir(dir);
      } finally {
        await client.cd(start);
      }
    });
  }

  async close(): Promise<void> {
    if (!this.client) return;
    this.client.close();
    this.client = null;
    this.logger.debug(`Disconnected from ${this.config.host}`);
  }
}
