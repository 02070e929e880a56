export class TransportError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "TransportError";
  }
}

/** One remote operation ran past its deadline. Fails the item, not the run. */
export class TransferTimeoutError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "TransferTimeoutError";
  }
}

/** The server refused an operation on one path; the session is still usable. */
export class RemoteFileError extends Error {
  constructor(
    message: string,
    public replyCode: number,
    public cause?: unknown
  ) {
    super(message);
    this.name = "RemoteFileError";
  }
}

export class BackupVerificationError extends Error {
  constructor(
    message: string,
    public expectedBytes: number,
    public actualBytes: number
  ) {
    super(message);
    this.name = "BackupVerificationError";
  }
}

export class VerificationMismatchError extends Error {
  constructor(message: string, public remotePath: string) {
    super(message);
    this.name = "VerificationMismatchError";
  }
}

export class VersionControlError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "VersionControlError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ConfigError";
  }
}

export class RunLockedError extends Error {
  constructor(message: string, public lockPath: string) {
    super(message);
    this.name = "RunLockedError";
  }
}

export function isErrnoCode(err: unknown, ...codes: string[]): boolean {
  if (!err || typeof err !== "object" || !("code" in err)) return false;
  return typeof err.code === "string" && codes.includes(err.code);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
