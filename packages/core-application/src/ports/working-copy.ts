import type { Readable } from "node:stream";

export type LocalFileInfo = {
  sizeBytes: number;
  modifiedAt: Date;
};

/** The local checkout, addressed by forward-slash relative paths. */
export interface WorkingCopy {
  readonly rootAbs: string;

  /** null when the path is absent or not a regular file */
  stat(relativePath: string): Promise<LocalFileInfo | null>;

  openRead(relativePath: string): Readable;
}
