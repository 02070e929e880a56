import type { Writable } from "node:stream";

export type BackupTarget = {
  location: string;
  sink: Writable;
};

export interface BackupStore {
  create(relativePath: string, suffix: string): Promise<BackupTarget>;
  sizeOf(location: string): Promise<number>;
  discard(location: string): Promise<void>;
}
