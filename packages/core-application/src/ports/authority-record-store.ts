import type { AuthorityRecordCollection } from "@deploy-guard/core-domain";

export type ReleaseLock = () => Promise<void>;

export interface AuthorityRecordStore {
  /** null when nothing has been persisted yet */
  load(): Promise<AuthorityRecordCollection | null>;
  save(records: AuthorityRecordCollection): Promise<void>;

  /** Exclusive access for the whole run. */
  lock(): Promise<ReleaseLock>;
}
