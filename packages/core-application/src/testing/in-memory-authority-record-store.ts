import type { AuthorityRecord, AuthorityRecordCollection } from "@deploy-guard/core-domain";

import type { AuthorityRecordStore, ReleaseLock } from "../ports/authority-record-store";

function cloneCollection(records: AuthorityRecordCollection): AuthorityRecordCollection {
  return new Map([...records].map(([k, v]): [string, AuthorityRecord] => [k, structuredClone(v)]));
}

export class InMemoryAuthorityRecordStore implements AuthorityRecordStore {
  saved: AuthorityRecordCollection | null;
  saveCount = 0;
  locked = false;

  constructor(initial: AuthorityRecord[] | null = null) {
    this.saved = initial ? new Map(initial.map((r) => [r.path, structuredClone(r)])) : null;
  }

  async load(): Promise<AuthorityRecordCollection | null> {
    return this.saved ? cloneCollection(this.saved) : null;
  }

  async save(records: AuthorityRecordCollection): Promise<void> {
    this.saveCount++;
    this.saved = cloneCollection(records);
  }

  async lock(): Promise<ReleaseLock> {
    if (this.locked) throw new Error("already locked");
    this.locked = true;
    return async () => {
      this.locked = false;
    };
  }
}
