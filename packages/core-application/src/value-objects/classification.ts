import type {
  AuthorityRecord,
  ContentFingerprint,
  SyncStatus,
  TimestampOrder,
} from "@deploy-guard/core-domain";

export type ClassificationDetails = {
  timestampOrder: TimestampOrder;
  localModifiedAt: Date | null;
  remoteModifiedAt: Date | null;

  localSize: number | null;
  remoteSize: number | null;

  // only in hash mode, when the object exists
  remoteFingerprint: ContentFingerprint | null;
};

export type ClassifiedRecord = {
  // the live record, so provenance updates land in the collection
  record: AuthorityRecord;
  remotePath: string;
  status: SyncStatus;
  details: ClassificationDetails;
};
