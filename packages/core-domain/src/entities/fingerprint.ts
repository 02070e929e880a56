/** Digest over content with every CR and LF byte removed. */
export type ContentFingerprint = string;

export type ContentDigest = {
  fingerprint: ContentFingerprint;
  // byte count before normalization
  rawSize: number;
};
