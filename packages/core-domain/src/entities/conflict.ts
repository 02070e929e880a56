import type { ContentFingerprint } from "./fingerprint";

export type ConflictDecision = "replace" | "keep" | "abort";

/** A remote object whose content no known authority explains. */
export interface RemoteConflict {
  path: string;
  remotePath: string;

  remoteFingerprint: ContentFingerprint;
  remoteSize: number;

  localFingerprint?: ContentFingerprint;
  localSize?: number;
  referenceFingerprint?: ContentFingerprint;
  lastDeployFingerprint?: ContentFingerprint;
}

const DECISION_ALIASES: Record<string, ConflictDecision> = {
  r: "replace",
  replace: "replace",
  k: "keep",
  keep: "keep",
  a: "abort",
  abort: "abort",
};

/** Anything unrecognized, including empty input, is an abort. */
export function parseConflictResponse(input: string): ConflictDecision {
  return DECISION_ALIASES[input.trim().toLowerCase()] ?? "abort";
}

/** Empty input means yes. */
export function parseConfirmation(input: string): boolean {
  const answer = input.trim().toLowerCase();
  return answer === "" || answer === "y" || answer === "yes";
}
