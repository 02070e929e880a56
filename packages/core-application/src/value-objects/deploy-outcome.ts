import type { ContentFingerprint } from "@deploy-guard/core-domain";

export type DeployFailureStage = "backup" | "upload" | "verify" | "transport";

export type DeployOutcome =
  | {
      kind: "deployed";
      path: string;
      fingerprint: ContentFingerprint;
      deployedAtIso: string;
      attempts: number;
      backupLocation: string | null;
    }
  | { kind: "backed_up"; path: string; backupLocation: string }
  | { kind: "failed"; path: string; stage: DeployFailureStage; reason: string }
  | { kind: "not_attempted"; path: string; reason: string };

export type FailedOutcome = Extract<DeployOutcome, { kind: "failed" | "not_attempted" }>;

export function isFailure(outcome: DeployOutcome): outcome is FailedOutcome {
  return outcome.kind === "failed" || outcome.kind === "not_attempted";
}
