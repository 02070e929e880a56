import { createInterface } from "node:readline";
import {
  parseConfirmation,
  parseConflictResponse,
  type ConflictDecision,
  type RemoteConflict,
} from "@deploy-guard/core-domain";

import type { ConflictResolver } from "../ports/conflict-resolver";
import type { DeployConfirmer } from "../ports/deploy-confirmer";
import type { DeployPlan } from "../value-objects/deploy-plan";

export type PromptStreams = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

function describeConflict(c: RemoteConflict): string[] {
  const short = (fp: string | undefined) => fp ?? "(none)";
  return [
    "",
    `CONFLICT: ${c.path}`,
    `  remote       ${c.remoteFingerprint} (${c.remoteSize} bytes) at ${c.remotePath}`,
    `  local        ${short(c.localFingerprint)}${c.localSize !== undefined ? ` (${c.localSize} bytes)` : ""}`,
    `  reference    ${short(c.referenceFingerprint)}`,
    `  last deploy  ${short(c.lastDeployFingerprint)}`,
  ];
}

/** Terminal answers for the two operator decisions. */
export class ReadlineOperatorPrompt implements ConflictResolver, DeployConfirmer {
  constructor(private readonly streams: PromptStreams = { input: process.stdin, output: process.stdout }) {}

  /** Resolves with `null` when the input ends before an answer. */
  private ask(question: string): Promise<string | null> {
    const rl = createInterface({ input: this.streams.input, output: this.streams.output });
    return new Promise((resolve) => {
      rl.once("close", () => resolve(null));
      rl.question(question, (answer) => {
        resolve(answer);
        rl.close();
      });
    });
  }

  async resolve(conflict: RemoteConflict): Promise<ConflictDecision> {
    this.streams.output.write(`${describeConflict(conflict).join("\n")}\n`);
    const answer = await this.ask("Replace remote, Keep remote (backup only) or Abort all? [r/k/a]: ");
    if (answer === null) {
      this.streams.output.write("\n");
      return "abort";
    }
    return parseConflictResponse(answer);
  }

  async confirmDeploy(plan: DeployPlan): Promise<boolean> {
    const answer = await this.ask(`Proceed with deployment of ${plan.deploys.length} file(s)? (Y/n): `);
    // end of input is a no, unlike an empty line
    if (answer === null) {
      this.streams.output.write("\n");
      return false;
    }
    return parseConfirmation(answer);
  }
}
