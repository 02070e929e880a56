import { PassThrough } from "node:stream";
import { describe, it, expect } from "vitest";
import type { RemoteConflict } from "@deploy-guard/core-domain";

import { ReadlineOperatorPrompt } from "./readline-operator-prompt.js";
import { emptyPlan } from "../value-objects/deploy-plan.js";

const conflict: RemoteConflict = {
  path: "a.txt",
  remotePath: "/www/a.txt",
  remoteFingerprint: "rrr",
  remoteSize: 12,
  localFingerprint: "lll",
  localSize: 10,
};

function terminal() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.on("data", (chunk: Buffer) => {
    written += chunk.toString("utf-8");
  });
  return { input, output, written: () => written };
}

describe("ReadlineOperatorPrompt", () => {
  it("shows the conflict and reads a decision", async () => {
    const t = terminal();
    const prompt = new ReadlineOperatorPrompt(t);

    const pending = prompt.resolve(conflict);
    t.input.write("k\n");

    expect(await pending).toBe("keep");
    expect(t.written()).toContain("CONFLICT: a.txt");
    expect(t.written()).toContain("  reference    (none)");
  });

  it("aborts on an unrecognized answer", async () => {
    const t = terminal();
    const pending = new ReadlineOperatorPrompt(t).resolve(conflict);
    t.input.write("whatever\n");
    expect(await pending).toBe("abort");
  });

  it("takes an empty answer as yes for the deploy confirmation only", async () => {
    const t = terminal();
    const prompt = new ReadlineOperatorPrompt(t);

    const yes = prompt.confirmDeploy(emptyPlan());
    t.input.write("\n");
    expect(await yes).toBe(true);

    const no = prompt.confirmDeploy(emptyPlan());
    t.input.write("n\n");
    expect(await no).toBe(false);
  });

  it("aborts when the input ends before a decision", async () => {
    const t = terminal();
    const pending = new ReadlineOperatorPrompt(t).resolve(conflict);
    t.input.end();
    expect(await pending).toBe("abort");
  });

  it("declines the deploy when the input ends before an answer", async () => {
    const t = terminal();
    const pending = new ReadlineOperatorPrompt(t).confirmDeploy(emptyPlan());
    t.input.end();
    expect(await pending).toBe(false);
  });
});
