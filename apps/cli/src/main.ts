import { Command } from "commander";
import {
  ConfigError,
  RunLockedError,
  TransportError,
  VersionControlError,
  describeError,
} from "@deploy-guard/core-application";

import { registerCheckCommand } from "./commands/check.js";
import { registerDiffCommand } from "./commands/diff.js";

const program = new Command();

program
  .name("deploy-guard")
  .description("Three-way check of a working copy, its git reference and an FTP deployment")
  .version("0.1.0");

registerCheckCommand(program);
registerDiffCommand(program);

try {
  await program.parseAsync(process.argv);
} catch (err) {
  const known =
    err instanceof ConfigError ||
    err instanceof RunLockedError ||
    err instanceof TransportError ||
    err instanceof VersionControlError;
  console.error(`Error: ${describeError(err)}`);
  if (!known && err instanceof Error && err.stack) console.error(err.stack);
  process.exitCode = 1;
}
