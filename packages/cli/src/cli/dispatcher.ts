/**
 * CLI command dispatcher
 */

import { processIO, runProgram } from "@flagline/core";
import type { ProgramIO } from "@flagline/core";
import { createCliProgram } from "./program.js";
import type { CliContext } from "./program.js";

export type RunCliOptions = {
  readonly cwd?: string;
  readonly io?: ProgramIO;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  options: RunCliOptions = {}
): Promise<number> => {
  const context: CliContext = {
    cwd: options.cwd ?? process.cwd(),
    io: options.io ?? processIO,
    exitCode: 0,
  };

  const exitCode = await runProgram(createCliProgram(context), args);

  // A manifest program run by `parse` reports its own failures
  return exitCode !== 0 ? exitCode : context.exitCode;
};
