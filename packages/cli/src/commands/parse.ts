/**
 * parse command - run an invocation against a manifest program
 */

import { runProgram } from "@flagline/core";
import type { Action, ProgramIO, Result } from "@flagline/core";
import type { InvocationReport } from "../types.js";
import { loadManifestProgram } from "./manifest-common.js";

/**
 * Action that prints what it received as JSON
 */
export const reportingAction =
  (command: string | null, io: ProgramIO): Action =>
  (flags, args) => {
    const report: InvocationReport = { command, flags, arguments: args };
    io.out(JSON.stringify(report, null, 2));
  };

/**
 * Run the manifest program on the given tokens. Help, version and errors
 * are reported by that program itself; resolves to its exit status.
 */
export const parseWithManifest = async (
  manifestPath: string,
  tokens: readonly string[],
  io: ProgramIO
): Promise<Result<number, string>> => {
  const loaded = loadManifestProgram(manifestPath, {
    actionFor: (command) => reportingAction(command, io),
    io,
  });
  if (!loaded.ok) {
    return loaded;
  }

  const exitCode = await runProgram(loaded.value.program, tokens);
  return { ok: true, value: exitCode };
};
