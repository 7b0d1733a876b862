/**
 * CLI program declaration and dispatch
 * Re-exports from cli/ subdirectory
 */

export {
  VERSION,
  MANIFEST_FILE,
  PROGRAM_NAME,
  createCliProgram,
  runCli,
} from "./cli/index.js";
export type { CliContext, RunCliOptions } from "./cli/index.js";
