/**
 * CLI - Public API
 */

export { VERSION, MANIFEST_FILE, PROGRAM_NAME } from "./constants.js";
export { createCliProgram } from "./program.js";
export type { CliContext } from "./program.js";
export { runCli } from "./dispatcher.js";
export type { RunCliOptions } from "./dispatcher.js";
