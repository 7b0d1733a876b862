/**
 * flagline - declarative command-line programs
 */

export * from "./types/result.js";
export * from "./types/errors.js";
export * from "./flag.js";
export * from "./flag-set.js";
export * from "./action.js";
export * from "./author.js";
export * from "./command.js";
export * from "./command-set.js";
export * from "./help.js";
export * from "./reporting.js";
export * from "./program.js";
