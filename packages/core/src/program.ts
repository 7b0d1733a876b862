/**
 * Programs: the top-level declaration and its dispatch
 */

import { helpAction, invokeAction } from "./action.js";
import type { Action, FallbackAction } from "./action.js";
import type { Author } from "./author.js";
import { isHelpToken, runCommand } from "./command.js";
import { checkCommandSet, findCommand } from "./command-set.js";
import type { CommandSet } from "./command-set.js";
import { checkFlagSet, parseFlags } from "./flag-set.js";
import type { FlagSet } from "./flag-set.js";
import { renderProgramHelp, renderVersion } from "./help.js";
import { EXIT_CODES, defaultErrorHandlers, processIO } from "./reporting.js";
import type { ErrorHandlers, ProgramIO } from "./reporting.js";
import type { ActionError, InputError, SchemaError } from "./types/errors.js";
import { flatMap, map } from "./types/result.js";
import type { Result } from "./types/result.js";

export const VERSION_TOKENS: readonly string[] = ["-v", "--version"];

export type ProgramDefinition = {
  readonly name: string;
  readonly version: string;
  readonly tagline?: string;
  readonly description?: string;
  readonly authors?: readonly Author[];
  /** Replaces the default usage line after the program name */
  readonly usage?: string;
  /** Global flags, parsed only when no subcommand is given */
  readonly flags?: FlagSet;
  readonly commands?: CommandSet;
  /** Runs when no subcommand is given */
  readonly action?: Action;
  /** Runs instead of `action` when there is none; defaults to helpAction */
  readonly fallbackAction?: FallbackAction;
  readonly errorHandlers?: ErrorHandlers;
  readonly io?: ProgramIO;
};

export type Program = {
  readonly name: string;
  readonly version: string;
  readonly tagline?: string;
  readonly description?: string;
  readonly authors: readonly Author[];
  readonly usage?: string;
  readonly flags: FlagSet;
  readonly commands: CommandSet;
  readonly action?: Action;
  readonly fallbackAction: FallbackAction;
  readonly errorHandlers: ErrorHandlers;
  readonly io: ProgramIO;
};

/**
 * Fill in the defaults of a program declaration. Error handlers report to
 * the program's own io unless given.
 */
export const defineProgram = (definition: ProgramDefinition): Program => {
  const io = definition.io ?? processIO;
  return {
    ...definition,
    authors: definition.authors ?? [],
    flags: definition.flags ?? [],
    commands: definition.commands ?? [],
    fallbackAction: definition.fallbackAction ?? helpAction,
    errorHandlers: definition.errorHandlers ?? defaultErrorHandlers(io),
    io,
  };
};

/**
 * Validate the whole declaration: global flags, then commands
 */
export const checkProgram = (
  program: Program
): Result<Program, SchemaError> =>
  flatMap(checkFlagSet(program.flags), () =>
    map(checkCommandSet(program.commands), () => program)
  );

type Reserved = "help" | "version";

/**
 * First help or version token anywhere in the input
 */
export const findReservedToken = (
  tokens: readonly string[]
): Reserved | undefined => {
  for (const token of tokens) {
    if (isHelpToken(token)) return "help";
    if (VERSION_TOKENS.includes(token)) return "version";
  }
  return undefined;
};

const report = (
  program: Program,
  failure: InputError | ActionError
): number =>
  failure.kind === "action"
    ? program.errorHandlers.action(program.name, failure)
    : program.errorHandlers.parse(program.name, failure);

/**
 * Run the program on the invocation tokens (without the program name).
 *
 * Resolves to the exit status: 0, or whatever the error handler for the
 * failing stage returns.
 */
export const runProgram = async (
  program: Program,
  tokens: readonly string[]
): Promise<number> => {
  const checked = checkProgram(program);
  if (!checked.ok) {
    return program.errorHandlers.setup(program.name, checked.error);
  }

  const command =
    tokens[0] === undefined
      ? undefined
      : findCommand(program.commands, tokens[0]);

  // "<command> --help" is the command's own help, not the program's
  if (!(command && isHelpToken(tokens[1]))) {
    const reserved = findReservedToken(tokens);
    if (reserved !== undefined) {
      program.io.out(
        reserved === "help" ? renderProgramHelp(program) : renderVersion(program)
      );
      return EXIT_CODES.success;
    }
  }

  if (command) {
    const result = await runCommand(
      program.name,
      command,
      tokens.slice(1),
      program.io
    );
    return result.ok ? EXIT_CODES.success : report(program, result.error);
  }

  const parsed = parseFlags(program.flags, tokens);
  if (!parsed.ok) {
    return report(program, parsed.error);
  }

  const result = program.action
    ? await invokeAction(program.action, parsed.value)
    : program.fallbackAction(parsed.value);

  return result.ok ? EXIT_CODES.success : report(program, result.error);
};
