/**
 * Subcommands
 */

import { defaultAction, invokeAction } from "./action.js";
import type { Action } from "./action.js";
import { findInvalidCharacter } from "./flag.js";
import { checkFlagSet, parseFlags } from "./flag-set.js";
import type { FlagSet } from "./flag-set.js";
import { renderCommandHelp } from "./help.js";
import type { ProgramIO } from "./reporting.js";
import { quote, quoteChar, schemaError } from "./types/errors.js";
import type { ActionError, InputError, SchemaError } from "./types/errors.js";
import { error, ok } from "./types/result.js";
import type { Result } from "./types/result.js";

export type Command = {
  /** First name is canonical, the rest are aliases */
  readonly names: readonly string[];
  readonly description?: string;
  /** Replaces the default "[flags and values...] [arguments...]" */
  readonly usage?: string;
  readonly flags?: FlagSet;
  readonly action?: Action;
};

export const HELP_TOKENS: readonly string[] = ["-h", "--help"];

export const isHelpToken = (token: string | undefined): boolean =>
  token !== undefined && HELP_TOKENS.includes(token);

export const checkCommand = (
  command: Command
): Result<Command, SchemaError> => {
  if (command.names.length < 1) {
    return error(schemaError("MissingCommandName", "missing name of command"));
  }

  for (const name of command.names) {
    const invalid = findInvalidCharacter(name);
    if (invalid !== undefined) {
      return error(
        schemaError(
          "InvalidCharacter",
          `invalid character in command name: ${quoteChar(invalid)} in ${quote(name)}`,
          name
        )
      );
    }
  }

  const flags = checkFlagSet(command.flags ?? []);
  if (!flags.ok) {
    return flags;
  }

  return ok(command);
};

/**
 * Run a command on the tokens that follow its name.
 *
 * A leading -h/--help prints the command's help instead; nothing is parsed
 * and the action does not run.
 */
export const runCommand = async (
  programName: string,
  command: Command,
  tokens: readonly string[],
  io: ProgramIO
): Promise<Result<void, InputError | ActionError>> => {
  if (isHelpToken(tokens[0])) {
    io.out(renderCommandHelp(programName, command));
    return ok(undefined);
  }

  const parsed = parseFlags(command.flags ?? [], tokens);
  if (!parsed.ok) {
    return parsed;
  }

  return invokeAction(command.action ?? defaultAction, parsed.value);
};
