/**
 * Command sets: schema check and lookup
 */

import { checkCommand } from "./command.js";
import type { Command } from "./command.js";
import { quote, schemaError } from "./types/errors.js";
import type { SchemaError } from "./types/errors.js";
import { error, ok } from "./types/result.js";
import type { Result } from "./types/result.js";

export type CommandSet = readonly Command[];

/**
 * Validate every command, and that no name or alias appears twice across
 * the whole set.
 */
export const checkCommandSet = (
  commands: CommandSet
): Result<CommandSet, SchemaError> => {
  const names = new Set<string>();

  for (const command of commands) {
    const checked = checkCommand(command);
    if (!checked.ok) {
      return checked;
    }

    for (const name of command.names) {
      if (names.has(name)) {
        return error(
          schemaError(
            "DuplicateCommandName",
            `duplicate command name ${quote(name)}`,
            name
          )
        );
      }
      names.add(name);
    }
  }

  return ok(commands);
};

/**
 * Command with the given name or alias (exact, case-sensitive)
 */
export const findCommand = (
  commands: CommandSet,
  name: string
): Command | undefined =>
  commands.find((command) => command.names.includes(name));
