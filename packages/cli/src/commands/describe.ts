/**
 * describe command - help text of a manifest program or one of its commands
 */

import {
  findCommand,
  quote,
  renderCommandHelp,
  renderProgramHelp,
} from "@flagline/core";
import type { Result } from "@flagline/core";
import { loadManifestProgram } from "./manifest-common.js";

export const describeManifest = (
  manifestPath: string,
  commandName?: string
): Result<string, string> => {
  const loaded = loadManifestProgram(manifestPath, { checked: true });
  if (!loaded.ok) {
    return loaded;
  }

  const { program } = loaded.value;
  if (commandName === undefined) {
    return { ok: true, value: renderProgramHelp(program) };
  }

  const command = findCommand(program.commands, commandName);
  if (!command) {
    return {
      ok: false,
      error: `unknown command for ${program.name}: ${quote(commandName)}`,
    };
  }
  return { ok: true, value: renderCommandHelp(program.name, command) };
};
