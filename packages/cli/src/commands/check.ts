/**
 * check command - validate a program manifest
 */

import type { Result } from "@flagline/core";
import { loadManifestProgram } from "./manifest-common.js";

/**
 * Validate shape and schema of a manifest. Resolves to the line to print.
 */
export const checkManifest = (manifestPath: string): Result<string, string> => {
  const loaded = loadManifestProgram(manifestPath, { checked: true });
  if (!loaded.ok) {
    return loaded;
  }

  const { program } = loaded.value;
  const commands = program.commands.length;
  const flags = program.flags.length;
  return {
    ok: true,
    value: `${program.name}: ok (${commands} ${commands === 1 ? "command" : "commands"}, ${flags} global ${flags === 1 ? "flag" : "flags"})`,
  };
};
