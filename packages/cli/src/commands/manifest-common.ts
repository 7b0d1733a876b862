/**
 * Shared helpers for commands that work on a manifest
 */

import { basename } from "node:path";
import { checkProgram, defaultAction, defineProgram } from "@flagline/core";
import type { Action, Program, ProgramIO, Result } from "@flagline/core";
import { loadManifest, manifestToDefinition } from "../config.js";
import type { ProgramManifest } from "../types.js";

export type LoadedProgram = {
  readonly manifest: ProgramManifest;
  readonly program: Program;
};

/**
 * Load a manifest and declare its program. With `checked`, schema errors
 * are returned here instead of being left to the program's own run.
 */
export const loadManifestProgram = (
  manifestPath: string,
  options: {
    readonly actionFor?: (command: string | null) => Action;
    readonly io?: ProgramIO;
    readonly checked?: boolean;
  } = {}
): Result<LoadedProgram, string> => {
  const manifest = loadManifest(manifestPath);
  if (!manifest.ok) {
    return manifest;
  }

  const program = defineProgram(
    manifestToDefinition(
      manifest.value,
      options.actionFor ?? (() => defaultAction),
      options.io
    )
  );

  if (options.checked) {
    const result = checkProgram(program);
    if (!result.ok) {
      return {
        ok: false,
        error: `${basename(manifestPath)}: ${result.error.message}`,
      };
    }
  }

  return { ok: true, value: { manifest: manifest.value, program } };
};
