/**
 * The flagline program, declared with flagline itself
 */

import { EMPTY_VALUE, defineProgram, error } from "@flagline/core";
import type { Flag, Program, ProgramIO } from "@flagline/core";
import { checkManifest } from "../commands/check.js";
import { describeManifest } from "../commands/describe.js";
import { parseWithManifest } from "../commands/parse.js";
import { resolveManifestPath } from "../config.js";
import { MANIFEST_FILE, PROGRAM_NAME, VERSION } from "./constants.js";

export type CliContext = {
  readonly cwd: string;
  readonly io: ProgramIO;
  /** Exit status of a manifest program run by `parse` */
  exitCode: number;
};

const manifestFlag: Flag = {
  name: "manifest",
  alias: "m",
  type: "FILE",
  description: `program manifest, instead of the nearest ${MANIFEST_FILE}`,
  defaultValue: EMPTY_VALUE,
};

export const createCliProgram = (context: CliContext): Program =>
  defineProgram({
    name: PROGRAM_NAME,
    version: VERSION,
    tagline: "declarative command-line programs",
    description: `Checks a ${MANIFEST_FILE} program manifest, prints its help, or parses an invocation against it.`,
    usage: "[command] [--manifest FILE] [arguments...]",
    commands: [
      {
        names: ["check", "c"],
        description: "validate the manifest",
        usage: "[--manifest FILE]",
        flags: [manifestFlag],
        action: (flags) => {
          const path = resolveManifestPath(flags["manifest"] ?? "", context.cwd);
          if (!path.ok) return path;

          const result = checkManifest(path.value);
          if (!result.ok) return result;
          context.io.out(result.value);
        },
      },
      {
        names: ["describe", "d"],
        description: "print the help of the manifest program or one of its commands",
        usage: "[--manifest FILE] [command]",
        flags: [manifestFlag],
        action: (flags, args) => {
          if (args.length > 1) {
            return error<void, string>(`describe takes at most one command, got ${args.length}`);
          }

          const path = resolveManifestPath(flags["manifest"] ?? "", context.cwd);
          if (!path.ok) return path;

          const result = describeManifest(path.value, args[0]);
          if (!result.ok) return result;
          context.io.out(result.value);
        },
      },
      {
        names: ["parse", "p"],
        description: "run tokens against the manifest program and print what it receives",
        usage: "[--manifest FILE] [tokens...]",
        flags: [manifestFlag],
        action: async (flags, args) => {
          const path = resolveManifestPath(flags["manifest"] ?? "", context.cwd);
          if (!path.ok) return path;

          const result = await parseWithManifest(path.value, args, context.io);
          if (!result.ok) return result;
          context.exitCode = result.value;
        },
      },
    ],
    io: context.io,
  });
