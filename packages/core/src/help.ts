/**
 * Help and version text
 *
 * Sections are a header line ("USAGE:") followed by tab-indented lines and
 * a blank line. Lists are padded to their widest name.
 */

import { formatAuthor } from "./author.js";
import type { Command } from "./command.js";
import type { CommandSet } from "./command-set.js";
import { formatFlagDescription, formatFlagLabel } from "./flag.js";
import type { FlagSet } from "./flag-set.js";
import type { Program } from "./program.js";

const INDENT = "\t";

export const DEFAULT_PROGRAM_USAGE =
  "[global flags...] [command] [flags and values...] [arguments...]";

export const DEFAULT_COMMAND_USAGE = "[flags and values...] [arguments...]";

const GLOBAL_FLAGS_HELP =
  `${INDENT}--help, -h  \tshow help (with optional subcommand) and exit\n` +
  `${INDENT}--version, -v  \tshow version and exit\n`;

/**
 * "FLAG:" for one entry, "FLAGS:" for more
 */
export const sectionHeader = (title: string, count: number): string =>
  count > 1 ? `${title}S:\n` : `${title}:\n`;

/**
 * Display length in code points, so astral letters count once
 */
const labelLength = (label: string): number => Array.from(label).length;

export const columnWidth = (labels: readonly string[]): number =>
  labels.reduce((width, label) => Math.max(width, labelLength(label)), 0);

const padLabel = (label: string, width: number): string =>
  label + " ".repeat(Math.max(0, width - labelLength(label)));

const renderColumns = (
  rows: readonly (readonly [string, string])[],
  indent: string
): string => {
  const width = columnWidth(rows.map(([label]) => label));
  return rows
    .map(
      ([label, description]) =>
        `${indent}${padLabel(label, width)}${indent}${description}\n`
    )
    .join("");
};

/**
 * One line per flag: label, then description with its default
 */
export const renderFlagSetHelp = (flags: FlagSet, indent: string): string =>
  renderColumns(
    flags.map((flag) => [formatFlagLabel(flag), formatFlagDescription(flag)]),
    indent
  );

/**
 * One line per command: all its names, then its description
 */
export const renderCommandSetHelp = (
  commands: CommandSet,
  indent: string
): string =>
  renderColumns(
    commands.map((command) => [
      command.names.join(", "),
      command.description ?? "",
    ]),
    indent
  );

const trimTrailingNewlines = (text: string): string =>
  text.replace(/\n+$/, "");

export const renderCommandHelp = (
  programName: string,
  command: Command
): string => {
  const name = `${programName} ${command.names[0] ?? ""}`;
  const flags = command.flags ?? [];
  let text = `NAME:\n${INDENT}${name}\n\n`;

  if (command.description) {
    text += `DESCRIPTION:\n${INDENT}${command.description}\n\n`;
  }

  text += `USAGE:\n${INDENT}${name} ${command.usage || DEFAULT_COMMAND_USAGE}\n\n`;

  if (flags.length >= 1) {
    text += sectionHeader("FLAG", flags.length);
    text += renderFlagSetHelp(flags, INDENT);
    text += "\n";
  }

  return trimTrailingNewlines(text);
};

export const renderProgramHelp = (program: Program): string => {
  let text = `NAME:\n${INDENT}${program.name}`;
  if (program.tagline) {
    text += ` - ${program.tagline}`;
  }
  text += "\n\n";

  text += `VERSION:\n${INDENT}${program.version}\n\n`;

  if (program.description) {
    text += `DESCRIPTION:\n${INDENT}${program.description}\n\n`;
  }

  if (program.authors.length >= 1) {
    text += sectionHeader("AUTHOR", program.authors.length);
    for (const author of program.authors) {
      text += `${INDENT}${formatAuthor(author)}\n`;
    }
    text += "\n";
  }

  text += `USAGE:\n${INDENT}${program.name} ${program.usage || DEFAULT_PROGRAM_USAGE}\n\n`;

  text += `GLOBAL FLAGS:\n${GLOBAL_FLAGS_HELP}\n`;

  if (program.commands.length >= 1) {
    text += sectionHeader("COMMAND", program.commands.length);
    text += renderCommandSetHelp(program.commands, INDENT);
    text += "\n";
  }

  if (program.flags.length >= 1) {
    text += sectionHeader("FLAG", program.flags.length);
    text += renderFlagSetHelp(program.flags, INDENT);
    text += "\n";
  }

  return trimTrailingNewlines(text);
};

export const renderVersion = (program: Program): string =>
  `${program.name} ${program.version}`;
