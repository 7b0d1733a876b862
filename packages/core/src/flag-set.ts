/**
 * Flag sets: schema check and token parsing
 */

import { checkFlag, matchesToken, resolveDefault } from "./flag.js";
import type { Flag } from "./flag.js";
import { inputError, quote, quoteChar, schemaError } from "./types/errors.js";
import type { InputError, SchemaError } from "./types/errors.js";
import { error, ok } from "./types/result.js";
import type { Result } from "./types/result.js";

export type FlagSet = readonly Flag[];

/**
 * Flags and positional arguments from one parse call
 */
export type ParsedInvocation = {
  /** Keyed by canonical flag name, never by alias */
  readonly flags: Readonly<Record<string, string>>;
  readonly arguments: readonly string[];
};

/**
 * Validate a flag set once, before it is used for parsing.
 *
 * Names and aliases share one namespace: a flag named "x" and a later flag
 * aliased 'x' collide.
 */
export const checkFlagSet = (flags: FlagSet): Result<FlagSet, SchemaError> => {
  const seen = new Set<string>();

  for (const flag of flags) {
    const checked = checkFlag(flag);
    if (!checked.ok) {
      return checked;
    }

    if (seen.has(flag.name)) {
      return error(
        schemaError(
          "DuplicateFlag",
          `duplicate flag name or alias: ${quote(flag.name)}`,
          flag.name
        )
      );
    }
    seen.add(flag.name);

    if (flag.alias !== undefined) {
      if (seen.has(flag.alias)) {
        return error(
          schemaError(
            "DuplicateFlag",
            `duplicate flag name or alias: ${quoteChar(flag.alias)}`,
            flag.alias
          )
        );
      }
      seen.add(flag.alias);
    }
  }

  return ok(flags);
};

/**
 * Flag selected by a token (`--name` or `-alias`), exact match only
 */
export const findFlag = (flags: FlagSet, token: string): Flag | undefined =>
  flags.find((flag) => matchesToken(flag, token));

/**
 * Split tokens into flag values and positional arguments.
 *
 * A token that selects no flag is kept as an argument, even when it looks
 * like one. The token after a flag is always its value.
 */
export const parseFlags = (
  flags: FlagSet,
  tokens: readonly string[]
): Result<ParsedInvocation, InputError> => {
  const values: Record<string, string> = {};
  const args: string[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) continue;

    const flag = findFlag(flags, token);
    if (!flag) {
      args.push(token);
      continue;
    }

    const value = tokens[i + 1];
    if (value === undefined) {
      return error(
        inputError(
          "MissingFlagValue",
          `no corresponding value for flag: ${quote(token)}`,
          token
        )
      );
    }
    values[flag.name] = value;
    i++;
  }

  for (const flag of flags) {
    if (Object.hasOwn(values, flag.name)) continue;

    const fallback = resolveDefault(flag);
    if (fallback === undefined) {
      return error(
        inputError(
          "MissingRequiredFlag",
          `no given or default value for flag: ${quote(flag.name)}`,
          flag.name
        )
      );
    }
    values[flag.name] = fallback;
  }

  return ok({ flags: values, arguments: args });
};
