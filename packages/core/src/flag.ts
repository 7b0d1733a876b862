/**
 * Flag declarations
 */

import { quote, quoteChar, schemaError } from "./types/errors.js";
import type { SchemaError } from "./types/errors.js";
import { error, ok } from "./types/result.js";
import type { Result } from "./types/result.js";

/**
 * Default that stands for the empty string. A plain `""` default leaves
 * the flag mandatory.
 */
export const EMPTY_VALUE = Symbol("flagline.empty-value");

export type FlagDefault = string | typeof EMPTY_VALUE;

export type Flag = {
  /** Long name, matched as `--name` */
  readonly name: string;
  /** Single letter or digit, matched as `-a` */
  readonly alias?: string;
  /** Value label for documentation, e.g. "FILE" or "URL" */
  readonly type?: string;
  readonly description?: string;
  /** Without a default the flag is mandatory */
  readonly defaultValue?: FlagDefault;
};

const NAME_CHARACTER = /^[\p{L}\p{N}-]$/u;
const ALIAS_CHARACTER = /^[\p{L}\p{N}]$/u;

/**
 * Character allowed in flag and command names
 */
export const isNameCharacter = (char: string): boolean =>
  NAME_CHARACTER.test(char);

/**
 * First character of a name that is not allowed, if any
 */
export const findInvalidCharacter = (name: string): string | undefined =>
  Array.from(name).find((char) => !isNameCharacter(char));

export const isMandatory = (flag: Flag): boolean =>
  flag.defaultValue === undefined || flag.defaultValue === "";

/**
 * Value a missing flag takes, or undefined when it has none
 */
export const resolveDefault = (flag: Flag): string | undefined => {
  if (flag.defaultValue === EMPTY_VALUE) {
    return "";
  }
  return isMandatory(flag) ? undefined : flag.defaultValue;
};

export const checkFlag = (flag: Flag): Result<Flag, SchemaError> => {
  if (flag.name === "") {
    return error(schemaError("InvalidName", "missing name of flag"));
  }

  const invalid = findInvalidCharacter(flag.name);
  if (invalid !== undefined) {
    return error(
      schemaError(
        "InvalidCharacter",
        `invalid character in flag name: ${quoteChar(invalid)}`,
        flag.name
      )
    );
  }

  if (flag.alias !== undefined) {
    const chars = Array.from(flag.alias);
    const [first] = chars;
    if (chars.length !== 1 || first === undefined || !ALIAS_CHARACTER.test(first)) {
      return error(
        schemaError(
          "InvalidCharacter",
          `flag alias is an invalid character: ${quoteChar(flag.alias)}`,
          flag.name
        )
      );
    }
  }

  return ok(flag);
};

/**
 * Tokens that select the flag on the command line
 */
export const flagTokens = (flag: Flag): readonly string[] =>
  flag.alias === undefined
    ? [`--${flag.name}`]
    : [`--${flag.name}`, `-${flag.alias}`];

export const matchesToken = (flag: Flag, token: string): boolean =>
  token === `--${flag.name}` ||
  (flag.alias !== undefined && token === `-${flag.alias}`);

/**
 * Name column of a flag in help output: "--out, -o"
 */
export const formatFlagLabel = (flag: Flag): string =>
  flagTokens(flag).join(", ");

/**
 * Description column, with the default appended as ("value")
 */
export const formatFlagDescription = (flag: Flag): string => {
  const description = flag.description ?? "";
  const fallback = resolveDefault(flag);
  return fallback === undefined
    ? description
    : `${description} (${quote(fallback)})`;
};

/**
 * One-line form: "--out, -o\twrite to FILE ("a.txt")"
 */
export const formatFlag = (flag: Flag): string =>
  `${formatFlagLabel(flag)}\t${formatFlagDescription(flag)}`;
