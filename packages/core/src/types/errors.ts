/**
 * Error taxonomy for flagline
 *
 * Three kinds, each reported through its own channel:
 * - schema: the program's own declarations are wrong (raised by check*)
 * - input: the user's tokens do not fit the declarations (raised by parse*)
 * - action: the invoked handler failed
 */

export type SchemaErrorCode =
  | "InvalidName" // Empty flag name
  | "InvalidCharacter" // Name or alias outside letters, digits and hyphen
  | "DuplicateFlag" // Flag name or alias declared twice in one set
  | "MissingCommandName" // Command with no names
  | "DuplicateCommandName"; // Command name or alias declared twice

export type InputErrorCode =
  | "MissingFlagValue" // Flag token was the last token
  | "MissingRequiredFlag" // Flag without default was never given
  | "MissingCommand"; // No top-level action and no subcommand given

export type ActionErrorCode = "ActionFailed";

export type SchemaError = {
  readonly kind: "schema";
  readonly code: SchemaErrorCode;
  readonly message: string;
  readonly subject?: string;
};

export type InputError = {
  readonly kind: "input";
  readonly code: InputErrorCode;
  readonly message: string;
  readonly subject?: string;
};

export type ActionError = {
  readonly kind: "action";
  readonly code: ActionErrorCode;
  readonly message: string;
  readonly cause?: unknown;
};

export type FlaglineError = SchemaError | InputError | ActionError;

export type ErrorKind = FlaglineError["kind"];

export const schemaError = (
  code: SchemaErrorCode,
  message: string,
  subject?: string
): SchemaError => ({ kind: "schema", code, message, subject });

export const inputError = (
  code: InputErrorCode,
  message: string,
  subject?: string
): InputError => ({ kind: "input", code, message, subject });

export const actionError = (message: string, cause?: unknown): ActionError => ({
  kind: "action",
  code: "ActionFailed",
  message,
  cause,
});

/**
 * Double-quoted form of a name or token, as shown in messages.
 */
export const quote = (value: string): string => JSON.stringify(value);

const CHAR_ESCAPES: Readonly<Record<string, string>> = {
  "\x07": "\\a",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\v": "\\v",
  "\\": "\\\\",
  "'": "\\'",
};

const NON_PRINTABLE = /^[\p{C}\p{Z}]$/u;

const hex = (code: number, digits: number): string =>
  code.toString(16).padStart(digits, "0");

const escapeChar = (char: string): string => {
  const escape = CHAR_ESCAPES[char];
  if (escape !== undefined) return escape;

  const code = char.codePointAt(0);
  if (code === undefined || char === " " || !NON_PRINTABLE.test(char)) {
    return char;
  }
  if (code < 0x20 || code === 0x7f) return `\\x${hex(code, 2)}`;
  return code < 0x10000 ? `\\u${hex(code, 4)}` : `\\U${hex(code, 8)}`;
};

/**
 * Single-quoted form of one character. Control, format and separator
 * characters are written as escapes: a newline shows as '\n'.
 */
export const quoteChar = (char: string): string =>
  `'${Array.from(char).map(escapeChar).join("")}'`;

/**
 * Prefix a message with the program name, unless the message is already
 * scoped ("name: ...") or carries no scope at all.
 */
export const formatErrorMessage = (
  programName: string,
  message: string
): string => {
  const colon = message.indexOf(":");
  if (colon !== -1 && message.slice(0, colon) !== programName) {
    return `${programName}: ${message}`;
  }
  return message;
};
