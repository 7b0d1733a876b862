/**
 * Output and error reporting collaborators
 *
 * The core never writes to the terminal or exits on its own. Help and
 * version text go to a ProgramIO; failures go to an ErrorHandler, which
 * reports them and decides the exit status.
 */

import { formatErrorMessage } from "./types/errors.js";
import type {
  ActionError,
  FlaglineError,
  InputError,
  SchemaError,
} from "./types/errors.js";

export type ProgramIO = {
  readonly out: (text: string) => void;
  readonly err: (text: string) => void;
};

export const processIO: ProgramIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export type BufferedIO = ProgramIO & {
  readonly stdout: readonly string[];
  readonly stderr: readonly string[];
};

/**
 * IO that keeps every emitted text in memory
 */
export const createBufferedIO = (): BufferedIO => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => {
      stdout.push(text);
    },
    err: (text) => {
      stderr.push(text);
    },
  };
};

export const EXIT_CODES = {
  success: 0,
  action: 1,
  parse: 2,
  setup: 3,
} as const;

/**
 * Reports an error for the named program and returns the exit status
 */
export type ErrorHandler<E extends FlaglineError = FlaglineError> = (
  programName: string,
  error: E
) => number;

export type ErrorHandlers = {
  readonly action: ErrorHandler<ActionError>;
  readonly parse: ErrorHandler<InputError>;
  readonly setup: ErrorHandler<SchemaError>;
};

export const createErrorHandler =
  (io: ProgramIO, exitCode: number): ErrorHandler =>
  (programName, error) => {
    io.err(formatErrorMessage(programName, error.message));
    return exitCode;
  };

export const defaultErrorHandlers = (io: ProgramIO): ErrorHandlers => ({
  action: createErrorHandler(io, EXIT_CODES.action),
  parse: createErrorHandler(io, EXIT_CODES.parse),
  setup: createErrorHandler(io, EXIT_CODES.setup),
});
