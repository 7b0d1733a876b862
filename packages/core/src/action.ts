/**
 * Actions: the handlers a program or command runs once its tokens parse
 */

import type { ParsedInvocation } from "./flag-set.js";
import { actionError, inputError } from "./types/errors.js";
import type { ActionError, InputError } from "./types/errors.js";
import { error, ok } from "./types/result.js";
import type { Result } from "./types/result.js";

/**
 * An action succeeds by returning nothing or an ok result, and fails with an
 * error result carrying a message. Throwing also counts as failure.
 */
export type ActionResult = Result<void, string> | void;

export type Action = (
  flags: Readonly<Record<string, string>>,
  args: readonly string[]
) => ActionResult | Promise<ActionResult>;

/**
 * Runs when the program has no top-level action and no subcommand matched
 */
export type FallbackAction = (
  invocation: ParsedInvocation
) => Result<void, InputError>;

/**
 * Does nothing. Commands without an action run this.
 */
export const defaultAction: Action = () => undefined;

/**
 * Tells the user to ask for help instead.
 */
export const helpAction: FallbackAction = () =>
  error(inputError("MissingCommand", 'use the "--help" global flag'));

const describeThrown = (thrown: unknown): string =>
  thrown instanceof Error ? thrown.message : String(thrown);

/**
 * Run an action and fold its three outcomes (void, result, throw) into one
 * result.
 */
export const invokeAction = async (
  action: Action,
  invocation: ParsedInvocation
): Promise<Result<void, ActionError>> => {
  try {
    const outcome = await action(invocation.flags, invocation.arguments);
    if (outcome && !outcome.ok) {
      return error(actionError(outcome.error));
    }
    return ok(undefined);
  } catch (thrown) {
    return error(actionError(describeThrown(thrown), thrown));
  }
};
