/**
 * Explicit results for guarded rendering steps.
 *
 * Collaborators signal passthrough and missing resources by throwing.
 * `attempt()` turns those throws into an Outcome so each entry point
 * branches on a closed union instead of nesting try/catch blocks.
 */

import { PassthroughCondition, StackUnderflowError } from "./errors.js";

export type Outcome<T> =
  | { status: "ok"; value: T }
  | { status: "passthrough"; source: string }
  | { status: "failed"; error: Error };

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Run `step`, capturing its result or the condition it raised.
 *
 * @throws StackUnderflowError, which is never recoverable
 */
export function attempt<T>(step: () => T): Outcome<T> {
  try {
    return { status: "ok", value: step() };
  } catch (err) {
    if (err instanceof StackUnderflowError) throw err;
    if (err instanceof PassthroughCondition) {
      return { status: "passthrough", source: err.source };
    }
    return { status: "failed", error: toError(err) };
  }
}
