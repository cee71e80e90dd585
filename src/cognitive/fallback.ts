/**
 * Error Classifier / Fallback Policy.
 *
 * Turns any failure into one of four kinds, a state update that keeps the
 * loop going, and the text the user sees.
 */
import { ZodError } from "zod";
import {
  CapabilityError,
  EnvelopeDecodeError,
  StateInvariantError,
  TaskInputError,
  errorToString,
} from "../infra/errors.ts";
import { ErrorKind, failure, type Failure } from "../envelope/types.ts";
import type { Action } from "../task/action.ts";
import type { TaskState, TaskStateUpdate } from "../task/state.ts";
import { ActionOutcome, TaskPhase } from "../task/states.ts";
import { ToolNotFoundError, ToolTimeoutError, ToolValidationError } from "../tools/errors.ts";

export const DEFAULT_FALLBACK = "That step could not be completed. Please try again.";

/** Messages that say nothing beyond "it failed". */
const GENERIC_MESSAGES = new Set([
  "error",
  "failed",
  "unknown error",
  "capability reported an error",
  "mcp tool returned an error",
]);

export function classify(err: unknown): ErrorKind {
  if (
    err instanceof ToolValidationError ||
    err instanceof ZodError ||
    err instanceof StateInvariantError ||
    err instanceof TaskInputError
  ) {
    return ErrorKind.VALIDATION;
  }
  if (err instanceof EnvelopeDecodeError) return ErrorKind.DECODE;
  if (
    err instanceof CapabilityError ||
    err instanceof ToolNotFoundError ||
    err instanceof ToolTimeoutError
  ) {
    return ErrorKind.SERVICE;
  }
  return ErrorKind.UNEXPECTED;
}

export function describeIssues(err: ZodError): string[] {
  return err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

/** Classify a thrown value into a Failure envelope. */
export function toFailure(err: unknown): Failure {
  const kind = classify(err);

  if (err instanceof ZodError) {
    const issues = describeIssues(err);
    return failure(kind, issues.join("; "), { issues });
  }

  const message = errorToString(err);

  if (err instanceof CapabilityError) {
    return failure(kind, message, { ...err.details, capability: err.capability });
  }
  if (err instanceof EnvelopeDecodeError && err.rawText !== undefined) {
    return failure(kind, message, { raw: err.rawText });
  }
  if (err instanceof StateInvariantError) {
    return failure(kind, message, { violations: err.violations });
  }
  if (err instanceof ToolValidationError || err instanceof TaskInputError) {
    return failure(kind, message, { issues: err.issues });
  }
  return failure(kind, message);
}

/** Non-fatal state update recording a failed step. */
export function failureUpdate(state: Readonly<TaskState>, message: string): TaskStateUpdate {
  return {
    phase: TaskPhase.ERROR,
    lastActionOutcome: ActionOutcome.FAILED,
    lastError: message,
    retryCount: state.retryCount + 1,
  };
}

function isInformative(message: string): boolean {
  const trimmed = message.trim();
  return trimmed.length > 0 && !GENERIC_MESSAGES.has(trimmed.toLowerCase());
}

/**
 * User-facing text for a failed action. ServiceError messages are shown
 * verbatim; uninformative messages fall back to the action's fallback text.
 */
export function describeFailure(action: Pick<Action, "fallback">, fail: Failure): string {
  const fallback = action.fallback ?? DEFAULT_FALLBACK;

  switch (fail.errorKind) {
    case ErrorKind.SERVICE:
      return isInformative(fail.message) ? fail.message : fallback;
    case ErrorKind.VALIDATION:
      return isInformative(fail.message) ? `Invalid request: ${fail.message}` : fallback;
    case ErrorKind.DECODE: {
      const raw = fail.details["raw"];
      const head = isInformative(fail.message) ? `${fallback}\n${fail.message}` : fallback;
      return typeof raw === "string" ? `${head}\nRaw response: ${raw}` : head;
    }
    case ErrorKind.UNEXPECTED:
      return fallback;
  }
}
