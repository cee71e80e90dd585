/**
 * Error hierarchy for larder.
 *
 * LarderError (base)
 * ├── ConfigError
 * ├── TaskError
 * │   ├── InvalidStateTransition
 * │   ├── StateInvariantError
 * │   └── TaskInputError
 * ├── CapabilityError
 * └── EnvelopeDecodeError
 *
 * Tool-level failures live in tools/errors.ts.
 */

export class LarderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LarderError";
  }
}

export class ConfigError extends LarderError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ── Task ─────────────────────────────────────────

export class TaskError extends LarderError {
  constructor(message: string) {
    super(message);
    this.name = "TaskError";
  }
}

export class InvalidStateTransition extends TaskError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateTransition";
  }
}

/** A merged Task State broke one of its invariants; nothing was applied. */
export class StateInvariantError extends TaskError {
  constructor(public readonly violations: string[]) {
    super(`Task state invariant violated: ${violations.join("; ")}`);
    this.name = "StateInvariantError";
  }
}

export class TaskInputError extends TaskError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = "TaskInputError";
  }
}

// ── Capabilities ─────────────────────────────────

/** A capability answered, but reported that it could not do the work. */
export class CapabilityError extends LarderError {
  constructor(
    public readonly capability: string,
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "CapabilityError";
  }
}

export class EnvelopeDecodeError extends LarderError {
  constructor(message: string, public readonly rawText?: string) {
    super(message);
    this.name = "EnvelopeDecodeError";
  }
}

// ── Utilities ───────────────────────────────────

/**
 * Extract a loggable string from an unknown caught value.
 *
 * Error objects have non-enumerable `message` and `stack` properties,
 * so `JSON.stringify(err)` returns `"{}"`. pino serializes log fields
 * via JSON before sending them to the transport worker thread, which
 * means `logger.warn({ error: err })` loses all error information.
 *
 * Use this helper everywhere an error is passed to logger fields:
 *   `logger.warn({ error: errorToString(err) }, "something_failed")`
 */
export function errorToString(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
