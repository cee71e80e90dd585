/**
 * Perception: validate what the driver hands in before a task starts.
 *
 * Accepts `{ subject, availableItems?, recipient? }`; snake_case
 * `available_items` is taken as well. Item lists may also be a
 * comma-separated string.
 */
import { z } from "zod";
import { TaskInputError } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import { normalizeItems } from "../task/state.ts";
import { describeIssues } from "./fallback.ts";

const logger = getLogger("cognitive.perceive");

const ItemsInput = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => normalizeItems(typeof value === "string" ? splitItems(value) : value));

const EmailAddress = z.string().trim().email();

const TaskInputSchema = z
  .object({
    subject: z.string().default(""),
    availableItems: ItemsInput.optional(),
    available_items: ItemsInput.optional(),
    recipient: EmailAddress.nullish().or(z.literal("").transform(() => null)),
  })
  .transform((input) => ({
    subject: input.subject.trim(),
    availableItems: input.availableItems ?? input.available_items ?? [],
    recipient: input.recipient ?? null,
  }));

export type TaskInput = z.output<typeof TaskInputSchema>;

export function isEmailAddress(text: string): boolean {
  return EmailAddress.safeParse(text).success;
}

/** Split "a, b ,c" into ["a", "b", "c"]. */
export function splitItems(text: string): string[] {
  return text
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Parse a driver-supplied task input. An empty subject is allowed here:
 * the Decision Engine answers it by asking for one.
 */
export function parseTaskInput(raw: unknown): TaskInput {
  const parsed = TaskInputSchema.safeParse(raw);
  if (!parsed.success) {
    const error = inputError(parsed.error);
    logger.warn({ issues: error.issues }, "task_input_rejected");
    throw error;
  }
  logger.info(
    { subject: parsed.data.subject, availableItems: parsed.data.availableItems.length },
    "task_input_parsed",
  );
  return parsed.data;
}

export interface SalvagedTaskInput {
  input: TaskInput;
  /** Why fields were dropped; null when the input was valid. */
  error: TaskInputError | null;
}

/**
 * Like parseTaskInput, but a field that fails validation is dropped and the
 * rest is kept. A bad recipient does not cost the task its subject.
 */
export function salvageTaskInput(raw: unknown): SalvagedTaskInput {
  const parsed = TaskInputSchema.safeParse(raw);
  if (parsed.success) return { input: parsed.data, error: null };

  const error = inputError(parsed.error);
  const rejected = new Set(parsed.error.issues.map((issue) => issue.path[0]));
  const kept =
    typeof raw === "object" && raw !== null && !Array.isArray(raw)
      ? Object.fromEntries(Object.entries(raw).filter(([key]) => !rejected.has(key)))
      : {};

  const retry = TaskInputSchema.safeParse(kept);
  const input = retry.success ? retry.data : { subject: "", availableItems: [], recipient: null };
  logger.warn({ issues: error.issues, kept: Object.keys(kept) }, "task_input_salvaged");
  return { input, error };
}

function inputError(err: z.ZodError): TaskInputError {
  const issues = describeIssues(err);
  return new TaskInputError(`Invalid task input: ${issues.join("; ")}`, issues);
}
