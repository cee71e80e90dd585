/**
 * TaskState: the single record describing where a task stands.
 */
import { shortId } from "../infra/id.ts";
import { PipelineStage, TaskPhase, type ActionOutcome } from "./states.ts";

// ── OrderDetails ─────────────────────────────────────

export interface OrderDetails {
  items: string[];
  total: number;
  status?: string;
}

// ── TaskState ────────────────────────────────────────

export interface TaskState {
  taskId: string;

  subject: string;
  availableItems: string[];
  requiredItems: string[];
  /** null until reconciliation has run; [] means nothing is missing. */
  missingItems: string[] | null;
  resultSteps: string[];

  orderPlaced: boolean;
  orderId: string | null;
  orderDetails: OrderDetails | null;

  notificationSent: boolean;
  recipient: string | null;

  phase: TaskPhase;
  lastAction: string | null;
  lastActionOutcome: ActionOutcome | null;
  retryCount: number;
  lastError: string | null;
}

export type TaskStateUpdate = Partial<Omit<TaskState, "taskId">>;

export function createTaskState(
  opts: Partial<Omit<TaskState, "taskId">> & { taskId?: string } = {},
): TaskState {
  return {
    taskId: opts.taskId ?? shortId(),
    subject: opts.subject ?? "",
    availableItems: normalizeItems(opts.availableItems ?? []),
    requiredItems: normalizeItems(opts.requiredItems ?? []),
    missingItems: opts.missingItems ? normalizeItems(opts.missingItems) : null,
    resultSteps: opts.resultSteps ?? [],
    orderPlaced: opts.orderPlaced ?? false,
    orderId: opts.orderId ?? null,
    orderDetails: opts.orderDetails ?? null,
    notificationSent: opts.notificationSent ?? false,
    recipient: opts.recipient ?? null,
    phase: opts.phase ?? TaskPhase.INITIAL,
    lastAction: opts.lastAction ?? null,
    lastActionOutcome: opts.lastActionOutcome ?? null,
    retryCount: opts.retryCount ?? 0,
    lastError: opts.lastError ?? null,
  };
}

/** Trim, lower-case and de-duplicate (first occurrence wins). Blank entries are dropped. */
export function normalizeItems(items: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of items) {
    const item = raw.trim().toLowerCase();
    if (!item || seen.has(item)) continue;
    seen.add(item);
    out.push(item);
  }
  return out;
}

/**
 * List every invariant the state breaks. Empty means well-formed.
 */
export function checkInvariants(state: TaskState): string[] {
  const violations: string[] = [];

  if (state.missingItems) {
    const required = new Set(state.requiredItems);
    const stray = state.missingItems.filter((item) => !required.has(item));
    if (stray.length > 0) {
      violations.push(`missing items not in required items: ${stray.join(", ")}`);
    }
  }

  if (state.orderPlaced && !state.orderId) {
    violations.push("order placed without an order id");
  }
  if (!state.orderPlaced && state.orderId) {
    violations.push("order id set but no order placed");
  }

  if (state.notificationSent && !state.orderPlaced) {
    violations.push("notification sent before an order was placed");
  }

  if (state.phase === TaskPhase.COMPLETED) {
    const nothingMissing = state.missingItems !== null && state.missingItems.length === 0;
    const ordered = state.orderPlaced && state.notificationSent;
    if (state.resultSteps.length === 0) {
      violations.push("completed without result steps");
    } else if (!nothingMissing && !ordered) {
      violations.push("completed with missing items neither empty nor ordered and notified");
    }
  }

  return violations;
}

/**
 * Where the task sits in the fetch → reconcile → order → notify → present pipeline,
 * read off the data alone.
 */
export function derivePipelineStage(state: TaskState): PipelineStage {
  if (state.phase === TaskPhase.COMPLETED) return PipelineStage.COMPLETED;
  if (!state.subject) return PipelineStage.INITIAL;
  if (state.requiredItems.length === 0 || state.resultSteps.length === 0) {
    return PipelineStage.FETCHING;
  }
  if (state.missingItems === null) return PipelineStage.RECONCILING;
  if (state.missingItems.length > 0 && !state.orderPlaced) return PipelineStage.ORDERING;
  if (state.orderPlaced && !state.notificationSent) return PipelineStage.NOTIFYING;
  return PipelineStage.PRESENTING;
}

/** Deep-frozen copy; the Decision Engine only ever sees these. */
export function freezeState(state: TaskState): Readonly<TaskState> {
  const copy = cloneState(state);
  Object.freeze(copy.availableItems);
  Object.freeze(copy.requiredItems);
  if (copy.missingItems) Object.freeze(copy.missingItems);
  Object.freeze(copy.resultSteps);
  if (copy.orderDetails) {
    Object.freeze(copy.orderDetails.items);
    Object.freeze(copy.orderDetails);
  }
  return Object.freeze(copy);
}

export function cloneState(state: TaskState): TaskState {
  return {
    ...state,
    availableItems: [...state.availableItems],
    requiredItems: [...state.requiredItems],
    missingItems: state.missingItems ? [...state.missingItems] : null,
    resultSteps: [...state.resultSteps],
    orderDetails: state.orderDetails
      ? { ...state.orderDetails, items: [...state.orderDetails.items] }
      : null,
  };
}

