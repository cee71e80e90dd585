/**
 * Action Dispatcher: execute one Action against its capability.
 *
 * Marks the action as started on the store, builds and validates the
 * capability request, invokes the bound tool through the ToolExecutor and
 * decodes the raw result. The state update is returned, not applied: the
 * loop merges it, so a rejected merge is still classified like any failure.
 */
import type { z } from "zod";
import { CAPABILITIES } from "../capabilities/schemas.ts";
import { decode, type PayloadSchema } from "../envelope/decode.ts";
import { ErrorKind, failure, type Envelope, type Failure } from "../envelope/types.ts";
import type { CapabilityName } from "../infra/config-schema.ts";
import { CapabilityError } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import { ActionKind, type Action, type ActionOf } from "../task/action.ts";
import type { TaskState, TaskStateUpdate } from "../task/state.ts";
import { ActionOutcome, TaskPhase } from "../task/states.ts";
import type { TaskStateStore } from "../task/store.ts";
import type { ToolExecutor } from "../tools/executor.ts";
import type { ToolResult } from "../tools/types.ts";
import { describeFailure, failureUpdate, toFailure } from "./fallback.ts";

const logger = getLogger("cognitive.act");

export interface DispatchResult {
  /** Human-readable status for this step. */
  text: string;
  success: boolean;
  /** Fields to merge into the Task State. */
  update: TaskStateUpdate;
  errorKind?: ErrorKind;
  /** Raw tool result, when a tool was called. */
  toolResult?: ToolResult;
}

export interface DispatcherOptions {
  /** Capability name → registry tool name. */
  bindings: Record<CapabilityName, string>;
  subjectLine: string;
}

const SUCCESS: TaskStateUpdate = {
  lastActionOutcome: ActionOutcome.COMPLETED,
  retryCount: 0,
  lastError: null,
};

/** Body of the order confirmation email. */
export function formatOrderEmail(orderId: string, items: readonly string[]): string {
  return [
    "Your grocery order has been placed!",
    "",
    `Order ID: ${orderId}`,
    "",
    "Items ordered:",
    ...items.map((item) => `- ${item}`),
    "",
    "Your items will be delivered soon. Happy cooking!",
  ].join("\n");
}

export function formatMoney(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

export class ActionDispatcher {
  constructor(
    private executor: ToolExecutor,
    private options: DispatcherOptions,
  ) {}

  /**
   * Execute an action. Never throws for failures inside the step; they come
   * back classified, with a failure update.
   */
  async execute(action: Action, store: TaskStateStore): Promise<DispatchResult> {
    logger.info({ taskId: store.taskId, action: action.kind }, "action_dispatch_start");

    let state = store.snapshot();
    let result: DispatchResult;
    try {
      store.update({
        lastAction: action.kind,
        lastActionOutcome: ActionOutcome.STARTED,
        phase: TaskPhase.IN_PROGRESS,
      });
      state = store.snapshot();
      result = await this.dispatch(action, state);
    } catch (err) {
      result = this.failed(action, state, toFailure(err));
    }

    logger.info(
      { taskId: state.taskId, action: action.kind, success: result.success, errorKind: result.errorKind },
      "action_dispatched",
    );
    return result;
  }

  private async dispatch(action: Action, state: Readonly<TaskState>): Promise<DispatchResult> {
    switch (action.kind) {
      case ActionKind.INVALID_INPUT:
        return this.invalidInput(action, state);
      case ActionKind.FETCH_DETAILS:
        return this.fetchDetails(action, state);
      case ActionKind.RECONCILE_ITEMS:
        return this.reconcileItems(action, state);
      case ActionKind.PLACE_ORDER:
        return this.placeOrder(action, state);
      case ActionKind.NOTIFY:
        return this.notify(action, state);
      case ActionKind.CHECK_ORDER_STATUS:
        return this.checkOrderStatus(action, state);
      case ActionKind.PRESENT_RESULT:
        return this.presentResult(action, state);
    }
  }

  // ── Local transforms ──

  private invalidInput(
    action: ActionOf<"invalid_input">,
    state: Readonly<TaskState>,
  ): DispatchResult {
    const text = action.fallback ?? action.reasoning;
    if (action.params.reason === "missing_subject") {
      // lastError here is why the input was rejected; keep it and show it.
      return {
        text: state.lastError ? `${text}\n${state.lastError}` : text,
        success: false,
        update: { phase: TaskPhase.WAITING, lastActionOutcome: ActionOutcome.WAITING },
      };
    }
    return {
      text,
      success: false,
      update: failureUpdate(state, action.reasoning),
    };
  }

  private presentResult(
    action: ActionOf<"present_result">,
    state: Readonly<TaskState>,
  ): DispatchResult {
    if (action.params.steps.length === 0) {
      return this.failed(action, state, failure(ErrorKind.VALIDATION, "There are no steps to present"));
    }
    const text = action.params.steps.map((step, i) => `${i + 1}. ${step}`).join("\n");
    return { text, success: true, update: { ...SUCCESS, phase: TaskPhase.COMPLETED } };
  }

  // ── Capability calls ──

  private async fetchDetails(
    action: ActionOf<"fetch_details">,
    state: Readonly<TaskState>,
  ): Promise<DispatchResult> {
    const spec = CAPABILITIES.fetch_details;
    const { envelope, toolResult } = await this.invoke(
      "fetch_details",
      spec.request,
      spec.payload,
      { subject: action.params.subject },
      state.taskId,
    );
    if (!envelope.ok) return this.failed(action, state, envelope, toolResult);

    const { required_items, result_steps } = envelope.payload;
    return {
      text: [
        `Recipe for ${action.params.subject} needs ${required_items.length} ingredient(s):`,
        ...required_items.map((item) => `- ${item}`),
      ].join("\n"),
      success: true,
      update: {
        ...SUCCESS,
        requiredItems: required_items,
        resultSteps: result_steps,
        missingItems: null,
      },
      toolResult,
    };
  }

  private async reconcileItems(
    action: ActionOf<"reconcile_items">,
    state: Readonly<TaskState>,
  ): Promise<DispatchResult> {
    const spec = CAPABILITIES.reconcile_items;
    const { envelope, toolResult } = await this.invoke(
      "reconcile_items",
      spec.request,
      spec.payload,
      {
        required_items: action.params.requiredItems,
        available_items: action.params.availableItems,
      },
      state.taskId,
    );
    if (!envelope.ok) return this.failed(action, state, envelope, toolResult);

    const missing = envelope.payload.missing_items;
    return {
      text:
        missing.length > 0
          ? ["Missing ingredients:", ...missing.map((item) => `- ${item}`)].join("\n")
          : "You have all the required ingredients!",
      success: true,
      update: { ...SUCCESS, missingItems: missing },
      toolResult,
    };
  }

  private async placeOrder(
    action: ActionOf<"place_order">,
    state: Readonly<TaskState>,
  ): Promise<DispatchResult> {
    const spec = CAPABILITIES.place_order;
    const { envelope, toolResult } = await this.invoke(
      "place_order",
      spec.request,
      spec.payload,
      { items: action.params.items },
      state.taskId,
    );
    if (!envelope.ok) return this.failed(action, state, envelope, toolResult);

    const { order_id, total, placed } = envelope.payload;
    if (!placed) {
      return this.failed(
        action,
        state,
        failure(ErrorKind.SERVICE, `Order ${order_id} was not placed`, { order_id }),
        toolResult,
      );
    }
    return {
      text: `Order placed successfully!\nOrder ID: ${order_id}\nTotal: ${formatMoney(total)}`,
      success: true,
      update: {
        ...SUCCESS,
        orderPlaced: true,
        orderId: order_id,
        orderDetails: { items: [...action.params.items], total },
      },
      toolResult,
    };
  }

  private async notify(
    action: ActionOf<"notify">,
    state: Readonly<TaskState>,
  ): Promise<DispatchResult> {
    const { recipient, orderId, items } = action.params;
    if (!recipient) {
      return this.failed(
        action,
        state,
        failure(ErrorKind.VALIDATION, "No recipient email address is set"),
      );
    }

    const spec = CAPABILITIES.notify;
    const { envelope, toolResult } = await this.invoke(
      "notify",
      spec.request,
      spec.payload,
      {
        recipient,
        subject_line: this.options.subjectLine,
        body: formatOrderEmail(orderId, items),
      },
      state.taskId,
    );
    if (!envelope.ok) return this.failed(action, state, envelope, toolResult);

    return {
      text: `Notification sent to ${recipient}\nMessage ID: ${envelope.payload.message_id}`,
      success: true,
      update: { ...SUCCESS, notificationSent: true },
      toolResult,
    };
  }

  private async checkOrderStatus(
    action: ActionOf<"check_order_status">,
    state: Readonly<TaskState>,
  ): Promise<DispatchResult> {
    const spec = CAPABILITIES.check_order_status;
    const { envelope, toolResult } = await this.invoke(
      "check_order_status",
      spec.request,
      spec.payload,
      { order_id: action.params.orderId },
      state.taskId,
    );
    if (!envelope.ok) return this.failed(action, state, envelope, toolResult);

    const { status, items, total } = envelope.payload;
    return {
      text: `Order ${action.params.orderId}: ${status}\nItems: ${items.join(", ")}\nTotal: ${formatMoney(total)}`,
      success: true,
      update: { ...SUCCESS, orderDetails: { items, total, status } },
      toolResult,
    };
  }

  // ── Internal ──

  /**
   * Validate the request, call the bound tool and decode what came back.
   */
  private async invoke<T>(
    capability: CapabilityName,
    requestSchema: z.ZodTypeAny,
    payloadSchema: PayloadSchema<T>,
    request: Record<string, unknown>,
    taskId: string,
  ): Promise<{ envelope: Envelope<T>; toolResult?: ToolResult }> {
    const parsed = requestSchema.safeParse(request);
    if (!parsed.success) {
      return { envelope: toFailure(parsed.error) };
    }

    const toolName = this.options.bindings[capability];
    const toolResult = await this.executor.execute(toolName, parsed.data, { taskId });

    if (toolResult.result !== undefined) {
      return {
        envelope: decode(toolResult.result, payloadSchema),
        toolResult,
      };
    }

    const cause =
      toolResult.cause ?? new CapabilityError(capability, toolResult.error ?? "Capability call failed");
    return { envelope: toFailure(cause), toolResult };
  }

  private failed(
    action: Action,
    state: Readonly<TaskState>,
    fail: Failure,
    toolResult?: ToolResult,
  ): DispatchResult {
    logger.warn(
      { taskId: state.taskId, action: action.kind, errorKind: fail.errorKind, error: fail.message },
      "action_failed",
    );
    return {
      text: describeFailure(action, fail),
      success: false,
      update: failureUpdate(state, fail.message),
      errorKind: fail.errorKind,
      toolResult,
    };
  }
}
