/**
 * Agent: drives one task at a time through Decide → Dispatch → Merge.
 *
 * Each runTask() call owns a fresh TaskStateStore; nothing about a task
 * outlives the call except the returned result. Step n's update is merged
 * before step n+1 decides. The loop ends when the phase is completed or the
 * iteration cap is hit, and never throws: every failure becomes data.
 */
import { setTimeout as sleep } from "node:timers/promises";
import { ActionDispatcher, type DispatchResult } from "./cognitive/act.ts";
import { nextAction } from "./cognitive/decide.ts";
import { describeFailure, failureUpdate, toFailure } from "./cognitive/fallback.ts";
import { salvageTaskInput } from "./cognitive/perceive.ts";
import type { ErrorKind } from "./envelope/types.ts";
import type { CapabilityName } from "./infra/config-schema.ts";
import type { Settings } from "./infra/config.ts";
import { getSettings } from "./infra/config.ts";
import { errorToString } from "./infra/errors.ts";
import { getLogger } from "./infra/logger.ts";
import { loadMCPTools } from "./mcp/load.ts";
import { MCPManager } from "./mcp/manager.ts";
import { attachBuiltinServices, type BuiltinServices } from "./services/index.ts";
import { ActionKind, createAction, type Action } from "./task/action.ts";
import { createTaskState, type TaskState, type TaskStateUpdate } from "./task/state.ts";
import { TaskPhase } from "./task/states.ts";
import { TaskStateStore } from "./task/store.ts";
import { LOCAL_RECONCILE_TOOL, builtinTools } from "./tools/builtins/index.ts";
import { ToolExecutor } from "./tools/executor.ts";
import { ToolRegistry } from "./tools/registry.ts";

const logger = getLogger("agent");

// ── Types ────────────────────────────────────────────

/** Anything that can carry out an Action against a task's store. */
export interface Dispatcher {
  execute(action: Action, store: TaskStateStore): Promise<DispatchResult>;
}

export interface IterationReport {
  iteration: number;
  action: Action["kind"] | null;
  text: string;
  success: boolean;
  errorKind?: ErrorKind;
  state: Readonly<TaskState>;
}

/** Fields a driver may correct while the task waits or after a failure. */
export interface InputCorrection {
  subject?: string;
  availableItems?: string[];
  recipient?: string | null;
}

export interface RunOptions {
  taskId?: string;
  maxIterations?: number;
  stepDelayMs?: number;
  /** Checked before every iteration; an aborted run ends incomplete. */
  signal?: AbortSignal;
  onIteration?: (report: IterationReport) => void | Promise<void>;
  /** Asked before a decision whenever the task is waiting or in error. */
  provideInput?: (
    state: Readonly<TaskState>,
  ) => InputCorrection | null | Promise<InputCorrection | null>;
}

export type TaskStatus = "completed" | "incomplete";

export interface TaskResult {
  taskId: string;
  status: TaskStatus;
  iterations: number;
  reports: IterationReport[];
  finalState: Readonly<TaskState>;
  /** Why part of the task input was dropped, or null. */
  inputError: string | null;
}

export interface AgentDeps {
  settings?: Settings;
  toolRegistry?: ToolRegistry;
  mcpManager?: MCPManager;
  /** Simulated services to attach when builtinServices is on. */
  services?: BuiltinServices;
  /** Replaces the ActionDispatcher built from settings. */
  dispatcher?: Dispatcher;
}

// ── Agent ────────────────────────────────────────────

export class Agent {
  readonly toolRegistry: ToolRegistry;
  readonly mcpManager: MCPManager;

  private dispatcher: Dispatcher;
  private settings: Settings;
  private _services: BuiltinServices | null = null;
  private _started = false;
  private builtinServices: BuiltinServices | undefined;

  constructor(deps: AgentDeps = {}) {
    this.settings = deps.settings ?? getSettings();
    this.mcpManager = deps.mcpManager ?? new MCPManager();
    this.builtinServices = deps.services;

    this.toolRegistry = deps.toolRegistry ?? new ToolRegistry();
    for (const tool of builtinTools) {
      if (!this.toolRegistry.has(tool.name)) this.toolRegistry.register(tool);
    }

    const executor = new ToolExecutor(this.toolRegistry, this.settings.tools.timeout * 1000);
    this.dispatcher =
      deps.dispatcher ??
      new ActionDispatcher(executor, {
        bindings: resolveBindings(this.settings),
        subjectLine: this.settings.notify.subjectLine,
      });
  }

  get isStarted(): boolean {
    return this._started;
  }

  /** Simulated services attached in-process, if any. */
  get services(): BuiltinServices | null {
    return this._services;
  }

  /**
   * Connect capability servers and register their tools.
   */
  async start(): Promise<void> {
    if (this._started) return;

    if (this.settings.capabilities.builtinServices) {
      this._services = await attachBuiltinServices(this.mcpManager, this.builtinServices);
    }
    await this.mcpManager.connectAll(this.settings.tools.mcpServers);

    const count = await loadMCPTools(this.mcpManager, this.toolRegistry);
    this._started = true;
    logger.info(
      {
        mcpTools: count,
        tools: this.toolRegistry.list().map((tool) => tool.name),
        servers: this.mcpManager.getConnectedServers(),
      },
      "agent_started",
    );
  }

  async stop(): Promise<void> {
    if (!this._started) return;
    await this.mcpManager.disconnectAll();
    if (this._services) {
      await Promise.allSettled([
        this._services.recipe.close(),
        this._services.delivery.server.close(),
        this._services.mail.server.close(),
      ]);
      this._services = null;
      this.builtinServices = undefined;
    }
    this._started = false;
    logger.info({ toolCalls: this.toolRegistry.getStats().calls }, "agent_stopped");
  }

  /**
   * Run one task to completion or until the iteration cap.
   */
  async runTask(input: unknown, options: RunOptions = {}): Promise<TaskResult> {
    const maxIterations = options.maxIterations ?? this.settings.agent.maxIterations;
    const stepDelayMs = options.stepDelayMs ?? this.settings.agent.stepDelayMs;

    // Fields that fail validation are dropped; the rest of the input still runs.
    const { input: parsed, error } = salvageTaskInput(input);
    const inputError = error ? error.message : null;
    const store = new TaskStateStore(
      createTaskState({ taskId: options.taskId, ...parsed, lastError: inputError }),
    );
    const reports: IterationReport[] = [];
    logger.info({ taskId: store.taskId, subject: store.snapshot().subject, maxIterations }, "task_started");

    let iteration = 0;
    while (!store.isTerminal && iteration < maxIterations && !options.signal?.aborted) {
      iteration++;

      if (options.provideInput && needsInput(store.phase)) {
        await this.applyCorrection(store, options.provideInput);
      }

      const report = await this.step(store, iteration);
      reports.push(report);

      if (options.onIteration) {
        try {
          await options.onIteration(report);
        } catch (err) {
          logger.warn({ taskId: store.taskId, iteration, error: errorToString(err) }, "on_iteration_failed");
        }
      }

      if (stepDelayMs > 0 && !store.isTerminal) {
        await sleep(stepDelayMs);
      }
    }

    const status: TaskStatus = store.isTerminal ? "completed" : "incomplete";
    logger.info(
      { taskId: store.taskId, status, iterations: iteration, aborted: options.signal?.aborted ?? false },
      "task_finished",
    );

    return {
      taskId: store.taskId,
      status,
      iterations: iteration,
      reports,
      finalState: store.snapshot(),
      inputError,
    };
  }

  /**
   * Ask the delivery capability about an order placed by an earlier task.
   */
  async checkOrderStatus(orderId: string): Promise<DispatchResult> {
    const store = new TaskStateStore(createTaskState({ orderPlaced: true, orderId }));
    const action = createAction(
      ActionKind.CHECK_ORDER_STATUS,
      { orderId },
      "The user asked for the order status.",
      "I could not look up the order status. Please try again later.",
    );
    return this.dispatcher.execute(action, store);
  }

  // ── Internal ──

  /** One Decide → Dispatch → Merge cycle. */
  private async step(store: TaskStateStore, iteration: number): Promise<IterationReport> {
    let action: Action | null = null;
    try {
      action = nextAction(store.snapshot());
      const result = await this.dispatcher.execute(action, store);

      try {
        store.update(result.update);
      } catch (err) {
        const fail = toFailure(err);
        logger.warn({ taskId: store.taskId, action: action.kind, error: fail.message }, "task_merge_rejected");
        this.recordFailure(store, fail.message);
        return this.report(iteration, action, describeFailure(action, fail), false, store, fail.errorKind);
      }

      return this.report(iteration, action, result.text, result.success, store, result.errorKind);
    } catch (err) {
      const fail = toFailure(err);
      logger.error({ taskId: store.taskId, iteration, error: fail.message }, "task_step_failed");
      this.recordFailure(store, fail.message);
      return this.report(
        iteration,
        action,
        describeFailure({ fallback: action?.fallback ?? null }, fail),
        false,
        store,
        fail.errorKind,
      );
    }
  }

  private report(
    iteration: number,
    action: Action | null,
    text: string,
    success: boolean,
    store: TaskStateStore,
    errorKind?: ErrorKind,
  ): IterationReport {
    return { iteration, action: action?.kind ?? null, text, success, errorKind, state: store.snapshot() };
  }

  private recordFailure(store: TaskStateStore, message: string): void {
    try {
      store.update(failureUpdate(store.snapshot(), message));
    } catch (err) {
      logger.error({ taskId: store.taskId, error: errorToString(err) }, "task_failure_not_recorded");
    }
  }

  private async applyCorrection(
    store: TaskStateStore,
    provideInput: NonNullable<RunOptions["provideInput"]>,
  ): Promise<void> {
    try {
      const correction = await provideInput(store.snapshot());
      if (!correction) return;
      store.update(correctionUpdate(store.snapshot(), correction));
      logger.info({ taskId: store.taskId, fields: Object.keys(correction) }, "task_input_corrected");
    } catch (err) {
      logger.warn({ taskId: store.taskId, error: errorToString(err) }, "task_input_correction_rejected");
    }
  }
}

// ── Helpers ──────────────────────────────────────────

function needsInput(phase: TaskPhase): boolean {
  return phase === TaskPhase.WAITING || phase === TaskPhase.ERROR;
}

/** Capability bindings with the reconcile mode applied. */
export function resolveBindings(settings: Settings): Record<CapabilityName, string> {
  const bindings = { ...settings.capabilities.bindings };
  if (settings.capabilities.reconcileMode === "local") {
    bindings.reconcile_items = LOCAL_RECONCILE_TOOL;
  }
  return bindings;
}

/**
 * Turn a driver's correction into a store update. A new subject discards
 * what was fetched for the old one; new pantry items force a fresh
 * reconciliation. Neither applies once an order exists.
 */
export function correctionUpdate(
  state: Readonly<TaskState>,
  correction: InputCorrection,
): TaskStateUpdate {
  const update: TaskStateUpdate = {};
  const editable = !state.orderPlaced;

  if (correction.recipient !== undefined) {
    update.recipient = correction.recipient?.trim() || null;
  }

  if (editable && correction.availableItems !== undefined) {
    update.availableItems = correction.availableItems;
    update.missingItems = null;
  }

  const subject = correction.subject?.trim();
  if (editable && subject && subject !== state.subject) {
    update.subject = subject;
    update.requiredItems = [];
    update.resultSteps = [];
    update.missingItems = null;
  }

  return update;
}
