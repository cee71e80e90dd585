/**
 * TaskStateStore: owns one task's state.
 *
 * The store performs NO I/O.  It only:
 *   1. Merges partial updates
 *   2. Validates phase transitions and invariants
 *   3. Records phase history
 *
 * An update either applies completely or not at all.
 */
import { InvalidStateTransition, StateInvariantError } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import {
  checkInvariants,
  cloneState,
  createTaskState,
  freezeState,
  normalizeItems,
  type TaskState,
  type TaskStateUpdate,
} from "./state.ts";
import { canTransition, TERMINAL_PHASES, type TaskPhase } from "./states.ts";

const logger = getLogger("task_store");

// ── PhaseTransition record ──────────────────────────

export interface PhaseTransition {
  from: TaskPhase;
  to: TaskPhase;
  action: string | null;
  timestamp: number;
}

// ── TaskStateStore ──────────────────────────────────

export class TaskStateStore {
  private state: TaskState;
  private readonly _history: PhaseTransition[] = [];

  constructor(initial?: TaskState) {
    const state = initial ? cloneState(initial) : createTaskState();
    const violations = checkInvariants(state);
    if (violations.length > 0) throw new StateInvariantError(violations);
    this.state = state;
  }

  get taskId(): string {
    return this.state.taskId;
  }

  get phase(): TaskPhase {
    return this.state.phase;
  }

  get history(): readonly PhaseTransition[] {
    return this._history;
  }

  get isTerminal(): boolean {
    return TERMINAL_PHASES.has(this.state.phase);
  }

  /** Immutable copy for the Decision Engine. */
  snapshot(): Readonly<TaskState> {
    return freezeState(this.state);
  }

  /**
   * Merge the supplied fields. Throws InvalidStateTransition or
   * StateInvariantError and leaves the state untouched on any violation.
   */
  update(partial: TaskStateUpdate): void {
    const current = this.state;
    if (TERMINAL_PHASES.has(current.phase)) {
      throw new InvalidStateTransition(
        `Task ${current.taskId} is in terminal phase ${current.phase}, cannot update`,
      );
    }

    const next = cloneState(current);
    for (const [key, value] of Object.entries(partial)) {
      if (value !== undefined) Object.assign(next, { [key]: value });
    }

    if (partial.availableItems) next.availableItems = normalizeItems(partial.availableItems);
    if (partial.requiredItems) next.requiredItems = normalizeItems(partial.requiredItems);
    if (partial.missingItems) next.missingItems = normalizeItems(partial.missingItems);
    if (partial.resultSteps) next.resultSteps = [...partial.resultSteps];
    if (partial.orderDetails) {
      next.orderDetails = { ...partial.orderDetails, items: [...partial.orderDetails.items] };
    }

    if (!canTransition(current.phase, next.phase)) {
      throw new InvalidStateTransition(
        `No transition from ${current.phase} to ${next.phase} for task ${current.taskId}`,
      );
    }

    const violations = checkInvariants(next);
    if (violations.length > 0) {
      logger.warn({ taskId: current.taskId, violations }, "task_state_update_rejected");
      throw new StateInvariantError(violations);
    }

    if (next.phase !== current.phase) {
      this._history.push({
        from: current.phase,
        to: next.phase,
        action: next.lastAction,
        timestamp: Date.now(),
      });
      logger.info(
        { taskId: current.taskId, from: current.phase, to: next.phase, action: next.lastAction },
        "task_phase_changed",
      );
    }

    this.state = next;
    logger.debug({ taskId: current.taskId, fields: Object.keys(partial) }, "task_state_updated");
  }
}
