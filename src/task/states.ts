/** Task phases as recorded on the Task State. */
export const TaskPhase = {
  INITIAL: "initial",
  IN_PROGRESS: "in_progress",
  WAITING: "waiting",
  ERROR: "error",
  COMPLETED: "completed",
} as const;

export type TaskPhase = (typeof TaskPhase)[keyof typeof TaskPhase];

/** Outcome of the most recent action. */
export const ActionOutcome = {
  STARTED: "started",
  COMPLETED: "completed",
  FAILED: "failed",
  WAITING: "waiting",
} as const;

export type ActionOutcome = (typeof ActionOutcome)[keyof typeof ActionOutcome];

/**
 * Pipeline position, derived from data only (see derivePipelineStage).
 * Never stored on the state.
 */
export const PipelineStage = {
  INITIAL: "initial",
  FETCHING: "fetching",
  RECONCILING: "reconciling",
  ORDERING: "ordering",
  NOTIFYING: "notifying",
  PRESENTING: "presenting",
  COMPLETED: "completed",
} as const;

export type PipelineStage = (typeof PipelineStage)[keyof typeof PipelineStage];

export const TERMINAL_PHASES: ReadonlySet<TaskPhase> = new Set([TaskPhase.COMPLETED]);

// ── Transition table ────────────────────────────────
// phase → phases it may move to. An update that keeps the phase is not a transition.

export const PHASE_TRANSITIONS: ReadonlyMap<TaskPhase, ReadonlySet<TaskPhase>> = new Map([
  [TaskPhase.INITIAL, new Set<TaskPhase>([TaskPhase.IN_PROGRESS, TaskPhase.WAITING, TaskPhase.ERROR])],
  [TaskPhase.IN_PROGRESS, new Set<TaskPhase>([TaskPhase.WAITING, TaskPhase.ERROR, TaskPhase.COMPLETED])],
  [TaskPhase.WAITING, new Set<TaskPhase>([TaskPhase.IN_PROGRESS, TaskPhase.ERROR])],
  [TaskPhase.ERROR, new Set<TaskPhase>([TaskPhase.IN_PROGRESS, TaskPhase.WAITING])],
  [TaskPhase.COMPLETED, new Set<TaskPhase>()],
]);

export function canTransition(from: TaskPhase, to: TaskPhase): boolean {
  if (from === to) return !TERMINAL_PHASES.has(from);
  return PHASE_TRANSITIONS.get(from)?.has(to) ?? false;
}
