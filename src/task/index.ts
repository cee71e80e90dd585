export {
  TaskPhase,
  ActionOutcome,
  PipelineStage,
  TERMINAL_PHASES,
  PHASE_TRANSITIONS,
  canTransition,
} from "./states.ts";
export {
  createTaskState,
  normalizeItems,
  checkInvariants,
  derivePipelineStage,
  freezeState,
  cloneState,
} from "./state.ts";
export type { TaskState, TaskStateUpdate, OrderDetails } from "./state.ts";
export { TaskStateStore } from "./store.ts";
export type { PhaseTransition } from "./store.ts";
export { ActionKind, createAction } from "./action.ts";
export type { Action, ActionOf, ActionParamsMap, InvalidInputReason } from "./action.ts";
