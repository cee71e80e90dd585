export { Agent, correctionUpdate, resolveBindings } from "./agent.ts";
export type {
  AgentDeps,
  Dispatcher,
  InputCorrection,
  IterationReport,
  RunOptions,
  TaskResult,
  TaskStatus,
} from "./agent.ts";
export { ActionDispatcher, formatOrderEmail, formatMoney } from "./cognitive/act.ts";
export type { DispatchResult, DispatcherOptions } from "./cognitive/act.ts";
export { DECISION_RULES, matchingRules, nextAction } from "./cognitive/decide.ts";
export { classify, describeFailure, toFailure } from "./cognitive/fallback.ts";
export { parseTaskInput } from "./cognitive/perceive.ts";
export type { TaskInput } from "./cognitive/perceive.ts";
export { decode, ErrorKind, failure, success } from "./envelope/index.ts";
export type { Envelope, Failure, Success } from "./envelope/index.ts";
export { CAPABILITIES, reconcileItems } from "./capabilities/index.ts";
export { MCPManager } from "./mcp/index.ts";
export { attachBuiltinServices, createBuiltinServices } from "./services/index.ts";
export type { BuiltinServices } from "./services/index.ts";
export { TaskStateStore, TaskPhase, ActionKind, createTaskState } from "./task/index.ts";
export type { Action, TaskState, TaskStateUpdate } from "./task/index.ts";
export { ToolRegistry, ToolExecutor, ToolCategory, LOCAL_RECONCILE_TOOL } from "./tools/index.ts";
export type { Tool, ToolContext, ToolResult } from "./tools/index.ts";
export {
  LarderError,
  CapabilityError,
  TaskInputError,
  getLogger,
  getSettings,
  setSettings,
  resetSettings,
  SettingsSchema,
} from "./infra/index.ts";
export type { Settings } from "./infra/index.ts";
