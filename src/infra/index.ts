export {
  LarderError,
  ConfigError,
  TaskError,
  InvalidStateTransition,
  StateInvariantError,
  TaskInputError,
  CapabilityError,
  EnvelopeDecodeError,
  errorToString,
} from "./errors.ts";
export { getLogger } from "./logger.ts";
export { shortId } from "./id.ts";
export { getSettings, setSettings, resetSettings, SettingsSchema } from "./config.ts";
export type { Settings, AgentConfig, ToolsConfig, CapabilitiesConfig, NotifyConfig } from "./config.ts";
