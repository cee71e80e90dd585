/**
 * Settings singleton. Loads once from config files + env, then re-targets the logger.
 */
import { join } from "node:path";
import { loadSettings } from "./config-loader.ts";
import type { Settings } from "./config-schema.ts";
import { reinitLogger } from "./logger.ts";

export { SettingsSchema } from "./config-schema.ts";
export type { Settings, AgentConfig, ToolsConfig, CapabilitiesConfig, NotifyConfig } from "./config-schema.ts";

let _settings: Settings | null = null;

export function getSettings(): Settings {
  if (!_settings) {
    const settings = loadSettings();
    reinitLogger(join(settings.dataDir, "logs/larder.log"), {
      level: settings.logLevel,
      logConsoleEnabled: settings.logConsoleEnabled,
      nodeEnv: settings.nodeEnv,
    });
    _settings = settings;
  }
  return _settings;
}

/** Override settings (for testing) */
export function setSettings(s: Settings): void {
  _settings = s;
}

/** Reset settings singleton so next getSettings() reloads (for testing) */
export function resetSettings(): void {
  _settings = null;
}
