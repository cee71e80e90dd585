/**
 * ConfigLoader: Load configuration from YAML files with env var support.
 *
 * Features:
 * - Load from config.yml (base) + config.local.yml (override)
 * - Support ${ENV_VAR} interpolation in strings
 * - Environment variables override all file configs
 * - Fallback to env-only mode if no config file found
 * - Custom config path via LARDER_CONFIG env var
 */
import { existsSync, readFileSync } from "node:fs";
import yaml from "js-yaml";
import { ConfigError, errorToString } from "./errors.ts";
import { getLogger } from "./logger.ts";
import { SettingsSchema, type Settings } from "./config-schema.ts";

const logger = getLogger("config_loader");

type Env = Record<string, string | undefined>;
type ConfigTree = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(config: ConfigTree, key: string): ConfigTree {
  const value = config[key];
  return isRecord(value) ? value : {};
}

function interpolateString(text: string, env: Env): string | undefined {
  const out = text.replace(/\$\{([^}]+)\}/g, (_match, content: string) => {
    // Bash-style operators: :- default, := assign default, :? required, :+ alternate
    const operatorMatch = content.match(/^([^:]+)(:-|:=|:\?|:\+)(.*)$/);

    if (operatorMatch) {
      const [, varName = "", operator, value = ""] = operatorMatch;
      const envValue = env[varName];
      const isEmpty = envValue === undefined || envValue === "";

      switch (operator) {
        case ":-":
          return isEmpty ? value : envValue;
        case ":=":
          if (isEmpty) {
            env[varName] = value;
            return value;
          }
          return envValue;
        case ":?":
          if (isEmpty) {
            throw new ConfigError(
              `Environment variable ${varName} is required but not set: ${value || "missing value"}`,
            );
          }
          return envValue;
        case ":+":
          return isEmpty ? "" : value;
        default:
          return envValue ?? "";
      }
    }

    return env[content] ?? "";
  });
  // Empty string becomes undefined so schema defaults apply
  return out === "" ? undefined : out;
}

/**
 * Interpolate ${VAR_NAME} placeholders with environment variables.
 */
export function interpolateEnvVars(value: unknown, env: Env = process.env): unknown {
  if (typeof value === "string") return interpolateString(value, env);
  if (Array.isArray(value)) return value.map((v) => interpolateEnvVars(v, env));
  if (isRecord(value)) {
    const result: ConfigTree = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = interpolateEnvVars(val, env);
    }
    return result;
  }
  return value;
}

/**
 * Load and parse config file (JSON or YAML), returning raw structure.
 */
function loadConfigFile(path: string): ConfigTree {
  let parsed: unknown;
  try {
    const content = readFileSync(path, "utf-8");
    const isYaml = path.endsWith(".yaml") || path.endsWith(".yml");
    parsed = isYaml ? yaml.load(content) : JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Failed to load config file ${path}: ${errorToString(err)}`);
  }

  const interpolated = interpolateEnvVars(parsed ?? {});
  if (!isRecord(interpolated)) {
    throw new ConfigError(`Config file ${path} must contain a mapping at the top level`);
  }
  return interpolated;
}

/**
 * Deep merge two objects, with source overriding target.
 */
export function deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function pickSingle(paths: string[], label: string): string | null {
  const found = paths.filter((p) => existsSync(p));
  if (found.length > 1) {
    throw new ConfigError(
      `Multiple ${label} config files found: ${found.join(", ")}. Please keep only one.`,
    );
  }
  return found[0] ?? null;
}

/**
 * Find and load config files with layered merging.
 * Priority: config.local.yml/yaml overrides config.yml/yaml
 */
function findAndMergeConfigs(env: Env): ConfigTree | null {
  const customPath = env["LARDER_CONFIG"];
  if (customPath) {
    if (!existsSync(customPath)) {
      throw new ConfigError(`LARDER_CONFIG points to a missing file: ${customPath}`);
    }
    logger.info({ path: customPath }, "loading_config_from_custom_path");
    return loadConfigFile(customPath);
  }

  const basePath = pickSingle(["config.yaml", "config.yml"], "base");
  const localPath = pickSingle(["config.local.yaml", "config.local.yml"], "local");

  const base = basePath ? loadConfigFile(basePath) : null;
  if (basePath) logger.info({ path: basePath }, "loading_base_config");

  const local = localPath ? loadConfigFile(localPath) : null;
  if (localPath) logger.info({ path: localPath }, "loading_local_config_override");

  if (base && local) return deepMerge(base, local);
  return local ?? base;
}

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Convert config file to Settings format, with env var overrides.
 */
export function configToSettings(config: ConfigTree, env: Env = process.env): Settings {
  const system = section(config, "system");
  const agent = section(config, "agent");
  const tools = section(config, "tools");
  const capabilities = section(config, "capabilities");

  return SettingsSchema.parse({
    agent: {
      maxIterations: envNumber(env, "LARDER_MAX_ITERATIONS") ?? agent["maxIterations"],
      stepDelayMs: envNumber(env, "LARDER_STEP_DELAY_MS") ?? agent["stepDelayMs"],
    },
    tools: {
      timeout: envNumber(env, "LARDER_TOOL_TIMEOUT") ?? tools["timeout"],
      mcpServers: tools["mcpServers"],
    },
    capabilities: {
      builtinServices: capabilities["builtinServices"],
      reconcileMode: env["LARDER_RECONCILE_MODE"] || capabilities["reconcileMode"],
      bindings: capabilities["bindings"],
    },
    notify: section(config, "notify"),
    logLevel: env["LARDER_LOG_LEVEL"] || system["logLevel"],
    dataDir: env["LARDER_DATA_DIR"] || system["dataDir"],
    logConsoleEnabled:
      env["LARDER_LOG_CONSOLE_ENABLED"] === "true" || system["logConsoleEnabled"],
    nodeEnv: env["NODE_ENV"] || system["nodeEnv"],
  });
}

/**
 * Load from env vars only (fallback when no config file).
 */
export function loadFromEnv(env: Env = process.env): Settings {
  return configToSettings({}, env);
}

/**
 * Load settings from config file or env vars.
 *
 * Priority:
 * 1. Environment variables (highest)
 * 2. config.local.yml/yaml (overrides base config)
 * 3. config.yml/yaml (base config)
 * 4. Schema defaults
 */
export function loadSettings(env: Env = process.env): Settings {
  const merged = findAndMergeConfigs(env);
  if (merged) {
    return configToSettings(merged, env);
  }
  logger.info("loading_config_from_env");
  return loadFromEnv(env);
}
