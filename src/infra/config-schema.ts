/**
 * Configuration schemas and types.
 * Separated to avoid circular dependencies between config.ts and config-loader.ts.
 */
import { z } from "zod";

export const CAPABILITY_NAMES = [
  "fetch_details",
  "reconcile_items",
  "place_order",
  "check_order_status",
  "notify",
] as const;

export type CapabilityName = (typeof CAPABILITY_NAMES)[number];

export const DEFAULT_CAPABILITY_BINDINGS: Record<CapabilityName, string> = {
  fetch_details: "recipe__fetch_details",
  reconcile_items: "delivery__reconcile_items",
  place_order: "delivery__place_order",
  check_order_status: "delivery__check_order_status",
  notify: "mail__notify",
};

/**
 * Preprocess stringified arrays from env var interpolation.
 * YAML ${VAR:-[]} produces string "[]" instead of an actual array.
 */
function coerceStringArray(val: unknown): unknown {
  if (typeof val === "string") {
    const trimmed = val.trim();
    if (trimmed === "[]" || trimmed === "") return [];
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) return parsed;
    } catch {
      return val; // not JSON; let zod report it
    }
  }
  return val;
}

function coerceBoolean(val: unknown): unknown {
  if (typeof val === "string") {
    if (val === "true") return true;
    if (val === "false" || val === "") return false;
  }
  return val;
}

export const AgentConfigSchema = z.object({
  maxIterations: z.coerce.number().int().positive().default(50),
  stepDelayMs: z.coerce.number().int().min(0).default(0),
});

export const MCPServerConfigSchema = z
  .object({
    name: z.string().min(1),
    transport: z.enum(["stdio", "sse"]).default("stdio"),
    // stdio transport fields
    command: z.string().optional(),
    args: z.array(z.string()).optional(),
    env: z.record(z.string(), z.string()).optional(),
    cwd: z.string().optional(),
    // sse/http transport fields
    url: z.string().url().optional(),
    enabled: z.boolean().default(true),
  })
  .refine(
    (s) => {
      if (s.transport === "stdio") return !!s.command;
      return !!s.url;
    },
    { message: "stdio transport requires 'command'; sse transport requires 'url'" },
  );

export const ToolsConfigSchema = z.object({
  timeout: z.coerce.number().int().positive().default(30), // seconds
  mcpServers: z.preprocess(coerceStringArray, z.array(MCPServerConfigSchema).default([])),
});

export const CapabilitiesConfigSchema = z.object({
  builtinServices: z.preprocess(coerceBoolean, z.boolean().default(true)),
  reconcileMode: z.enum(["remote", "local"]).default("remote"),
  bindings: z
    .object({
      fetch_details: z.string().default(DEFAULT_CAPABILITY_BINDINGS.fetch_details),
      reconcile_items: z.string().default(DEFAULT_CAPABILITY_BINDINGS.reconcile_items),
      place_order: z.string().default(DEFAULT_CAPABILITY_BINDINGS.place_order),
      check_order_status: z.string().default(DEFAULT_CAPABILITY_BINDINGS.check_order_status),
      notify: z.string().default(DEFAULT_CAPABILITY_BINDINGS.notify),
    })
    .default({}),
});

export const NotifyConfigSchema = z.object({
  subjectLine: z.string().min(1).default("Your grocery order confirmation"),
});

export const SettingsSchema = z.object({
  agent: AgentConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  capabilities: CapabilitiesConfigSchema.default({}),
  notify: NotifyConfigSchema.default({}),
  logLevel: z.string().default("info"),
  dataDir: z.string().default("data"),
  logConsoleEnabled: z.preprocess(coerceBoolean, z.boolean().default(false)),
  nodeEnv: z.string().default("development"), // development | production | test
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type MCPServerSettings = z.infer<typeof MCPServerConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type CapabilitiesConfig = z.infer<typeof CapabilitiesConfigSchema>;
export type NotifyConfig = z.infer<typeof NotifyConfigSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
