/**
 * Tools system - core types.
 */

import type { z } from "zod";

// ── ToolCategory ─────────────────────────────────────

export enum ToolCategory {
  LOCAL = "local", // in-process pure functions
  MCP = "mcp", // remote capability behind an MCP server
}

// ── Tool ───────────────────────────────────────────

/**
 * Tool interface - all tools must implement this.
 */
export interface Tool {
  name: string;
  description: string;
  category: ToolCategory;
  parameters: z.ZodTypeAny;
  execute: (params: unknown, context: ToolContext) => Promise<ToolResult>;
}

// ── ToolResult ───────────────────────────────────

/**
 * Result returned by tool execution.
 * Note: toolName is omitted as it's managed by the caller.
 */
export interface ToolResult {
  success: boolean;
  /** Raw result; for MCP tools, the CallToolResult as received (even when it reports an error). */
  result?: unknown;
  error?: string;
  /** The thrown value behind a failure, kept for classification. */
  cause?: unknown;
  startedAt: number;
  completedAt?: number;
  durationMs?: number;
}

// ── ToolContext ─────────────────────────────────

/**
 * Context passed to tool execution.
 */
export interface ToolContext {
  taskId: string;
}

// ── ToolStats ─────────────────────────────────

export interface ToolStats {
  total: number;
  byCategory: Record<ToolCategory, number>;
  /** Per tool name; only tools that were called appear. */
  calls: Record<string, { count: number; failures: number; avgDurationMs: number }>;
}
