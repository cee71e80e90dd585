/**
 * ToolExecutor - executes tools with validation, timeout, and call statistics.
 *
 * Never throws: every failure comes back as a ToolResult with `success: false`,
 * and the thrown value is kept on `cause` for the caller to classify.
 */

import type { Tool, ToolResult, ToolContext } from "./types.ts";
import {
  ToolNotFoundError,
  ToolValidationError,
  ToolTimeoutError,
} from "./errors.ts";
import { errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";

const logger = getLogger("tools.executor");

/** Upper bound for a per-call timeout override. */
export const MAX_TOOL_TIMEOUT = 10 * 60 * 1000;

export interface ToolSource {
  get(name: string): Tool | undefined;
  updateCallStats(name: string, durationMs: number, success: boolean): void;
}

export class ToolExecutor {
  constructor(
    private registry: ToolSource,
    private timeout: number = 30000,
  ) {}

  /**
   * Execute a tool with validation and timeout.
   */
  async execute(
    toolName: string,
    params: unknown,
    context: ToolContext,
    options?: { timeout?: number },
  ): Promise<ToolResult> {
    const startedAt = Date.now();

    logger.info(
      { toolName, taskId: context.taskId, params },
      "tool_execute_start",
    );

    try {
      const tool = this.registry.get(toolName);
      if (!tool) {
        throw new ToolNotFoundError(toolName);
      }

      const parsed = tool.parameters.safeParse(params);
      if (!parsed.success) {
        throw new ToolValidationError(
          toolName,
          parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
          parsed.error,
        );
      }

      // Per-call override takes precedence, capped at MAX_TOOL_TIMEOUT
      const effectiveTimeout = options?.timeout
        ? Math.min(options.timeout, MAX_TOOL_TIMEOUT)
        : this.timeout;

      const result = await this.executeWithTimeout(tool, parsed.data, context, effectiveTimeout);
      const durationMs = Date.now() - startedAt;

      this.registry.updateCallStats(toolName, result.durationMs ?? durationMs, result.success);

      logger.info(
        { toolName, taskId: context.taskId, success: result.success, durationMs },
        "tool_execute_done",
      );

      return result;
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      const errorMessage = errorToString(error);

      this.registry.updateCallStats(toolName, durationMs, false);

      logger.error(
        { toolName, taskId: context.taskId, durationMs, error: errorMessage },
        "tool_execute_error",
      );

      return {
        success: false,
        error: errorMessage,
        cause: error,
        startedAt,
        completedAt: Date.now(),
        durationMs,
      };
    }
  }

  /**
   * Execute a tool with timeout protection.
   */
  private async executeWithTimeout(
    tool: Tool,
    params: unknown,
    context: ToolContext,
    timeout: number,
  ): Promise<ToolResult> {
    let timerId: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timerId = setTimeout(() => reject(new ToolTimeoutError(tool.name, timeout)), timeout);
    });

    try {
      return await Promise.race([tool.execute(params, context), timeoutPromise]);
    } finally {
      clearTimeout(timerId);
    }
  }
}
