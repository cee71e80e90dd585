/**
 * ToolRegistry: the tools capabilities can be bound to, with a per-tool
 * tally of calls made through the ToolExecutor.
 */

import type { Tool, ToolStats } from "./types.ts";
import { ToolCategory } from "./types.ts";
import { ToolError } from "./errors.ts";

interface CallTally {
  count: number;
  failures: number;
  totalDurationMs: number;
}

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();
  private readonly tallies = new Map<string, CallTally>();

  /** Throws ToolError when the name is taken. */
  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new ToolError(tool.name, `Tool "${tool.name}" already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  registerMany(tools: readonly Tool[]): void {
    tools.forEach((tool) => this.register(tool));
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): Tool[] {
    return [...this.tools.values()];
  }

  /** Called by the executor after every call, including failed ones. */
  updateCallStats(toolName: string, durationMs: number, success: boolean): void {
    const tally = this.tallies.get(toolName) ?? { count: 0, failures: 0, totalDurationMs: 0 };
    tally.count += 1;
    tally.failures += success ? 0 : 1;
    tally.totalDurationMs += durationMs;
    this.tallies.set(toolName, tally);
  }

  getStats(): ToolStats {
    const byCategory: Record<ToolCategory, number> = {
      [ToolCategory.LOCAL]: 0,
      [ToolCategory.MCP]: 0,
    };
    for (const tool of this.tools.values()) {
      byCategory[tool.category] += 1;
    }

    const calls: ToolStats["calls"] = {};
    for (const [name, tally] of this.tallies) {
      calls[name] = {
        count: tally.count,
        failures: tally.failures,
        avgDurationMs: Math.round(tally.totalDurationMs / tally.count),
      };
    }

    return { total: this.tools.size, byCategory, calls };
  }
}
