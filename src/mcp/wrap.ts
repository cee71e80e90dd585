/**
 * wrapMCPTools: converts MCP tools to the Tool interface.
 *
 * Each MCP tool is wrapped as a standard Tool:
 * - Name: `{serverName}__{toolName}` (double underscore to avoid collisions)
 * - Description: `[{serverName}] {description}`
 * - Category: ToolCategory.MCP
 * - Parameters: any JSON object (the MCP server validates the rest)
 *
 * The raw CallToolResult is passed back as `result`, also when the server
 * flags it with isError, so the envelope decoder can read the error payload.
 */

import { z } from "zod";
import { CallToolResultSchema, type Tool as McpTool } from "@modelcontextprotocol/sdk/types.js";
import type { Tool, ToolResult } from "../tools/types.ts";
import { ToolCategory } from "../tools/types.ts";
import type { MCPCallResult, MCPManager } from "./manager.ts";
import { errorToString } from "../infra/errors.ts";

const ArgumentsSchema = z.record(z.string(), z.unknown());

/**
 * Convert CallToolResult content to string.
 * Joins text content with newlines. Non-text blocks are noted by type.
 */
export function extractContent(result: MCPCallResult): string {
  const parsed = CallToolResultSchema.safeParse(result);
  if (!parsed.success) {
    return "";
  }

  const parts: string[] = [];
  for (const block of parsed.data.content) {
    if (block.type === "text") {
      parts.push(block.text);
    } else {
      parts.push(`[${block.type}: non-text content]`);
    }
  }
  return parts.join("\n");
}

export function isErrorResult(result: MCPCallResult): boolean {
  return "isError" in result && result.isError === true;
}

/**
 * Wrap MCP tools from a server as Tool objects.
 */
export function wrapMCPTools(
  serverName: string,
  mcpTools: McpTool[],
  manager: MCPManager,
): Tool[] {
  return mcpTools.map((mcpTool) => wrapSingle(serverName, mcpTool, manager));
}

function wrapSingle(
  serverName: string,
  mcpTool: McpTool,
  manager: MCPManager,
): Tool {
  return {
    name: `${serverName}__${mcpTool.name}`,
    description: `[${serverName}] ${mcpTool.description ?? mcpTool.name}`,
    category: ToolCategory.MCP,
    parameters: ArgumentsSchema,

    async execute(params: unknown): Promise<ToolResult> {
      const startedAt = Date.now();
      try {
        const callResult = await manager.callTool(
          serverName,
          mcpTool.name,
          ArgumentsSchema.parse(params ?? {}),
        );

        if (isErrorResult(callResult)) {
          return {
            success: false,
            result: callResult,
            error: extractContent(callResult) || "MCP tool returned an error",
            startedAt,
            completedAt: Date.now(),
            durationMs: Date.now() - startedAt,
          };
        }

        return {
          success: true,
          result: callResult,
          startedAt,
          completedAt: Date.now(),
          durationMs: Date.now() - startedAt,
        };
      } catch (err) {
        return {
          success: false,
          error: errorToString(err),
          cause: err,
          startedAt,
          completedAt: Date.now(),
          durationMs: Date.now() - startedAt,
        };
      }
    },
  };
}
