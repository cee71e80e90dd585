/**
 * Unit tests for wrapMCPTools and loadMCPTools.
 */

import { describe, it, expect } from "vitest";
import type { Tool as McpTool } from "@modelcontextprotocol/sdk/types.js";
import { MCPManager } from "../../../src/mcp/manager.ts";
import { extractContent, isErrorResult, wrapMCPTools } from "../../../src/mcp/wrap.ts";
import { loadMCPTools } from "../../../src/mcp/load.ts";
import { ToolRegistry } from "../../../src/tools/registry.ts";
import { ToolCategory } from "../../../src/tools/types.ts";
import { connectTestServer } from "./helpers.ts";

const context = { taskId: "t1" };

const searchTool: McpTool = {
  name: "search",
  description: "Search for documents",
  inputSchema: { type: "object", properties: { query: { type: "string" } }, required: ["query"] },
};

describe("wrapMCPTools", () => {
  it("should name tools after their server", () => {
    const tools = wrapMCPTools("docs", [searchTool, { ...searchTool, name: "fetch", description: undefined }], new MCPManager());

    expect(tools.map((t) => t.name)).toEqual(["docs__search", "docs__fetch"]);
    expect(tools[0]?.description).toBe("[docs] Search for documents");
    expect(tools[1]?.description).toBe("[docs] fetch");
    expect(tools.every((t) => t.category === ToolCategory.MCP)).toBe(true);
  });

  it("should pass the raw call result through on success", async () => {
    const { manager } = await connectTestServer();
    const [echo] = wrapMCPTools("test", await manager.listTools("test"), manager);

    const result = await echo?.execute({ value: "hi" }, context);

    expect(result?.success).toBe(true);
    expect(result?.result).toMatchObject({ content: [{ type: "text", text: '{"echoed":"hi"}' }] });
    await manager.disconnectAll();
  });

  it("should keep the raw result when the server flags an error", async () => {
    const { manager } = await connectTestServer();
    const tools = wrapMCPTools("test", await manager.listTools("test"), manager);
    const fail = tools.find((t) => t.name === "test__fail");

    const result = await fail?.execute({}, context);

    expect(result?.success).toBe(false);
    expect(result?.error).toBe('{"error_kind":"Refused","message":"Not today","details":{}}');
    expect(result?.result).toMatchObject({ isError: true });
    await manager.disconnectAll();
  });

  it("should return a failure with the cause when the call throws", async () => {
    const [tool] = wrapMCPTools("ghost", [searchTool], new MCPManager());

    const result = await tool?.execute({ query: "x" }, context);

    expect(result?.success).toBe(false);
    expect(result?.error).toBe('MCP server "ghost" is not connected');
    expect(result?.cause).toBeInstanceOf(Error);
  });
});

describe("extractContent", () => {
  it("should join text blocks and note other blocks", () => {
    expect(
      extractContent({
        content: [
          { type: "text", text: "first" },
          { type: "image", data: "AAAA", mimeType: "image/png" },
          { type: "text", text: "second" },
        ],
      }),
    ).toBe("first\n[image: non-text content]\nsecond");
  });

  it("should return an empty string for a result without content", () => {
    expect(extractContent({ toolResult: "legacy" })).toBe("");
  });
});

describe("isErrorResult", () => {
  it("should detect the isError flag", () => {
    expect(isErrorResult({ content: [], isError: true })).toBe(true);
    expect(isErrorResult({ content: [] })).toBe(false);
  });
});

describe("loadMCPTools", () => {
  it("should register every connected server's tools", async () => {
    const { manager } = await connectTestServer("alpha");
    await connectTestServer("beta", undefined, manager);
    const registry = new ToolRegistry();

    const count = await loadMCPTools(manager, registry);

    expect(count).toBe(4);
    expect(registry.list().map((t) => t.name)).toEqual([
      "alpha__echo",
      "alpha__fail",
      "beta__echo",
      "beta__fail",
    ]);
    await manager.disconnectAll();
  });

  it("should skip a server whose tools cannot be listed", async () => {
    const { manager } = await connectTestServer("alpha");
    const registry = new ToolRegistry();

    const count = await loadMCPTools(manager, registry, ["ghost", "alpha"]);

    expect(count).toBe(2);
    expect(registry.has("alpha__echo")).toBe(true);
    await manager.disconnectAll();
  });
});
