/**
 * Unit tests for MCPManager.
 *
 * Real SDK clients talk to an in-process CapabilityServer over a linked
 * in-memory transport pair; connection failures use real stdio/sse paths.
 */

import { describe, it, expect } from "vitest";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { MCPManager } from "../../../src/mcp/manager.ts";
import { extractContent } from "../../../src/mcp/wrap.ts";
import { connectTestServer } from "./helpers.ts";

describe("MCPManager", () => {
  it("should start with no connected servers", () => {
    const manager = new MCPManager();
    expect(manager.getConnectedServers()).toEqual([]);
    expect(manager.getClient("none")).toBeUndefined();
  });

  it("should connect over a caller-built transport and list tools", async () => {
    const { manager } = await connectTestServer();

    expect(manager.getConnectedServers()).toEqual(["test"]);
    const tools = await manager.listTools("test");
    expect(tools.map((t) => t.name)).toEqual(["echo", "fail"]);
    expect(tools[0]?.inputSchema).toEqual({
      type: "object",
      properties: { value: { type: "string" } },
      required: ["value"],
    });

    await manager.disconnectAll();
  });

  it("should call a tool and return its result", async () => {
    const { manager } = await connectTestServer();

    const result = await manager.callTool("test", "echo", { value: "hi" });
    expect(extractContent(result)).toBe('{"echoed":"hi"}');

    await manager.disconnectAll();
  });

  it("should refuse a second connection under the same name", async () => {
    const { manager } = await connectTestServer();
    const [clientTransport] = InMemoryTransport.createLinkedPair();

    await expect(manager.connectTransport("test", clientTransport)).rejects.toThrow(
      'MCP server "test" is already connected',
    );

    await manager.disconnectAll();
  });

  it("should throw when calling a server that is not connected", async () => {
    const manager = new MCPManager();
    await expect(manager.listTools("ghost")).rejects.toThrow('MCP server "ghost" is not connected');
    await expect(manager.callTool("ghost", "x", {})).rejects.toThrow('MCP server "ghost" is not connected');
  });

  it("should forget a server after disconnecting it", async () => {
    const { manager } = await connectTestServer();
    await manager.disconnect("test");

    expect(manager.getConnectedServers()).toEqual([]);
    await manager.disconnect("test");
  });

  it("should skip disabled servers and survive failing ones", async () => {
    const manager = new MCPManager();
    await manager.connectAll([
      { name: "off", transport: "stdio", command: "larder-nonexistent-binary", enabled: false },
      { name: "broken", transport: "stdio", command: "larder-nonexistent-binary-xyz", enabled: true },
    ]);

    expect(manager.getConnectedServers()).toEqual([]);
  });
});
