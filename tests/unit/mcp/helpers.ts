/**
 * Shared fixtures: a small CapabilityServer linked to an MCPManager in-process.
 */
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { MCPManager } from "../../../src/mcp/manager.ts";
import { CapabilityServer, ServiceFailure, type ServiceTool } from "../../../src/services/server.ts";

export const echoTool: ServiceTool = {
  name: "echo",
  description: "Echo the arguments back",
  inputSchema: {
    type: "object",
    properties: { value: { type: "string" } },
    required: ["value"],
  },
  handler: async (args) => ({ echoed: args["value"] }),
};

export const failingTool: ServiceTool = {
  name: "fail",
  description: "Always refuses",
  inputSchema: { type: "object", properties: {}, required: [] },
  handler: async () => {
    throw new ServiceFailure("Refused", "Not today");
  },
};

export async function connectTestServer(
  name = "test",
  tools: ServiceTool[] = [echoTool, failingTool],
  manager = new MCPManager(),
): Promise<{ manager: MCPManager; server: CapabilityServer }> {
  const server = new CapabilityServer(name, tools);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await manager.connectTransport(name, clientTransport);
  return { manager, server };
}
