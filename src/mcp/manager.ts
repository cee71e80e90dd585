/**
 * MCPManager: MCP server connection lifecycle manager.
 *
 * Owns Client instances for each configured MCP server.
 * Supports stdio (local subprocess), SSE/StreamableHTTP, and any
 * already-built transport (e.g. an in-process linked pair).
 * Does NOT know about the Tool interface: that's the wrapper's job.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { Tool as McpTool } from "@modelcontextprotocol/sdk/types.js";
import { errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import type { MCPServerSettings } from "../infra/config-schema.ts";

const logger = getLogger("mcp.manager");

export type MCPServerConfig = MCPServerSettings;

/** Whatever Client.callTool resolves to. */
export type MCPCallResult = Awaited<ReturnType<Client["callTool"]>>;

const CLIENT_INFO = { name: "larder", version: "0.1.0" };

export class MCPManager {
  private clients = new Map<string, Client>();

  /**
   * Connect to all enabled MCP servers.
   * Graceful degradation: if a server fails, log warning and continue.
   */
  async connectAll(configs: MCPServerConfig[]): Promise<void> {
    const enabled = configs.filter((c) => c.enabled);
    for (const config of enabled) {
      try {
        await this.connect(config);
        logger.info({ server: config.name, transport: config.transport }, "mcp_server_connected");
      } catch (err) {
        logger.warn(
          { server: config.name, error: errorToString(err) },
          "mcp_server_connect_failed",
        );
      }
    }
  }

  /**
   * Connect a server over a transport the caller already built.
   */
  async connectTransport(name: string, transport: Transport): Promise<void> {
    if (this.clients.has(name)) {
      throw new Error(`MCP server "${name}" is already connected`);
    }
    const client = new Client(CLIENT_INFO);
    await client.connect(transport);
    this.clients.set(name, client);
    logger.info({ server: name }, "mcp_server_connected");
  }

  /**
   * Connect to a single MCP server.
   */
  private async connect(config: MCPServerConfig): Promise<void> {
    const client = new Client(CLIENT_INFO);

    let transport: Transport;
    if (config.transport === "stdio") {
      if (!config.command) {
        throw new Error(`MCP server "${config.name}": stdio transport requires 'command'`);
      }
      transport = new StdioClientTransport({
        command: config.command,
        args: config.args,
        env: config.env,
        cwd: config.cwd,
      });
    } else {
      // SSE transport with StreamableHTTP fallback
      if (!config.url) {
        throw new Error(`MCP server "${config.name}": sse transport requires 'url'`);
      }
      try {
        transport = new StreamableHTTPClientTransport(new URL(config.url));
        await client.connect(transport);
        this.clients.set(config.name, client);
        return;
      } catch (err) {
        logger.debug(
          { server: config.name, error: errorToString(err) },
          "streamable_http_failed_falling_back_to_sse",
        );
        transport = new SSEClientTransport(new URL(config.url));
      }
    }

    await client.connect(transport);
    this.clients.set(config.name, client);
  }

  /**
   * Disconnect a single MCP server.
   */
  async disconnect(name: string): Promise<void> {
    const client = this.clients.get(name);
    if (client) {
      try {
        await client.close();
      } catch (err) {
        logger.warn({ server: name, error: errorToString(err) }, "mcp_server_disconnect_error");
      }
      this.clients.delete(name);
    }
  }

  /**
   * Disconnect all MCP servers.
   */
  async disconnectAll(): Promise<void> {
    const names = Array.from(this.clients.keys());
    await Promise.allSettled(names.map((name) => this.disconnect(name)));
  }

  /**
   * List tools from a connected MCP server.
   */
  async listTools(name: string): Promise<McpTool[]> {
    const result = await this.requireClient(name).listTools();
    return result.tools;
  }

  /**
   * Call a tool on a connected MCP server.
   */
  async callTool(
    serverName: string,
    toolName: string,
    args: Record<string, unknown>,
  ): Promise<MCPCallResult> {
    return await this.requireClient(serverName).callTool({ name: toolName, arguments: args });
  }

  getClient(name: string): Client | undefined {
    return this.clients.get(name);
  }

  getConnectedServers(): string[] {
    return Array.from(this.clients.keys());
  }

  private requireClient(name: string): Client {
    const client = this.clients.get(name);
    if (!client) {
      throw new Error(`MCP server "${name}" is not connected`);
    }
    return client;
  }
}
