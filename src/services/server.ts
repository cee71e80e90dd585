/**
 * CapabilityServer: a simulated backing service exposed over MCP.
 *
 * Built on the SDK's low-level Server: tools/list advertises each tool's JSON
 * Schema, tools/call validates the arguments with the capability's request
 * schema and answers with the payload serialized as text. Failures are
 * answered, never thrown: `{ error_kind, message, details }` with isError.
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { ZodError, type z } from "zod";
import type { CapabilitySpec } from "../capabilities/schemas.ts";
import { errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";

const logger = getLogger("services.server");

/** A service refusing a request, with a machine-readable code. */
export class ServiceFailure extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "ServiceFailure";
  }
}

export interface ServiceTool {
  name: string;
  description: string;
  inputSchema: CapabilitySpec<z.ZodTypeAny, z.ZodTypeAny>["inputSchema"];
  handler: (args: Record<string, unknown>) => Promise<unknown>;
}

/**
 * Bind a handler to a capability: arguments are parsed with its request
 * schema, and the handler must return its payload's shape.
 */
export function capabilityTool<Req extends z.ZodTypeAny, Pay extends z.ZodTypeAny>(
  name: string,
  spec: CapabilitySpec<Req, Pay>,
  handler: (request: z.output<Req>) => z.input<Pay> | Promise<z.input<Pay>>,
): ServiceTool {
  return {
    name,
    description: spec.description,
    inputSchema: spec.inputSchema,
    handler: async (args) => handler(spec.request.parse(args)),
  };
}

export interface CapabilityServerOptions {
  version?: string;
  /** Wrap every answer in one more serialized content layer. */
  nested?: boolean;
}

interface TextResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export class CapabilityServer {
  readonly server: Server;
  private tools = new Map<string, ServiceTool>();

  constructor(
    readonly name: string,
    tools: ServiceTool[],
    private options: CapabilityServerOptions = {},
  ) {
    for (const tool of tools) {
      this.tools.set(tool.name, tool);
    }
    this.server = new Server(
      { name, version: options.version ?? "0.1.0" },
      { capabilities: { tools: {} } },
    );
    this.setupHandlers();
  }

  get toolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
    logger.info({ service: this.name, tools: this.tools.size }, "service_connected");
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  /** Run one tool call outside the protocol (used by the request handler). */
  async call(toolName: string, args: Record<string, unknown>): Promise<TextResult> {
    const tool = this.tools.get(toolName);
    if (!tool) {
      return this.errorResult("UnknownTool", `Unknown tool: ${toolName}`, {
        available: this.toolNames,
      });
    }

    try {
      const payload = await tool.handler(args);
      logger.debug({ service: this.name, tool: toolName }, "service_call_done");
      return this.textResult(payload, false);
    } catch (err) {
      if (err instanceof ServiceFailure) {
        return this.errorResult(err.code, err.message, err.details);
      }
      if (err instanceof ZodError) {
        const issues = err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
        return this.errorResult("InvalidRequest", `Invalid arguments for ${toolName}`, { issues });
      }
      logger.error({ service: this.name, tool: toolName, error: errorToString(err) }, "service_call_error");
      return this.errorResult("InternalError", `Failed to run ${toolName}: ${errorToString(err)}`);
    }
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: Array.from(this.tools.values()).map((t) => ({
        name: t.name,
        description: t.description,
        inputSchema: t.inputSchema,
      })),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.call(request.params.name, request.params.arguments ?? {}),
    );
  }

  private errorResult(code: string, message: string, details: Record<string, unknown> = {}): TextResult {
    logger.warn({ service: this.name, code, error: message }, "service_call_failed");
    return this.textResult({ error_kind: code, message, details }, true);
  }

  private textResult(data: unknown, isError: boolean): TextResult {
    let text = JSON.stringify(data);
    if (this.options.nested) {
      text = JSON.stringify({ content: [{ type: "text", text }] });
    }
    return { content: [{ type: "text", text }], isError };
  }
}
