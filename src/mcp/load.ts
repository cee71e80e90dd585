/**
 * Register every connected server's tools into a ToolRegistry.
 */
import { errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import type { ToolRegistry } from "../tools/registry.ts";
import type { MCPManager } from "./manager.ts";
import { wrapMCPTools } from "./wrap.ts";

const logger = getLogger("mcp.load");

/**
 * Returns the number of tools registered. A server whose tools cannot be
 * listed is skipped with a warning.
 */
export async function loadMCPTools(
  manager: MCPManager,
  registry: ToolRegistry,
  serverNames: string[] = manager.getConnectedServers(),
): Promise<number> {
  let count = 0;
  for (const name of serverNames) {
    try {
      const mcpTools = await manager.listTools(name);
      const wrapped = wrapMCPTools(name, mcpTools, manager);
      for (const tool of wrapped) {
        registry.register(tool);
      }
      count += wrapped.length;
      logger.info({ server: name, tools: mcpTools.length }, "mcp_tools_registered");
    } catch (err) {
      logger.warn({ server: name, error: errorToString(err) }, "mcp_tools_register_failed");
    }
  }
  return count;
}
