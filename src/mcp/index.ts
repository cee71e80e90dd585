/**
 * MCP (Model Context Protocol) integration: public API.
 */

export { MCPManager } from "./manager.ts";
export type { MCPServerConfig, MCPCallResult } from "./manager.ts";
export { wrapMCPTools, extractContent, isErrorResult } from "./wrap.ts";
export { loadMCPTools } from "./load.ts";
