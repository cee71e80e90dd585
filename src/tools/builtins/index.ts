/**
 * Built-in tools - in-process tools registered next to the MCP ones.
 */

import type { Tool } from "../types.ts";
import { reconcile_items, LOCAL_RECONCILE_TOOL } from "./reconcile-tool.ts";

export { reconcile_items, LOCAL_RECONCILE_TOOL };

export const builtinTools: Tool[] = [reconcile_items];
