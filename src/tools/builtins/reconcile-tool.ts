/**
 * Local reconcile tool - the pure set difference, no remote call.
 */

import { ReconcileItemsRequest } from "../../capabilities/schemas.ts";
import { reconcileItems } from "../../capabilities/reconcile.ts";
import type { Tool, ToolResult, ToolContext } from "../types.ts";
import { ToolCategory } from "../types.ts";

export const LOCAL_RECONCILE_TOOL = "local__reconcile_items";

// ── local__reconcile_items ──────────────────────

export const reconcile_items: Tool = {
  name: LOCAL_RECONCILE_TOOL,
  description: "Compare required items with available items and list the missing ones",
  category: ToolCategory.LOCAL,
  parameters: ReconcileItemsRequest,
  async execute(params: unknown, _context: ToolContext): Promise<ToolResult> {
    const startedAt = Date.now();
    const { required_items, available_items } = ReconcileItemsRequest.parse(params);

    return {
      success: true,
      result: { missing_items: reconcileItems(required_items, available_items) },
      startedAt,
      completedAt: Date.now(),
      durationMs: Date.now() - startedAt,
    };
  },
};
