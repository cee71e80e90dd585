import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { Agent, correctionUpdate, resolveBindings, type Dispatcher } from "@larder/agent.ts";
import { ReconcileItemsRequest } from "@larder/capabilities/schemas.ts";
import { reconcileItems } from "@larder/capabilities/reconcile.ts";
import { SettingsSchema } from "@larder/infra/config.ts";
import { DEFAULT_CAPABILITY_BINDINGS } from "@larder/infra/config-schema.ts";
import { CapabilityError } from "@larder/infra/errors.ts";
import { ActionKind } from "@larder/task/action.ts";
import { createTaskState } from "@larder/task/state.ts";
import { TaskPhase } from "@larder/task/states.ts";
import { ToolRegistry } from "@larder/tools/registry.ts";
import { ToolCategory, type Tool, type ToolResult } from "@larder/tools/types.ts";

// ── Helpers ────────────────────────────────────────

function fakeTool(name: string, respond: (params: unknown) => unknown): Tool {
  return {
    name,
    description: name,
    category: ToolCategory.MCP,
    parameters: z.record(z.string(), z.unknown()),
    execute: async (params): Promise<ToolResult> => ({
      success: true,
      result: respond(params),
      startedAt: Date.now(),
    }),
  };
}

const recipeTool = fakeTool("recipe__fetch_details", () => ({
  required_items: ["flour", "milk"],
  result_steps: ["Mix", "Fry"],
}));

const reconcileTool = fakeTool("delivery__reconcile_items", (params) => {
  const { required_items, available_items } = ReconcileItemsRequest.parse(params);
  return { missing_items: reconcileItems(required_items, available_items) };
});

const orderTool = fakeTool("delivery__place_order", () => ({
  order_id: "ord-1",
  total: 1.59,
  placed: true,
}));

const statusTool = fakeTool("delivery__check_order_status", () => ({
  status: "processing",
  items: ["milk"],
  total: 1.59,
}));

const mailTool = fakeTool("mail__notify", () => ({ message_id: "m-1" }));

function makeAgent(
  opts: { tools?: Tool[]; reconcileMode?: "local" | "remote"; dispatcher?: Dispatcher } = {},
): Agent {
  const registry = new ToolRegistry();
  registry.registerMany(opts.tools ?? [recipeTool, reconcileTool, orderTool, statusTool, mailTool]);
  const settings = SettingsSchema.parse({
    capabilities: { builtinServices: false, reconcileMode: opts.reconcileMode ?? "remote" },
  });
  return new Agent({ settings, toolRegistry: registry, dispatcher: opts.dispatcher });
}

const pancakes = { subject: "pancakes", availableItems: ["flour"], recipient: "cook@example.com" };

// ── runTask ────────────────────────────────────────

describe("Agent.runTask", () => {
  it("fetches, reconciles, orders, notifies and presents", async () => {
    const result = await makeAgent().runTask(pancakes, { taskId: "t1" });

    expect(result.taskId).toBe("t1");
    expect(result.status).toBe("completed");
    expect(result.iterations).toBe(5);
    expect(result.reports.map((r) => r.action)).toEqual([
      ActionKind.FETCH_DETAILS,
      ActionKind.RECONCILE_ITEMS,
      ActionKind.PLACE_ORDER,
      ActionKind.NOTIFY,
      ActionKind.PRESENT_RESULT,
    ]);
    expect(result.reports.map((r) => r.text)).toEqual([
      "Recipe for pancakes needs 2 ingredient(s):\n- flour\n- milk",
      "Missing ingredients:\n- milk",
      "Order placed successfully!\nOrder ID: ord-1\nTotal: $1.59",
      "Notification sent to cook@example.com\nMessage ID: m-1",
      "1. Mix\n2. Fry",
    ]);
    expect(result.reports.every((r) => r.success)).toBe(true);
    expect(result.finalState).toMatchObject({
      phase: TaskPhase.COMPLETED,
      missingItems: ["milk"],
      orderPlaced: true,
      orderId: "ord-1",
      orderDetails: { items: ["milk"], total: 1.59 },
      notificationSent: true,
    });
  });

  it("skips the order when nothing is missing", async () => {
    const result = await makeAgent().runTask({ ...pancakes, availableItems: ["Flour", "MILK"] });

    expect(result.status).toBe("completed");
    expect(result.reports.map((r) => r.text)).toEqual([
      "Recipe for pancakes needs 2 ingredient(s):\n- flour\n- milk",
      "You have all the required ingredients!",
      "1. Mix\n2. Fry",
    ]);
    expect(result.finalState.orderPlaced).toBe(false);
  });

  it("reconciles in-process in local mode", async () => {
    const agent = makeAgent({
      reconcileMode: "local",
      tools: [recipeTool, orderTool, mailTool],
    });

    const result = await agent.runTask(pancakes);

    expect(result.status).toBe("completed");
    expect(result.reports[1]?.text).toBe("Missing ingredients:\n- milk");
  });

  it("stops at the iteration cap when a capability keeps failing", async () => {
    const broken: Tool = {
      ...recipeTool,
      execute: async () => {
        throw new CapabilityError("fetch_details", "Recipe service is down");
      },
    };
    const agent = makeAgent({ tools: [broken] });

    const result = await agent.runTask(pancakes, { maxIterations: 3 });

    expect(result.status).toBe("incomplete");
    expect(result.iterations).toBe(3);
    expect(result.reports.map((r) => r.text)).toEqual([
      "Recipe service is down",
      "Recipe service is down",
      "Recipe service is down",
    ]);
    expect(result.reports.every((r) => r.errorKind === "ServiceError")).toBe(true);
    expect(result.finalState).toMatchObject({
      phase: TaskPhase.ERROR,
      retryCount: 3,
      lastError: "Recipe service is down",
    });
  });

  it("asks for input while waiting and carries on with the correction", async () => {
    const provideInput = vi.fn(() => ({ subject: "pancakes", availableItems: ["flour", "milk"] }));

    const result = await makeAgent().runTask({ subject: "" }, { provideInput });

    expect(result.status).toBe("completed");
    expect(result.reports.map((r) => r.action)).toEqual([
      ActionKind.INVALID_INPUT,
      ActionKind.FETCH_DETAILS,
      ActionKind.RECONCILE_ITEMS,
      ActionKind.PRESENT_RESULT,
    ]);
    expect(result.reports[0]?.text).toBe("Please tell me which dish you would like to cook.");
    expect(result.reports[0]?.state.phase).toBe(TaskPhase.WAITING);
    expect(provideInput).toHaveBeenCalledTimes(1);
  });

  it("starts an invalid input as an empty task and says why", async () => {
    const reason = "Invalid task input: subject: Expected string, received number";

    const untouched = await makeAgent().runTask({ subject: 42 }, { maxIterations: 0 });
    expect(untouched.iterations).toBe(0);
    expect(untouched.inputError).toBe(reason);
    expect(untouched.finalState.subject).toBe("");
    expect(untouched.finalState.lastError).toBe(reason);

    const result = await makeAgent().runTask({ subject: 42 }, { maxIterations: 1 });
    expect(result.reports[0]?.text).toBe(`Please tell me which dish you would like to cook.\n${reason}`);
    expect(result.finalState).toMatchObject({ phase: TaskPhase.WAITING, lastError: reason });
  });

  it("keeps the dish when only the recipient is invalid", async () => {
    const input = { subject: "pasta carbonara", recipient: "not-an-email" };

    const untouched = await makeAgent().runTask(input, { maxIterations: 0 });
    expect(untouched.inputError).toBe("Invalid task input: recipient: Invalid email");
    expect(untouched.finalState).toMatchObject({
      subject: "pasta carbonara",
      recipient: null,
      lastError: "Invalid task input: recipient: Invalid email",
    });

    const result = await makeAgent().runTask(input, { maxIterations: 4 });
    expect(result.reports.map((r) => r.action)).toEqual([
      ActionKind.FETCH_DETAILS,
      ActionKind.RECONCILE_ITEMS,
      ActionKind.PLACE_ORDER,
      ActionKind.NOTIFY,
    ]);
    expect(result.reports[0]?.text).toBe(
      "Recipe for pasta carbonara needs 2 ingredient(s):\n- flour\n- milk",
    );
    expect(result.reports[3]).toMatchObject({
      success: false,
      errorKind: "ValidationError",
      text: "Invalid request: No recipient email address is set",
    });
  });

  it("keeps going when onIteration throws", async () => {
    const onIteration = vi.fn(() => {
      throw new Error("display broke");
    });

    const result = await makeAgent().runTask(pancakes, { onIteration });

    expect(result.status).toBe("completed");
    expect(onIteration).toHaveBeenCalledTimes(5);
  });

  it("ends incomplete once the signal is aborted", async () => {
    const controller = new AbortController();

    const result = await makeAgent().runTask(pancakes, {
      signal: controller.signal,
      onIteration: () => controller.abort(),
    });

    expect(result.status).toBe("incomplete");
    expect(result.iterations).toBe(1);
  });

  it("records a rejected merge as a validation failure", async () => {
    const dispatcher: Dispatcher = {
      execute: async () => ({ text: "ok", success: true, update: { orderPlaced: true } }),
    };

    const result = await makeAgent({ dispatcher }).runTask(pancakes, { maxIterations: 1 });

    const [report] = result.reports;
    expect(report?.success).toBe(false);
    expect(report?.errorKind).toBe("ValidationError");
    expect(report?.text).toBe(
      "Invalid request: Task state invariant violated: order placed without an order id",
    );
    expect(result.finalState).toMatchObject({
      phase: TaskPhase.ERROR,
      orderPlaced: false,
      lastError: "Task state invariant violated: order placed without an order id",
    });
  });

  it("answers a throwing dispatcher with the action's fallback", async () => {
    const dispatcher: Dispatcher = {
      execute: async () => {
        throw new Error("kaput");
      },
    };

    const result = await makeAgent({ dispatcher }).runTask(pancakes, { maxIterations: 1 });

    expect(result.reports[0]).toMatchObject({
      action: ActionKind.FETCH_DETAILS,
      success: false,
      errorKind: "UnexpectedError",
      text: 'I could not find a recipe for "pancakes". Try another dish.',
    });
    expect(result.finalState.lastError).toBe("kaput");
  });
});

// ── checkOrderStatus ───────────────────────────────

describe("Agent.checkOrderStatus", () => {
  it("reports the status of an order", async () => {
    const result = await makeAgent().checkOrderStatus("ord-1");

    expect(result.success).toBe(true);
    expect(result.text).toBe("Order ord-1: processing\nItems: milk\nTotal: $1.59");
  });

  it("falls back when the delivery capability is missing", async () => {
    const result = await makeAgent({ tools: [] }).checkOrderStatus("ord-1");

    expect(result.success).toBe(false);
    expect(result.errorKind).toBe("ServiceError");
    expect(result.text).toBe('Tool "delivery__check_order_status" not found');
  });
});

// ── start / stop ───────────────────────────────────

describe("Agent lifecycle", () => {
  it("starts and stops without capability servers", async () => {
    const agent = makeAgent();

    await agent.start();
    expect(agent.isStarted).toBe(true);
    expect(agent.services).toBeNull();
    expect(agent.toolRegistry.has("local__reconcile_items")).toBe(true);

    await agent.stop();
    expect(agent.isStarted).toBe(false);
  });

  it("tallies every capability call in the tool registry", async () => {
    const agent = makeAgent();

    await agent.runTask(pancakes);

    const { calls } = agent.toolRegistry.getStats();
    expect(Object.keys(calls).sort()).toEqual([
      "delivery__place_order",
      "delivery__reconcile_items",
      "mail__notify",
      "recipe__fetch_details",
    ]);
    expect(calls["recipe__fetch_details"]).toMatchObject({ count: 1, failures: 0 });
  });
});

// ── Helpers ────────────────────────────────────────

describe("resolveBindings", () => {
  it("uses the configured bindings in remote mode", () => {
    const settings = SettingsSchema.parse({});
    expect(resolveBindings(settings)).toEqual(DEFAULT_CAPABILITY_BINDINGS);
  });

  it("binds reconciliation to the local tool in local mode", () => {
    const settings = SettingsSchema.parse({ capabilities: { reconcileMode: "local" } });
    expect(resolveBindings(settings)).toEqual({
      ...DEFAULT_CAPABILITY_BINDINGS,
      reconcile_items: "local__reconcile_items",
    });
  });
});

describe("correctionUpdate", () => {
  const fetched = createTaskState({
    subject: "pancakes",
    requiredItems: ["flour"],
    resultSteps: ["Mix"],
    missingItems: ["flour"],
  });

  it("discards fetched details for a new subject", () => {
    expect(correctionUpdate(fetched, { subject: "  tomato soup " })).toEqual({
      subject: "tomato soup",
      requiredItems: [],
      resultSteps: [],
      missingItems: null,
    });
  });

  it("ignores the same subject", () => {
    expect(correctionUpdate(fetched, { subject: "pancakes" })).toEqual({});
  });

  it("forces a new reconciliation for new pantry items", () => {
    expect(correctionUpdate(fetched, { availableItems: ["flour"] })).toEqual({
      availableItems: ["flour"],
      missingItems: null,
    });
  });

  it("trims the recipient and clears a blank one", () => {
    expect(correctionUpdate(fetched, { recipient: " cook@example.com " })).toEqual({
      recipient: "cook@example.com",
    });
    expect(correctionUpdate(fetched, { recipient: "   " })).toEqual({ recipient: null });
  });

  it("only takes the recipient once an order exists", () => {
    const ordered = createTaskState({ subject: "pancakes", orderPlaced: true, orderId: "ord-1" });
    expect(
      correctionUpdate(ordered, {
        subject: "tomato soup",
        availableItems: ["milk"],
        recipient: "cook@example.com",
      }),
    ).toEqual({ recipient: "cook@example.com" });
  });
});
