import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { DECISION_RULES, matchingRules, nextAction } from "@larder/cognitive/decide.ts";
import { ActionKind } from "@larder/task/action.ts";
import { checkInvariants, createTaskState, type TaskState } from "@larder/task/state.ts";
import { TaskStateStore } from "@larder/task/store.ts";
import { TaskPhase } from "@larder/task/states.ts";

// ── Arbitraries ────────────────────────────────────

const itemArb = fc.constantFrom("eggs", "flour", "milk", "salt", "rice", "onion");

/** Random states that satisfy every invariant and are not yet completed. */
const wellFormedState: fc.Arbitrary<TaskState> = fc
  .record({
    subject: fc.constantFrom("", "   ", "pancakes", "chicken curry"),
    required: fc.uniqueArray(itemArb, { maxLength: 5 }),
    steps: fc.array(fc.constantFrom("Mix", "Bake", "Serve"), { maxLength: 3 }),
    available: fc.uniqueArray(itemArb, { maxLength: 4 }),
    reconciled: fc.boolean(),
    placed: fc.boolean(),
    sent: fc.boolean(),
    recipient: fc.constantFrom(null, "cook@example.com"),
    phase: fc.constantFrom(TaskPhase.INITIAL, TaskPhase.IN_PROGRESS, TaskPhase.WAITING, TaskPhase.ERROR),
  })
  .chain((base) =>
    fc.subarray(base.required).map((missing) =>
      createTaskState({
        subject: base.subject,
        requiredItems: base.required,
        resultSteps: base.steps,
        availableItems: base.available,
        missingItems: base.reconciled ? missing : null,
        orderPlaced: base.placed,
        orderId: base.placed ? "ord-1" : null,
        notificationSent: base.placed && base.sent,
        recipient: base.recipient,
        phase: base.phase,
      }),
    ),
  );

function stateWith(overrides: Partial<TaskState>): TaskState {
  return createTaskState({ taskId: "t1", ...overrides });
}

// ── Rule table ────────────────────────────────────

describe("rule table", () => {
  it("ends with the unexpected-state catch-all", () => {
    expect(DECISION_RULES.map((r) => r.name)).toEqual([
      "missing_subject",
      "fetch_details",
      "reconcile_items",
      "place_order",
      "notify",
      "present_result",
      "unexpected_state",
    ]);
  });

  it("matches exactly one stage rule for every well-formed state", () => {
    fc.assert(
      fc.property(wellFormedState, (state) => {
        expect(checkInvariants(state)).toEqual([]);
        const matched = matchingRules(state);
        expect(matched).toHaveLength(1);
        expect(matched[0]?.name).not.toBe("unexpected_state");
      }),
    );
  });

  it("is deterministic", () => {
    fc.assert(
      fc.property(wellFormedState, (state) => {
        expect(nextAction(state)).toEqual(nextAction(state));
      }),
    );
  });
});

// ── nextAction ────────────────────────────────────

describe("nextAction", () => {
  it("asks for a subject when it is empty, whatever else is set", () => {
    fc.assert(
      fc.property(wellFormedState, (state) => {
        const action = nextAction({ ...state, subject: "" });
        expect(action.kind).toBe(ActionKind.INVALID_INPUT);
        expect(action.params).toEqual({ reason: "missing_subject" });
        expect(action.fallback).toBe("Please tell me which dish you would like to cook.");
      }),
    );
  });

  it("fetches details while the steps are unknown", () => {
    const action = nextAction(stateWith({ subject: "pancakes", requiredItems: ["a", "b"], resultSteps: [] }));
    expect(action.kind).toBe(ActionKind.FETCH_DETAILS);
    expect(action.params).toEqual({ subject: "pancakes" });
    expect(action.fallback).toBe('I could not find a recipe for "pancakes". Try another dish.');
  });

  it("reconciles once details are known", () => {
    const action = nextAction(
      stateWith({
        subject: "pancakes",
        requiredItems: ["flour", "milk"],
        resultSteps: ["Mix"],
        availableItems: ["milk"],
      }),
    );
    expect(action.kind).toBe(ActionKind.RECONCILE_ITEMS);
    expect(action.params).toEqual({ requiredItems: ["flour", "milk"], availableItems: ["milk"] });
  });

  it("orders the missing items", () => {
    const action = nextAction(
      stateWith({
        subject: "pancakes",
        requiredItems: ["a", "b"],
        resultSteps: ["step1"],
        missingItems: ["b"],
        orderPlaced: false,
      }),
    );
    expect(action.kind).toBe(ActionKind.PLACE_ORDER);
    expect(action.params).toEqual({ items: ["b"] });
  });

  it("notifies after the order is placed", () => {
    const action = nextAction(
      stateWith({
        subject: "pancakes",
        requiredItems: ["a", "b"],
        resultSteps: ["step1"],
        missingItems: ["b"],
        orderPlaced: true,
        orderId: "X",
        notificationSent: false,
        recipient: "cook@example.com",
      }),
    );
    expect(action.kind).toBe(ActionKind.NOTIFY);
    expect(action.params).toEqual({ recipient: "cook@example.com", orderId: "X", items: ["b"] });
  });

  it("presents the result when nothing is missing, and the next merge completes the task", () => {
    const state = stateWith({
      subject: "pancakes",
      requiredItems: ["a"],
      resultSteps: ["step1"],
      missingItems: [],
      phase: TaskPhase.IN_PROGRESS,
    });
    const action = nextAction(state);
    expect(action.kind).toBe(ActionKind.PRESENT_RESULT);
    expect(action.params).toEqual({ steps: ["step1"] });

    const store = new TaskStateStore(state);
    store.update({ phase: TaskPhase.COMPLETED });
    expect(store.isTerminal).toBe(true);
  });

  it("presents the result after ordering and notifying", () => {
    const action = nextAction(
      stateWith({
        subject: "pancakes",
        requiredItems: ["a", "b"],
        resultSteps: ["step1", "step2"],
        missingItems: ["b"],
        orderPlaced: true,
        orderId: "X",
        notificationSent: true,
      }),
    );
    expect(action.kind).toBe(ActionKind.PRESENT_RESULT);
    expect(action.reasoning).toBe("Missing ingredients were ordered and the user was notified.");
  });

  it("falls back to an unexpected-state action when no stage rule applies", () => {
    // Placed but without an id: not well-formed, so no stage guard holds.
    const state: TaskState = {
      ...stateWith({ subject: "pancakes", requiredItems: ["a"], resultSteps: ["s"], missingItems: ["a"] }),
      orderPlaced: true,
    };
    const action = nextAction(state);
    expect(action.kind).toBe(ActionKind.INVALID_INPUT);
    expect(action.params).toEqual({ reason: "unexpected_state" });
    expect(action.reasoning).toBe("unexpected state");
    expect(action.fallback).toBe(
      "Something went wrong with this task. Please start again with a dish name.",
    );
  });

  it("returns frozen actions", () => {
    const action = nextAction(stateWith({}));
    expect(Object.isFrozen(action)).toBe(true);
    expect(Object.isFrozen(action.params)).toBe(true);
  });
});
