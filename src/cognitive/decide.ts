/**
 * Decision Engine: pick the single next action from a Task State.
 *
 * Pure: no I/O, no clock, no randomness. The rule table is ordered and the
 * first matching guard wins. Guards test postconditions of the previous
 * pipeline stage, so progress is read off the data alone.
 */
import { getLogger } from "../infra/logger.ts";
import { ActionKind, createAction, type Action } from "../task/action.ts";
import type { TaskState } from "../task/state.ts";

const logger = getLogger("cognitive.decide");

export interface DecisionRule {
  readonly name: string;
  readonly matches: (state: Readonly<TaskState>) => boolean;
  readonly build: (state: Readonly<TaskState>) => Action;
}

// ── Guards ──────────────────────────────────────────

const hasSubject = (s: Readonly<TaskState>): boolean => s.subject.trim().length > 0;

/** Details fetched: both the requirements and the steps are known. */
const hasDetails = (s: Readonly<TaskState>): boolean =>
  s.requiredItems.length > 0 && s.resultSteps.length > 0;

const reconciled = (s: Readonly<TaskState>): boolean => s.missingItems !== null;

const missingCount = (s: Readonly<TaskState>): number => s.missingItems?.length ?? 0;

const pastFetch = (s: Readonly<TaskState>): boolean =>
  hasSubject(s) && hasDetails(s) && reconciled(s);

// ── Rule table ──────────────────────────────────────

const STAGE_RULES: readonly DecisionRule[] = [
  {
    name: "missing_subject",
    matches: (s) => !hasSubject(s),
    build: () =>
      createAction(
        ActionKind.INVALID_INPUT,
        { reason: "missing_subject" },
        "No dish was named, so there is nothing to look up.",
        "Please tell me which dish you would like to cook.",
      ),
  },
  {
    name: "fetch_details",
    matches: (s) => hasSubject(s) && !hasDetails(s),
    build: (s) =>
      createAction(
        ActionKind.FETCH_DETAILS,
        { subject: s.subject },
        `The ingredients and steps for "${s.subject}" are not known yet.`,
        `I could not find a recipe for "${s.subject}". Try another dish.`,
      ),
  },
  {
    name: "reconcile_items",
    matches: (s) => hasSubject(s) && hasDetails(s) && !reconciled(s),
    build: (s) =>
      createAction(
        ActionKind.RECONCILE_ITEMS,
        { requiredItems: [...s.requiredItems], availableItems: [...s.availableItems] },
        "The recipe is known but has not been compared with the pantry.",
        "I could not compare the recipe with your pantry. Please try again.",
      ),
  },
  {
    name: "place_order",
    matches: (s) => pastFetch(s) && missingCount(s) > 0 && !s.orderPlaced,
    build: (s) =>
      createAction(
        ActionKind.PLACE_ORDER,
        { items: [...(s.missingItems ?? [])] },
        `${missingCount(s)} ingredient(s) are missing and no order has been placed.`,
        "I could not order the missing ingredients. Please try again.",
      ),
  },
  {
    name: "notify",
    matches: (s) => pastFetch(s) && s.orderPlaced && !s.notificationSent && s.orderId !== null,
    build: (s) =>
      createAction(
        ActionKind.NOTIFY,
        {
          recipient: s.recipient,
          orderId: s.orderId ?? "",
          items: [...(s.missingItems ?? [])],
        },
        "The order is placed but the user has not been told about it.",
        "Your order was placed, but I could not send the confirmation email.",
      ),
  },
  {
    name: "present_result",
    matches: (s) =>
      pastFetch(s) && (s.orderPlaced ? s.notificationSent : missingCount(s) === 0),
    build: (s) =>
      createAction(
        ActionKind.PRESENT_RESULT,
        { steps: [...s.resultSteps] },
        s.orderPlaced
          ? "Missing ingredients were ordered and the user was notified."
          : "Every required ingredient is already in the pantry.",
        "I could not present the recipe steps. Please try again.",
      ),
  },
];

/** Catch-all: no stage rule matched. Never reached for a well-formed state. */
const UNEXPECTED_STATE_RULE: DecisionRule = {
  name: "unexpected_state",
  matches: (s) => STAGE_RULES.every((rule) => !rule.matches(s)),
  build: () =>
    createAction(
      ActionKind.INVALID_INPUT,
      { reason: "unexpected_state" },
      "unexpected state",
      "Something went wrong with this task. Please start again with a dish name.",
    ),
};

export const DECISION_RULES: readonly DecisionRule[] = [...STAGE_RULES, UNEXPECTED_STATE_RULE];

/** Rules whose guard holds for the state, in table order. */
export function matchingRules(state: Readonly<TaskState>): DecisionRule[] {
  return DECISION_RULES.filter((rule) => rule.matches(state));
}

/**
 * Decide the next action. Same input always yields the same output.
 */
export function nextAction(state: Readonly<TaskState>): Action {
  for (const rule of DECISION_RULES) {
    if (rule.matches(state)) {
      const action = rule.build(state);
      logger.debug({ taskId: state.taskId, rule: rule.name, action: action.kind }, "next_action_decided");
      return action;
    }
  }
  return UNEXPECTED_STATE_RULE.build(state);
}
