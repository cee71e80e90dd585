/**
 * Action: one typed instruction produced by the Decision Engine.
 *
 * The kinds form a closed set; parameters are typed per kind.
 */

export const ActionKind = {
  INVALID_INPUT: "invalid_input",
  FETCH_DETAILS: "fetch_details",
  RECONCILE_ITEMS: "reconcile_items",
  PLACE_ORDER: "place_order",
  NOTIFY: "notify",
  PRESENT_RESULT: "present_result",
  /** Driver-only: no decision rule produces it. */
  CHECK_ORDER_STATUS: "check_order_status",
} as const;

export type ActionKind = (typeof ActionKind)[keyof typeof ActionKind];

export type InvalidInputReason = "missing_subject" | "unexpected_state";

export interface ActionParamsMap {
  invalid_input: { reason: InvalidInputReason };
  fetch_details: { subject: string };
  reconcile_items: { requiredItems: string[]; availableItems: string[] };
  place_order: { items: string[] };
  notify: { recipient: string | null; orderId: string; items: string[] };
  present_result: { steps: string[] };
  check_order_status: { orderId: string };
}

export interface ActionOf<K extends ActionKind> {
  readonly kind: K;
  readonly params: Readonly<ActionParamsMap[K]>;
  readonly reasoning: string;
  readonly fallback: string | null;
}

export type Action = { [K in ActionKind]: ActionOf<K> }[ActionKind];

export function createAction<K extends ActionKind>(
  kind: K,
  params: ActionParamsMap[K],
  reasoning: string,
  fallback: string | null = null,
): ActionOf<K> {
  return Object.freeze({
    kind,
    params: Object.freeze({ ...params }),
    reasoning,
    fallback,
  });
}
