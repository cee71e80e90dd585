/**
 * Capability catalog: request and payload shapes on the wire (snake_case).
 *
 * Requests are validated before a call goes out; payloads are what the
 * envelope decoder validates a response against.
 */
import { z } from "zod";
import type { CapabilityName } from "../infra/config-schema.ts";

const itemList = z.array(z.string().trim().min(1));

// ── fetch_details ───────────────────────────────────

export const FetchDetailsRequest = z.object({
  subject: z.string().trim().min(1),
});

export const FetchDetailsPayload = z.object({
  required_items: itemList.min(1),
  result_steps: z.array(z.string()).min(1),
});

// ── reconcile_items ─────────────────────────────────

export const ReconcileItemsRequest = z.object({
  required_items: itemList,
  available_items: itemList,
});

export const ReconcileItemsPayload = z.object({
  missing_items: z.array(z.string()),
});

// ── place_order ─────────────────────────────────────

export const PlaceOrderRequest = z.object({
  items: itemList.min(1),
});

export const PlaceOrderPayload = z.object({
  order_id: z.string().min(1),
  total: z.number().nonnegative(),
  placed: z.boolean(),
});

// ── check_order_status ──────────────────────────────

export const CheckOrderStatusRequest = z.object({
  order_id: z.string().min(1),
});

export const CheckOrderStatusPayload = z.object({
  status: z.string().min(1),
  items: z.array(z.string()),
  total: z.number().nonnegative(),
});

// ── notify ──────────────────────────────────────────

export const NotifyRequest = z.object({
  recipient: z.string().trim().email(),
  subject_line: z.string().min(1),
  body: z.string().min(1),
});

export const NotifyPayload = z.object({
  message_id: z.string().min(1),
});

// ── Catalog ─────────────────────────────────────────

export interface CapabilitySpec<Req extends z.ZodTypeAny, Pay extends z.ZodTypeAny> {
  description: string;
  request: Req;
  payload: Pay;
  /** JSON Schema advertised in tools/list. */
  inputSchema: { type: "object"; properties: Record<string, object>; required: string[] };
}

const stringArray = { type: "array", items: { type: "string" } };

export const CAPABILITIES = {
  fetch_details: {
    description: "Look up the required items and the steps for a subject (a dish name).",
    request: FetchDetailsRequest,
    payload: FetchDetailsPayload,
    inputSchema: {
      type: "object",
      properties: { subject: { type: "string", description: "Dish name" } },
      required: ["subject"],
    },
  },
  reconcile_items: {
    description: "Return the required items that are not among the available ones.",
    request: ReconcileItemsRequest,
    payload: ReconcileItemsPayload,
    inputSchema: {
      type: "object",
      properties: { required_items: stringArray, available_items: stringArray },
      required: ["required_items", "available_items"],
    },
  },
  place_order: {
    description: "Order the given items for delivery.",
    request: PlaceOrderRequest,
    payload: PlaceOrderPayload,
    inputSchema: {
      type: "object",
      properties: { items: stringArray },
      required: ["items"],
    },
  },
  check_order_status: {
    description: "Report the delivery status of a placed order.",
    request: CheckOrderStatusRequest,
    payload: CheckOrderStatusPayload,
    inputSchema: {
      type: "object",
      properties: { order_id: { type: "string" } },
      required: ["order_id"],
    },
  },
  notify: {
    description: "Send a message to a recipient by email.",
    request: NotifyRequest,
    payload: NotifyPayload,
    inputSchema: {
      type: "object",
      properties: {
        recipient: { type: "string", description: "Email address" },
        subject_line: { type: "string" },
        body: { type: "string" },
      },
      required: ["recipient", "subject_line", "body"],
    },
  },
} satisfies { [N in CapabilityName]: CapabilitySpec<z.ZodTypeAny, z.ZodTypeAny> };

export type Capabilities = typeof CAPABILITIES;
export type CapabilityRequest<N extends CapabilityName> = z.infer<Capabilities[N]["request"]>;
export type CapabilityPayload<N extends CapabilityName> = z.infer<Capabilities[N]["payload"]>;
