/**
 * Delivery service: reconciles items, takes orders and reports their status.
 */
import { CAPABILITIES } from "../capabilities/schemas.ts";
import { reconcileItems } from "../capabilities/reconcile.ts";
import { shortId } from "../infra/id.ts";
import { normalizeItems } from "../task/state.ts";
import { CapabilityServer, ServiceFailure, capabilityTool } from "./server.ts";
import { loadPriceList, type PriceList } from "./data.ts";

export const DELIVERY_SERVICE = "delivery";

/** Order age (ms) below which it is still processing / out for delivery. */
export const PROCESSING_MS = 60_000;
export const OUT_FOR_DELIVERY_MS = 120_000;

export interface Order {
  orderId: string;
  items: string[];
  total: number;
  placedAt: number;
}

export interface DeliveryOptions {
  prices?: PriceList;
  clock?: () => number;
  newOrderId?: () => string;
}

export function orderStatus(ageMs: number): string {
  if (ageMs < PROCESSING_MS) return "processing";
  if (ageMs < OUT_FOR_DELIVERY_MS) return "out for delivery";
  return "delivered";
}

/** Sum of prices in cents-exact dollars; unknown items cost nothing. */
export function priceItems(items: readonly string[], prices: PriceList): number {
  const cents = items.reduce((sum, item) => {
    const price = Object.hasOwn(prices, item) ? (prices[item] ?? 0) : 0;
    return sum + Math.round(price * 100);
  }, 0);
  return cents / 100;
}

export function createDeliveryServer(options: DeliveryOptions = {}): {
  server: CapabilityServer;
  orders: ReadonlyMap<string, Order>;
} {
  const prices = options.prices ?? loadPriceList();
  const clock = options.clock ?? Date.now;
  const newOrderId = options.newOrderId ?? (() => `ord-${shortId()}`);
  const orders = new Map<string, Order>();

  const reconcile = capabilityTool(
    "reconcile_items",
    CAPABILITIES.reconcile_items,
    ({ required_items, available_items }) => ({
      missing_items: reconcileItems(required_items, available_items),
    }),
  );

  const placeOrder = capabilityTool("place_order", CAPABILITIES.place_order, ({ items }) => {
    const normalized = normalizeItems(items);
    const order: Order = {
      orderId: newOrderId(),
      items: normalized,
      total: priceItems(normalized, prices),
      placedAt: clock(),
    };
    orders.set(order.orderId, order);
    return { order_id: order.orderId, total: order.total, placed: true };
  });

  const checkStatus = capabilityTool(
    "check_order_status",
    CAPABILITIES.check_order_status,
    ({ order_id }) => {
      const order = orders.get(order_id);
      if (!order) {
        throw new ServiceFailure("OrderNotFound", `Order ${order_id} not found`, { order_id });
      }
      return {
        status: orderStatus(clock() - order.placedAt),
        items: order.items,
        total: order.total,
      };
    },
  );

  return {
    server: new CapabilityServer(DELIVERY_SERVICE, [reconcile, placeOrder, checkStatus]),
    orders,
  };
}
