export {
  CAPABILITIES,
  FetchDetailsRequest,
  FetchDetailsPayload,
  ReconcileItemsRequest,
  ReconcileItemsPayload,
  PlaceOrderRequest,
  PlaceOrderPayload,
  CheckOrderStatusRequest,
  CheckOrderStatusPayload,
  NotifyRequest,
  NotifyPayload,
} from "./schemas.ts";
export type { Capabilities, CapabilitySpec, CapabilityRequest, CapabilityPayload } from "./schemas.ts";
export { reconcileItems } from "./reconcile.ts";
export { CAPABILITY_NAMES, DEFAULT_CAPABILITY_BINDINGS } from "../infra/config-schema.ts";
export type { CapabilityName } from "../infra/config-schema.ts";
