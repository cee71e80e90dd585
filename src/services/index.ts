/**
 * Simulated backing services, attachable in-process or runnable over stdio.
 */
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { MCPManager } from "../mcp/manager.ts";
import { createDeliveryServer, type DeliveryOptions } from "./delivery-server.ts";
import { createMailServer } from "./mail-server.ts";
import { createRecipeServer } from "./recipe-server.ts";
import type { CapabilityServer } from "./server.ts";

export { CapabilityServer, ServiceFailure, capabilityTool } from "./server.ts";
export type { ServiceTool, CapabilityServerOptions } from "./server.ts";
export { createRecipeServer, RECIPE_SERVICE } from "./recipe-server.ts";
export { createDeliveryServer, orderStatus, priceItems, DELIVERY_SERVICE } from "./delivery-server.ts";
export type { Order, DeliveryOptions } from "./delivery-server.ts";
export { createMailServer, MAIL_SERVICE } from "./mail-server.ts";
export type { SentMessage } from "./mail-server.ts";

export interface BuiltinServices {
  recipe: CapabilityServer;
  delivery: ReturnType<typeof createDeliveryServer>;
  mail: ReturnType<typeof createMailServer>;
}

export function createBuiltinServices(options: { delivery?: DeliveryOptions } = {}): BuiltinServices {
  return {
    recipe: createRecipeServer(),
    delivery: createDeliveryServer(options.delivery),
    mail: createMailServer(),
  };
}

/**
 * Link a service to the manager through an in-memory transport pair.
 */
export async function attachInProcess(manager: MCPManager, service: CapabilityServer): Promise<void> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await service.connect(serverTransport);
  await manager.connectTransport(service.name, clientTransport);
}

export async function attachBuiltinServices(
  manager: MCPManager,
  services: BuiltinServices = createBuiltinServices(),
): Promise<BuiltinServices> {
  await attachInProcess(manager, services.recipe);
  await attachInProcess(manager, services.delivery.server);
  await attachInProcess(manager, services.mail.server);
  return services;
}
