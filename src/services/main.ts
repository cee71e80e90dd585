#!/usr/bin/env tsx
/**
 * Run one simulated service over stdio:  tsx src/services/main.ts <recipe|delivery|mail>
 */
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import { createDeliveryServer } from "./delivery-server.ts";
import { createMailServer } from "./mail-server.ts";
import { createRecipeServer } from "./recipe-server.ts";
import type { CapabilityServer } from "./server.ts";

const logger = getLogger("services.main");

const FACTORIES: Record<string, () => CapabilityServer> = {
  recipe: () => createRecipeServer(),
  delivery: () => createDeliveryServer().server,
  mail: () => createMailServer().server,
};

async function main(): Promise<void> {
  const name = process.argv[2] ?? "";
  const factory = FACTORIES[name];
  if (!factory) {
    process.stderr.write(`usage: main.ts <${Object.keys(FACTORIES).join("|")}>\n`);
    process.exit(2);
  }

  const service = factory();
  await service.connect(new StdioServerTransport());
  logger.info({ service: name }, "service_listening_stdio");
}

main().catch((err: unknown) => {
  logger.fatal({ error: errorToString(err) }, "service_startup_failed");
  process.stderr.write(`service startup failed: ${errorToString(err)}\n`);
  process.exit(1);
});
