#!/usr/bin/env node

import { UntisBridgeServer } from "./server.js";
import { logger } from "./logger.js";

async function main() {
  const server = new UntisBridgeServer();
  await server.start();
}

main().catch((error) => {
  logger.error("[ERROR] Fatal error:", error);
  process.exit(1);
});
