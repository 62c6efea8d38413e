#!/usr/bin/env tsx

/**
 * Stdio entry point for the TaskBridge MCP server
 */

import { errorFields, logger } from "@taskbridge/sdk";
import { redirectConsoleToStderr, startServer } from "./server.js";

async function main(): Promise<void> {
  redirectConsoleToStderr();

  const running = await startServer();
  if (running === null) {
    process.exit(0);
  }

  const shutdown = (): void => {
    running.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("server.shutdown.error", errorFields(error));
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    ...errorFields(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
