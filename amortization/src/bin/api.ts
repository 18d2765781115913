#!/usr/bin/env node

/**
 * Amortization HTTP Server
 */

import { ConsoleLogger } from "@loanrent/shared-utils";
import { apiCfg } from "../config/env";
import { createApp } from "../http/app";

async function startServer(): Promise<void> {
  const logger = new ConsoleLogger("amortization-api", apiCfg.logLevel);

  logger.info("🚀 Starting Amortization API Server...");

  const app = createApp({ logger });
  const server = app.listen(apiCfg.port, () => {
    logger.info(`✅ Amortization API listening on port ${apiCfg.port}`);
    logger.info(`🔗 Health check: http://localhost:${apiCfg.port}/health`);
    logger.info(`🔗 Schedule: POST http://localhost:${apiCfg.port}/schedule`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`🛑 Received ${signal}, shutting down gracefully...`);
    server.close((error) => {
      if (error) {
        logger.error("Error during shutdown:", error);
        process.exit(1);
      }
      logger.info("✅ Server shut down successfully");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

if (require.main === module) {
  startServer().catch((error) => {
    console.error("💥 API server crashed:", error);
    process.exit(1);
  });
}
