import cors from "cors";
import express, { Express } from "express";
import helmet from "helmet";
import { Logger } from "@loanrent/shared-utils";
import { CsvScheduleExporter } from "../adapters/export.csv";
import { apiCfg } from "../config/env";
import { ScheduleExportPort } from "../core/ports";
import { AmortizationMiddleware } from "./middleware";
import { AmortizationRoutes } from "./routes";

export interface AppOptions {
  logger: Logger;
  exporter?: ScheduleExportPort;
  corsOrigins?: string[];
}

/**
 * Build the express application without binding a port
 */
export function createApp(options: AppOptions): Express {
  const { logger } = options;
  const origins = options.corsOrigins ?? apiCfg.corsOrigins;
  const middleware = new AmortizationMiddleware(logger);
  const routes = new AmortizationRoutes(
    middleware,
    options.exporter ?? new CsvScheduleExporter(),
    logger
  );

  const app = express();
  app.use(helmet());
  app.use(cors({ origin: origins.includes("*") ? "*" : origins }));
  app.use(express.json({ limit: "64kb" }));
  app.use(middleware.requestLogger());

  app.use(routes.getRouter());

  app.use(middleware.notFoundHandler());
  app.use(middleware.errorHandler());

  return app;
}
