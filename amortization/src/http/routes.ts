/**
 * Amortization HTTP Routes
 *
 * Routes are thin: they validate, hand the scenario to the calculator
 * and wrap the result in the response envelope.
 */

import { Logger } from "@loanrent/shared-utils";
import { NextFunction, Request, Response, Router } from "express";
import { inputDefaults } from "../config/env";
import { APIResponse } from "../core/dto";
import { computeEMI, generateSchedule } from "../core/finance";
import { ScheduleExportPort } from "../core/ports";
import { analyzeScenario, buildScenario, ScenarioInput } from "../core/scenario";
import { isCashflowPositive, rowsForYear, yearAverages } from "../core/summary";
import { AmortizationMiddleware, EMIInput, ScenarioYearInput, schemas } from "./middleware";

export class AmortizationRoutes {
  private router: Router;

  constructor(
    private middleware: AmortizationMiddleware,
    private exporter: ScheduleExportPort,
    private logger: Logger
  ) {
    this.router = Router();
    this.setupRoutes();
  }

  getRouter(): Router {
    return this.router;
  }

  private setupRoutes(): void {
    this.router.get("/health", this.handleHealthCheck.bind(this));

    this.router.get("/defaults", this.handleDefaults.bind(this));

    this.router.post(
      "/emi",
      this.middleware.validateBody(schemas.emi),
      this.handleEMI.bind(this)
    );

    this.router.post(
      "/schedule",
      this.middleware.validateBody(schemas.scenario),
      this.handleSchedule.bind(this)
    );

    // Rows and averages for one year of the schedule
    this.router.post(
      "/schedule/year",
      this.middleware.validateBody(schemas.scenarioYear),
      this.handleScheduleYear.bind(this)
    );

    this.router.post(
      "/schedule/export",
      this.middleware.validateBody(schemas.scenario),
      this.handleExport.bind(this)
    );
  }

  // ===== Route Handlers =====

  private handleHealthCheck(_req: Request, res: Response): void {
    this.sendSuccess(res, { status: "healthy", service: "amortization" });
  }

  private handleDefaults(_req: Request, res: Response): void {
    this.sendSuccess(res, inputDefaults);
  }

  private handleEMI(
    req: Request<Record<string, string>, unknown, EMIInput>,
    res: Response,
    next: NextFunction
  ): void {
    try {
      const { principal, annualRatePercent, years } = req.body;
      const emi = computeEMI(principal, annualRatePercent, years);
      this.sendSuccess(res, { emi });
    } catch (error) {
      next(error);
    }
  }

  private handleSchedule(
    req: Request<Record<string, string>, unknown, ScenarioInput>,
    res: Response,
    next: NextFunction
  ): void {
    try {
      const analysis = analyzeScenario(buildScenario(req.body));
      this.logger.debug(
        `Generated ${analysis.rows.length} rows, break-even year ${analysis.summary.breakEvenYear ?? "none"}`
      );
      this.sendSuccess(res, analysis);
    } catch (error) {
      next(error);
    }
  }

  private handleScheduleYear(
    req: Request<Record<string, string>, unknown, ScenarioYearInput>,
    res: Response,
    next: NextFunction
  ): void {
    try {
      const { year, ...input } = req.body;
      const { loan, rent } = buildScenario(input);
      const { rows } = generateSchedule(loan, rent);

      const averages = yearAverages(rows, year);
      const yearRows = rowsForYear(rows, year).map((row) => ({
        ...row,
        cashflowPositive: isCashflowPositive(row),
      }));

      this.sendSuccess(res, { year, rows: yearRows, averages });
    } catch (error) {
      next(error);
    }
  }

  private handleExport(
    req: Request<Record<string, string>, unknown, ScenarioInput>,
    res: Response,
    next: NextFunction
  ): void {
    try {
      const { loan, rent } = buildScenario(req.body);
      const { rows } = generateSchedule(loan, rent);

      res
        .status(200)
        .type(this.exporter.contentType)
        .attachment(this.exporter.fileName)
        .send(this.exporter.serialize(rows));
    } catch (error) {
      next(error);
    }
  }

  // ===== Helper Methods =====

  private sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
    const response: APIResponse<T> = {
      success: true,
      data,
      timestamp: new Date().toISOString(),
    };
    res.status(statusCode).json(response);
  }
}
