/**
 * Express Middleware for the amortization API
 *
 * Handles validation, request logging and error mapping.
 */

import { Logger } from "@loanrent/shared-utils";
import { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { apiCfg, inputBounds, inputDefaults } from "../config/env";
import { APIResponse } from "../core/dto";
import { AmortizationError, InvalidParameterError } from "../core/errors";

export class AmortizationMiddleware {
  constructor(private logger: Logger) {}

  // ===== Request Validation Middleware =====

  validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    return (req: Request, res: Response, next: NextFunction) => {
      const result = schema.safeParse(req.body ?? {});
      if (!result.success) {
        return this.badRequest(res, "Validation error", {
          errors: result.error.errors.map((e) => ({
            path: e.path.join("."),
            message: e.message,
          })),
        });
      }

      req.body = result.data;
      next();
    };
  }

  // ===== Logging Middleware =====

  requestLogger() {
    return (req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();

      res.on("finish", () => {
        const logData = {
          method: req.method,
          url: req.originalUrl,
          statusCode: res.statusCode,
          duration: Date.now() - startTime,
        };

        if (res.statusCode >= 400) {
          this.logger.warn("HTTP request failed", logData);
        } else {
          this.logger.info("HTTP request", logData);
        }
      });

      next();
    };
  }

  // ===== Error Handling Middleware =====

  errorHandler() {
    // Express recognizes error handlers by their four parameters
    return (error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof AmortizationError) {
        this.logger.warn(`Rejected calculation: ${error.message}`);
        return this.unprocessable(res, error);
      }

      if (error instanceof SyntaxError) {
        return this.badRequest(res, "Malformed JSON body");
      }

      const status = clientErrorStatus(error);
      if (status !== undefined) {
        const message = error instanceof Error ? error.message : "Bad request";
        this.logger.warn(`Rejected request: ${message}`, { status, url: req.originalUrl });
        return this.send(res, status, { success: false, error: message });
      }

      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error("Unhandled error:", {
        error: err.message,
        stack: err.stack,
        method: req.method,
        url: req.originalUrl,
      });

      // Don't expose internal error details in production
      const message = apiCfg.isDevelopment ? err.message : "Internal server error";
      this.send(res, 500, { success: false, error: message });
    };
  }

  notFoundHandler() {
    return (req: Request, res: Response) => {
      this.send(res, 404, {
        success: false,
        error: `Route ${req.method} ${req.originalUrl} not found`,
      });
    };
  }

  // ===== Response Helpers =====

  private badRequest(res: Response, message: string, details?: unknown): void {
    this.send(res, 400, { success: false, error: message, details });
  }

  private unprocessable(res: Response, error: AmortizationError): void {
    const details =
      error instanceof InvalidParameterError
        ? { code: error.code, parameter: error.parameter }
        : { code: error.code };

    this.send(res, 422, { success: false, error: error.message, details });
  }

  private send(
    res: Response,
    statusCode: number,
    body: Omit<APIResponse<never>, "timestamp">
  ): void {
    const response: APIResponse<never> = {
      ...body,
      timestamp: new Date().toISOString(),
    };
    res.status(statusCode).json(response);
  }
}

/**
 * 4xx status carried by errors that body-parser raises (oversized or
 * unsupported bodies)
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  const status =
    "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  if (typeof status === "number" && status >= 400 && status < 500) return status;
  return undefined;
}

// ===== Validation Schemas =====

const b = inputBounds;
const d = inputDefaults;

const scenario = z.object({
  propertyValue: z.number().positive().default(d.propertyValue),
  downPaymentPercent: z
    .number()
    .min(b.downPaymentPercent.min)
    .max(b.downPaymentPercent.max)
    .default(d.downPaymentPercent),
  annualInterestRatePercent: z
    .number()
    .min(b.annualInterestRatePercent.min)
    .max(b.annualInterestRatePercent.max)
    .default(d.annualInterestRatePercent),
  tenureYears: z
    .number()
    .int()
    .min(b.tenureYears.min)
    .max(b.tenureYears.max)
    .default(d.tenureYears),
  rentMode: z.enum(["monthly", "yield"]).default(d.rentMode),
  monthlyRent: z.number().min(0).default(d.monthlyRent),
  rentalYieldPercent: z
    .number()
    .min(b.rentalYieldPercent.min)
    .max(b.rentalYieldPercent.max)
    .default(d.rentalYieldPercent),
  annualRentIncreasePercent: z
    .number()
    .min(b.annualRentIncreasePercent.min)
    .max(b.annualRentIncreasePercent.max)
    .default(d.annualRentIncreasePercent),
  vacancyMonthsPerYear: z
    .number()
    .int()
    .min(b.vacancyMonthsPerYear.min)
    .max(b.vacancyMonthsPerYear.max)
    .default(d.vacancyMonthsPerYear),
});

export const schemas = {
  scenario,

  scenarioYear: scenario.extend({
    year: z.number().int().min(1),
  }),

  // Domain checks (positive rate, whole years) are left to the calculator
  emi: z.object({
    principal: z.number(),
    annualRatePercent: z.number(),
    years: z.number(),
  }),
};

export type ScenarioYearInput = z.infer<typeof schemas.scenarioYear>;
export type EMIInput = z.infer<typeof schemas.emi>;
