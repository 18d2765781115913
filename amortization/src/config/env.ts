/**
 * Environment configuration for amortization service
 */

import * as dotenv from "dotenv";
import { createServiceConfig, LogLevel, parseEnvArray } from "@loanrent/shared-utils";
import type { ScenarioInput } from "../core/scenario";

// Load environment variables
dotenv.config();

export interface APIConfig {
  port: number;
  mode: string;
  isDevelopment: boolean;
  logLevel: LogLevel;
  corsOrigins: string[];
}

const service = createServiceConfig(3004);

export const apiCfg: APIConfig = {
  port: service.port ?? 3004,
  mode: service.mode,
  isDevelopment: service.mode === "development",
  logLevel: service.logLevel,
  corsOrigins: parseEnvArray("CORS_ORIGIN", ["*"]),
};

/**
 * Inputs used for any field a request leaves out
 */
export const inputDefaults: ScenarioInput = {
  propertyValue: 22_000_000,
  downPaymentPercent: 10,
  annualInterestRatePercent: 7.4,
  tenureYears: 20,
  rentMode: "monthly",
  monthlyRent: 75_000,
  rentalYieldPercent: 4.0,
  annualRentIncreasePercent: 5.0,
  vacancyMonthsPerYear: 1,
};

/**
 * Bounds accepted at the request boundary
 */
export const inputBounds = {
  downPaymentPercent: { min: 0, max: 50 },
  annualInterestRatePercent: { min: 5.0, max: 15.0 },
  tenureYears: { min: 5, max: 30 },
  rentalYieldPercent: { min: 1.0, max: 10.0 },
  annualRentIncreasePercent: { min: 0.0, max: 15.0 },
  vacancyMonthsPerYear: { min: 0, max: 3 },
} as const;
