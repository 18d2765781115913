import {
  LoanParameters,
  Money,
  RentGrowth,
  RentInput,
  RentParameters,
  ScheduleRow,
  ScheduleSummary,
} from "./dto";
import { computeDownPayment, computeLoanAmount, generateSchedule } from "./finance";
import { resolveMonthlyRent } from "./rent";
import { describeSummary, isCashflowPositive, rentGrowth, summarizeSchedule } from "./summary";

/**
 * Flat input as collected from a form or request body
 */
export interface ScenarioInput {
  propertyValue: Money;
  downPaymentPercent: number;
  annualInterestRatePercent: number;
  tenureYears: number;
  rentMode: RentInput["mode"];
  monthlyRent: Money;
  rentalYieldPercent: number;
  annualRentIncreasePercent: number;
  vacancyMonthsPerYear: number;
}

export interface Scenario {
  loan: LoanParameters;
  rent: RentParameters;
}

export interface AnalyzedRow extends ScheduleRow {
  cashflowPositive: boolean;
}

export interface ScenarioAnalysis {
  downPayment: Money;
  loanAmount: Money;
  emi: Money;
  rows: AnalyzedRow[];
  summary: ScheduleSummary;
  rentGrowth: RentGrowth;
  summaryLines: string[];
}

function rentInputOf(input: ScenarioInput): RentInput {
  return input.rentMode === "yield"
    ? { mode: "yield", rentalYieldPercent: input.rentalYieldPercent }
    : { mode: "monthly", monthlyRent: input.monthlyRent };
}

/**
 * Split a flat input into core parameters, resolving the rent mode
 */
export function buildScenario(input: ScenarioInput): Scenario {
  return {
    loan: {
      propertyValue: input.propertyValue,
      downPaymentPercent: input.downPaymentPercent,
      annualInterestRatePercent: input.annualInterestRatePercent,
      tenureYears: input.tenureYears,
    },
    rent: {
      baseMonthlyRent: resolveMonthlyRent(input.propertyValue, rentInputOf(input)),
      annualRentIncreasePercent: input.annualRentIncreasePercent,
      vacancyMonthsPerYear: input.vacancyMonthsPerYear,
    },
  };
}

/**
 * Run the whole calculation for one scenario
 */
export function analyzeScenario(scenario: Scenario): ScenarioAnalysis {
  const { loan, rent } = scenario;
  const schedule = generateSchedule(loan, rent);
  const summary = summarizeSchedule(schedule);
  const growth = rentGrowth(rent, loan.tenureYears);

  return {
    downPayment: computeDownPayment(loan),
    loanAmount: computeLoanAmount(loan),
    emi: schedule.emi,
    rows: schedule.rows.map((row) => ({
      ...row,
      cashflowPositive: isCashflowPositive(row),
    })),
    summary,
    rentGrowth: growth,
    summaryLines: describeSummary(summary, growth),
  };
}
