import type { Money } from "@loanrent/shared-utils";

export type { Money };

export interface LoanParameters {
  propertyValue: Money;
  downPaymentPercent: number;        // [0, 100)
  annualInterestRatePercent: number; // e.g. 7.4 = 7.40% nominal
  tenureYears: number;               // whole years
}

export interface RentParameters {
  baseMonthlyRent: Money;            // month 1, before escalation
  annualRentIncreasePercent: number; // compounded once per full year
  vacancyMonthsPerYear: number;      // 0..12, last N months of each year
}

export interface ScheduleRow {
  year: number;                      // ceil(month / 12)
  month: number;                     // 1..tenureYears * 12
  principalPaid: Money;
  interestCharged: Money;
  totalInstallment: Money;
  outstandingBalance: Money;         // floored at zero
  rentReceived: Money;
  amountPaidByUser: Money;           // installment - rent, may be negative
}

export interface Schedule {
  rows: ScheduleRow[];
  emi: Money;                        // unrounded
}

export type RentInput =
  | { mode: "monthly"; monthlyRent: Money }
  | { mode: "yield"; rentalYieldPercent: number };

export interface ScheduleSummary {
  emi: Money;
  totalInterest: Money;
  totalInstallmentPaid: Money;
  totalRentReceived: Money;
  breakEvenYear: number | null;
  cashflowPositiveMonths: number;
}

export interface YearAverages {
  year: number;
  averageMonthlyRent: Money;
  averageOutOfPocket: Money;
}

export interface RentGrowth {
  startingRent: Money;
  endingRent: Money;
  annualIncreasePercent: number;
  years: number;
}

export interface APIResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  details?: unknown;
  timestamp: string;
}
