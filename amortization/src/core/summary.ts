import { formatPercent, formatRupees } from "@loanrent/shared-utils";
import {
  Money,
  RentGrowth,
  RentParameters,
  Schedule,
  ScheduleRow,
  ScheduleSummary,
  YearAverages,
} from "./dto";
import { InvalidParameterError } from "./errors";
import { escalatedRent } from "./finance";

function sum(rows: ScheduleRow[], pick: (row: ScheduleRow) => number): number {
  return rows.reduce((acc, row) => acc + pick(row), 0);
}

function mean(rows: ScheduleRow[], pick: (row: ScheduleRow) => number): number {
  return rows.length === 0 ? 0 : sum(rows, pick) / rows.length;
}

export function totalInterest(rows: ScheduleRow[]): Money {
  return sum(rows, (row) => row.interestCharged);
}

export function totalInstallmentPaid(rows: ScheduleRow[]): Money {
  return sum(rows, (row) => row.totalInstallment);
}

export function totalRentReceived(rows: ScheduleRow[]): Money {
  return sum(rows, (row) => row.rentReceived);
}

/**
 * A single month where rent covers the installment; not the same as break-even
 */
export function isCashflowPositive(row: ScheduleRow): boolean {
  return row.rentReceived >= row.totalInstallment;
}

/**
 * Distinct years of the schedule, ascending
 */
export function scheduleYears(rows: ScheduleRow[]): number[] {
  const years: number[] = [];
  for (const row of rows) {
    if (years[years.length - 1] !== row.year) {
      years.push(row.year);
    }
  }
  return years;
}

export function rowsForYear(rows: ScheduleRow[], year: number): ScheduleRow[] {
  return rows.filter((row) => row.year === year);
}

/**
 * First year whose average monthly rent meets or exceeds the installment
 * @returns The year, or null if rent never catches up within the tenure
 */
export function breakEvenYear(rows: ScheduleRow[], emi: Money): number | null {
  for (const year of scheduleYears(rows)) {
    const yearly = rowsForYear(rows, year);
    if (mean(yearly, (row) => row.rentReceived) >= emi) {
      return year;
    }
  }
  return null;
}

/**
 * Average rent and out-of-pocket amount per month for one year
 * @throws InvalidParameterError if the schedule has no rows for that year
 */
export function yearAverages(rows: ScheduleRow[], year: number): YearAverages {
  const yearly = rowsForYear(rows, year);
  if (yearly.length === 0) {
    throw new InvalidParameterError("year", year, "is outside the loan tenure");
  }

  return {
    year,
    averageMonthlyRent: mean(yearly, (row) => row.rentReceived),
    averageOutOfPocket: mean(yearly, (row) => row.amountPaidByUser),
  };
}

export function summarizeSchedule(schedule: Schedule): ScheduleSummary {
  const { rows, emi } = schedule;

  return {
    emi,
    totalInterest: totalInterest(rows),
    totalInstallmentPaid: totalInstallmentPaid(rows),
    totalRentReceived: totalRentReceived(rows),
    breakEvenYear: breakEvenYear(rows, emi),
    cashflowPositiveMonths: rows.filter(isCashflowPositive).length,
  };
}

/**
 * Rent at the start of the tenure versus the rent of its final year
 */
export function rentGrowth(rent: RentParameters, tenureYears: number): RentGrowth {
  return {
    startingRent: rent.baseMonthlyRent,
    endingRent: escalatedRent(rent, tenureYears - 1),
    annualIncreasePercent: rent.annualRentIncreasePercent,
    years: tenureYears,
  };
}

/**
 * Human-readable summary lines, one fact per line
 */
export function describeSummary(
  summary: ScheduleSummary,
  growth: RentGrowth
): string[] {
  const breakEven =
    summary.breakEvenYear !== null
      ? `Break-even achieved in Year ${summary.breakEvenYear}`
      : "Break-even not achieved within loan tenure";

  return [
    `Monthly EMI (Fixed): ${formatRupees(summary.emi)}`,
    `Total Loan Paid: ${formatRupees(summary.totalInstallmentPaid)}`,
    `Total Interest Paid: ${formatRupees(summary.totalInterest)}`,
    breakEven,
    `Total Rent Received (${growth.years} yrs): ${formatRupees(summary.totalRentReceived)}`,
    `Rent grows from ${formatRupees(growth.startingRent)} → ${formatRupees(growth.endingRent)} ` +
      `over ${growth.years} years (${formatPercent(growth.annualIncreasePercent)} annual increase)`,
  ];
}
