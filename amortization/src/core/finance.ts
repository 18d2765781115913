import { roundMoney } from "@loanrent/shared-utils";
import { LoanParameters, Money, RentParameters, Schedule, ScheduleRow } from "./dto";
import { InvalidParameterError, NumericOverflowError } from "./errors";

/** Ceiling applied to escalated rent so long, steep escalations stay finite */
export const MAX_MONETARY_AMOUNT: Money = 1e15;

const MONTHS_PER_YEAR = 12;

/**
 * Convert an annual percentage rate to a monthly decimal rate
 * e.g. 7.4 -> 0.0061666...
 */
export function monthlyRateFromAnnualPercent(annualRatePercent: number): number {
  return annualRatePercent / (MONTHS_PER_YEAR * 100);
}

/**
 * Calculate the equated monthly installment of a fixed-rate loan
 * EMI = P * r * (1+r)^n / ((1+r)^n - 1) where r is monthly rate, n is number of months
 * @param principal Amount borrowed
 * @param annualRatePercent Nominal annual rate in percent (e.g., 7.4)
 * @param years Loan tenure in whole years
 * @returns Monthly installment, constant for the whole tenure
 * @throws InvalidParameterError for a non-positive principal, rate or tenure
 */
export function computeEMI(
  principal: Money,
  annualRatePercent: number,
  years: number
): Money {
  requirePositive("principal", principal);
  // A zero rate would divide by zero below
  requirePositive("annualRatePercent", annualRatePercent);
  requirePositiveInteger("years", years);

  const r = monthlyRateFromAnnualPercent(annualRatePercent);
  const n = years * MONTHS_PER_YEAR;
  const factor = Math.pow(1 + r, n);
  const emi = (principal * r * factor) / (factor - 1);

  if (!Number.isFinite(emi)) {
    throw new NumericOverflowError("Monthly installment");
  }

  return emi;
}

/**
 * Rent for a month, escalated once per elapsed full year
 * @param yearIndex Number of full years elapsed (0 for the first year)
 */
export function escalatedRent(rent: RentParameters, yearIndex: number): Money {
  const growth = Math.pow(1 + rent.annualRentIncreasePercent / 100, yearIndex);
  const value = rent.baseMonthlyRent * growth;
  return Number.isFinite(value)
    ? Math.min(value, MAX_MONETARY_AMOUNT)
    : MAX_MONETARY_AMOUNT;
}

/**
 * Vacant months are the last `vacancyMonthsPerYear` months of each 12-month cycle
 */
export function isVacantMonth(month: number, vacancyMonthsPerYear: number): boolean {
  return (month - 1) % MONTHS_PER_YEAR >= MONTHS_PER_YEAR - vacancyMonthsPerYear;
}

/**
 * Build the month-by-month amortization schedule with the rent overlay
 * @param loan Financing inputs
 * @param rent Rental inputs, with the monthly rent already resolved
 * @returns One row per month plus the unrounded installment
 * @throws InvalidParameterError before any row is built if an input is out of range
 */
export function generateSchedule(
  loan: LoanParameters,
  rent: RentParameters
): Schedule {
  validateLoanParameters(loan);
  validateRentParameters(rent);

  const loanAmount = computeLoanAmount(loan);

  const emi = computeEMI(loanAmount, loan.annualInterestRatePercent, loan.tenureYears);
  const monthlyRate = monthlyRateFromAnnualPercent(loan.annualInterestRatePercent);

  const totalMonths = loan.tenureYears * MONTHS_PER_YEAR;
  const rows: ScheduleRow[] = [];
  let balance = loanAmount;

  for (let month = 1; month <= totalMonths; month++) {
    const yearIndex = Math.floor((month - 1) / MONTHS_PER_YEAR);
    const effectiveRent = isVacantMonth(month, rent.vacancyMonthsPerYear)
      ? 0
      : escalatedRent(rent, yearIndex);

    const interest = balance * monthlyRate;
    const principal = emi - interest;
    // Running balance may drift slightly below zero; only the emitted row is clamped
    balance -= principal;

    rows.push({
      year: yearIndex + 1,
      month,
      principalPaid: roundMoney(principal),
      interestCharged: roundMoney(interest),
      totalInstallment: roundMoney(emi),
      outstandingBalance: roundMoney(Math.max(balance, 0)),
      rentReceived: roundMoney(effectiveRent),
      amountPaidByUser: roundMoney(emi - effectiveRent),
    });
  }

  return { rows, emi };
}

export function computeDownPayment(loan: LoanParameters): Money {
  return (loan.propertyValue * loan.downPaymentPercent) / 100;
}

export function computeLoanAmount(loan: LoanParameters): Money {
  return loan.propertyValue - computeDownPayment(loan);
}

/**
 * Validate loan parameters against their mathematical domain
 * @throws InvalidParameterError naming the first offending field
 */
export function validateLoanParameters(loan: LoanParameters): void {
  requirePositive("propertyValue", loan.propertyValue);

  if (
    !Number.isFinite(loan.downPaymentPercent) ||
    loan.downPaymentPercent < 0 ||
    loan.downPaymentPercent >= 100
  ) {
    throw new InvalidParameterError(
      "downPaymentPercent",
      loan.downPaymentPercent,
      "must be at least 0 and below 100"
    );
  }

  requirePositive("annualInterestRatePercent", loan.annualInterestRatePercent);
  requirePositiveInteger("tenureYears", loan.tenureYears);
}

/**
 * Validate rent parameters against their mathematical domain
 * @throws InvalidParameterError naming the first offending field
 */
export function validateRentParameters(rent: RentParameters): void {
  requireNonNegative("baseMonthlyRent", rent.baseMonthlyRent);
  requireNonNegative("annualRentIncreasePercent", rent.annualRentIncreasePercent);

  if (
    !Number.isInteger(rent.vacancyMonthsPerYear) ||
    rent.vacancyMonthsPerYear < 0 ||
    rent.vacancyMonthsPerYear > MONTHS_PER_YEAR
  ) {
    throw new InvalidParameterError(
      "vacancyMonthsPerYear",
      rent.vacancyMonthsPerYear,
      "must be a whole number from 0 to 12"
    );
  }
}

function requirePositive(parameter: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(parameter, value, "must be greater than 0");
  }
}

function requireNonNegative(parameter: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidParameterError(parameter, value, "must not be negative");
  }
}

function requirePositiveInteger(parameter: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidParameterError(parameter, value, "must be a positive whole number");
  }
}
