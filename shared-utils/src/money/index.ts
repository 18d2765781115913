export type Money = number;

/**
 * Round a monetary amount to 2 decimal places
 */
export function roundMoney(amount: Money): Money {
  return Math.round(amount * 100) / 100;
}

/**
 * Rupee amount with western digit grouping, e.g. "₹ 1,580,000"
 */
export function formatRupees(amount: Money): string {
  const digits = new Intl.NumberFormat("en-US", {
    minimumFractionDigits: 0,
    maximumFractionDigits: 0,
  }).format(amount);
  return `₹ ${digits}`;
}

/**
 * Percentage as entered: whole numbers keep one decimal ("5.0%"),
 * fractional values print every digit they carry ("2.25%")
 */
export function formatPercent(value: number): string {
  const digits = Number.isInteger(value) ? value.toFixed(1) : String(value);
  return `${digits}%`;
}
