import { ScheduleRow } from "../core/dto";
import { ScheduleExportPort } from "../core/ports";

export const EXPORT_FILE_NAME = "loan_rent_amortization.csv";

const COLUMNS: { header: string; pick: (row: ScheduleRow) => number }[] = [
  { header: "Year", pick: (row) => row.year },
  { header: "Month", pick: (row) => row.month },
  { header: "Principal Paid", pick: (row) => row.principalPaid },
  { header: "Interest Charged", pick: (row) => row.interestCharged },
  { header: "Total EMI", pick: (row) => row.totalInstallment },
  { header: "Outstanding Balance", pick: (row) => row.outstandingBalance },
  { header: "Rent Received", pick: (row) => row.rentReceived },
  { header: "Amount Paid by User", pick: (row) => row.amountPaidByUser },
];

/**
 * Serialize a schedule as CSV, one line per month
 */
export function scheduleToCsv(rows: ScheduleRow[]): string {
  const lines = [COLUMNS.map((c) => c.header).join(",")];

  for (const row of rows) {
    lines.push(COLUMNS.map((c) => String(c.pick(row))).join(","));
  }

  return lines.join("\n") + "\n";
}

export class CsvScheduleExporter implements ScheduleExportPort {
  readonly contentType = "text/csv; charset=utf-8";
  readonly fileName = EXPORT_FILE_NAME;

  serialize(rows: ScheduleRow[]): string {
    return scheduleToCsv(rows);
  }
}
