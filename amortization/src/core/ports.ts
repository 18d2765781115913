import { ScheduleRow } from "./dto";

// Tabular export of a full schedule (CSV today, spreadsheet formats later)
export interface ScheduleExportPort {
  readonly contentType: string;
  readonly fileName: string;
  serialize(rows: ScheduleRow[]): string;
}
