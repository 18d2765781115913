export * from "./core/dto";
export * from "./core/errors";
export * from "./core/finance";
export * from "./core/ports";
export * from "./core/rent";
export * from "./core/scenario";
export * from "./core/summary";
export { CsvScheduleExporter, EXPORT_FILE_NAME, scheduleToCsv } from "./adapters/export.csv";
export { createApp } from "./http/app";
export type { AppOptions } from "./http/app";
