/**
 * Shared configuration utilities for services
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ServiceConfig {
  mode: string;
  logLevel: LogLevel;
  port?: number;
}

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Create service configuration from environment variables
 */
export function createServiceConfig(defaultPort?: number): ServiceConfig {
  return {
    mode: process.env.MODE ?? process.env.NODE_ENV ?? "development",
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
    port: defaultPort ? parseEnvNumber("PORT", defaultPort) : undefined,
  };
}

/**
 * Parse a log level, falling back to "info" for unknown values
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? "info";
}

/**
 * Parse a numeric environment variable
 */
export function parseEnvNumber(envVar: string, defaultValue: number): number {
  const raw = process.env[envVar];
  if (raw === undefined || raw.trim() === "") return defaultValue;

  const num = Number(raw);
  if (isNaN(num)) {
    throw new Error(`Invalid number in ${envVar}: ${raw}`);
  }
  return num;
}

/**
 * Parse comma-separated environment variable into array
 */
export function parseEnvArray(
  envVar: string,
  defaultValue: string[] = []
): string[] {
  const value = process.env[envVar];
  if (!value) return defaultValue;

  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}
