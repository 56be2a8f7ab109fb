import { DEFAULT_DURATION_UNIT, DEFAULT_ENVIRONMENT, REPORT_ENV_VARIABLES } from "../constants.js";
import { isLogLevel, type LogLevel } from "../utils/logger.js";

export interface ReportConfig {
  logLevel: LogLevel;
  environment: string;
  durationUnit: string;
}

function parseNonEmpty(value: string | undefined, fallback: string): string {
  if (value === undefined) {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export function resolveReportConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  return {
    logLevel: parseLogLevel(env[REPORT_ENV_VARIABLES.logLevel], "info"),
    environment: parseNonEmpty(env[REPORT_ENV_VARIABLES.environment], DEFAULT_ENVIRONMENT),
    durationUnit: parseNonEmpty(env[REPORT_ENV_VARIABLES.durationUnit], DEFAULT_DURATION_UNIT)
  };
}
