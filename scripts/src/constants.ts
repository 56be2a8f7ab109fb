import { fileURLToPath } from "node:url";

const LIB_DIR = new URL("../../lib/", import.meta.url);

export const LAYOUT_PATH = fileURLToPath(new URL("report_layout.yaml", LIB_DIR));
export const LAYOUT_SCHEMA_PATH = fileURLToPath(new URL("schemas/report_layout.schema.json", LIB_DIR));
export const RESULTS_SCHEMA_PATH = fileURLToPath(new URL("schemas/benchmark_results.schema.json", LIB_DIR));

export const REPORT_ENV_VARIABLES = {
  logLevel: "REPORT_LOG_LEVEL",
  environment: "REPORT_ENVIRONMENT",
  durationUnit: "REPORT_DURATION_UNIT"
} as const;

export const DEFAULT_ENVIRONMENT = "Linux x86_64";
export const DEFAULT_DURATION_UNIT = "ms";

export const NUMBER_LOCALE = "en-US";
export const OVERVIEW_RPS_PRECISION = 0;
export const DETAIL_RPS_PRECISION = 1;
export const DURATION_PRECISION = 3;

export const MISSING_CELL = "—";

export const IMPLEMENTATION_COLUMN = "Loop";
export const OVERVIEW_HEADING = "Overview";
export const DETAIL_HEADING_SUFFIX = "Details";
export const DETAIL_COLUMNS = ["Loop", "RPS", "Mean Latency", "99p Latency", "Min", "Max"] as const;
