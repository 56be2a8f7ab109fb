import { createHash } from "node:crypto";

import type {
  BenchmarkResultsInput,
  ReportLayout,
  ReportResult,
  ResultTree,
  RunMetadata
} from "lib/report/types.js";

import type { ReportConfig } from "./config/env.js";
import { DEFAULT_DURATION_UNIT, DEFAULT_ENVIRONMENT } from "./constants.js";
import { parseBenchmarkResults } from "./contracts/validators.js";
import { DEFAULT_LAYOUT } from "./layout.js";
import { composeReport } from "./report/compose.js";
import { selectSections } from "./report/sections.js";
import { createLogger } from "./utils/logger.js";

export interface BuildReportOptions {
  layout?: ReportLayout;
  config?: Partial<ReportConfig>;
}

export function computeSha256(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

export function toResultTree(input: BenchmarkResultsInput): ResultTree {
  return { ...input.results };
}

export function toRunMetadata(input: BenchmarkResultsInput, environment: string = DEFAULT_ENVIRONMENT): RunMetadata {
  return {
    runAt: input.run_at,
    environment: input.env ?? environment,
    cpu: input.cpu,
    runtimeVersion: input.pyver,
    subjectVersion: input.veloxloop
  };
}

/**
 * Validates a harness result document and renders it. Throws `SchemaError`
 * for malformed input and `FormatError` for values that cannot be printed;
 * nothing is returned unless the whole document rendered.
 */
export function buildReport(raw: unknown, options: BuildReportOptions = {}): ReportResult {
  const layout = options.layout ?? DEFAULT_LAYOUT;
  const input = parseBenchmarkResults(raw);
  const tree = toResultTree(input);
  const metadata = toRunMetadata(input, options.config?.environment);

  const markdown = composeReport(tree, metadata, {
    layout,
    durationUnit: options.config?.durationUnit ?? DEFAULT_DURATION_UNIT,
    logger: createLogger(options.config?.logLevel)
  });

  return {
    markdown,
    sha256: computeSha256(markdown),
    sections: selectSections(tree, layout).map((section) => section.layout.key)
  };
}
