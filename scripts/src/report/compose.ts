import type { ReportLayout, ResultTree, RunMetadata } from "lib/report/types.js";

import { DEFAULT_DURATION_UNIT, DETAIL_HEADING_SUFFIX, OVERVIEW_HEADING } from "../constants.js";
import { DEFAULT_LAYOUT, keyLabel } from "../layout.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { formatRunTimestamp } from "./format.js";
import { collectUndeclared, selectSections, type SelectedSection } from "./sections.js";
import { renderTable } from "./table.js";

export interface ComposeOptions {
  layout?: ReportLayout;
  durationUnit?: string;
  logger?: Logger;
}

interface ComposeContext {
  layout: ReportLayout;
  metadata: RunMetadata;
  durationUnit: string;
}

/**
 * Renders the whole markdown document. Pure with respect to its inputs:
 * the same tree and metadata always yield the same bytes, and any
 * formatting failure propagates before a string is returned.
 */
export function composeReport(tree: ResultTree, metadata: RunMetadata, options: ComposeOptions = {}): string {
  const context: ComposeContext = {
    layout: options.layout ?? DEFAULT_LAYOUT,
    metadata,
    durationUnit: options.durationUnit ?? DEFAULT_DURATION_UNIT
  };
  const logger = options.logger ?? defaultLogger;

  for (const entry of collectUndeclared(tree, context.layout)) {
    logger.warn("Ignoring results not declared in the report layout", { ...entry });
  }

  const sections = selectSections(tree, context.layout);
  const rendered = new Set(sections.map((section) => section.layout.key));
  for (const section of context.layout.sections) {
    if (!rendered.has(section.key)) {
      logger.debug("Skipping section without data", { section: section.key });
    }
  }

  const blocks: string[] = [
    ...renderHeader(context),
    ...sections.flatMap((section) => renderSection(section, context))
  ];
  return `${blocks.join("\n\n")}\n`;
}

function renderHeader({ layout, metadata }: ComposeContext): string[] {
  return [
    `# ${layout.title}`,
    [
      `**Run at:** ${formatRunTimestamp(metadata.runAt)}`,
      `**Environment:** ${metadata.environment} (CPUs: ${metadata.cpu})`,
      `**${layout.runtimeLabel} version:** ${metadata.runtimeVersion}`,
      `**${layout.subject} version:** ${metadata.subjectVersion}`
    ].join("\n")
  ];
}

function renderSection(section: SelectedSection, context: ComposeContext): string[] {
  const { layout, results, keys, implementations } = section;
  const blocks = [
    `### ${layout.title}`,
    layout.description,
    `### ${OVERVIEW_HEADING}`,
    renderTable({ schema: "overview", columns: keys, implementations, results, path: layout.key })
  ];

  for (const entry of keys) {
    blocks.push(
      `#### ${keyLabel(entry)} ${DETAIL_HEADING_SUFFIX}`,
      renderTable({
        schema: "detail",
        implementations,
        records: results[entry.key] ?? {},
        path: `${layout.key}/${entry.key}`,
        durationUnit: context.durationUnit
      })
    );
  }

  return blocks.filter((block) => block.length > 0);
}
