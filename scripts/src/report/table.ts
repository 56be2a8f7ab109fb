import type {
  ImplementationName,
  ImplementationRecords,
  KeyLayout,
  MetricField,
  MetricRecord,
  SectionResults
} from "lib/report/types.js";

import {
  DETAIL_COLUMNS,
  DETAIL_RPS_PRECISION,
  IMPLEMENTATION_COLUMN,
  MISSING_CELL,
  OVERVIEW_RPS_PRECISION
} from "../constants.js";
import { keyLabel } from "../layout.js";
import { formatCount, formatDuration } from "./format.js";

export interface OverviewTableRequest {
  schema: "overview";
  columns: KeyLayout[];
  implementations: ImplementationName[];
  results: SectionResults;
  /** Prefix for field paths in format errors, usually the section key. */
  path: string;
}

export interface DetailTableRequest {
  schema: "detail";
  implementations: ImplementationName[];
  records: ImplementationRecords;
  path: string;
  durationUnit: string;
}

export type TableRequest = OverviewTableRequest | DetailTableRequest;

const LATENCY_FIELDS: readonly MetricField[] = ["mean", "p99", "min", "max"];

export function renderTable(request: TableRequest): string {
  switch (request.schema) {
    case "overview":
      return renderOverviewTable(request);
    case "detail":
      return renderDetailTable(request);
  }
}

export function renderOverviewTable(request: OverviewTableRequest): string {
  const { columns, implementations, results, path } = request;
  const lines = [
    row([IMPLEMENTATION_COLUMN, ...columns.map(keyLabel)]),
    separator(columns.length + 1)
  ];

  for (const name of implementations) {
    const cells = columns.map((column) => {
      const record = recordFor(results[column.key], name);
      return record ? formatCount(record.rps, `${path}/${column.key}/${name}/rps`, OVERVIEW_RPS_PRECISION) : null;
    });
    if (cells.every((cell) => cell === null)) {
      continue;
    }
    lines.push(row([name, ...cells.map((cell) => cell ?? MISSING_CELL)]));
  }

  return lines.join("\n");
}

export function renderDetailTable(request: DetailTableRequest): string {
  const { implementations, records, path, durationUnit } = request;
  const lines = [row([...DETAIL_COLUMNS]), separator(DETAIL_COLUMNS.length)];

  for (const name of implementations) {
    const record = recordFor(records, name);
    if (!record) {
      continue;
    }
    const fieldPath = `${path}/${name}`;
    lines.push(
      row([
        name,
        formatCount(record.rps, `${fieldPath}/rps`, DETAIL_RPS_PRECISION),
        ...LATENCY_FIELDS.map((field) => formatDuration(record[field], `${fieldPath}/${field}`, durationUnit))
      ])
    );
  }

  return lines.join("\n");
}

function recordFor(records: ImplementationRecords | undefined, name: ImplementationName): MetricRecord | undefined {
  if (!records || !Object.prototype.hasOwnProperty.call(records, name)) {
    return undefined;
  }
  return records[name];
}

function escapeCell(cell: string): string {
  return cell.replace(/\|/g, "\\|");
}

function row(cells: string[]): string {
  return `| ${cells.map(escapeCell).join(" | ")} |`;
}

function separator(count: number): string {
  return row(Array.from({ length: count }, () => "---"));
}
