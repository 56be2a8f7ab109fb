import { readFileSync } from "node:fs";
import { load } from "js-yaml";

import type { KeyLayout, ReportLayout } from "lib/report/types.js";

import { LAYOUT_PATH } from "./constants.js";
import { parseReportLayout } from "./contracts/validators.js";

export function loadReportLayout(text: string): ReportLayout {
  return parseReportLayout(load(text));
}

export function keyLabel(entry: KeyLayout): string {
  return entry.label ?? entry.key;
}

export const DEFAULT_LAYOUT: ReportLayout = loadReportLayout(readFileSync(LAYOUT_PATH, "utf8"));
