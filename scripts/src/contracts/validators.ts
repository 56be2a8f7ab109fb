import { readFileSync } from "node:fs";

import AjvModule, { type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";

import type { BenchmarkResultsInput, ReportLayout } from "lib/report/types.js";

import { LAYOUT_SCHEMA_PATH, RESULTS_SCHEMA_PATH } from "../constants.js";
import { SchemaError } from "../report/errors.js";

// ajv ships CommonJS; under NodeNext the class is reached through `.default`.
const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });

let resultsValidator: ValidateFunction<BenchmarkResultsInput> | null = null;
let layoutValidator: ValidateFunction<ReportLayout> | null = null;

export function parseBenchmarkResults(value: unknown): BenchmarkResultsInput {
  if (!resultsValidator) {
    resultsValidator = ajv.compile<BenchmarkResultsInput>(loadSchema(RESULTS_SCHEMA_PATH));
  }
  if (resultsValidator(value)) {
    return value;
  }
  throw new SchemaError(formatErrors(resultsValidator.errors));
}

export function parseReportLayout(value: unknown): ReportLayout {
  if (!layoutValidator) {
    layoutValidator = ajv.compile<ReportLayout>(loadSchema(LAYOUT_SCHEMA_PATH));
  }
  if (!layoutValidator(value)) {
    throw new SchemaError(formatErrors(layoutValidator.errors));
  }
  const duplicates = findDuplicateKeys(value);
  if (duplicates.length > 0) {
    throw new SchemaError(duplicates);
  }
  return value;
}

function findDuplicateKeys(layout: ReportLayout): string[] {
  const issues: string[] = [];
  const sectionKeys = new Set<string>();
  layout.sections.forEach((section, index) => {
    if (sectionKeys.has(section.key)) {
      issues.push(`/sections/${index}/key duplicate section '${section.key}'`);
    }
    sectionKeys.add(section.key);

    const configKeys = new Set<string>();
    section.keys.forEach((entry, keyIndex) => {
      if (configKeys.has(entry.key)) {
        issues.push(`/sections/${index}/keys/${keyIndex}/key duplicate key '${entry.key}'`);
      }
      configKeys.add(entry.key);
    });
  });
  return issues;
}

function loadSchema(path: string): SchemaObject {
  const schema: SchemaObject = JSON.parse(readFileSync(path, "utf8"));
  return schema;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return ["Unknown validation error"];
  }
  return errors.map((error) => `${error.instancePath || "/"} ${error.message ?? "invalid"}`);
}
