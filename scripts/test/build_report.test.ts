import { readFileSync } from "node:fs";

import { afterEach, describe, expect, it, vi } from "vitest";

import { buildReport, computeSha256, toResultTree, toRunMetadata } from "../src/build_report.js";
import { resolveReportConfig } from "../src/config/env.js";
import { parseBenchmarkResults } from "../src/contracts/validators.js";
import { FormatError, SchemaError } from "../src/report/errors.js";

const fixture = (name: string): string => readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8");

const loadResults = (): unknown => JSON.parse(fixture("results.json"));

describe("buildReport", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("matches the golden report byte-for-byte", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const result = buildReport(loadResults());

    expect(result.markdown).toBe(fixture("report.md"));
    expect(result.sections).toEqual(["raw", "stream", "proto", "concurrency"]);
  });

  it("returns the digest of the rendered markdown", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const result = buildReport(loadResults());

    expect(result.sha256).toBe(computeSha256(result.markdown));
    expect(buildReport(loadResults()).sha256).toBe(result.sha256);
  });

  it("hashes UTF-8 content as lowercase hex", () => {
    expect(computeSha256("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });

  it("warns once about the undeclared concurrency level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    buildReport(loadResults());

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      '[WARN] Ignoring results not declared in the report layout {"section":"concurrency","key":"3"}'
    );
  });

  it("applies the configured log level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const result = buildReport(loadResults(), { config: resolveReportConfig({ REPORT_LOG_LEVEL: "error" }) });

    expect(warn).not.toHaveBeenCalled();
    expect(result.markdown).toBe(fixture("report.md"));
  });

  it("starts the document with the title and a four-line metadata block", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const lines = buildReport(loadResults()).markdown.split("\n").slice(0, 7);

    expect(lines).toEqual([
      "# Veloxloop benchmarks",
      "",
      "**Run at:** Sat 18 Oct 2025, 14:05",
      "**Environment:** GHA Linux x86_64 (CPUs: 4)",
      "**Python version:** 3.12.7",
      "**Veloxloop version:** 0.2.0",
      "",
    ]);
  });

  it("falls back to the configured environment label", () => {
    const markdown = buildReport(
      {
        run_at: 1704067200,
        cpu: 2,
        pyver: "3.11.9",
        veloxloop: "0.1.0",
        results: {},
      },
      { config: { environment: "Self-hosted arm64", durationUnit: "ms" } }
    ).markdown;

    expect(markdown).toBe(
      [
        "# Veloxloop benchmarks",
        "",
        "**Run at:** Mon 01 Jan 2024, 00:00",
        "**Environment:** Self-hosted arm64 (CPUs: 2)",
        "**Python version:** 3.11.9",
        "**Veloxloop version:** 0.1.0",
        "",
      ].join("\n")
    );
  });

  it("raises SchemaError before rendering malformed input", () => {
    expect(() => buildReport({ run_at: 1, cpu: 1, pyver: "3", veloxloop: "0" })).toThrow(SchemaError);
  });

  it("raises FormatError for negative throughput", () => {
    const input = {
      run_at: 1704067200,
      cpu: 2,
      pyver: "3.11.9",
      veloxloop: "0.1.0",
      results: { proto: { "1024": { uvloop: { rps: -3, mean: 0.1, p99: 0.2, min: 0.05, max: 1 } } } },
    };

    expect(() => buildReport(input)).toThrow(new FormatError("proto/1024/uvloop/rps", -3));
  });
});

describe("harness conversion", () => {
  it("maps harness fields onto run metadata", () => {
    const input = parseBenchmarkResults(loadResults());

    expect(toRunMetadata(input)).toEqual({
      runAt: 1760796300,
      environment: "GHA Linux x86_64",
      cpu: 4,
      runtimeVersion: "3.12.7",
      subjectVersion: "0.2.0",
    });
    expect(toRunMetadata({ ...input, env: undefined }).environment).toBe("Linux x86_64");
  });

  it("exposes the result sections without copying records", () => {
    const input = parseBenchmarkResults(loadResults());
    const tree = toResultTree(input);

    expect(Object.keys(tree).sort()).toEqual(["concurrency", "proto", "raw", "stream"]);
    expect(tree.raw).toBe(input.results.raw);
  });
});
