import { DURATION_PRECISION, NUMBER_LOCALE } from "../constants.js";
import { FormatError } from "./errors.js";

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

const formatters = new Map<string, Intl.NumberFormat>();

function fixedFormatter(precision: number, grouping: boolean): Intl.NumberFormat {
  const cacheKey = `${precision}:${grouping}`;
  let formatter = formatters.get(cacheKey);
  if (!formatter) {
    formatter = new Intl.NumberFormat(NUMBER_LOCALE, {
      minimumFractionDigits: precision,
      maximumFractionDigits: precision,
      useGrouping: grouping
    });
    formatters.set(cacheKey, formatter);
  }
  return formatter;
}

function assertFormattable(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new FormatError(field, value);
  }
}

/**
 * Throughput figures: `71,765` at precision 0, `71,764.8` at precision 1.
 */
export function formatCount(value: number, field: string, precision: number): string {
  assertFormattable(value, field);
  return fixedFormatter(precision, true).format(value);
}

/** Latencies: `0.011ms`, never grouped. */
export function formatDuration(value: number, field: string, unit: string): string {
  assertFormattable(value, field);
  return `${fixedFormatter(DURATION_PRECISION, false).format(value)}${unit}`;
}

function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

/** `Sat 18 Oct 2025, 14:05`, always in UTC. */
export function formatRunTimestamp(epochSeconds: number): string {
  assertFormattable(epochSeconds, "run_at");
  const date = new Date(epochSeconds * 1000);
  if (Number.isNaN(date.getTime())) {
    throw new FormatError("run_at", epochSeconds);
  }
  const weekday = WEEKDAYS[date.getUTCDay()];
  const month = MONTHS[date.getUTCMonth()];
  return `${weekday} ${pad2(date.getUTCDate())} ${month} ${date.getUTCFullYear()}, ` +
    `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}`;
}
