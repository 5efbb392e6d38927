/**
 * Calendar-month helpers.
 */

import type { RatePeriod } from "./types.js";
import { RateError } from "./types.js";

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const PERIOD_PATTERN = /^(\d{4})-(\d{2})$/;

/**
 * The month a YYYY-MM-DD date falls in.
 */
export function periodOf(date: string): RatePeriod {
  const match = DATE_PATTERN.exec(date);
  const year = Number(match?.[1]);
  const month = Number(match?.[2]);
  if (match === null || month < 1 || month > 12) {
    throw new RateError("INVALID_DATE", `Not a calendar date: "${date}"`);
  }
  return { year, month };
}

/**
 * "2024-03" — zero-padded, sorts chronologically.
 */
export function periodKey(period: RatePeriod): string {
  return `${String(period.year)}-${String(period.month).padStart(2, "0")}`;
}

export function parsePeriodKey(key: string): RatePeriod {
  const match = PERIOD_PATTERN.exec(key);
  const year = Number(match?.[1]);
  const month = Number(match?.[2]);
  if (match === null || month < 1 || month > 12) {
    throw new RateError("INVALID_DATE", `Not a YYYY-MM period: "${key}"`);
  }
  return { year, month };
}
