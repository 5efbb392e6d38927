/**
 * Parsing of the published monthly rate CSV.
 *
 * One header row, then one row per currency. The currency column is
 * "Currency Code" (or "currency_code"), the rate column
 * "Currency Units per £1" (or "rate"). Rows without a usable code or
 * with an unparseable rate are skipped.
 */

import { parse } from "csv-parse/sync";
import type { MonthlyRateTable } from "./types.js";

const CODE_COLUMNS = ["Currency Code", "currency_code"] as const;
const RATE_COLUMNS = ["Currency Units per £1", "rate"] as const;
const RATE_FORMAT = /^\d+(\.\d+)?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstCell(row: Record<string, unknown>, columns: readonly string[]): string {
  for (const column of columns) {
    const cell = row[column];
    if (typeof cell === "string" && cell.trim() !== "") {
      return cell.trim();
    }
  }
  return "";
}

export function parseRateCsv(text: string): MonthlyRateTable {
  const records: unknown = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });

  const table = new Map<string, string>();
  if (!Array.isArray(records)) {
    return table;
  }

  for (const row of records) {
    if (!isRecord(row)) continue;
    const code = firstCell(row, CODE_COLUMNS).toUpperCase();
    const rate = firstCell(row, RATE_COLUMNS);
    if (code === "" || !RATE_FORMAT.test(rate)) continue;
    table.set(code, rate);
  }

  return table;
}
