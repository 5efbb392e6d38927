/**
 * Secondary ledger CSV.
 *
 * Header row `date,amount,direction,reference` (any case, any column
 * order), one pre-classified movement per row. Amounts are in the
 * reporting currency; `direction` is `received` or `returned`.
 */

import { parse } from "csv-parse/sync";
import type { SecondaryMovement } from "@histcost/types";
import { isSecondaryMovement } from "@histcost/types";
import { CliError } from "./errors.js";

const AMOUNT_FORMAT = /^\d+(\.\d+)?$/;
const NON_ZERO = /[1-9]/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function cell(row: Record<string, unknown>, column: string): string {
  const value = row[column];
  return typeof value === "string" ? value.trim() : "";
}

export function parseSecondaryLedger(text: string): readonly SecondaryMovement[] {
  let records: unknown;
  try {
    records = parse(text, {
      columns: (header: string[]) => header.map((name) => name.trim().toLowerCase()),
      bom: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliError("INVALID_SECONDARY_LEDGER", `Secondary ledger is not valid CSV: ${reason}`);
  }
  if (!Array.isArray(records)) {
    return [];
  }

  const movements: SecondaryMovement[] = [];
  records.forEach((row: unknown, index) => {
    // header is line 1
    const line = index + 2;
    if (!isRecord(row)) return;

    const candidate = {
      date: cell(row, "date"),
      amount: cell(row, "amount").replaceAll(",", ""),
      direction: cell(row, "direction").toLowerCase(),
      reference: cell(row, "reference"),
    };
    const positive = AMOUNT_FORMAT.test(candidate.amount) && NON_ZERO.test(candidate.amount);
    if (!isSecondaryMovement(candidate) || !positive) {
      throw new CliError(
        "INVALID_SECONDARY_LEDGER",
        `Secondary ledger row ${String(line)} needs a YYYY-MM-DD date, a positive amount and a direction of received or returned`,
      );
    }
    movements.push(candidate);
  });

  return movements;
}
