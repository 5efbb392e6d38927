/**
 * @histcost/ingest — Sectioned brokerage export reader.
 *
 * Every row starts with a marker and a section code:
 *
 *   "HEADER","TRNT","TradeDate","Symbol",...
 *   "DATA","TRNT","2024-03-01","ABC",...
 *
 * A HEADER row declares its section's column names; each DATA row is
 * keyed by the header of its own section code, so sections may be
 * interleaved. BOF/EOF/BOA/EOA/BOS/EOS rows are structural and ignored;
 * rows with any other marker are dropped and logged per marker.
 */

import type {
  CashTransaction,
  CorporateActionRecord,
  PositionSnapshot,
  TradeDirection,
  TradeTransaction,
} from "@histcost/types";
import {
  absDecimal,
  firstField,
  isZeroDecimal,
  parseDateCell,
  parseNumberCell,
} from "./cells.js";
import type { FieldRecord } from "./cells.js";
import { classifyCashType } from "./cash-classifier.js";
import { readCsvRows } from "./csv-rows.js";
import {
  DEFAULT_INSTRUMENT_CLASS_TABLE,
  DEFAULT_SECTION_TABLE,
  lookupInstrumentClass,
  routeSection,
} from "./tables.js";
import type {
  IngestLogEntry,
  IngestOptions,
  IngestResult,
  InstrumentClassTable,
  SkipReason,
  SkippedRow,
  UnrecognizedSection,
} from "./types.js";
import { IngestError } from "./types.js";

const STRUCTURAL_MARKERS = new Set(["BOF", "EOF", "BOA", "EOA", "BOS", "EOS"]);

const TRADE_DATE_FIELDS = ["TradeDate", "DateTime", "Date/Time", "Date"];
const CASH_DATE_FIELDS = ["Date", "DateTime", "Date/Time", "SettleDate", "ReportDate"];
const CORPORATE_ACTION_DATE_FIELDS = ["Date/Time", "DateTime", "Date", "ReportDate"];
const CURRENCY_FIELDS = ["CurrencyPrimary", "Currency"];

const DIRECTIONS: Readonly<Record<string, TradeDirection>> = {
  BUY: "acquisition",
  BOT: "acquisition",
  SELL: "disposal",
  SLD: "disposal",
};

type RowOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: SkipReason; readonly detail: string };

function skip<T>(reason: SkipReason, detail: string): RowOutcome<T> {
  return { ok: false, reason, detail };
}

interface RowContext {
  readonly line: number;
  readonly classTable: InstrumentClassTable;
  readonly defaultCurrency: string;
  readonly nextId: (prefix: "trade" | "cash", sourceId: string) => string;
}

// =============================================================================
// Row readers
// =============================================================================

function readDate(record: FieldRecord, fields: readonly string[]): RowOutcome<string> {
  const cell = firstField(record, fields);
  if (cell === "") return skip("missing-date", `none of ${fields.join(", ")} is set`);
  const date = parseDateCell(cell);
  return date === undefined ? skip("invalid-date", `unreadable date "${cell}"`) : { ok: true, value: date };
}

function readNumber(record: FieldRecord, fields: readonly string[]): RowOutcome<string> {
  const cell = firstField(record, fields);
  const value = parseNumberCell(cell);
  return value === undefined
    ? skip("invalid-number", `${fields[0] ?? "value"} "${cell}" is not a number`)
    : { ok: true, value };
}

function readTrade(record: FieldRecord, ctx: RowContext): RowOutcome<TradeTransaction> {
  const date = readDate(record, TRADE_DATE_FIELDS);
  if (!date.ok) return date;

  const instrument = firstField(record, ["Symbol"]);
  if (instrument === "") return skip("missing-symbol", "trade has no Symbol");

  const tag = firstField(record, ["AssetClass"]);
  const instrumentClass = lookupInstrumentClass(tag, ctx.classTable);
  if (instrumentClass === undefined) {
    return skip("unknown-instrument-class", `asset class "${tag}" for ${instrument} is not mapped`);
  }

  const side = firstField(record, ["Buy/Sell"]).toUpperCase();
  const direction = DIRECTIONS[side];
  if (direction === undefined) {
    return skip("unknown-direction", `Buy/Sell "${side}" for ${instrument}`);
  }

  const quantity = readNumber(record, ["Quantity"]);
  if (!quantity.ok) return quantity;
  if (isZeroDecimal(quantity.value)) return skip("zero-quantity", `zero quantity for ${instrument}`);

  const proceeds = readNumber(record, ["Proceeds"]);
  if (!proceeds.ok) return proceeds;
  const commission = readNumber(record, ["IBCommission", "Commission"]);
  if (!commission.ok) return commission;

  return {
    ok: true,
    value: {
      kind: "trade",
      id: ctx.nextId("trade", firstField(record, ["TradeID", "TransactionID"])),
      sequence: ctx.line,
      date: date.value,
      instrument,
      instrumentClass,
      direction,
      quantity: absDecimal(quantity.value),
      grossConsideration: absDecimal(proceeds.value),
      transactionCost: absDecimal(commission.value),
      currency: (firstField(record, CURRENCY_FIELDS) || ctx.defaultCurrency).toUpperCase(),
      description: firstField(record, ["Description"]),
    },
  };
}

function readCash(record: FieldRecord, ctx: RowContext): RowOutcome<CashTransaction> {
  const date = readDate(record, CASH_DATE_FIELDS);
  if (!date.ok) return date;

  const amount = readNumber(record, ["Amount"]);
  if (!amount.ok) return amount;
  const rawType = firstField(record, ["Type"]);
  if (isZeroDecimal(amount.value)) return skip("zero-amount", `zero amount for "${rawType}"`);

  return {
    ok: true,
    value: {
      kind: "cash",
      id: ctx.nextId("cash", firstField(record, ["TransactionID"])),
      sequence: ctx.line,
      date: date.value,
      category: classifyCashType(rawType),
      rawType,
      instrument: firstField(record, ["Symbol"]),
      description: firstField(record, ["Description"]),
      amount: amount.value,
      currency: (firstField(record, CURRENCY_FIELDS) || ctx.defaultCurrency).toUpperCase(),
    },
  };
}

function readPosition(record: FieldRecord, ctx: RowContext): RowOutcome<PositionSnapshot | undefined> {
  const instrument = firstField(record, ["Symbol"]);
  if (instrument === "") return skip("missing-symbol", "position has no Symbol");

  const quantity = readNumber(record, ["Quantity", "Position"]);
  if (!quantity.ok) return quantity;
  if (isZeroDecimal(quantity.value)) return { ok: true, value: undefined };

  const costBasis = readNumber(record, ["CostBasisMoney", "CostBasis"]);
  if (!costBasis.ok) return costBasis;

  return {
    ok: true,
    value: {
      instrument,
      instrumentClass: lookupInstrumentClass(firstField(record, ["AssetClass"]), ctx.classTable),
      quantity: quantity.value,
      costBasis: costBasis.value,
      currency: (firstField(record, CURRENCY_FIELDS) || ctx.defaultCurrency).toUpperCase(),
      description: firstField(record, ["Description"]),
    },
  };
}

function readCorporateAction(record: FieldRecord): RowOutcome<CorporateActionRecord> {
  const date = readDate(record, CORPORATE_ACTION_DATE_FIELDS);
  if (!date.ok) return date;
  return {
    ok: true,
    value: {
      date: date.value,
      instrument: firstField(record, ["Symbol"]),
      description: firstField(record, ["Description", "ActionDescription"]),
      fields: record,
    },
  };
}

// =============================================================================
// Export reader
// =============================================================================

function keyRow(header: readonly string[], cells: readonly string[]): FieldRecord {
  const record: Record<string, string> = {};
  for (let i = 2; i < header.length; i++) {
    const name = header[i];
    if (name === undefined || name === "") continue;
    record[name] = cells[i] ?? "";
  }
  return record;
}

/**
 * Read a sectioned export into normalised records.
 *
 * @throws IngestError on structural failure (no rows, a DATA row before
 *   its section's HEADER, no trades section)
 */
export function parseFlexExport(text: string, options: IngestOptions = {}): IngestResult {
  const sectionTable = options.sectionTable ?? DEFAULT_SECTION_TABLE;
  const classTable = options.classTable ?? DEFAULT_INSTRUMENT_CLASS_TABLE;
  const defaultCurrency = options.defaultCurrency ?? "USD";
  const periodEnd = options.periodEnd;
  const log = options.onLog ?? ((_entry: IngestLogEntry): void => undefined);

  const headers = new Map<string, readonly string[]>();
  const unrecognized = new Map<string, number>();
  const unknownMarkers = new Map<string, number>();
  const trades: TradeTransaction[] = [];
  const cash: CashTransaction[] = [];
  const positions: PositionSnapshot[] = [];
  const corporateActions: CorporateActionRecord[] = [];
  const skipped: SkippedRow[] = [];

  const usedIds = new Set<string>();
  const counters = { trade: 0, cash: 0 };
  let rowCount = 0;
  let sawTradesHeader = false;

  const skipRow = (row: SkippedRow): void => {
    skipped.push(row);
    log({
      level: row.reason === "after-period-end" ? "info" : "warn",
      message: `Skipped row: ${row.detail}`,
      section: row.section,
      line: row.line,
      reason: row.reason,
    });
  };

  const { rows, unreadable } = readCsvRows(text);
  for (const { line, reason } of unreadable) {
    skipRow({ line, section: "", reason: "invalid-csv", detail: `line ${String(line)} is not readable as CSV: ${reason}` });
  }

  for (const { line, cells } of rows) {
    const marker = (cells[0] ?? "").toUpperCase();
    const section = cells[1] ?? "";
    if (STRUCTURAL_MARKERS.has(marker)) continue;
    if (marker !== "HEADER" && marker !== "DATA") {
      unknownMarkers.set(marker, (unknownMarkers.get(marker) ?? 0) + 1);
      continue;
    }
    rowCount += 1;

    const route = routeSection(section, sectionTable);

    if (marker === "HEADER") {
      headers.set(section, cells);
      if (route.kind === "trades") sawTradesHeader = true;
      if (route.kind === "unrecognized" && !unrecognized.has(section)) {
        unrecognized.set(section, 0);
      }
      continue;
    }

    if (route.kind === "unrecognized") {
      unrecognized.set(section, (unrecognized.get(section) ?? 0) + 1);
      continue;
    }

    const header = headers.get(section);
    if (header === undefined) {
      throw new IngestError(
        "MALFORMED_SECTION",
        `DATA row for section "${section}" at line ${String(line)} has no preceding HEADER`,
        line,
      );
    }

    const fields = keyRow(header, cells);
    const ctx: RowContext = {
      line,
      classTable,
      defaultCurrency,
      nextId: (prefix, sourceId) => {
        let id = sourceId;
        if (id === "") {
          counters[prefix] += 1;
          id = `${prefix}-${String(counters[prefix])}`;
        }
        if (usedIds.has(id)) {
          log({ level: "warn", message: `Duplicate transaction id "${id}"`, section, line });
          id = `${id}@${String(line)}`;
        }
        usedIds.add(id);
        return id;
      },
    };

    switch (route.kind) {
      case "trades": {
        const outcome = readTrade(fields, ctx);
        if (!outcome.ok) {
          skipRow({ line, section, reason: outcome.reason, detail: outcome.detail });
        } else if (periodEnd !== undefined && outcome.value.date > periodEnd) {
          skipRow({ line, section, reason: "after-period-end", detail: `trade ${outcome.value.id} dated ${outcome.value.date}` });
        } else {
          trades.push(outcome.value);
        }
        break;
      }
      case "cash": {
        const outcome = readCash(fields, ctx);
        if (!outcome.ok) {
          skipRow({ line, section, reason: outcome.reason, detail: outcome.detail });
        } else if (periodEnd !== undefined && outcome.value.date > periodEnd) {
          skipRow({ line, section, reason: "after-period-end", detail: `cash ${outcome.value.id} dated ${outcome.value.date}` });
        } else {
          cash.push(outcome.value);
        }
        break;
      }
      case "positions": {
        const outcome = readPosition(fields, ctx);
        if (!outcome.ok) {
          skipRow({ line, section, reason: outcome.reason, detail: outcome.detail });
        } else if (outcome.value !== undefined) {
          positions.push(outcome.value);
        }
        break;
      }
      case "corporate-actions": {
        const outcome = readCorporateAction(fields);
        if (!outcome.ok) {
          skipRow({ line, section, reason: outcome.reason, detail: outcome.detail });
        } else {
          corporateActions.push(outcome.value);
        }
        break;
      }
    }
  }

  if (rowCount === 0) {
    throw new IngestError("EMPTY_INPUT", "Export contains no HEADER or DATA rows");
  }
  if (!sawTradesHeader) {
    throw new IngestError("MISSING_SECTION", "Export has no trades section header");
  }

  const unrecognizedSections: UnrecognizedSection[] = [];
  for (const [code, count] of unrecognized) {
    unrecognizedSections.push({ code, rowCount: count });
    log({ level: "warn", message: `Dropped unrecognized section "${code}"`, section: code, rowCount: count });
  }
  for (const [marker, count] of unknownMarkers) {
    log({ level: "warn", message: `Dropped rows with unrecognized marker "${marker}"`, marker, rowCount: count });
  }

  return {
    trades,
    cash,
    positions,
    corporateActions,
    skipped,
    unrecognizedSections,
    rowCount,
  };
}
