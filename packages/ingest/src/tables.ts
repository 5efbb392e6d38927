/**
 * Default routing tables. Callers may pass their own.
 */

import type { InstrumentClass } from "@histcost/types";
import type { InstrumentClassTable, SectionRoute, SectionTable } from "./types.js";

export const DEFAULT_SECTION_TABLE: SectionTable = {
  TRNT: "trades",
  Trades: "trades",
  CTRN: "cash",
  CashTransactions: "cash",
  POST: "positions",
  OpenPositions: "positions",
  CORP: "corporate-actions",
  CorporateActions: "corporate-actions",
};

export const DEFAULT_INSTRUMENT_CLASS_TABLE: InstrumentClassTable = {
  STK: "equity",
  OPT: "option",
  CASH: "currency-conversion",
  CRYPTO: "digital-asset",
};

export function routeSection(code: string, table: SectionTable): SectionRoute {
  const kind = Object.hasOwn(table, code) ? table[code] : undefined;
  return kind === undefined ? { kind: "unrecognized", code } : { kind };
}

export function lookupInstrumentClass(
  tag: string,
  table: InstrumentClassTable,
): InstrumentClass | undefined {
  const key = tag.trim().toUpperCase();
  return Object.hasOwn(table, key) ? table[key] : undefined;
}
