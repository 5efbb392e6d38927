/**
 * @histcost/ingest — Brokerage export ingestion.
 *
 * Reads a sectioned CSV export into normalised trades, cash movements,
 * broker positions and corporate-action rows, and fixes the global
 * order in which trades are matched against lots.
 */

export { parseFlexExport } from "./flex-parser.js";
export { orderForLotMatching, compareForLotMatching } from "./ordering.js";
export { classifyCashType, CASH_RULES } from "./cash-classifier.js";
export type { CashRule } from "./cash-classifier.js";
export {
  DEFAULT_SECTION_TABLE,
  DEFAULT_INSTRUMENT_CLASS_TABLE,
  routeSection,
  lookupInstrumentClass,
} from "./tables.js";
export { parseDateCell, parseNumberCell } from "./cells.js";
export { readCsvRows } from "./csv-rows.js";
export type { CsvRow, CsvReadResult, UnreadableLine } from "./csv-rows.js";

export type {
  SectionKind,
  SectionRoute,
  SectionTable,
  InstrumentClassTable,
  SkipReason,
  SkippedRow,
  UnrecognizedSection,
  IngestLogEntry,
  IngestOptions,
  IngestResult,
  IngestErrorCode,
} from "./types.js";
export { IngestError } from "./types.js";
