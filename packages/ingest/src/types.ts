/**
 * @histcost/ingest — Types for reading a sectioned brokerage export.
 *
 * Rules:
 * - Sections are routed by an explicit table, never by substring match
 * - Instrument classes come from an explicit tag table, never inferred
 * - Row-level problems skip the row and are reported; structural
 *   problems abort the whole ingest
 */

import type {
  CashTransaction,
  CorporateActionRecord,
  InstrumentClass,
  PositionSnapshot,
  TradeTransaction,
} from "@histcost/types";

// ─── Routing tables ──────────────────────────────────────────────────────

/** What a recognised section contains. */
export type SectionKind = "trades" | "cash" | "positions" | "corporate-actions";

/**
 * Result of looking a section code up. Anything not in the table is
 * the explicit `unrecognized` variant.
 */
export type SectionRoute =
  | { readonly kind: SectionKind }
  | { readonly kind: "unrecognized"; readonly code: string };

/** Section code → kind. Exact match. */
export type SectionTable = Readonly<Record<string, SectionKind>>;

/** Broker asset-class tag → instrument class. Exact match. */
export type InstrumentClassTable = Readonly<Record<string, InstrumentClass>>;

// ─── Skips and logging ───────────────────────────────────────────────────

export type SkipReason =
  | "missing-date"
  | "invalid-date"
  | "missing-symbol"
  | "unknown-direction"
  | "unknown-instrument-class"
  | "zero-quantity"
  | "zero-amount"
  | "invalid-number"
  | "invalid-csv"
  | "after-period-end";

/**
 * A source row that was read but not turned into a record.
 */
export interface SkippedRow {
  /** 1-based line in the export */
  readonly line: number;
  readonly section: string;
  readonly reason: SkipReason;
  readonly detail: string;
}

export interface UnrecognizedSection {
  readonly code: string;
  readonly rowCount: number;
}

export interface IngestLogEntry {
  readonly level: "info" | "warn";
  readonly message: string;
  readonly section?: string | undefined;
  /** Row marker (column 1) of rows dropped for an unknown marker */
  readonly marker?: string | undefined;
  readonly line?: number | undefined;
  readonly reason?: SkipReason | undefined;
  readonly rowCount?: number | undefined;
}

export interface IngestOptions {
  /** Defaults to DEFAULT_SECTION_TABLE */
  readonly sectionTable?: SectionTable | undefined;

  /** Defaults to DEFAULT_INSTRUMENT_CLASS_TABLE */
  readonly classTable?: InstrumentClassTable | undefined;

  /** YYYY-MM-DD; trades and cash dated later are excluded */
  readonly periodEnd?: string | undefined;

  /** Currency assumed when a row carries none. Default: "USD" */
  readonly defaultCurrency?: string | undefined;

  readonly onLog?: ((entry: IngestLogEntry) => void) | undefined;
}

export interface IngestResult {
  readonly trades: readonly TradeTransaction[];
  readonly cash: readonly CashTransaction[];
  readonly positions: readonly PositionSnapshot[];
  readonly corporateActions: readonly CorporateActionRecord[];
  readonly skipped: readonly SkippedRow[];
  readonly unrecognizedSections: readonly UnrecognizedSection[];
  /** HEADER and DATA rows read, across every section */
  readonly rowCount: number;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type IngestErrorCode =
  | "MALFORMED_SECTION"
  | "MISSING_SECTION"
  | "EMPTY_INPUT";

/**
 * Structural failure: the export cannot be trusted as a whole.
 */
export class IngestError extends Error {
  public readonly code: IngestErrorCode;
  public readonly line: number | undefined;

  constructor(code: IngestErrorCode, message: string, line?: number) {
    super(message);
    this.name = "IngestError";
    this.code = code;
    this.line = line;
  }
}
