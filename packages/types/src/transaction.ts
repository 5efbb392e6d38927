/**
 * Transaction Types
 *
 * The uniform representation every source record is normalised into
 * before lot matching and journal posting.
 *
 * Rules:
 * - Transactions are immutable once ingested
 * - Dates are calendar dates (YYYY-MM-DD); time of day carries no meaning
 * - Quantities and considerations are unsigned decimal strings; the
 *   direction lives in `direction`, never in a sign
 */

/**
 * Closed set of tradable instrument categories.
 * Drives gain/loss routing and holdings-schedule inclusion.
 */
export type InstrumentClass =
  | "equity"
  | "option"
  | "currency-conversion"
  | "digital-asset";

/** Whether a trade opens (acquires) or closes (disposes of) a holding. */
export type TradeDirection = "acquisition" | "disposal";

/**
 * A trade execution.
 */
export interface TradeTransaction {
  readonly kind: "trade";

  /** Source transaction id (broker trade id or synthetic) */
  readonly id: string;

  /** Position of the row in the source export; final ordering tie-break */
  readonly sequence: number;

  /** Occurrence date, YYYY-MM-DD */
  readonly date: string;

  /** Security symbol, currency pair, or digital-asset ticker */
  readonly instrument: string;

  readonly instrumentClass: InstrumentClass;

  readonly direction: TradeDirection;

  /** Positive, nonzero */
  readonly quantity: string;

  /** Gross consideration in transaction currency, non-negative */
  readonly grossConsideration: string;

  /** Commission in transaction currency, non-negative */
  readonly transactionCost: string;

  /** Transaction currency code */
  readonly currency: string;

  readonly description: string;
}

/**
 * Economic category of a cash movement.
 */
export type CashMovementCategory =
  | "dividend"
  | "withholding-tax"
  | "interest"
  | "fee"
  | "capital"
  | "other";

/**
 * A cash movement that is not a trade.
 */
export interface CashTransaction {
  readonly kind: "cash";
  readonly id: string;
  readonly sequence: number;
  readonly date: string;
  readonly category: CashMovementCategory;

  /** The broker's own type label, kept for the audit trail */
  readonly rawType: string;

  /** Related symbol; empty for account-level movements */
  readonly instrument: string;

  readonly description: string;

  /** Signed: positive = received, negative = paid */
  readonly amount: string;

  readonly currency: string;
}

export type Transaction = TradeTransaction | CashTransaction;

/**
 * Broker-reported open position at the end of the export.
 * Used only to cross-check the holdings schedule.
 */
export interface PositionSnapshot {
  readonly instrument: string;
  readonly instrumentClass?: InstrumentClass | undefined;
  readonly quantity: string;
  readonly costBasis: string;
  readonly currency: string;
  readonly description: string;
}

/**
 * Corporate action row. Recognised, never posted; surfaced for review.
 */
export interface CorporateActionRecord {
  readonly date: string;
  readonly instrument: string;
  readonly description: string;
  readonly fields: Readonly<Record<string, string>>;
}

/**
 * Pre-classified movement from the secondary (non-brokerage) ledger,
 * in reporting currency.
 */
export interface SecondaryMovement {
  readonly date: string;

  /** Positive amount in reporting currency */
  readonly amount: string;

  readonly direction: "received" | "returned";

  readonly reference: string;
}
