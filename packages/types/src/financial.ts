/**
 * Financial Types
 *
 * Core financial primitives for historical-cost accounting.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit (no implicit reporting currency)
 * - Postings are append-only by contract
 */

/**
 * Currency identifier. ISO 4217 codes for fiat, ticker symbols for
 * digital assets.
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "-12.00") */
  readonly amount: string;

  /** Currency code (e.g., "GBP", "USD") */
  readonly currency: Currency;

  /** Number of decimal places carried for this currency (GBP = 2). */
  readonly decimals: number;
}

/**
 * Reference to an account in the chart of accounts.
 */
export interface AccountRef {
  /** Account code, e.g. "1200" */
  readonly id: string;

  /** Account type (asset, liability, income, expense, equity) */
  readonly type: "asset" | "liability" | "income" | "expense" | "equity";

  /** Human-readable name */
  readonly name: string;
}

/**
 * Side of a posting (double-entry accounting).
 */
export type PostingType = "debit" | "credit";

/**
 * A single leg of a journal entry.
 * Always part of a balanced posting group (debits = credits).
 */
export interface Posting {
  /** Unique posting identifier */
  readonly id: string;

  /** Which account this posting affects */
  readonly accountId: string;

  /** Debit or credit */
  readonly type: PostingType;

  /** The amount, always positive */
  readonly money: Money;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Posting group this leg belongs to */
  readonly correlationId: string;

  /** Id of the source transaction that produced this posting */
  readonly sourceRef?: string | undefined;

  /** Free-text narrative */
  readonly memo?: string | undefined;
}
