/**
 * @histcost/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @histcost/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored postings
 * - Fail-closed: invalid posting groups throw, never silently succeed
 */

import type {
  AccountRef,
  Posting,
} from "@histcost/types";

// ─── Account Types ───────────────────────────────────────────────────────

/** The five fundamental account types in double-entry accounting. */
export type AccountType = AccountRef["type"];

/** Normal balance direction for an account. */
export type NormalBalance = "debit" | "credit";

/**
 * Map account types to their normal balance direction.
 *
 * - Asset, Expense → debit-normal (increases with debits)
 * - Liability, Income, Equity → credit-normal (increases with credits)
 */
export const NORMAL_BALANCE: Readonly<Record<AccountType, NormalBalance>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  income: "credit",
  equity: "credit",
} as const;

// ─── Ledger Types ────────────────────────────────────────────────────────

/**
 * An immutable account registered in the ledger.
 */
export interface LedgerAccount {
  readonly ref: AccountRef;
  readonly createdAt: string;
}

/**
 * A balanced group of postings sharing a correlation ID.
 * All postings within a group must balance (total debits = total credits).
 */
export interface PostingGroup {
  readonly correlationId: string;
  readonly postings: readonly Posting[];
  readonly timestamp: string;
  readonly sourceRef?: string | undefined;
  readonly description?: string | undefined;
}

/**
 * Balance for a single currency within an account.
 */
export interface CurrencyBalance {
  readonly currency: string;
  readonly decimals: number;
  /** Net balance as string. Positive = normal direction, negative = contra. */
  readonly balance: string;
  /** Total debits applied to this account in this currency. */
  readonly totalDebits: string;
  /** Total credits applied to this account in this currency. */
  readonly totalCredits: string;
}

/**
 * Full balance information for an account across all currencies.
 */
export interface AccountBalance {
  readonly accountId: string;
  readonly accountType: AccountType;
  readonly balances: readonly CurrencyBalance[];
}

/**
 * A single line in the trial balance.
 */
export interface TrialBalanceLine {
  readonly accountId: string;
  readonly accountName: string;
  readonly accountType: AccountType;
  readonly currency: string;
  readonly decimals: number;
  readonly debitBalance: string;
  readonly creditBalance: string;
}

/**
 * Column totals for one currency.
 */
export interface TrialBalanceTotals {
  readonly currency: string;
  readonly totalDebits: string;
  readonly totalCredits: string;
  /** totalDebits − totalCredits */
  readonly difference: string;
  readonly balanced: boolean;
}

/**
 * The full trial balance report.
 *
 * An out-of-balance result is reported, not thrown: `balanced` is false
 * and the per-currency `difference` shows by how much.
 */
export interface TrialBalance {
  readonly lines: readonly TrialBalanceLine[];
  readonly totals: readonly TrialBalanceTotals[];
  /** Tolerance applied, in scaled units of each currency. */
  readonly toleranceUnits: string;
  readonly generatedAt: string;
  /** Whether every currency is in balance within tolerance. */
  readonly balanced: boolean;
}

/**
 * Options for computing a trial balance.
 */
export interface TrialBalanceOptions {
  /**
   * Allowed |debits − credits| in smallest units of the currency.
   * Defaults to 1 (one rounding unit).
   */
  readonly toleranceUnits?: bigint | undefined;
  readonly timestamp?: string | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNBALANCED_TRANSACTION"
  | "UNKNOWN_ACCOUNT"
  | "CURRENCY_MISMATCH"
  | "INVALID_AMOUNT"
  | "DIVISION_BY_ZERO"
  | "DUPLICATE_ENTRY_ID"
  | "DUPLICATE_ACCOUNT_ID"
  | "INVALID_ACCOUNT"
  | "EMPTY_TRANSACTION"
  | "MIXED_CORRELATION_ID"
  | "INVALID_MONEY";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Append Options ──────────────────────────────────────────────────────

/**
 * Options for appending a posting group to the ledger.
 */
export interface AppendOptions {
  readonly description?: string | undefined;
  readonly sourceRef?: string | undefined;
}

/**
 * Result of a successful append operation.
 */
export interface AppendResult {
  readonly correlationId: string;
  readonly postingCount: number;
  readonly timestamp: string;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the entire ledger state.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly accounts: readonly LedgerAccount[];
  readonly postings: readonly Posting[];
  readonly createdAt: string;
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Filter criteria for querying postings.
 */
export interface PostingFilter {
  readonly accountId?: string | undefined;
  readonly correlationId?: string | undefined;
  readonly sourceRef?: string | undefined;
  readonly currency?: string | undefined;
  readonly fromTimestamp?: string | undefined;
  readonly toTimestamp?: string | undefined;
}
