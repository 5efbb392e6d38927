/**
 * @histcost/journal — Types for posting, aggregation and run results.
 *
 * Everything the journal emits is in the reporting currency.
 */

import type {
  CorporateActionRecord,
  InstrumentClass,
  Money,
  PositionSnapshot,
  PostingType,
  SecondaryMovement,
} from "@histcost/types";
import type { SkippedRow, UnrecognizedSection } from "@histcost/ingest";
import type { ShortfallRecord } from "@histcost/lots";
import type { RateProvider } from "@histcost/rates";
import type { TrialBalance } from "@histcost/ledger";

// ─── Policies ────────────────────────────────────────────────────────────

/**
 * How commission is treated.
 *
 * - capitalize: folded into acquisition cost, netted from disposal proceeds
 * - expense: excluded from lot cost and debited to Transaction Costs
 */
export type TransactionCostPolicy = "capitalize" | "expense";

/**
 * Routing for one instrument class.
 */
export interface ClassPolicy {
  readonly gainAccount: string;
  readonly lossAccount: string;
  /** Whether open lots of this class appear in the holdings schedule */
  readonly inHoldings: boolean;
}

export type ClassPolicyTable = Readonly<Record<InstrumentClass, ClassPolicy>>;

/**
 * Cash account per transaction currency.
 */
export interface CashAccountMap {
  /** Account for the reporting currency */
  readonly reporting: string;
  /** Accounts for specific foreign currencies, keyed by ISO code */
  readonly byCurrency: Readonly<Record<string, string>>;
  /** Account for every other currency */
  readonly fallback: string;
}

// ─── Journal ─────────────────────────────────────────────────────────────

export type JournalEntryKind = "trade" | "cash" | "secondary";

export interface JournalLine {
  readonly id: string;
  readonly accountId: string;
  readonly type: PostingType;
  readonly amount: string;
}

/**
 * One balanced posting group as written to the ledger.
 */
export interface JournalEntry {
  readonly correlationId: string;
  readonly kind: JournalEntryKind;
  /** Source transaction reference */
  readonly sourceRef: string;
  readonly date: string;
  readonly memo: string;
  readonly lines: readonly JournalLine[];
}

export interface JournalLogEntry {
  readonly level: "debug" | "info" | "warn";
  readonly message: string;
  readonly context?: Readonly<Record<string, string | number>> | undefined;
}

export interface JournalEngineOptions {
  readonly rates: RateProvider;
  /** Default: the rate provider's; must match it when given */
  readonly reportingCurrency?: string | undefined;
  /** Default: the rate provider's; must match it when given */
  readonly reportingDecimals?: number | undefined;
  /** Default: "capitalize" */
  readonly costPolicy?: TransactionCostPolicy | undefined;
  /** Default: DEFAULT_CLASS_POLICY */
  readonly classPolicy?: ClassPolicyTable | undefined;
  /** Default: DEFAULT_CASH_ACCOUNTS */
  readonly cashAccounts?: CashAccountMap | undefined;
  readonly onLog?: ((entry: JournalLogEntry) => void) | undefined;
}

// ─── Holdings ────────────────────────────────────────────────────────────

export type HoldingsFlag =
  | "quantity-mismatch"
  | "no-broker-position"
  /** A disposal of this instrument found no lot and was taken at zero cost */
  | "shortfall-on-instrument"
  /** Another instrument of this class was disposed of at zero cost */
  | "shortfall-in-class";

/**
 * How disposals find their lots. Only exact identifiers match, so a
 * line may be the unclosed remainder of an instrument the broker renamed.
 */
export type LotMatching = "per-identifier";

export interface HoldingsLine {
  readonly instrument: string;
  readonly instrumentClass: InstrumentClass;
  readonly quantity: string;
  readonly cost: Money;
  /** cost / quantity, 4 decimal places */
  readonly averageCost: string;
  readonly lotCount: number;
  /** Broker-reported quantity, when a position snapshot matched */
  readonly brokerQuantity?: string | undefined;
  readonly flags: readonly HoldingsFlag[];
}

export interface ExcludedHoldings {
  readonly instrumentClass: InstrumentClass;
  readonly lotCount: number;
  readonly cost: Money;
}

/**
 * Investments-at-cost balance against the schedule.
 * `difference` always equals `excludedCost` when the books are consistent.
 */
export interface TransitReconciliation {
  readonly transitBalance: Money;
  readonly scheduleTotal: Money;
  readonly excludedCost: Money;
  readonly difference: Money;
  readonly reconciled: boolean;
}

export interface HoldingsSchedule {
  readonly lines: readonly HoldingsLine[];
  readonly total: Money;
  readonly excluded: readonly ExcludedHoldings[];
  /** Broker positions of scheduled classes with no open lots behind them */
  readonly unmatchedPositions: readonly PositionSnapshot[];
  readonly matching: LotMatching;
  /** Zero-cost disposals the flags were derived from */
  readonly shortfalls: readonly ShortfallRecord[];
  readonly transit?: TransitReconciliation | undefined;
}

export interface HoldingsOptions {
  readonly positions?: readonly PositionSnapshot[] | undefined;
  readonly shortfalls?: readonly ShortfallRecord[] | undefined;
  /** Balance of the investments-at-cost account */
  readonly transitBalance?: Money | undefined;
  /** Default: "GBP" */
  readonly currency?: string | undefined;
  /** Default: 2 */
  readonly decimals?: number | undefined;
}

export interface RealizedClassTotal {
  readonly instrumentClass: InstrumentClass;
  readonly disposals: number;
  readonly gains: Money;
  readonly losses: Money;
  readonly net: Money;
}

// ─── Run ─────────────────────────────────────────────────────────────────

export interface RunInput {
  /** Sectioned brokerage export, CSV text */
  readonly ledgerExport: string;
  readonly secondaryMovements?: readonly SecondaryMovement[] | undefined;
  /** Inclusive, YYYY-MM-DD */
  readonly periodEnd?: string | undefined;
}

export interface RunDeps extends JournalEngineOptions {
  /** Currency assumed for export rows that carry none */
  readonly defaultCurrency?: string | undefined;
  /** Timestamp for the trial balance; defaults to now */
  readonly now?: (() => string) | undefined;
}

export interface RunReport {
  readonly trialBalance: TrialBalance;
  readonly holdings: HoldingsSchedule;
  readonly realized: readonly RealizedClassTotal[];
  readonly shortfalls: readonly ShortfallRecord[];
  readonly skipped: readonly SkippedRow[];
  readonly unrecognizedSections: readonly UnrecognizedSection[];
  readonly corporateActions: readonly CorporateActionRecord[];
  readonly excludedSecondary: readonly SecondaryMovement[];
  readonly journal: readonly JournalEntry[];
  /** SHA-256 of the canonical journal */
  readonly digest: string;
}

export interface RunAbort {
  readonly name: string;
  readonly code: string;
  readonly message: string;
}

export type RunResult =
  | ({ readonly status: "balanced" | "unbalanced" } & RunReport)
  | { readonly status: "aborted"; readonly error: RunAbort };

// ─── Errors ──────────────────────────────────────────────────────────────

export type JournalErrorCode =
  | "UNKNOWN_ACCOUNT"
  | "MISSING_CLASS_POLICY"
  | "INVALID_MOVEMENT"
  | "REPORTING_MISMATCH";

export class JournalError extends Error {
  public readonly code: JournalErrorCode;

  constructor(code: JournalErrorCode, message: string) {
    super(message);
    this.name = "JournalError";
    this.code = code;
  }
}
