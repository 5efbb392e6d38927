/**
 * @histcost/journal — Posting engine, aggregation and run orchestration.
 *
 * Routes trades, cash movements and secondary-ledger movements onto a
 * fixed chart of accounts, then produces the trial balance, holdings
 * schedule and journal digest for one run.
 */

// Engine
export { JournalEngine } from "./journal-engine.js";

// Run
export { runTrialBalance } from "./run.js";

// Aggregation
export { buildHoldingsSchedule } from "./holdings.js";
export { realizedByClass } from "./realized.js";
export { journalDigest } from "./digest.js";

// Chart and routing
export {
  ACCOUNTS,
  CHART_OF_ACCOUNTS,
  CASH_ROUTES,
  DEFAULT_CLASS_POLICY,
  DEFAULT_CASH_ACCOUNTS,
  cashAccountFor,
} from "./chart.js";

// Types
export type {
  TransactionCostPolicy,
  ClassPolicy,
  ClassPolicyTable,
  CashAccountMap,
  JournalEntryKind,
  JournalLine,
  JournalEntry,
  JournalLogEntry,
  JournalEngineOptions,
  HoldingsFlag,
  HoldingsLine,
  ExcludedHoldings,
  TransitReconciliation,
  HoldingsSchedule,
  HoldingsOptions,
  RealizedClassTotal,
  RunInput,
  RunDeps,
  RunReport,
  RunAbort,
  RunResult,
  JournalErrorCode,
} from "./types.js";
export { JournalError } from "./types.js";
