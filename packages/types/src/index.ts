/**
 * @histcost/types — Shared domain types for the histcost stack.
 *
 * These types are used across all histcost packages:
 * - Financial primitives (Money, postings, accounts)
 * - Normalised transactions and instrument classes
 * - Broker position snapshots and secondary-ledger movements
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Financial types
export type {
  Money,
  Currency,
  Posting,
  PostingType,
  AccountRef,
} from "./financial.js";

// Transaction types
export type {
  InstrumentClass,
  TradeDirection,
  TradeTransaction,
  CashMovementCategory,
  CashTransaction,
  Transaction,
  PositionSnapshot,
  CorporateActionRecord,
  SecondaryMovement,
} from "./transaction.js";

// Runtime type guards
export {
  isMoney,
  isAccountRef,
  isPostingType,
  isPosting,
  isCalendarDate,
  isInstrumentClass,
  isTradeDirection,
  isCashMovementCategory,
  isTradeTransaction,
  isCashTransaction,
  isSecondaryMovement,
} from "./guards.js";
