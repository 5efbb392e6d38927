/**
 * Runtime Type Guards
 *
 * Narrowing functions for histcost domain types.
 * These enable safe runtime validation at system boundaries
 * (file inputs, deserialized reports, external integrations).
 */

import type { Money, AccountRef, Posting, PostingType } from "./financial.js";
import type {
  CashMovementCategory,
  CashTransaction,
  InstrumentClass,
  SecondaryMovement,
  TradeDirection,
  TradeTransaction,
} from "./transaction.js";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;
const UNSIGNED_DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

// =============================================================================
// Financial guards
// =============================================================================

const ACCOUNT_TYPES = new Set(["asset", "liability", "income", "expense", "equity"]);
const POSTING_TYPES = new Set<string>(["debit", "credit"]);

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.amount === "string" &&
    typeof v.currency === "string" &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0
  );
}

export function isAccountRef(value: unknown): value is AccountRef {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.type === "string" &&
    ACCOUNT_TYPES.has(v.type) &&
    typeof v.name === "string"
  );
}

export function isPostingType(value: unknown): value is PostingType {
  return typeof value === "string" && POSTING_TYPES.has(value);
}

export function isPosting(value: unknown): value is Posting {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.accountId === "string" &&
    isPostingType(v.type) &&
    isMoney(v.money) &&
    typeof v.timestamp === "string" &&
    typeof v.correlationId === "string" &&
    (v.sourceRef === undefined || typeof v.sourceRef === "string") &&
    (v.memo === undefined || typeof v.memo === "string")
  );
}

// =============================================================================
// Transaction guards
// =============================================================================

const INSTRUMENT_CLASSES = new Set<string>([
  "equity", "option", "currency-conversion", "digital-asset",
]);
const DIRECTIONS = new Set<string>(["acquisition", "disposal"]);
const CASH_CATEGORIES = new Set<string>([
  "dividend", "withholding-tax", "interest", "fee", "capital", "other",
]);
const SECONDARY_DIRECTIONS = new Set<string>(["received", "returned"]);

export function isCalendarDate(value: unknown): value is string {
  return typeof value === "string" && DATE_PATTERN.test(value);
}

export function isInstrumentClass(value: unknown): value is InstrumentClass {
  return typeof value === "string" && INSTRUMENT_CLASSES.has(value);
}

export function isTradeDirection(value: unknown): value is TradeDirection {
  return typeof value === "string" && DIRECTIONS.has(value);
}

export function isCashMovementCategory(value: unknown): value is CashMovementCategory {
  return typeof value === "string" && CASH_CATEGORIES.has(value);
}

export function isTradeTransaction(value: unknown): value is TradeTransaction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    v.kind === "trade" &&
    typeof v.id === "string" &&
    typeof v.sequence === "number" &&
    isCalendarDate(v.date) &&
    typeof v.instrument === "string" &&
    v.instrument.length > 0 &&
    isInstrumentClass(v.instrumentClass) &&
    isTradeDirection(v.direction) &&
    typeof v.quantity === "string" &&
    UNSIGNED_DECIMAL_PATTERN.test(v.quantity) &&
    /[1-9]/.test(v.quantity) &&
    typeof v.grossConsideration === "string" &&
    UNSIGNED_DECIMAL_PATTERN.test(v.grossConsideration) &&
    typeof v.transactionCost === "string" &&
    UNSIGNED_DECIMAL_PATTERN.test(v.transactionCost) &&
    typeof v.currency === "string" &&
    typeof v.description === "string"
  );
}

export function isCashTransaction(value: unknown): value is CashTransaction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    v.kind === "cash" &&
    typeof v.id === "string" &&
    typeof v.sequence === "number" &&
    isCalendarDate(v.date) &&
    isCashMovementCategory(v.category) &&
    typeof v.rawType === "string" &&
    typeof v.instrument === "string" &&
    typeof v.description === "string" &&
    typeof v.amount === "string" &&
    DECIMAL_PATTERN.test(v.amount) &&
    typeof v.currency === "string"
  );
}

export function isSecondaryMovement(value: unknown): value is SecondaryMovement {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isCalendarDate(v.date) &&
    typeof v.amount === "string" &&
    UNSIGNED_DECIMAL_PATTERN.test(v.amount) &&
    typeof v.direction === "string" &&
    SECONDARY_DIRECTIONS.has(v.direction) &&
    typeof v.reference === "string"
  );
}
