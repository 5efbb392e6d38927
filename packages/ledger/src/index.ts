/**
 * @histcost/ledger — Append-only double-entry ledger engine.
 *
 * Enforces double-entry accounting invariants:
 * - Every posting group balances (debits = credits)
 * - Postings are immutable once appended
 * - All monetary arithmetic uses bigint (no floating point)
 * - The trial balance reports imbalance instead of throwing
 */

// Core engine
export { Ledger } from "./ledger.js";

// Account registry
export { AccountRegistry } from "./accounts.js";

// Balance computation
export {
  computeAccountBalance,
  computeTrialBalance,
} from "./balance-calculator.js";

// Decimal arithmetic
export {
  parseAmount,
  formatAmount,
  parseDecimal,
  divideRounded,
  rescale,
  convertAmount,
  multiplyAmount,
  validateMoney,
  assertSameCurrency,
  moneyFromScaled,
  toScaled,
  addMoney,
  subtractMoney,
  sumMoney,
  allocateMoney,
  isZero,
  isPositive,
  isNegative,
  zeroMoney,
  compareMoney,
  absMoney,
  negateMoney,
} from "./money-math.js";
export type { ScaledDecimal } from "./money-math.js";

// Types
export type {
  AccountType,
  NormalBalance,
  LedgerAccount,
  PostingGroup,
  CurrencyBalance,
  AccountBalance,
  TrialBalanceLine,
  TrialBalanceTotals,
  TrialBalance,
  TrialBalanceOptions,
  LedgerErrorCode,
  AppendOptions,
  AppendResult,
  LedgerSnapshot,
  PostingFilter,
} from "./types.js";

export { LedgerError, NORMAL_BALANCE } from "./types.js";
