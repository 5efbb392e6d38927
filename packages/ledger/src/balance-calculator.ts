/**
 * @histcost/ledger — Balance calculation and trial balance aggregation.
 *
 * Computes account balances and the trial balance from postings.
 * All calculations are deterministic using bigint arithmetic.
 *
 * Rules:
 * - Balances are computed per-currency (never cross-currency)
 * - Normal balance rules determine which column a net balance lands in
 * - No period-close: income and expense accounts keep their natural
 *   balances, nothing is transferred to retained earnings
 * - Imbalance is reported, never thrown
 */

import type { Posting } from "@histcost/types";
import type { AccountRegistry } from "./accounts.js";
import type {
  AccountBalance,
  CurrencyBalance,
  TrialBalance,
  TrialBalanceLine,
  TrialBalanceOptions,
  TrialBalanceTotals,
} from "./types.js";
import { NORMAL_BALANCE } from "./types.js";
import { formatAmount, parseAmount } from "./money-math.js";

function balanceKey(accountId: string, currency: string): string {
  return `${accountId}::${currency}`;
}

interface BalanceAccumulator {
  readonly accountId: string;
  readonly currency: string;
  readonly decimals: number;
  totalDebits: bigint;
  totalCredits: bigint;
}

function buildAccumulators(
  postings: readonly Posting[],
): Map<string, BalanceAccumulator> {
  const accumulators = new Map<string, BalanceAccumulator>();

  for (const posting of postings) {
    const key = balanceKey(posting.accountId, posting.money.currency);
    let acc = accumulators.get(key);

    if (acc === undefined) {
      acc = {
        accountId: posting.accountId,
        currency: posting.money.currency,
        decimals: posting.money.decimals,
        totalDebits: 0n,
        totalCredits: 0n,
      };
      accumulators.set(key, acc);
    }

    const amount = parseAmount(posting.money.amount, posting.money.decimals);

    if (posting.type === "debit") {
      acc.totalDebits += amount;
    } else {
      acc.totalCredits += amount;
    }
  }

  return accumulators;
}

/**
 * Account code order, then currency. Keeps report output stable.
 */
function compareAccumulators(a: BalanceAccumulator, b: BalanceAccumulator): number {
  if (a.accountId !== b.accountId) return a.accountId < b.accountId ? -1 : 1;
  if (a.currency !== b.currency) return a.currency < b.currency ? -1 : 1;
  return 0;
}

/**
 * Compute the balance for a single account across all currencies.
 */
export function computeAccountBalance(
  accountId: string,
  postings: readonly Posting[],
  accounts: AccountRegistry,
): AccountBalance {
  const account = accounts.assertExists(accountId);
  const accumulators = buildAccumulators(postings.filter((p) => p.accountId === accountId));
  const normalBalance = NORMAL_BALANCE[account.ref.type];

  const balances: CurrencyBalance[] = [];

  for (const acc of [...accumulators.values()].sort(compareAccumulators)) {
    const net = normalBalance === "debit"
      ? acc.totalDebits - acc.totalCredits
      : acc.totalCredits - acc.totalDebits;

    balances.push({
      currency: acc.currency,
      decimals: acc.decimals,
      balance: formatAmount(net, acc.decimals),
      totalDebits: formatAmount(acc.totalDebits, acc.decimals),
      totalCredits: formatAmount(acc.totalCredits, acc.decimals),
    });
  }

  return {
    accountId,
    accountType: account.ref.type,
    balances,
  };
}

/**
 * Compute the trial balance from all postings.
 *
 * Each account+currency net balance goes to its normal column when
 * positive and to the opposite column when contra. A currency is in
 * balance when |debits − credits| is within the tolerance.
 */
export function computeTrialBalance(
  postings: readonly Posting[],
  accounts: AccountRegistry,
  options: TrialBalanceOptions = {},
): TrialBalance {
  const tolerance = options.toleranceUnits ?? 1n;
  const accumulators = [...buildAccumulators(postings).values()].sort(compareAccumulators);
  const lines: TrialBalanceLine[] = [];

  const currencyTotals = new Map<string, { debits: bigint; credits: bigint; decimals: number }>();

  for (const acc of accumulators) {
    const account = accounts.assertExists(acc.accountId);
    const netDebit = acc.totalDebits - acc.totalCredits;

    let debitBalance: bigint;
    let creditBalance: bigint;

    if (NORMAL_BALANCE[account.ref.type] === "debit") {
      debitBalance = netDebit >= 0n ? netDebit : 0n;
      creditBalance = netDebit >= 0n ? 0n : -netDebit;
    } else {
      const netCredit = -netDebit;
      debitBalance = netCredit >= 0n ? 0n : -netCredit;
      creditBalance = netCredit >= 0n ? netCredit : 0n;
    }

    lines.push({
      accountId: acc.accountId,
      accountName: account.ref.name,
      accountType: account.ref.type,
      currency: acc.currency,
      decimals: acc.decimals,
      debitBalance: formatAmount(debitBalance, acc.decimals),
      creditBalance: formatAmount(creditBalance, acc.decimals),
    });

    let totals = currencyTotals.get(acc.currency);
    if (totals === undefined) {
      totals = { debits: 0n, credits: 0n, decimals: acc.decimals };
      currencyTotals.set(acc.currency, totals);
    }
    totals.debits += debitBalance;
    totals.credits += creditBalance;
  }

  const totals: TrialBalanceTotals[] = [];
  for (const [currency, t] of [...currencyTotals.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    const difference = t.debits - t.credits;
    const magnitude = difference < 0n ? -difference : difference;
    totals.push({
      currency,
      totalDebits: formatAmount(t.debits, t.decimals),
      totalCredits: formatAmount(t.credits, t.decimals),
      difference: formatAmount(difference, t.decimals),
      balanced: magnitude <= tolerance,
    });
  }

  return {
    lines,
    totals,
    toleranceUnits: tolerance.toString(),
    generatedAt: options.timestamp ?? new Date().toISOString(),
    balanced: totals.every((t) => t.balanced),
  };
}
