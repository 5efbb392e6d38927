/**
 * Chart of accounts and routing tables.
 *
 * Account codes double as ledger account ids.
 */

import type { AccountRef, CashMovementCategory } from "@histcost/types";
import type { CashAccountMap, ClassPolicyTable } from "./types.js";

export const ACCOUNTS = {
  cashReporting: "1100",
  cashUsd: "1101",
  cashOther: "1102",
  cashSecondary: "1103",
  investmentsAtCost: "1200",
  accruals: "2100",
  ownersLoan: "2101",
  shareCapital: "3000",
  retainedEarnings: "3100",
  periodProfit: "3200",
  capitalIntroduced: "3300",
  capitalWithdrawn: "3400",
  dividendIncome: "4000",
  interestReceived: "4100",
  realizedGains: "4200",
  fxGains: "4300",
  otherIncome: "4400",
  withholdingTax: "5000",
  transactionCosts: "5100",
  brokerFees: "5200",
  realizedLosses: "5400",
  fxLosses: "5500",
  interestPaid: "5600",
  otherExpenses: "5700",
} as const;

export const CHART_OF_ACCOUNTS: readonly AccountRef[] = [
  { id: ACCOUNTS.cashReporting, type: "asset", name: "Cash at Bank - Reporting Currency" },
  { id: ACCOUNTS.cashUsd, type: "asset", name: "Cash at Bank - USD" },
  { id: ACCOUNTS.cashOther, type: "asset", name: "Cash at Bank - Other Currency" },
  { id: ACCOUNTS.cashSecondary, type: "asset", name: "Cash at Bank - Secondary Account" },
  { id: ACCOUNTS.investmentsAtCost, type: "asset", name: "Investments at Cost" },
  { id: ACCOUNTS.accruals, type: "liability", name: "Accruals and Deferred Income" },
  { id: ACCOUNTS.ownersLoan, type: "liability", name: "Owner's Loan" },
  { id: ACCOUNTS.shareCapital, type: "equity", name: "Share Capital" },
  { id: ACCOUNTS.retainedEarnings, type: "equity", name: "Retained Earnings B/F" },
  { id: ACCOUNTS.periodProfit, type: "equity", name: "Profit/(Loss) for Period" },
  { id: ACCOUNTS.capitalIntroduced, type: "equity", name: "Capital Introduced" },
  { id: ACCOUNTS.capitalWithdrawn, type: "equity", name: "Capital Withdrawn" },
  { id: ACCOUNTS.dividendIncome, type: "income", name: "Dividend Income" },
  { id: ACCOUNTS.interestReceived, type: "income", name: "Interest Received" },
  { id: ACCOUNTS.realizedGains, type: "income", name: "Realized Gains on Investments" },
  { id: ACCOUNTS.fxGains, type: "income", name: "Foreign Exchange Gains" },
  { id: ACCOUNTS.otherIncome, type: "income", name: "Other Income" },
  { id: ACCOUNTS.withholdingTax, type: "expense", name: "Foreign Withholding Tax" },
  { id: ACCOUNTS.transactionCosts, type: "expense", name: "Transaction Costs" },
  { id: ACCOUNTS.brokerFees, type: "expense", name: "Broker Fees" },
  { id: ACCOUNTS.realizedLosses, type: "expense", name: "Realized Losses on Investments" },
  { id: ACCOUNTS.fxLosses, type: "expense", name: "Foreign Exchange Losses" },
  { id: ACCOUNTS.interestPaid, type: "expense", name: "Interest Paid" },
  { id: ACCOUNTS.otherExpenses, type: "expense", name: "Other Expenses" },
];

/**
 * Gain/loss routing and schedule inclusion per instrument class.
 * Adding a class is a change to this table, not to the posting code.
 */
export const DEFAULT_CLASS_POLICY: ClassPolicyTable = {
  equity: { gainAccount: ACCOUNTS.realizedGains, lossAccount: ACCOUNTS.realizedLosses, inHoldings: true },
  option: { gainAccount: ACCOUNTS.realizedGains, lossAccount: ACCOUNTS.realizedLosses, inHoldings: true },
  "currency-conversion": { gainAccount: ACCOUNTS.fxGains, lossAccount: ACCOUNTS.fxLosses, inHoldings: false },
  "digital-asset": { gainAccount: ACCOUNTS.realizedGains, lossAccount: ACCOUNTS.realizedLosses, inHoldings: false },
};

/**
 * Counter-account for a cash movement; the sign of the amount picks
 * `inflow` or `outflow`.
 */
export const CASH_ROUTES: Readonly<Record<CashMovementCategory, { readonly inflow: string; readonly outflow: string }>> = {
  dividend: { inflow: ACCOUNTS.dividendIncome, outflow: ACCOUNTS.dividendIncome },
  "withholding-tax": { inflow: ACCOUNTS.withholdingTax, outflow: ACCOUNTS.withholdingTax },
  interest: { inflow: ACCOUNTS.interestReceived, outflow: ACCOUNTS.interestPaid },
  fee: { inflow: ACCOUNTS.brokerFees, outflow: ACCOUNTS.brokerFees },
  capital: { inflow: ACCOUNTS.capitalIntroduced, outflow: ACCOUNTS.capitalWithdrawn },
  other: { inflow: ACCOUNTS.otherIncome, outflow: ACCOUNTS.otherExpenses },
};

export const DEFAULT_CASH_ACCOUNTS: CashAccountMap = {
  reporting: ACCOUNTS.cashReporting,
  byCurrency: { USD: ACCOUNTS.cashUsd },
  fallback: ACCOUNTS.cashOther,
};

export function cashAccountFor(currency: string, reportingCurrency: string, map: CashAccountMap): string {
  const code = currency.trim().toUpperCase();
  if (code === reportingCurrency.toUpperCase()) {
    return map.reporting;
  }
  return Object.hasOwn(map.byCurrency, code) ? (map.byCurrency[code] ?? map.fallback) : map.fallback;
}
