/**
 * Journal engine tests.
 *
 * Verifies:
 * - Acquisition and disposal routing under both cost policies
 * - Gain/loss account selection by instrument class
 * - Cash account selection by currency and conversion at the month rate
 * - Zero-leg omission and side flipping for negative amounts
 * - Cash movement and secondary-ledger routing
 * - Deterministic posting ids and timestamps
 */

import { describe, it, expect } from "vitest";
import type { CashTransaction, TradeTransaction } from "@histcost/types";
import { RateError, RateProvider, StaticRateSource } from "@histcost/rates";
import { JournalEngine } from "../src/journal-engine.js";
import { DEFAULT_CLASS_POLICY } from "../src/chart.js";
import type { JournalEngineOptions, JournalLogEntry } from "../src/types.js";
import { JournalError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

function engine(overrides: Partial<JournalEngineOptions> = {}): JournalEngine {
  const rates = new RateProvider({
    source: new StaticRateSource({ "2024-03": { USD: "1.25", EUR: "0.8" } }),
  });
  return new JournalEngine({ rates, ...overrides });
}

function trade(overrides: Partial<TradeTransaction> = {}): TradeTransaction {
  return {
    kind: "trade",
    id: "B1",
    sequence: 1,
    date: "2024-03-01",
    instrument: "ABC",
    instrumentClass: "equity",
    direction: "acquisition",
    quantity: "10",
    grossConsideration: "100.00",
    transactionCost: "0",
    currency: "GBP",
    description: "ABC PLC",
    ...overrides,
  };
}

function cash(overrides: Partial<CashTransaction> = {}): CashTransaction {
  return {
    kind: "cash",
    id: "C1",
    sequence: 1,
    date: "2024-03-10",
    category: "dividend",
    rawType: "Dividends",
    instrument: "ABC",
    description: "ABC CASH DIV",
    amount: "12.50",
    currency: "GBP",
    ...overrides,
  };
}

function lines(entry: { lines: readonly { accountId: string; type: string; amount: string }[] } | undefined) {
  return entry?.lines.map((l) => [l.accountId, l.type, l.amount]);
}

// =============================================================================
// Trades
// =============================================================================

describe("JournalEngine.postTrade", () => {
  it("capitalizes commission into the acquisition", async () => {
    const journal = engine();
    const entry = await journal.postTrade(trade({ transactionCost: "1.00" }));

    expect(entry?.lines).toEqual([
      { id: "B1:1", accountId: "1200", type: "debit", amount: "101.00" },
      { id: "B1:2", accountId: "1100", type: "credit", amount: "101.00" },
    ]);
    expect(journal.lots.lotsFor({ instrument: "ABC", instrumentClass: "equity" })[0]?.cost.amount).toBe("101.00");
  });

  it("expenses commission under the expense policy", async () => {
    const journal = engine({ costPolicy: "expense" });
    const entry = await journal.postTrade(trade({ transactionCost: "1.00" }));

    expect(lines(entry)).toEqual([
      ["1200", "debit", "100.00"],
      ["5100", "debit", "1.00"],
      ["1100", "credit", "101.00"],
    ]);
    expect(journal.lots.lotsFor({ instrument: "ABC", instrumentClass: "equity" })[0]?.cost.amount).toBe("100.00");
  });

  it("nets commission from disposal proceeds and credits the gain", async () => {
    const journal = engine();
    await journal.postTrade(trade({ transactionCost: "1.00" }));
    const entry = await journal.postTrade(
      trade({ id: "S1", direction: "disposal", grossConsideration: "150.00", transactionCost: "1.00" }),
    );

    expect(entry?.lines).toEqual([
      { id: "S1:1", accountId: "1100", type: "debit", amount: "149.00" },
      { id: "S1:2", accountId: "1200", type: "credit", amount: "101.00" },
      { id: "S1:3", accountId: "4200", type: "credit", amount: "48.00" },
    ]);
  });

  it("debits a loss and the commission under the expense policy", async () => {
    const journal = engine({ costPolicy: "expense" });
    await journal.postTrade(trade({ transactionCost: "1.00" }));
    const entry = await journal.postTrade(
      trade({ id: "S1", direction: "disposal", grossConsideration: "90.00", transactionCost: "1.00" }),
    );

    expect(lines(entry)).toEqual([
      ["1100", "debit", "89.00"],
      ["5100", "debit", "1.00"],
      ["1200", "credit", "100.00"],
      ["5400", "debit", "10.00"],
    ]);
  });

  it("routes currency-conversion results to the exchange accounts", async () => {
    const journal = engine();
    const pair = { instrument: "EUR.GBP", instrumentClass: "currency-conversion" } as const;
    await journal.postTrade(trade({ ...pair, quantity: "1000", grossConsideration: "100.00" }));
    const entry = await journal.postTrade(
      trade({ ...pair, id: "S1", direction: "disposal", quantity: "1000", grossConsideration: "90.00" }),
    );

    expect(lines(entry)).toEqual([
      ["1100", "debit", "90.00"],
      ["1200", "credit", "100.00"],
      ["5500", "debit", "10.00"],
    ]);
  });

  it("converts at the month rate and picks the cash account by currency", async () => {
    const journal = engine();
    const usd = await journal.postTrade(trade({ currency: "USD", grossConsideration: "1000.00", transactionCost: "1.25" }));
    const eur = await journal.postTrade(trade({ id: "B2", currency: "EUR", grossConsideration: "80.00" }));

    expect(lines(usd)).toEqual([
      ["1200", "debit", "801.00"],
      ["1101", "credit", "801.00"],
    ]);
    expect(lines(eur)).toEqual([
      ["1200", "debit", "100.00"],
      ["1102", "credit", "100.00"],
    ]);
  });

  it("posts a negative net amount on the opposite side", async () => {
    const journal = engine();
    await journal.postTrade(trade({ quantity: "1", grossConsideration: "5.00" }));
    const entry = await journal.postTrade(
      trade({ id: "S1", direction: "disposal", quantity: "1", grossConsideration: "0", transactionCost: "1.00" }),
    );

    expect(lines(entry)).toEqual([
      ["1100", "credit", "1.00"],
      ["1200", "credit", "5.00"],
      ["5400", "debit", "6.00"],
    ]);
  });

  it("posts nothing for an all-zero trade but still opens the lot", async () => {
    const journal = engine();
    const entry = await journal.postTrade(trade({ quantity: "5", grossConsideration: "0" }));

    expect(entry).toBeUndefined();
    expect(journal.ledger.groupCount).toBe(0);
    expect(journal.lots.lotsFor({ instrument: "ABC", instrumentClass: "equity" })).toEqual([
      {
        lotId: "B1",
        instrument: "ABC",
        instrumentClass: "equity",
        acquiredOn: "2024-03-01",
        originalQuantity: "5",
        quantity: "5",
        cost: { amount: "0.00", currency: "GBP", decimals: 2 },
      },
    ]);
  });

  it("credits the full proceeds of a shortfall as gain and logs it", async () => {
    const logs: JournalLogEntry[] = [];
    const journal = engine({ onLog: (entry) => logs.push(entry) });
    const entry = await journal.postTrade(
      trade({ id: "S1", direction: "disposal", quantity: "3", grossConsideration: "30.00" }),
    );

    expect(lines(entry)).toEqual([
      ["1100", "debit", "30.00"],
      ["4200", "credit", "30.00"],
    ]);
    expect(logs).toEqual([
      {
        level: "warn",
        message: "Disposal exceeds open lots; 3 taken at zero cost",
        context: { transactionId: "S1", instrument: "ABC", instrumentClass: "equity" },
      },
    ]);
    expect(journal.lots.shortfalls()).toHaveLength(1);
  });

  it("stamps postings with the transaction date at midnight UTC", async () => {
    const journal = engine();
    await journal.postTrade(trade({ date: "2024-03-07" }));
    expect(journal.ledger.getEntries().map((p) => p.timestamp)).toEqual([
      "2024-03-07T00:00:00.000Z",
      "2024-03-07T00:00:00.000Z",
    ]);
    expect(journal.ledger.getEntries()[0]?.sourceRef).toBe("B1");
    expect(journal.ledger.getEntries()[0]?.memo).toBe("ABC PLC");
  });

  it("fails on a missing rate", async () => {
    const journal = engine();
    await expect(journal.postTrade(trade({ currency: "JPY" }))).rejects.toBeInstanceOf(RateError);
  });
});

// =============================================================================
// Cash
// =============================================================================

describe("JournalEngine.postCash", () => {
  it("credits dividends to dividend income", async () => {
    const entry = await engine().postCash(cash());
    expect(entry?.lines).toEqual([
      { id: "C1:1", accountId: "1100", type: "debit", amount: "12.50" },
      { id: "C1:2", accountId: "4000", type: "credit", amount: "12.50" },
    ]);
  });

  it("debits withholding tax", async () => {
    const entry = await engine().postCash(cash({ category: "withholding-tax", amount: "-1.88" }));
    expect(lines(entry)).toEqual([
      ["1100", "credit", "1.88"],
      ["5000", "debit", "1.88"],
    ]);
  });

  it.each([
    ["interest", "3.00", [["1100", "debit", "3.00"], ["4100", "credit", "3.00"]]],
    ["interest", "-3.00", [["1100", "credit", "3.00"], ["5600", "debit", "3.00"]]],
    ["fee", "-2.00", [["1100", "credit", "2.00"], ["5200", "debit", "2.00"]]],
    ["capital", "1000.00", [["1100", "debit", "1000.00"], ["3300", "credit", "1000.00"]]],
    ["capital", "-500.00", [["1100", "credit", "500.00"], ["3400", "debit", "500.00"]]],
    ["other", "4.00", [["1100", "debit", "4.00"], ["4400", "credit", "4.00"]]],
    ["other", "-4.00", [["1100", "credit", "4.00"], ["5700", "debit", "4.00"]]],
  ] as const)("routes %s of %s", async (category, amount, expected) => {
    const entry = await engine().postCash(cash({ category, amount }));
    expect(lines(entry)).toEqual(expected);
  });

  it("converts foreign cash into the currency's cash account", async () => {
    const entry = await engine().postCash(cash({ amount: "12.50", currency: "USD" }));
    expect(lines(entry)).toEqual([
      ["1101", "debit", "10.00"],
      ["4000", "credit", "10.00"],
    ]);
  });
});

// =============================================================================
// Secondary ledger
// =============================================================================

describe("JournalEngine.postSecondary", () => {
  it("posts receipts and returns against the owner's loan", () => {
    const journal = engine();
    const received = journal.postSecondary({ date: "2024-03-15", amount: "300.00", direction: "received", reference: "Loan in" });
    const returned = journal.postSecondary({ date: "2024-04-15", amount: "100", direction: "returned", reference: "" });

    expect(received?.lines).toEqual([
      { id: "secondary-1:1", accountId: "1103", type: "debit", amount: "300.00" },
      { id: "secondary-1:2", accountId: "2101", type: "credit", amount: "300.00" },
    ]);
    expect(returned?.memo).toBe("Secondary account returned");
    expect(lines(returned)).toEqual([
      ["2101", "debit", "100.00"],
      ["1103", "credit", "100.00"],
    ]);
  });

  it.each(["0", "-5.00", "abc", "1.001"])("rejects amount %s", (amount) => {
    const journal = engine();
    try {
      journal.postSecondary({ date: "2024-03-15", amount, direction: "received", reference: "x" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(JournalError);
      expect(error instanceof JournalError ? error.code : undefined).toBe("INVALID_MOVEMENT");
    }
  });
});

// =============================================================================
// Setup and reads
// =============================================================================

describe("JournalEngine", () => {
  it("rejects routing to accounts outside the chart", () => {
    expect(
      () => engine({ classPolicy: { ...DEFAULT_CLASS_POLICY, option: { gainAccount: "9999", lossAccount: "5400", inHoldings: true } } }),
    ).toThrow(JournalError);
  });

  const mismatched: [Partial<JournalEngineOptions>, string][] = [
    [{ reportingDecimals: 4 }, "Journal reports in GBP at 4 dp but rates convert to GBP at 2 dp"],
    [{ reportingCurrency: "usd" }, "Journal reports in USD at 2 dp but rates convert to GBP at 2 dp"],
  ];

  it.each(mismatched)("rejects a reporting scale the rate provider does not use (%o)", (overrides, message) => {
    try {
      engine(overrides);
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(JournalError);
      if (error instanceof JournalError) {
        expect(error.code).toBe("REPORTING_MISMATCH");
        expect(error.message).toBe(message);
      }
    }
  });

  it("takes the reporting scale from the rate provider", async () => {
    const rates = new RateProvider({
      source: new StaticRateSource({ "2024-03": { USD: "1.25" } }),
      reportingDecimals: 4,
    });
    const journal = new JournalEngine({ rates });
    expect(journal.reportingDecimals).toBe(4);

    const entry = await journal.postTrade(trade({ grossConsideration: "1000.00", currency: "USD" }));
    expect(entry?.lines).toEqual([
      { id: "B1:1", accountId: "1200", type: "debit", amount: "800.0000" },
      { id: "B1:2", accountId: "1101", type: "credit", amount: "800.0000" },
    ]);
  });

  it("reports the investments-at-cost balance", async () => {
    const journal = engine();
    expect(journal.transitBalance()).toEqual({ amount: "0.00", currency: "GBP", decimals: 2 });
    await journal.postTrade(trade({ transactionCost: "1.00" }));
    expect(journal.transitBalance()).toEqual({ amount: "101.00", currency: "GBP", decimals: 2 });
  });

  it("keeps every entry in posting order", async () => {
    const journal = engine();
    await journal.postTrade(trade());
    await journal.postCash(cash());
    journal.postSecondary({ date: "2024-03-15", amount: "1.00", direction: "received", reference: "r" });
    expect(journal.entries().map((e) => [e.kind, e.correlationId])).toEqual([
      ["trade", "B1"],
      ["cash", "C1"],
      ["secondary", "secondary-1"],
    ]);
  });
});
