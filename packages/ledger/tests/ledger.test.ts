/**
 * Tests for the core Ledger class.
 *
 * Covers:
 * - Chart registration
 * - Append-only enforcement (no update/delete)
 * - Double-entry balance validation per posting group
 * - Posting validation (duplicates, unknown accounts, etc.)
 * - Query operations, including source references
 * - Trial balance aggregation
 * - Snapshot/restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AccountRef, Posting, Money } from "@histcost/types";
import { Ledger } from "../src/ledger.js";
import { LedgerError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const TS = "2024-01-15T00:00:00.000Z";
const TS2 = "2024-02-20T00:00:00.000Z";

const CASH: AccountRef = { id: "1100", type: "asset", name: "Cash at Bank" };
const INVESTMENTS: AccountRef = { id: "1200", type: "asset", name: "Investments at Cost" };
const CAPITAL: AccountRef = { id: "3300", type: "equity", name: "Capital Introduced" };
const DIVIDENDS: AccountRef = { id: "4000", type: "income", name: "Dividend Income" };
const FEES: AccountRef = { id: "5200", type: "expense", name: "Broker Fees" };

function gbp(amount: string): Money {
  return { amount, currency: "GBP", decimals: 2 };
}

function posting(
  id: string,
  accountId: string,
  type: "debit" | "credit",
  money: Money,
  correlationId: string,
  extra?: { sourceRef?: string; memo?: string; timestamp?: string },
): Posting {
  return {
    id,
    accountId,
    type,
    money,
    timestamp: extra?.timestamp ?? TS,
    correlationId,
    ...(extra?.sourceRef !== undefined ? { sourceRef: extra.sourceRef } : {}),
    ...(extra?.memo !== undefined ? { memo: extra.memo } : {}),
  };
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("Ledger", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = new Ledger();
    ledger.registerChart([CASH, INVESTMENTS, CAPITAL, DIVIDENDS, FEES], TS);
  });

  describe("account management", () => {
    it("registers a chart and retrieves accounts", () => {
      expect(ledger.getAccount("1200")?.ref.name).toBe("Investments at Cost");
      expect(ledger.getAccounts()).toHaveLength(5);
    });

    it("checks account existence", () => {
      expect(ledger.hasAccount("1100")).toBe(true);
      expect(ledger.hasAccount("9999")).toBe(false);
    });

    it("rejects a duplicate account code", () => {
      expect(() => ledger.registerAccount(CASH, TS)).toThrow(LedgerError);
    });

    it("stamps the current time when none is provided", () => {
      const fresh = new Ledger();
      const account = fresh.registerAccount({ id: "1", type: "asset", name: "A" });
      expect(account.createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });
  });

  describe("append", () => {
    it("appends a balanced two-leg group", () => {
      const result = ledger.append([
        posting("d1:1", "1100", "debit", gbp("500.00"), "d1"),
        posting("d1:2", "3300", "credit", gbp("500.00"), "d1"),
      ]);
      expect(result).toEqual({ correlationId: "d1", postingCount: 2, timestamp: TS });
    });

    it("appends a three-leg disposal group", () => {
      const result = ledger.append([
        posting("s1:1", "1100", "debit", gbp("80.00"), "s1"),
        posting("s1:2", "1200", "credit", gbp("50.00"), "s1"),
        posting("s1:3", "4000", "credit", gbp("30.00"), "s1"),
      ]);
      expect(result.postingCount).toBe(3);
      expect(ledger.entryCount).toBe(3);
      expect(ledger.groupCount).toBe(1);
    });

    it("records description and source reference on the group", () => {
      ledger.append(
        [
          posting("d1:1", "1100", "debit", gbp("10.00"), "d1"),
          posting("d1:2", "4000", "credit", gbp("10.00"), "d1"),
        ],
        { description: "Dividend ABC", sourceRef: "CASH-7" },
      );
      const [group] = ledger.getGroups();
      expect(group?.description).toBe("Dividend ABC");
      expect(group?.sourceRef).toBe("CASH-7");
    });

    it("takes the group source reference from the first posting by default", () => {
      ledger.append([
        posting("d1:1", "1100", "debit", gbp("10.00"), "d1", { sourceRef: "T-9" }),
        posting("d1:2", "4000", "credit", gbp("10.00"), "d1", { sourceRef: "T-9" }),
      ]);
      expect(ledger.getGroups()[0]?.sourceRef).toBe("T-9");
    });
  });

  describe("validation", () => {
    it("rejects an empty group", () => {
      expect(() => ledger.append([])).toThrow(/empty/i);
    });

    it("rejects mixed correlation IDs", () => {
      expect(() =>
        ledger.append([
          posting("a", "1100", "debit", gbp("1.00"), "g1"),
          posting("b", "4000", "credit", gbp("1.00"), "g2"),
        ]),
      ).toThrow(/correlationId/);
    });

    it("rejects duplicate posting IDs within a group", () => {
      expect(() =>
        ledger.append([
          posting("a", "1100", "debit", gbp("1.00"), "g1"),
          posting("a", "4000", "credit", gbp("1.00"), "g1"),
        ]),
      ).toThrow(/Duplicate/);
    });

    it("rejects posting IDs already in the ledger", () => {
      ledger.append([
        posting("a", "1100", "debit", gbp("1.00"), "g1"),
        posting("b", "4000", "credit", gbp("1.00"), "g1"),
      ]);
      expect(() =>
        ledger.append([
          posting("a", "1100", "debit", gbp("2.00"), "g2"),
          posting("c", "4000", "credit", gbp("2.00"), "g2"),
        ]),
      ).toThrow(/already exists/);
    });

    it("rejects an unknown account", () => {
      expect(() =>
        ledger.append([
          posting("a", "9999", "debit", gbp("1.00"), "g1"),
          posting("b", "4000", "credit", gbp("1.00"), "g1"),
        ]),
      ).toThrow(/Unknown account/);
    });

    it("rejects zero and negative amounts", () => {
      expect(() =>
        ledger.append([
          posting("a", "1100", "debit", gbp("0.00"), "g1"),
          posting("b", "4000", "credit", gbp("0.00"), "g1"),
        ]),
      ).toThrow(/positive/);
      expect(() =>
        ledger.append([
          posting("a", "1100", "debit", gbp("-1.00"), "g1"),
          posting("b", "4000", "credit", gbp("-1.00"), "g1"),
        ]),
      ).toThrow(/positive/);
    });

    it("rejects an unbalanced group", () => {
      expect(() =>
        ledger.append([
          posting("a", "1100", "debit", gbp("100.00"), "g1"),
          posting("b", "4000", "credit", gbp("99.99"), "g1"),
        ]),
      ).toThrow(/unbalanced/i);
    });

    it("does not partially commit on validation failure", () => {
      ledger.append([
        posting("a", "1100", "debit", gbp("1.00"), "g1"),
        posting("b", "4000", "credit", gbp("1.00"), "g1"),
      ]);

      expect(() =>
        ledger.append([
          posting("c", "1100", "debit", gbp("2.00"), "g2"),
          posting("d", "4000", "credit", gbp("1.00"), "g2"),
        ]),
      ).toThrow(LedgerError);

      expect(ledger.entryCount).toBe(2);
      expect(ledger.groupCount).toBe(1);
    });
  });

  describe("append-only enforcement", () => {
    it("exposes no update, delete or remove", () => {
      expect("update" in ledger).toBe(false);
      expect("delete" in ledger).toBe(false);
      expect("remove" in ledger).toBe(false);
    });
  });

  describe("queries", () => {
    beforeEach(() => {
      ledger.append([
        posting("d1:1", "1100", "debit", gbp("1000.00"), "d1", { sourceRef: "D-1" }),
        posting("d1:2", "3300", "credit", gbp("1000.00"), "d1", { sourceRef: "D-1" }),
      ]);
      ledger.append([
        posting("b1:1", "1200", "debit", gbp("250.00"), "b1", { sourceRef: "T-1", timestamp: TS2 }),
        posting("b1:2", "1100", "credit", gbp("250.00"), "b1", { sourceRef: "T-1", timestamp: TS2 }),
      ]);
    });

    it("returns all postings without a filter", () => {
      expect(ledger.getEntries()).toHaveLength(4);
    });

    it("filters by account", () => {
      expect(ledger.getEntries({ accountId: "1100" }).map((p) => p.id)).toEqual(["d1:1", "b1:2"]);
    });

    it("filters by source reference", () => {
      expect(ledger.getEntries({ sourceRef: "T-1" }).map((p) => p.id)).toEqual(["b1:1", "b1:2"]);
    });

    it("filters by timestamp range", () => {
      expect(ledger.getEntries({ fromTimestamp: TS2 })).toHaveLength(2);
      expect(ledger.getEntries({ toTimestamp: TS })).toHaveLength(2);
    });

    it("filters by currency", () => {
      expect(ledger.getEntries({ currency: "USD" })).toHaveLength(0);
    });

    it("returns the postings of one group", () => {
      expect(ledger.getEntriesByCorrelation("b1").map((p) => p.accountId)).toEqual(["1200", "1100"]);
    });

    it("computes account balances on the normal side", () => {
      const cash = ledger.getBalance("1100");
      expect(cash.balances[0]).toEqual({
        currency: "GBP",
        decimals: 2,
        balance: "750.00",
        totalDebits: "1000.00",
        totalCredits: "250.00",
      });
      expect(ledger.getBalance("3300").balances[0]?.balance).toBe("1000.00");
    });

    it("returns no balances for an untouched account", () => {
      expect(ledger.getBalance("5200").balances).toHaveLength(0);
    });
  });

  describe("trial balance", () => {
    it("aggregates every posting and balances", () => {
      ledger.append([
        posting("d1:1", "1100", "debit", gbp("1000.00"), "d1"),
        posting("d1:2", "3300", "credit", gbp("1000.00"), "d1"),
      ]);
      ledger.append([
        posting("f1:1", "5200", "debit", gbp("3.50"), "f1"),
        posting("f1:2", "1100", "credit", gbp("3.50"), "f1"),
      ]);

      const tb = ledger.getTrialBalance({ timestamp: TS });
      expect(tb.balanced).toBe(true);
      expect(tb.generatedAt).toBe(TS);
      expect(tb.lines.map((l) => [l.accountId, l.debitBalance, l.creditBalance])).toEqual([
        ["1100", "996.50", "0.00"],
        ["3300", "0.00", "1000.00"],
        ["5200", "3.50", "0.00"],
      ]);
      expect(tb.totals).toEqual([
        {
          currency: "GBP",
          totalDebits: "1000.00",
          totalCredits: "1000.00",
          difference: "0.00",
          balanced: true,
        },
      ]);
    });

    it("carries account names into the lines", () => {
      ledger.append([
        posting("d1:1", "1100", "debit", gbp("5.00"), "d1"),
        posting("d1:2", "4000", "credit", gbp("5.00"), "d1"),
      ]);
      const tb = ledger.getTrialBalance();
      expect(tb.lines.find((l) => l.accountId === "4000")?.accountName).toBe("Dividend Income");
    });
  });

  describe("snapshot / fromSnapshot", () => {
    it("restores a ledger with the same balances", () => {
      ledger.append([
        posting("d1:1", "1100", "debit", gbp("100.00"), "d1"),
        posting("d1:2", "3300", "credit", gbp("100.00"), "d1"),
      ]);

      const snap = ledger.snapshot();
      expect(snap.version).toBe(1);
      expect(snap.postings).toHaveLength(2);

      const restored = Ledger.fromSnapshot(snap);
      expect(restored.entryCount).toBe(2);
      expect(restored.getAccounts()).toHaveLength(5);
      expect(restored.getBalance("1100").balances[0]?.balance).toBe("100.00");
    });

    it("keeps validating after restore", () => {
      ledger.append([
        posting("d1:1", "1100", "debit", gbp("100.00"), "d1"),
        posting("d1:2", "3300", "credit", gbp("100.00"), "d1"),
      ]);
      const restored = Ledger.fromSnapshot(ledger.snapshot());

      expect(() =>
        restored.append([
          posting("d1:1", "1100", "debit", gbp("1.00"), "d2"),
          posting("d2:2", "3300", "credit", gbp("1.00"), "d2"),
        ]),
      ).toThrow(LedgerError);
    });
  });

  describe("LedgerError", () => {
    it("has name and code", () => {
      const err = new LedgerError("UNBALANCED_TRANSACTION", "test");
      expect(err.name).toBe("LedgerError");
      expect(err.code).toBe("UNBALANCED_TRANSACTION");
      expect(err.message).toBe("test");
    });
  });
});
