/**
 * Tests for the secondary ledger CSV reader.
 */

import { describe, it, expect } from "vitest";
import { parseSecondaryLedger } from "../src/secondary-ledger.js";
import { CliError } from "../src/errors.js";

describe("parseSecondaryLedger", () => {
  it("reads rows in file order", () => {
    const text = [
      "date,amount,direction,reference",
      "2024-03-15,300.00,received,Loan in",
      "2024-06-30,100,returned,Repayment",
    ].join("\n");

    expect(parseSecondaryLedger(text)).toEqual([
      { date: "2024-03-15", amount: "300.00", direction: "received", reference: "Loan in" },
      { date: "2024-06-30", amount: "100", direction: "returned", reference: "Repayment" },
    ]);
  });

  it("accepts any header case and column order", () => {
    const text = [
      "\uFEFFReference, Direction ,DATE,Amount",
      '"Director loan","RECEIVED",2024-01-02,"1,250.50"',
      "",
    ].join("\n");

    expect(parseSecondaryLedger(text)).toEqual([
      { date: "2024-01-02", amount: "1250.50", direction: "received", reference: "Director loan" },
    ]);
  });

  it("allows an empty reference", () => {
    const text = "date,amount,direction,reference\n2024-01-02,5,received,\n";
    expect(parseSecondaryLedger(text)).toEqual([
      { date: "2024-01-02", amount: "5", direction: "received", reference: "" },
    ]);
  });

  it("returns nothing for a header-only file", () => {
    expect(parseSecondaryLedger("date,amount,direction,reference\n")).toEqual([]);
  });

  it.each([
    ["a negative amount", "2024-01-02,-5,received,x"],
    ["a zero amount", "2024-01-02,0.00,received,x"],
    ["an unknown direction", "2024-01-02,5,lent,x"],
    ["a malformed date", "02/01/2024,5,received,x"],
    ["a non-numeric amount", "2024-01-02,five,received,x"],
  ])("rejects %s with the row's line number", (_label, row) => {
    const text = `date,amount,direction,reference\n2024-01-01,1,received,ok\n${row}\n`;
    expect(() => parseSecondaryLedger(text)).toThrow(
      "Secondary ledger row 3 needs a YYYY-MM-DD date, a positive amount and a direction of received or returned",
    );
  });

  it("raises INVALID_SECONDARY_LEDGER for malformed CSV", () => {
    const text = 'date,amount,direction,reference\n2024-01-02,5,received,"unterminated\n';
    try {
      parseSecondaryLedger(text);
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(CliError);
      if (error instanceof CliError) {
        expect(error.code).toBe("INVALID_SECONDARY_LEDGER");
        expect(error.message).toMatch(/^Secondary ledger is not valid CSV: /);
      }
    }
  });
});
