/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_RATE_URL_TEMPLATE } from "@histcost/rates";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ LEDGER_FILE: "export.csv" });
    expect(config).toEqual({
      LEDGER_FILE: "export.csv",
      REPORTING_CURRENCY: "GBP",
      REPORTING_DECIMALS: 2,
      DEFAULT_CURRENCY: "USD",
      TRANSACTION_COST_POLICY: "capitalize",
      RATE_URL_TEMPLATE: DEFAULT_RATE_URL_TEMPLATE,
      RATE_TIMEOUT_MS: 30000,
      LOG_LEVEL: "info",
      NODE_ENV: "development",
    });
  });

  it("reads overrides and coerces numbers", () => {
    const config = loadConfig({
      LEDGER_FILE: "export.csv",
      SECONDARY_LEDGER_FILE: "loans.csv",
      PERIOD_END: "2024-12-31",
      REPORTING_CURRENCY: "eur",
      REPORTING_DECIMALS: "3",
      TRANSACTION_COST_POLICY: "expense",
      RATES_FILE: "rates.json",
      RATE_TIMEOUT_MS: "5000",
      LOG_LEVEL: "debug",
      NODE_ENV: "test",
    });
    expect(config.SECONDARY_LEDGER_FILE).toBe("loans.csv");
    expect(config.PERIOD_END).toBe("2024-12-31");
    expect(config.REPORTING_CURRENCY).toBe("EUR");
    expect(config.REPORTING_DECIMALS).toBe(3);
    expect(config.TRANSACTION_COST_POLICY).toBe("expense");
    expect(config.RATES_FILE).toBe("rates.json");
    expect(config.RATE_TIMEOUT_MS).toBe(5000);
    expect(config.LOG_LEVEL).toBe("debug");
  });

  it("throws when LEDGER_FILE is missing", () => {
    expect(() => loadConfig({})).toThrow();
  });

  it("rejects a malformed period end", () => {
    expect(() => loadConfig({ LEDGER_FILE: "export.csv", PERIOD_END: "31/12/2024" })).toThrow(
      "Expected YYYY-MM-DD",
    );
  });

  it("rejects an unknown cost policy", () => {
    expect(() => loadConfig({ LEDGER_FILE: "export.csv", TRANSACTION_COST_POLICY: "amortize" })).toThrow();
  });

  it("rejects a currency code of the wrong length", () => {
    expect(() => loadConfig({ LEDGER_FILE: "export.csv", REPORTING_CURRENCY: "POUND" })).toThrow(
      "Expected a three-letter currency code",
    );
  });
});
