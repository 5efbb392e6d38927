/**
 * End-to-end tests for runCli: files in, summary and report out.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Chalk } from "chalk";
import pino from "pino";
import { loadConfig } from "../src/config.js";
import { runCli } from "../src/cli.js";
import { LEDGER_EXPORT, RATES, SECONDARY_LEDGER } from "./fixtures.js";

const silent = pino({ level: "silent" });
const plain = new Chalk({ level: 0 });

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "histcost-cli-"));
  await writeFile(join(dir, "export.csv"), LEDGER_EXPORT, "utf8");
  await writeFile(join(dir, "loans.csv"), SECONDARY_LEDGER, "utf8");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function readReport(path: string): Promise<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(await readFile(path, "utf8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("report is not a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

describe("runCli", () => {
  it("runs a balanced trial balance and writes the report", async () => {
    await writeFile(join(dir, "rates.json"), JSON.stringify(RATES), "utf8");
    const config = loadConfig({
      LEDGER_FILE: join(dir, "export.csv"),
      SECONDARY_LEDGER_FILE: join(dir, "loans.csv"),
      PERIOD_END: "2024-12-31",
      RATES_FILE: join(dir, "rates.json"),
      REPORT_FILE: join(dir, "report.json"),
      NODE_ENV: "test",
    });
    const printed: string[] = [];

    const code = await runCli(config, silent, { print: (line) => printed.push(line), painter: plain });

    expect(code).toBe(0);
    expect(printed[0]).toBe("Trial balance BALANCED");
    expect(printed[1]).toBe("  GBP  debits 5409.00  credits 5409.00  difference 0.00");

    const report = await readReport(join(dir, "report.json"));
    expect(report["status"]).toBe("balanced");
    expect(report["reportingCurrency"]).toBe("GBP");
    expect(report["periodEnd"]).toBe("2024-12-31");
    expect(report["costPolicy"]).toBe("capitalize");
    expect(report["excludedSecondary"]).toEqual([
      { date: "2025-01-05", amount: "50.00", direction: "received", reference: "Late" },
    ]);
    expect(printed.at(-1)).toBe(`Journal digest ${String(report["digest"])}`);
  });

  it("fetches rates through the injected fetch when no rates file is set", async () => {
    const requested: string[] = [];
    const fetchFn: typeof fetch = (input) => {
      requested.push(String(input));
      return Promise.resolve(new Response("currency_code,rate\nUSD,1.25\n"));
    };
    const config = loadConfig({
      LEDGER_FILE: join(dir, "export.csv"),
      RATE_URL_TEMPLATE: "https://rates.test/{year}/{month}.csv",
      NODE_ENV: "test",
    });

    const code = await runCli(config, silent, { fetchFn, print: () => undefined, painter: plain });

    expect(code).toBe(0);
    expect(requested).toEqual(["https://rates.test/2024/3.csv"]);
  });

  it("reports an aborted run with exit code 2", async () => {
    await writeFile(join(dir, "rates.json"), JSON.stringify({ "2024-02": { USD: "1.3" } }), "utf8");
    const config = loadConfig({
      LEDGER_FILE: join(dir, "export.csv"),
      RATES_FILE: join(dir, "rates.json"),
      REPORT_FILE: join(dir, "report.json"),
      NODE_ENV: "test",
    });
    const printed: string[] = [];

    const code = await runCli(config, silent, { print: (line) => printed.push(line), painter: plain });

    expect(code).toBe(2);
    expect(printed).toEqual([
      "Run ABORTED",
      "  RateError RATE_FETCH_FAILED: No rates loaded for 2024-03",
    ]);
    const report = await readReport(join(dir, "report.json"));
    expect(report["status"]).toBe("aborted");
    expect(report["periodEnd"]).toBeNull();
  });

  it("fails on a missing ledger file", async () => {
    const config = loadConfig({ LEDGER_FILE: join(dir, "absent.csv"), NODE_ENV: "test" });
    await expect(runCli(config, silent, { print: () => undefined })).rejects.toThrow("Cannot read");
  });
});
