/**
 * Tests for input and report files.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MonthlyCsvRateSource, StaticRateSource } from "@histcost/rates";
import { loadConfig } from "../src/config.js";
import { CliError } from "../src/errors.js";
import { loadRateSource, loadSecondaryLedger, readTextFile, writeJsonFile } from "../src/inputs.js";
import { SECONDARY_LEDGER } from "./fixtures.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "histcost-inputs-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function expectCliError(promise: Promise<unknown>, code: string, message: string): Promise<void> {
  try {
    await promise;
    expect.unreachable("should have thrown");
  } catch (error) {
    expect(error).toBeInstanceOf(CliError);
    if (error instanceof CliError) {
      expect(error.code).toBe(code);
      expect(error.message).toContain(message);
    }
  }
}

describe("readTextFile", () => {
  it("reads UTF-8 text", async () => {
    const path = join(dir, "export.csv");
    await writeFile(path, "a,b\n", "utf8");
    expect(await readTextFile(path)).toBe("a,b\n");
  });

  it("raises UNREADABLE_FILE for a missing file", async () => {
    const path = join(dir, "missing.csv");
    await expectCliError(readTextFile(path), "UNREADABLE_FILE", `Cannot read ${path}`);
  });
});

describe("loadRateSource", () => {
  it("uses the monthly CSV source when no rates file is set", async () => {
    const source = await loadRateSource(loadConfig({ LEDGER_FILE: "x.csv" }));
    expect(source).toBeInstanceOf(MonthlyCsvRateSource);
  });

  it("loads a static table from RATES_FILE", async () => {
    const path = join(dir, "rates.json");
    await writeFile(path, JSON.stringify({ "2024-03": { usd: "1.25", EUR: 1.1 } }), "utf8");

    const source = await loadRateSource(loadConfig({ LEDGER_FILE: "x.csv", RATES_FILE: path }));
    expect(source).toBeInstanceOf(StaticRateSource);
    const month = await source.fetchMonth({ year: 2024, month: 3 });
    expect(month.get("USD")).toBe("1.25");
    expect(month.get("EUR")).toBe("1.1");
  });

  it("rejects a rates file that is not JSON", async () => {
    const path = join(dir, "rates.json");
    await writeFile(path, "{not json", "utf8");
    await expectCliError(
      loadRateSource(loadConfig({ LEDGER_FILE: "x.csv", RATES_FILE: path })),
      "INVALID_RATES_FILE",
      `Rates file ${path} is not valid JSON`,
    );
  });

  it("rejects a rates file of the wrong shape", async () => {
    const path = join(dir, "rates.json");
    await writeFile(path, JSON.stringify({ "2024-03": { USD: true } }), "utf8");
    await expectCliError(
      loadRateSource(loadConfig({ LEDGER_FILE: "x.csv", RATES_FILE: path })),
      "INVALID_RATES_FILE",
      `Rates file ${path}: Rate for USD in 2024-03 is not a number`,
    );
  });
});

describe("loadSecondaryLedger", () => {
  it("returns no movements when no file is configured", async () => {
    expect(await loadSecondaryLedger(loadConfig({ LEDGER_FILE: "x.csv" }))).toEqual([]);
  });

  it("parses the configured file", async () => {
    const path = join(dir, "loans.csv");
    await writeFile(path, SECONDARY_LEDGER, "utf8");

    const movements = await loadSecondaryLedger(loadConfig({ LEDGER_FILE: "x.csv", SECONDARY_LEDGER_FILE: path }));
    expect(movements).toEqual([
      { date: "2024-03-15", amount: "300.00", direction: "received", reference: "Loan in" },
      { date: "2025-01-05", amount: "50.00", direction: "received", reference: "Late" },
    ]);
  });

  it("prefixes row errors with the file path", async () => {
    const path = join(dir, "loans.csv");
    await writeFile(path, "date,amount,direction,reference\n2024-03-15,0,received,x\n", "utf8");
    await expectCliError(
      loadSecondaryLedger(loadConfig({ LEDGER_FILE: "x.csv", SECONDARY_LEDGER_FILE: path })),
      "INVALID_SECONDARY_LEDGER",
      `${path}: Secondary ledger row 2`,
    );
  });
});

describe("writeJsonFile", () => {
  it("writes indented JSON with a trailing newline", async () => {
    const path = join(dir, "report.json");
    await writeJsonFile(path, { status: "balanced", lines: [1] });
    expect(await readFile(path, "utf8")).toBe('{\n  "status": "balanced",\n  "lines": [\n    1\n  ]\n}\n');
  });
});
