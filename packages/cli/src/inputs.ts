/**
 * Input and output files for one run.
 */

import { readFile, writeFile } from "node:fs/promises";
import type { SecondaryMovement } from "@histcost/types";
import { MonthlyCsvRateSource, RateError, StaticRateSource } from "@histcost/rates";
import type { RateSource } from "@histcost/rates";
import type { AppConfig } from "./config.js";
import { CliError } from "./errors.js";
import { parseSecondaryLedger } from "./secondary-ledger.js";

export async function readTextFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliError("UNREADABLE_FILE", `Cannot read ${path}: ${reason}`, path);
  }
}

/**
 * Static rates from RATES_FILE when set, otherwise the monthly CSV
 * published at RATE_URL_TEMPLATE.
 */
export async function loadRateSource(config: AppConfig, fetchFn?: typeof fetch): Promise<RateSource> {
  const path = config.RATES_FILE;
  if (path === undefined) {
    return new MonthlyCsvRateSource({
      urlTemplate: config.RATE_URL_TEMPLATE,
      timeoutMs: config.RATE_TIMEOUT_MS,
      fetchFn,
    });
  }

  const text = await readTextFile(path);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliError("INVALID_RATES_FILE", `Rates file ${path} is not valid JSON: ${reason}`, path);
  }
  try {
    return StaticRateSource.fromJson(parsed);
  } catch (error) {
    if (error instanceof RateError) {
      throw new CliError("INVALID_RATES_FILE", `Rates file ${path}: ${error.message}`, path);
    }
    throw error;
  }
}

export async function loadSecondaryLedger(config: AppConfig): Promise<readonly SecondaryMovement[]> {
  const path = config.SECONDARY_LEDGER_FILE;
  if (path === undefined) {
    return [];
  }
  try {
    return parseSecondaryLedger(await readTextFile(path));
  } catch (error) {
    if (error instanceof CliError && error.path === undefined) {
      throw new CliError(error.code, `${path}: ${error.message}`, path);
    }
    throw error;
  }
}

export async function writeJsonFile(path: string, value: unknown): Promise<void> {
  await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, "utf8");
}
