/**
 * @histcost/cli — One run from configuration to exit code.
 */

import type { Logger } from "pino";
import type { ChalkInstance } from "chalk";
import { runTrialBalance } from "@histcost/journal";
import { RateProvider } from "@histcost/rates";
import type { AppConfig } from "./config.js";
import { loadRateSource, loadSecondaryLedger, readTextFile, writeJsonFile } from "./inputs.js";
import { exitCodeFor, renderSummary } from "./summary.js";

export interface CliIo {
  /** Custom fetch function (for testing) */
  readonly fetchFn?: typeof fetch | undefined;
  /** Receives each summary line; defaults to stdout */
  readonly print?: ((line: string) => void) | undefined;
  readonly painter?: ChalkInstance | undefined;
}

export async function runCli(config: AppConfig, logger: Logger, io: CliIo = {}): Promise<number> {
  const print = io.print ?? ((line: string) => {
    process.stdout.write(`${line}\n`);
  });

  const ledgerExport = await readTextFile(config.LEDGER_FILE);
  const secondaryMovements = await loadSecondaryLedger(config);
  const rates = new RateProvider({
    source: await loadRateSource(config, io.fetchFn),
    reportingCurrency: config.REPORTING_CURRENCY,
    reportingDecimals: config.REPORTING_DECIMALS,
    onFetch: (entry) => {
      logger.info(entry, `Loaded ${String(entry.currencyCount)} rates for ${entry.period}`);
    },
  });

  logger.info(
    {
      ledgerFile: config.LEDGER_FILE,
      periodEnd: config.PERIOD_END,
      costPolicy: config.TRANSACTION_COST_POLICY,
      secondaryMovements: secondaryMovements.length,
    },
    "Starting trial balance run",
  );

  const result = await runTrialBalance(
    { ledgerExport, secondaryMovements, periodEnd: config.PERIOD_END },
    {
      rates,
      reportingCurrency: config.REPORTING_CURRENCY,
      reportingDecimals: config.REPORTING_DECIMALS,
      costPolicy: config.TRANSACTION_COST_POLICY,
      defaultCurrency: config.DEFAULT_CURRENCY,
      onLog: (entry) => {
        logger[entry.level](entry.context ?? {}, entry.message);
      },
    },
  );

  for (const line of renderSummary(result, io.painter)) {
    print(line);
  }

  if (config.REPORT_FILE !== undefined) {
    await writeJsonFile(config.REPORT_FILE, {
      reportingCurrency: config.REPORTING_CURRENCY,
      periodEnd: config.PERIOD_END ?? null,
      costPolicy: config.TRANSACTION_COST_POLICY,
      ...result,
    });
    logger.info({ path: config.REPORT_FILE }, "Report written");
  }

  logger.info({ status: result.status, rateMonths: rates.cachedPeriods() }, "Run finished");
  return exitCodeFor(result.status);
}
