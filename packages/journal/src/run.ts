/**
 * @histcost/journal — One complete trial-balance run.
 *
 * Strictly linear: ingest, order trades for lot matching, post trades,
 * then cash movements, then secondary-ledger movements, then aggregate.
 * Every run starts from an empty ledger and empty lot queues.
 *
 * Outcomes:
 * - balanced / unbalanced: processing completed; an out-of-balance
 *   trial balance is reported, never thrown
 * - aborted: a rate could not be resolved or the export is structurally
 *   unusable
 * Any other error propagates.
 */

import type { SecondaryMovement } from "@histcost/types";
import { IngestError, orderForLotMatching, parseFlexExport } from "@histcost/ingest";
import type { IngestLogEntry } from "@histcost/ingest";
import { RateError } from "@histcost/rates";
import { journalDigest } from "./digest.js";
import { buildHoldingsSchedule } from "./holdings.js";
import { JournalEngine } from "./journal-engine.js";
import { realizedByClass } from "./realized.js";
import type { JournalLogEntry, RunDeps, RunInput, RunResult } from "./types.js";

function fromIngestLog(entry: IngestLogEntry): JournalLogEntry {
  const context: Record<string, string | number> = {};
  if (entry.section !== undefined) context["section"] = entry.section;
  if (entry.marker !== undefined) context["marker"] = entry.marker;
  if (entry.line !== undefined) context["line"] = entry.line;
  if (entry.reason !== undefined) context["reason"] = entry.reason;
  if (entry.rowCount !== undefined) context["rowCount"] = entry.rowCount;
  return { level: entry.level, message: entry.message, context };
}

async function execute(input: RunInput, deps: RunDeps): Promise<RunResult> {
  const onLog = deps.onLog;
  const ingest = parseFlexExport(input.ledgerExport, {
    periodEnd: input.periodEnd,
    defaultCurrency: deps.defaultCurrency,
    onLog: onLog === undefined ? undefined : (entry) => onLog(fromIngestLog(entry)),
  });

  const engine = new JournalEngine(deps);

  for (const trade of orderForLotMatching(ingest.trades)) {
    await engine.postTrade(trade);
  }
  for (const movement of ingest.cash) {
    await engine.postCash(movement);
  }

  const periodEnd = input.periodEnd;
  const included: SecondaryMovement[] = [];
  const excludedSecondary: SecondaryMovement[] = [];
  for (const movement of input.secondaryMovements ?? []) {
    if (periodEnd !== undefined && movement.date > periodEnd) {
      excludedSecondary.push(movement);
    } else {
      included.push(movement);
    }
  }
  if (excludedSecondary.length > 0) {
    onLog?.({
      level: "info",
      message: `Excluded ${String(excludedSecondary.length)} secondary movement(s) after ${periodEnd ?? ""}`,
    });
  }
  for (const movement of included) {
    engine.postSecondary(movement);
  }

  if (ingest.corporateActions.length > 0) {
    onLog?.({
      level: "warn",
      message: `${String(ingest.corporateActions.length)} corporate action(s) need manual review`,
    });
  }

  const now = deps.now ?? (() => new Date().toISOString());
  const trialBalance = engine.ledger.getTrialBalance({ timestamp: now() });
  const holdings = buildHoldingsSchedule(engine.lots.openLots(), engine.classPolicy, {
    // no position section: nothing to compare against
    positions: ingest.positions.length > 0 ? ingest.positions : undefined,
    shortfalls: engine.lots.shortfalls(),
    transitBalance: engine.transitBalance(),
    currency: engine.reportingCurrency,
    decimals: engine.reportingDecimals,
  });
  const journal = engine.entries();

  return {
    status: trialBalance.balanced ? "balanced" : "unbalanced",
    trialBalance,
    holdings,
    realized: realizedByClass(engine.lots.disposals(), engine.reportingCurrency, engine.reportingDecimals),
    shortfalls: engine.lots.shortfalls(),
    skipped: ingest.skipped,
    unrecognizedSections: ingest.unrecognizedSections,
    corporateActions: ingest.corporateActions,
    excludedSecondary,
    journal,
    digest: journalDigest(journal),
  };
}

export async function runTrialBalance(input: RunInput, deps: RunDeps): Promise<RunResult> {
  try {
    return await execute(input, deps);
  } catch (error) {
    if (error instanceof RateError || error instanceof IngestError) {
      deps.onLog?.({ level: "warn", message: `Run aborted: ${error.message}`, context: { code: error.code } });
      return { status: "aborted", error: { name: error.name, code: error.code, message: error.message } };
    }
    throw error;
  }
}
