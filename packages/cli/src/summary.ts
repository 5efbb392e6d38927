/**
 * Console summary of a run.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { RunResult } from "@histcost/journal";

export type RunStatus = RunResult["status"];

const EXIT_CODES: Readonly<Record<RunStatus, number>> = {
  balanced: 0,
  unbalanced: 1,
  aborted: 2,
};

export function exitCodeFor(status: RunStatus): number {
  return EXIT_CODES[status];
}

export function renderSummary(result: RunResult, painter: ChalkInstance = chalk): readonly string[] {
  if (result.status === "aborted") {
    const { name, code, message } = result.error;
    return [painter.red.bold("Run ABORTED"), `  ${name} ${code}: ${message}`];
  }

  const out: string[] = [];
  const { trialBalance, holdings } = result;

  out.push(
    trialBalance.balanced
      ? painter.green.bold("Trial balance BALANCED")
      : painter.red.bold("Trial balance NOT BALANCED"),
  );
  for (const t of trialBalance.totals) {
    const difference = t.balanced ? t.difference : painter.red(t.difference);
    out.push(`  ${t.currency}  debits ${t.totalDebits}  credits ${t.totalCredits}  difference ${difference}`);
  }

  out.push("", painter.bold("Accounts"));
  for (const line of trialBalance.lines) {
    out.push(
      `  ${line.accountId}  ${line.accountName.padEnd(36)}${line.debitBalance.padStart(14)}${line.creditBalance.padStart(14)}`,
    );
  }

  out.push("", painter.bold("Holdings"));
  if (holdings.lines.length === 0) {
    out.push("  (none)");
  }
  for (const line of holdings.lines) {
    const flags = line.flags.length > 0 ? `  ${painter.yellow(line.flags.join(", "))}` : "";
    out.push(`  ${line.instrument.padEnd(12)}${line.quantity.padStart(14)}${line.cost.amount.padStart(14)}${flags}`);
  }
  out.push(`  Total ${holdings.total.amount}`);
  const shortfallLines = holdings.lines.filter((l) => l.flags.some((f) => f.startsWith("shortfall-")));
  if (shortfallLines.length > 0) {
    out.push(painter.yellow(
      `  Lots are matched per identifier: ${String(shortfallLines.length)} line(s) may hold cost of an instrument disposed of under another name`,
    ));
  }

  const transit = holdings.transit;
  if (transit !== undefined) {
    out.push(
      transit.reconciled
        ? `  Investments at cost ${transit.transitBalance.amount} = schedule ${transit.scheduleTotal.amount} + excluded ${transit.excludedCost.amount}`
        : painter.red(
          `  Investments at cost ${transit.transitBalance.amount} differs from schedule by ${transit.difference.amount}; excluded cost is ${transit.excludedCost.amount}`,
        ),
    );
  }

  const flags: string[] = [
    ...result.shortfalls.map(
      (s) => `  Shortfall: ${s.transactionId} ${s.instrument} ${s.quantity} taken at zero cost`,
    ),
    ...holdings.unmatchedPositions.map(
      (p) => `  Broker position without lots: ${p.instrument} ${p.quantity}`,
    ),
    ...result.unrecognizedSections.map(
      (s) => `  Dropped section ${s.code} (${String(s.rowCount)} rows)`,
    ),
    ...result.corporateActions.map(
      (a) => `  Corporate action for review: ${a.date} ${a.instrument} ${a.description}`,
    ),
    ...(result.skipped.length > 0 ? [`  Skipped ${String(result.skipped.length)} row(s)`] : []),
  ];
  if (flags.length > 0) {
    out.push("", painter.bold("Flags"), ...flags.map((f) => painter.yellow(f)));
  }

  out.push("", painter.gray(`Journal digest ${result.digest}`));
  return out;
}
