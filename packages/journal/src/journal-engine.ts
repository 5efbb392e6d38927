/**
 * @histcost/journal — Journal engine.
 *
 * Turns normalised transactions into balanced posting groups on a
 * fresh ledger and drives the lot ledger for every trade.
 *
 * Rules:
 * - One group per transaction, correlated by its source id
 * - Posting ids are `<sourceId>:<n>`; timestamps are the transaction
 *   date at midnight UTC, so no wall-clock value enters the journal
 * - Zero legs are omitted; a negative leg is posted on the other side
 * - A group with no non-zero legs posts nothing, but its lot effect stands
 * - Gain/loss accounts come from the class policy table
 */

import type {
  CashTransaction,
  InstrumentClass,
  Money,
  Posting,
  PostingType,
  SecondaryMovement,
  TradeTransaction,
} from "@histcost/types";
import { Ledger, LedgerError, moneyFromScaled, parseAmount } from "@histcost/ledger";
import { LotLedger } from "@histcost/lots";
import type { RateProvider } from "@histcost/rates";
import {
  ACCOUNTS,
  CASH_ROUTES,
  CHART_OF_ACCOUNTS,
  DEFAULT_CASH_ACCOUNTS,
  DEFAULT_CLASS_POLICY,
  cashAccountFor,
} from "./chart.js";
import type {
  CashAccountMap,
  ClassPolicy,
  ClassPolicyTable,
  JournalEngineOptions,
  JournalEntry,
  JournalEntryKind,
  JournalLogEntry,
  TransactionCostPolicy,
} from "./types.js";
import { JournalError } from "./types.js";

/** Registration time of the chart; fixed so runs stay reproducible. */
const CHART_EPOCH = "1970-01-01T00:00:00.000Z";

interface Leg {
  readonly accountId: string;
  readonly side: PostingType;
  /** Scaled reporting units; may be negative or zero */
  readonly amount: bigint;
}

export class JournalEngine {
  readonly ledger: Ledger;
  readonly lots: LotLedger;
  readonly reportingCurrency: string;
  readonly reportingDecimals: number;
  readonly costPolicy: TransactionCostPolicy;
  readonly classPolicy: ClassPolicyTable;
  readonly cashAccounts: CashAccountMap;

  private readonly rates: RateProvider;
  private readonly onLog: ((entry: JournalLogEntry) => void) | undefined;
  private readonly _entries: JournalEntry[] = [];
  private secondaryCount = 0;

  constructor(options: JournalEngineOptions) {
    const rates = options.rates;
    this.rates = rates;
    this.reportingCurrency = (options.reportingCurrency ?? rates.reportingCurrency).toUpperCase();
    this.reportingDecimals = options.reportingDecimals ?? rates.reportingDecimals;
    // converted amounts are read at the provider's scale
    if (this.reportingCurrency !== rates.reportingCurrency || this.reportingDecimals !== rates.reportingDecimals) {
      throw new JournalError(
        "REPORTING_MISMATCH",
        `Journal reports in ${this.reportingCurrency} at ${String(this.reportingDecimals)} dp but rates convert to ${rates.reportingCurrency} at ${String(rates.reportingDecimals)} dp`,
      );
    }
    this.costPolicy = options.costPolicy ?? "capitalize";
    this.classPolicy = options.classPolicy ?? DEFAULT_CLASS_POLICY;
    this.cashAccounts = options.cashAccounts ?? DEFAULT_CASH_ACCOUNTS;
    this.onLog = options.onLog;

    this.ledger = new Ledger();
    this.ledger.registerChart(CHART_OF_ACCOUNTS, CHART_EPOCH);
    this.lots = new LotLedger({ currency: this.reportingCurrency, decimals: this.reportingDecimals });

    this.assertRoutable();
  }

  // ─── Posting ─────────────────────────────────────────────────────────

  /**
   * Post one trade and apply its lot effect.
   * Trades must arrive in lot-matching order.
   */
  async postTrade(trade: TradeTransaction): Promise<JournalEntry | undefined> {
    const policy = this.policyFor(trade.instrumentClass);
    const gross = await this.toReporting(trade.grossConsideration, trade.currency, trade.date);
    const commission = await this.toReporting(trade.transactionCost, trade.currency, trade.date);
    const cash = cashAccountFor(trade.currency, this.reportingCurrency, this.cashAccounts);
    const capitalize = this.costPolicy === "capitalize";
    const legs: Leg[] = [];

    if (trade.direction === "acquisition") {
      const lotCost = capitalize ? gross + commission : gross;
      this.lots.acquire({
        transactionId: trade.id,
        date: trade.date,
        instrument: trade.instrument,
        instrumentClass: trade.instrumentClass,
        quantity: trade.quantity,
        cost: this.money(lotCost),
      });

      legs.push({ accountId: ACCOUNTS.investmentsAtCost, side: "debit", amount: lotCost });
      if (!capitalize) {
        legs.push({ accountId: ACCOUNTS.transactionCosts, side: "debit", amount: commission });
      }
      legs.push({ accountId: cash, side: "credit", amount: gross + commission });
    } else {
      const disposal = this.lots.dispose({
        transactionId: trade.id,
        date: trade.date,
        instrument: trade.instrument,
        instrumentClass: trade.instrumentClass,
        quantity: trade.quantity,
        netProceeds: this.money(capitalize ? gross - commission : gross),
      });
      const cost = parseAmount(disposal.cost.amount, disposal.cost.decimals);
      const gain = parseAmount(disposal.realizedGain.amount, disposal.realizedGain.decimals);

      if (disposal.shortfall !== undefined) {
        this.log("warn", `Disposal exceeds open lots; ${disposal.shortfall.quantity} taken at zero cost`, {
          transactionId: trade.id,
          instrument: trade.instrument,
          instrumentClass: trade.instrumentClass,
        });
      }

      legs.push({ accountId: cash, side: "debit", amount: gross - commission });
      if (!capitalize) {
        legs.push({ accountId: ACCOUNTS.transactionCosts, side: "debit", amount: commission });
      }
      legs.push({ accountId: ACCOUNTS.investmentsAtCost, side: "credit", amount: cost });
      legs.push(
        gain >= 0n
          ? { accountId: policy.gainAccount, side: "credit", amount: gain }
          : { accountId: policy.lossAccount, side: "debit", amount: -gain },
      );
    }

    const memo = trade.description !== ""
      ? trade.description
      : `${trade.direction} ${trade.quantity} ${trade.instrument}`;
    return this.post("trade", trade.id, trade.date, memo, legs);
  }

  async postCash(movement: CashTransaction): Promise<JournalEntry | undefined> {
    const amount = await this.toReporting(movement.amount, movement.currency, movement.date);
    const cash = cashAccountFor(movement.currency, this.reportingCurrency, this.cashAccounts);
    const route = CASH_ROUTES[movement.category];
    const counter = amount >= 0n ? route.inflow : route.outflow;

    const memo = movement.description !== "" ? movement.description : movement.rawType;
    return this.post("cash", movement.id, movement.date, memo, [
      { accountId: cash, side: "debit", amount },
      { accountId: counter, side: "credit", amount },
    ]);
  }

  /**
   * Post a secondary-ledger movement. Amounts are already in reporting
   * currency and must be positive.
   */
  postSecondary(movement: SecondaryMovement): JournalEntry | undefined {
    let amount: bigint;
    try {
      amount = parseAmount(movement.amount, this.reportingDecimals);
    } catch (error) {
      if (error instanceof LedgerError) {
        throw new JournalError("INVALID_MOVEMENT", `Secondary movement "${movement.reference}": ${error.message}`);
      }
      throw error;
    }
    if (amount <= 0n) {
      throw new JournalError(
        "INVALID_MOVEMENT",
        `Secondary movement "${movement.reference}" must have a positive amount, got "${movement.amount}"`,
      );
    }

    this.secondaryCount += 1;
    const id = `secondary-${String(this.secondaryCount)}`;
    const received = movement.direction === "received";
    const memo = movement.reference !== "" ? movement.reference : `Secondary account ${movement.direction}`;

    return this.post("secondary", id, movement.date, memo, [
      { accountId: received ? ACCOUNTS.cashSecondary : ACCOUNTS.ownersLoan, side: "debit", amount },
      { accountId: received ? ACCOUNTS.ownersLoan : ACCOUNTS.cashSecondary, side: "credit", amount },
    ]);
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  entries(): readonly JournalEntry[] {
    return [...this._entries];
  }

  /**
   * Investments-at-cost balance in reporting currency.
   */
  transitBalance(): Money {
    const balance = this.ledger
      .getBalance(ACCOUNTS.investmentsAtCost)
      .balances.find((b) => b.currency === this.reportingCurrency);
    return balance === undefined
      ? this.money(0n)
      : { amount: balance.balance, currency: this.reportingCurrency, decimals: this.reportingDecimals };
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private post(
    kind: JournalEntryKind,
    sourceRef: string,
    date: string,
    memo: string,
    legs: readonly Leg[],
  ): JournalEntry | undefined {
    const normalised = legs
      .filter((leg) => leg.amount !== 0n)
      .map((leg): Leg => (leg.amount < 0n
        ? { accountId: leg.accountId, side: leg.side === "debit" ? "credit" : "debit", amount: -leg.amount }
        : leg));

    if (normalised.length === 0) {
      this.log("debug", `Nothing to post for ${kind} ${sourceRef}`, { sourceRef });
      return undefined;
    }

    const timestamp = `${date}T00:00:00.000Z`;
    const postings: Posting[] = normalised.map((leg, i) => ({
      id: `${sourceRef}:${String(i + 1)}`,
      accountId: leg.accountId,
      type: leg.side,
      money: this.money(leg.amount),
      timestamp,
      correlationId: sourceRef,
      sourceRef,
      memo,
    }));

    this.ledger.append(postings, { description: memo, sourceRef });

    const entry: JournalEntry = {
      correlationId: sourceRef,
      kind,
      sourceRef,
      date,
      memo,
      lines: postings.map((p) => ({ id: p.id, accountId: p.accountId, type: p.type, amount: p.money.amount })),
    };
    this._entries.push(entry);
    return entry;
  }

  private async toReporting(amount: string, currency: string, date: string): Promise<bigint> {
    const converted = await this.rates.toReporting(amount, currency, date);
    return parseAmount(converted.amount, converted.decimals);
  }

  private money(scaled: bigint): Money {
    return moneyFromScaled(scaled, this.reportingCurrency, this.reportingDecimals);
  }

  private policyFor(instrumentClass: InstrumentClass): ClassPolicy {
    const policy = Object.hasOwn(this.classPolicy, instrumentClass) ? this.classPolicy[instrumentClass] : undefined;
    if (policy === undefined) {
      throw new JournalError("MISSING_CLASS_POLICY", `No routing policy for instrument class "${instrumentClass}"`);
    }
    return policy;
  }

  private assertRoutable(): void {
    const referenced = [
      this.cashAccounts.reporting,
      this.cashAccounts.fallback,
      ...Object.values(this.cashAccounts.byCurrency),
      ...Object.values(this.classPolicy).flatMap((p) => [p.gainAccount, p.lossAccount]),
    ];
    for (const accountId of referenced) {
      if (!this.ledger.hasAccount(accountId)) {
        throw new JournalError("UNKNOWN_ACCOUNT", `Routing references unknown account "${accountId}"`);
      }
    }
  }

  private log(level: JournalLogEntry["level"], message: string, context: Record<string, string | number>): void {
    this.onLog?.({ level, message, context });
  }
}
