/**
 * @histcost/lots — FIFO lot ledger.
 *
 * One queue per (instrument, instrument class). Acquisitions append a
 * lot; disposals consume from the head.
 *
 * Rules:
 * - Partial consumption takes lotCost × consumed / lotQuantity, rounded
 *   half-up; the remainder stays on the lot, so cost is never lost
 * - An exhausted lot is removed
 * - Quantity disposed of beyond every open lot is taken at zero cost
 *   and flagged as a shortfall
 * - Keys never cross-match (no roll or rename matching)
 */

import type { Money } from "@histcost/types";
import { divideRounded, formatAmount, parseAmount } from "@histcost/ledger";
import { formatQuantity, parseQuantity } from "./quantity.js";
import type {
  AcquireInput,
  DisposalResult,
  DisposeInput,
  LotConsumption,
  LotKey,
  LotLedgerOptions,
  LotPosition,
  OpenLot,
  ShortfallRecord,
} from "./types.js";
import { LotError } from "./types.js";

interface MutableLot {
  readonly lotId: string;
  readonly key: LotKey;
  readonly acquiredOn: string;
  readonly originalQuantity: bigint;
  quantity: bigint;
  cost: bigint;
}

function keyOf(key: LotKey): string {
  return `${key.instrumentClass}::${key.instrument}`;
}

export class LotLedger {
  readonly currency: string;
  readonly decimals: number;

  private readonly queues = new Map<string, MutableLot[]>();
  private readonly _disposals: DisposalResult[] = [];

  constructor(options: LotLedgerOptions = {}) {
    this.currency = options.currency ?? "GBP";
    this.decimals = options.decimals ?? 2;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  acquire(input: AcquireInput): OpenLot {
    const quantity = parseQuantity(input.quantity, input.transactionId);
    const cost = this.scaledCost(input.cost, input.transactionId);
    if (cost < 0n) {
      throw new LotError("INVALID_COST", `Lot cost must not be negative, got "${input.cost.amount}"`, input.transactionId);
    }

    const lot: MutableLot = {
      lotId: input.transactionId,
      key: { instrument: input.instrument, instrumentClass: input.instrumentClass },
      acquiredOn: input.date,
      originalQuantity: quantity,
      quantity,
      cost,
    };

    const k = keyOf(lot.key);
    let queue = this.queues.get(k);
    if (queue === undefined) {
      queue = [];
      this.queues.set(k, queue);
    }
    queue.push(lot);

    return this.view(lot);
  }

  dispose(input: DisposeInput): DisposalResult {
    const requested = parseQuantity(input.quantity, input.transactionId);
    const proceeds = this.scaledCost(input.netProceeds, input.transactionId);
    const queue = this.queues.get(keyOf(input)) ?? [];

    const consumptions: LotConsumption[] = [];
    let remaining = requested;
    let totalCost = 0n;

    while (remaining > 0n) {
      const [head] = queue;
      if (head === undefined) break;

      const consumed = head.quantity <= remaining ? head.quantity : remaining;
      const cost = consumed === head.quantity
        ? head.cost
        : divideRounded(head.cost * consumed, head.quantity);

      head.quantity -= consumed;
      head.cost -= cost;
      remaining -= consumed;
      totalCost += cost;

      consumptions.push({
        lotId: head.lotId,
        acquiredOn: head.acquiredOn,
        quantity: formatQuantity(consumed),
        cost: this.money(cost),
      });

      if (head.quantity === 0n) {
        queue.shift();
      }
    }

    const result: DisposalResult = {
      transactionId: input.transactionId,
      instrument: input.instrument,
      instrumentClass: input.instrumentClass,
      date: input.date,
      quantity: formatQuantity(requested),
      consumptions,
      cost: this.money(totalCost),
      netProceeds: this.money(proceeds),
      realizedGain: this.money(proceeds - totalCost),
      ...(remaining > 0n ? { shortfall: { quantity: formatQuantity(remaining) } } : {}),
    };

    this._disposals.push(result);
    return result;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  /**
   * Every open lot, ordered by key then acquisition.
   */
  openLots(): readonly OpenLot[] {
    return [...this.queues.keys()]
      .sort()
      .flatMap((k) => (this.queues.get(k) ?? []).map((lot) => this.view(lot)));
  }

  lotsFor(key: LotKey): readonly OpenLot[] {
    return (this.queues.get(keyOf(key)) ?? []).map((lot) => this.view(lot));
  }

  /**
   * Total held quantity and cost per key, omitting empty keys.
   */
  positions(): readonly LotPosition[] {
    const positions: LotPosition[] = [];
    for (const k of [...this.queues.keys()].sort()) {
      const queue = this.queues.get(k) ?? [];
      const [first] = queue;
      if (first === undefined) continue;
      positions.push({
        instrument: first.key.instrument,
        instrumentClass: first.key.instrumentClass,
        quantity: formatQuantity(queue.reduce((sum, lot) => sum + lot.quantity, 0n)),
        cost: this.money(queue.reduce((sum, lot) => sum + lot.cost, 0n)),
        lotCount: queue.length,
      });
    }
    return positions;
  }

  /**
   * Every disposal that ran past its open lots, in processing order.
   */
  shortfalls(): readonly ShortfallRecord[] {
    const records: ShortfallRecord[] = [];
    for (const disposal of this._disposals) {
      if (disposal.shortfall === undefined) continue;
      records.push({
        transactionId: disposal.transactionId,
        date: disposal.date,
        instrument: disposal.instrument,
        instrumentClass: disposal.instrumentClass,
        quantity: disposal.shortfall.quantity,
      });
    }
    return records;
  }

  disposals(): readonly DisposalResult[] {
    return [...this._disposals];
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private scaledCost(money: Money, transactionId: string): bigint {
    if (money.currency !== this.currency || money.decimals !== this.decimals) {
      throw new LotError(
        "CURRENCY_MISMATCH",
        `Expected ${this.currency} at ${String(this.decimals)} decimals, got ${money.currency} at ${String(money.decimals)}`,
        transactionId,
      );
    }
    return parseAmount(money.amount, money.decimals);
  }

  private money(scaled: bigint): Money {
    return { amount: formatAmount(scaled, this.decimals), currency: this.currency, decimals: this.decimals };
  }

  private view(lot: MutableLot): OpenLot {
    return {
      lotId: lot.lotId,
      instrument: lot.key.instrument,
      instrumentClass: lot.key.instrumentClass,
      acquiredOn: lot.acquiredOn,
      originalQuantity: formatQuantity(lot.originalQuantity),
      quantity: formatQuantity(lot.quantity),
      cost: this.money(lot.cost),
    };
  }
}
