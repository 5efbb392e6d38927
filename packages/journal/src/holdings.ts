/**
 * Holdings schedule.
 *
 * Open lots of the classes the policy table schedules, grouped by
 * instrument and class. Lots of other classes are only totalled, which
 * is why the investments-at-cost balance and the schedule total differ
 * by exactly the excluded cost.
 *
 * Lots are matched per instrument, so an instrument substitution by the
 * broker leaves a lot nobody closes. Such lines are not corrected here.
 * They are flagged against the broker's own position snapshot when there
 * is one, and against the run's zero-cost disposals in any case: a roll
 * shows up as a shortfall on the new identifier beside an old line of
 * the same class.
 */

import type { InstrumentClass, PositionSnapshot } from "@histcost/types";
import { divideRounded, formatAmount, moneyFromScaled, parseAmount, parseDecimal, rescale } from "@histcost/ledger";
import type { OpenLot, ShortfallRecord } from "@histcost/lots";
import { QUANTITY_DECIMALS, formatQuantity } from "@histcost/lots";
import type {
  ClassPolicyTable,
  ExcludedHoldings,
  HoldingsFlag,
  HoldingsLine,
  HoldingsOptions,
  HoldingsSchedule,
  TransitReconciliation,
} from "./types.js";

const AVERAGE_COST_DECIMALS = 4;

interface Group {
  readonly instrument: string;
  readonly instrumentClass: InstrumentClass;
  quantity: bigint;
  cost: bigint;
  lotCount: number;
}

function toQuantityScale(quantity: string): bigint {
  const parsed = parseDecimal(quantity);
  return rescale(parsed.value, parsed.scale, QUANTITY_DECIMALS);
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function shortfallFlags(group: Group, shortfalls: readonly ShortfallRecord[]): HoldingsFlag[] {
  const sameClass = shortfalls.filter((s) => s.instrumentClass === group.instrumentClass);
  const flags: HoldingsFlag[] = [];
  if (sameClass.some((s) => s.instrument === group.instrument)) flags.push("shortfall-on-instrument");
  if (sameClass.some((s) => s.instrument !== group.instrument)) flags.push("shortfall-in-class");
  return flags;
}

export function buildHoldingsSchedule(
  openLots: readonly OpenLot[],
  classPolicy: ClassPolicyTable,
  options: HoldingsOptions = {},
): HoldingsSchedule {
  const currency = options.currency ?? "GBP";
  const decimals = options.decimals ?? 2;

  const groups = new Map<string, Group>();
  const excluded = new Map<InstrumentClass, { lotCount: number; cost: bigint }>();

  for (const lot of openLots) {
    const quantity = toQuantityScale(lot.quantity);
    if (quantity === 0n) continue;
    const cost = rescale(parseAmount(lot.cost.amount, lot.cost.decimals), lot.cost.decimals, decimals);

    if (!classPolicy[lot.instrumentClass].inHoldings) {
      const bucket = excluded.get(lot.instrumentClass) ?? { lotCount: 0, cost: 0n };
      bucket.lotCount += 1;
      bucket.cost += cost;
      excluded.set(lot.instrumentClass, bucket);
      continue;
    }

    const key = `${lot.instrument}\u0000${lot.instrumentClass}`;
    let group = groups.get(key);
    if (group === undefined) {
      group = { instrument: lot.instrument, instrumentClass: lot.instrumentClass, quantity: 0n, cost: 0n, lotCount: 0 };
      groups.set(key, group);
    }
    group.quantity += quantity;
    group.cost += cost;
    group.lotCount += 1;
  }

  const positions = options.positions;
  const shortfalls = options.shortfalls ?? [];
  const matched = new Set<PositionSnapshot>();

  const lines: HoldingsLine[] = [...groups.values()]
    .sort((a, b) => compareText(a.instrument, b.instrument) || compareText(a.instrumentClass, b.instrumentClass))
    .map((group): HoldingsLine => {
      const line = {
        instrument: group.instrument,
        instrumentClass: group.instrumentClass,
        quantity: formatQuantity(group.quantity),
        cost: moneyFromScaled(group.cost, currency, decimals),
        averageCost: formatAmount(
          divideRounded(
            group.cost * 10n ** BigInt(QUANTITY_DECIMALS + AVERAGE_COST_DECIMALS),
            group.quantity * 10n ** BigInt(decimals),
          ),
          AVERAGE_COST_DECIMALS,
        ),
        lotCount: group.lotCount,
      };
      const fromShortfalls = shortfallFlags(group, shortfalls);
      if (positions === undefined) {
        return { ...line, flags: fromShortfalls };
      }

      const reported = positions.filter(
        (p) => p.instrument === group.instrument
          && (p.instrumentClass === undefined || p.instrumentClass === group.instrumentClass),
      );
      if (reported.length === 0) {
        return { ...line, flags: ["no-broker-position", ...fromShortfalls] };
      }

      reported.forEach((p) => matched.add(p));
      const brokerQuantity = reported.reduce((sum, p) => sum + toQuantityScale(p.quantity), 0n);
      const flags: HoldingsFlag[] = brokerQuantity === group.quantity ? [] : ["quantity-mismatch"];
      flags.push(...fromShortfalls);
      return { ...line, brokerQuantity: formatQuantity(brokerQuantity), flags };
    });

  const total = lines.reduce((sum, line) => sum + parseAmount(line.cost.amount, decimals), 0n);
  const excludedCost = [...excluded.values()].reduce((sum, bucket) => sum + bucket.cost, 0n);

  const excludedList: ExcludedHoldings[] = [...excluded.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([instrumentClass, bucket]) => ({
      instrumentClass,
      lotCount: bucket.lotCount,
      cost: moneyFromScaled(bucket.cost, currency, decimals),
    }));

  const unmatchedPositions = (positions ?? []).filter(
    (p) => !matched.has(p) && (p.instrumentClass === undefined || classPolicy[p.instrumentClass].inHoldings),
  );

  let transit: TransitReconciliation | undefined;
  if (options.transitBalance !== undefined) {
    const balance = rescale(
      parseAmount(options.transitBalance.amount, options.transitBalance.decimals),
      options.transitBalance.decimals,
      decimals,
    );
    const difference = balance - total;
    transit = {
      transitBalance: moneyFromScaled(balance, currency, decimals),
      scheduleTotal: moneyFromScaled(total, currency, decimals),
      excludedCost: moneyFromScaled(excludedCost, currency, decimals),
      difference: moneyFromScaled(difference, currency, decimals),
      reconciled: difference === excludedCost,
    };
  }

  return {
    lines,
    total: moneyFromScaled(total, currency, decimals),
    excluded: excludedList,
    unmatchedPositions,
    matching: "per-identifier",
    shortfalls,
    ...(transit !== undefined ? { transit } : {}),
  };
}
