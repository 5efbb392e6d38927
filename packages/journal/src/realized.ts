/**
 * Realized gain/loss totals per instrument class.
 */

import type { InstrumentClass } from "@histcost/types";
import { moneyFromScaled, parseAmount, rescale } from "@histcost/ledger";
import type { DisposalResult } from "@histcost/lots";
import type { RealizedClassTotal } from "./types.js";

export function realizedByClass(
  disposals: readonly DisposalResult[],
  currency = "GBP",
  decimals = 2,
): readonly RealizedClassTotal[] {
  const totals = new Map<InstrumentClass, { disposals: number; gains: bigint; losses: bigint }>();

  for (const disposal of disposals) {
    const { amount, decimals: scale } = disposal.realizedGain;
    const gain = rescale(parseAmount(amount, scale), scale, decimals);
    const bucket = totals.get(disposal.instrumentClass) ?? { disposals: 0, gains: 0n, losses: 0n };
    bucket.disposals += 1;
    if (gain >= 0n) {
      bucket.gains += gain;
    } else {
      bucket.losses -= gain;
    }
    totals.set(disposal.instrumentClass, bucket);
  }

  return [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([instrumentClass, t]) => ({
      instrumentClass,
      disposals: t.disposals,
      gains: moneyFromScaled(t.gains, currency, decimals),
      losses: moneyFromScaled(t.losses, currency, decimals),
      net: moneyFromScaled(t.gains - t.losses, currency, decimals),
    }));
}
