/**
 * Global trade ordering for lot matching.
 *
 * Date first; within a date every acquisition precedes every disposal,
 * so a same-day sell can match a same-day buy; then input order.
 */

import type { TradeTransaction } from "@histcost/types";

const DIRECTION_RANK = { acquisition: 0, disposal: 1 } as const;

export function compareForLotMatching(a: TradeTransaction, b: TradeTransaction): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  const rank = DIRECTION_RANK[a.direction] - DIRECTION_RANK[b.direction];
  if (rank !== 0) return rank;
  return a.sequence - b.sequence;
}

/**
 * Sorted copy; the input is left untouched.
 */
export function orderForLotMatching(trades: readonly TradeTransaction[]): readonly TradeTransaction[] {
  return [...trades].sort(compareForLotMatching);
}
