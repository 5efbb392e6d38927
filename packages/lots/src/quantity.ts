/**
 * Quantity scaling.
 */

import { formatAmount, LedgerError, parseAmount } from "@histcost/ledger";
import { LotError, QUANTITY_DECIMALS } from "./types.js";

export function parseQuantity(quantity: string, transactionId: string): bigint {
  let scaled: bigint;
  try {
    scaled = parseAmount(quantity, QUANTITY_DECIMALS);
  } catch (error) {
    if (error instanceof LedgerError) {
      throw new LotError("INVALID_QUANTITY", `Invalid quantity "${quantity}": ${error.message}`, transactionId);
    }
    throw error;
  }
  if (scaled <= 0n) {
    throw new LotError("INVALID_QUANTITY", `Quantity must be positive, got "${quantity}"`, transactionId);
  }
  return scaled;
}

/**
 * Shortest decimal form: 25000000000n → "2.5".
 */
export function formatQuantity(scaled: bigint): string {
  const text = formatAmount(scaled, QUANTITY_DECIMALS);
  return text.replace(/\.?0+$/, "");
}
