/**
 * @histcost/lots — Types for FIFO lot tracking.
 *
 * Costs are in the reporting currency. Quantities are decimal strings;
 * internally they are held as bigint at QUANTITY_DECIMALS places.
 */

import type { InstrumentClass, Money } from "@histcost/types";

/** Fractional digits carried for quantities. */
export const QUANTITY_DECIMALS = 10;

/**
 * Lots of the same instrument but different classes never match.
 */
export interface LotKey {
  readonly instrument: string;
  readonly instrumentClass: InstrumentClass;
}

export interface AcquireInput extends LotKey {
  readonly transactionId: string;
  readonly date: string;
  /** Positive */
  readonly quantity: string;
  /** Total cost of the lot, non-negative */
  readonly cost: Money;
}

export interface DisposeInput extends LotKey {
  readonly transactionId: string;
  readonly date: string;
  /** Positive */
  readonly quantity: string;
  /** Proceeds after any netted transaction cost; may be negative */
  readonly netProceeds: Money;
}

/**
 * An open lot, as seen from outside the ledger.
 */
export interface OpenLot extends LotKey {
  readonly lotId: string;
  readonly acquiredOn: string;
  readonly originalQuantity: string;
  /** Quantity still held */
  readonly quantity: string;
  /** Cost still attached to the held quantity */
  readonly cost: Money;
}

export interface LotConsumption {
  readonly lotId: string;
  readonly acquiredOn: string;
  readonly quantity: string;
  readonly cost: Money;
}

export interface Shortfall {
  /** Quantity disposed of beyond every open lot, taken at zero cost */
  readonly quantity: string;
}

export interface DisposalResult extends LotKey {
  readonly transactionId: string;
  readonly date: string;
  readonly quantity: string;
  readonly consumptions: readonly LotConsumption[];
  /** Cost of everything consumed */
  readonly cost: Money;
  readonly netProceeds: Money;
  /** netProceeds − cost; negative for a loss */
  readonly realizedGain: Money;
  readonly shortfall?: Shortfall | undefined;
}

export interface LotPosition extends LotKey {
  readonly quantity: string;
  readonly cost: Money;
  readonly lotCount: number;
}

export interface ShortfallRecord extends LotKey {
  readonly transactionId: string;
  readonly date: string;
  readonly quantity: string;
}

export interface LotLedgerOptions {
  /** Default: "GBP" */
  readonly currency?: string | undefined;
  /** Default: 2 */
  readonly decimals?: number | undefined;
}

export type LotErrorCode =
  | "INVALID_QUANTITY"
  | "INVALID_COST"
  | "CURRENCY_MISMATCH";

export class LotError extends Error {
  public readonly code: LotErrorCode;
  public readonly transactionId: string | undefined;

  constructor(code: LotErrorCode, message: string, transactionId?: string) {
    super(message);
    this.name = "LotError";
    this.code = code;
    this.transactionId = transactionId;
  }
}
