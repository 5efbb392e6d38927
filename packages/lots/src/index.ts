/**
 * @histcost/lots — FIFO lot tracking at historical cost.
 */

export { LotLedger } from "./lot-ledger.js";
export { formatQuantity, parseQuantity } from "./quantity.js";
export type {
  LotKey,
  AcquireInput,
  DisposeInput,
  OpenLot,
  LotConsumption,
  Shortfall,
  DisposalResult,
  LotPosition,
  ShortfallRecord,
  LotLedgerOptions,
  LotErrorCode,
} from "./types.js";
export { LotError, QUANTITY_DECIMALS } from "./types.js";
