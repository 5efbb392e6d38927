/**
 * @histcost/rates — Types for monthly exchange-rate lookup.
 *
 * Rates are quoted as foreign-currency units per one unit of the
 * reporting currency, so `reporting = foreign / rate`.
 */

// ─── Periods ─────────────────────────────────────────────────────────────

/**
 * A calendar month. Rates are published per month and apply to every
 * transaction dated within it.
 */
export interface RatePeriod {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
}

/**
 * Currency code → rate decimal string, for one month.
 */
export type MonthlyRateTable = ReadonlyMap<string, string>;

// ─── Sources ─────────────────────────────────────────────────────────────

/**
 * Where month tables come from: the published monthly CSV over HTTP,
 * or a static table for offline runs.
 */
export interface RateSource {
  /** Short label used in log entries and error messages. */
  readonly name: string;

  /**
   * Load every published rate for one month.
   * Rejects with RateError("RATE_FETCH_FAILED") when the table cannot
   * be obtained at all.
   */
  fetchMonth(period: RatePeriod): Promise<MonthlyRateTable>;
}

/**
 * Emitted once per month table actually fetched (never for cache hits).
 */
export interface RateFetchLogEntry {
  readonly source: string;
  readonly period: string;
  readonly currencyCount: number;
  readonly durationMs: number;
}

export interface RateProviderOptions {
  readonly source: RateSource;

  /** Default: "GBP" */
  readonly reportingCurrency?: string | undefined;

  /** Default: 2 */
  readonly reportingDecimals?: number | undefined;

  readonly onFetch?: ((entry: RateFetchLogEntry) => void) | undefined;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type RateErrorCode =
  | "RATE_FETCH_FAILED"
  | "RATE_UNAVAILABLE"
  | "INVALID_RATE"
  | "INVALID_DATE";

/**
 * Every rate failure is fatal for a run: a missing rate is never
 * defaulted or guessed.
 */
export class RateError extends Error {
  public readonly code: RateErrorCode;
  public readonly currency: string | undefined;
  public readonly period: string | undefined;

  constructor(
    code: RateErrorCode,
    message: string,
    context: { currency?: string | undefined; period?: string | undefined } = {},
  ) {
    super(message);
    this.name = "RateError";
    this.code = code;
    this.currency = context.currency;
    this.period = context.period;
  }
}
