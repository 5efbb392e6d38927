/**
 * @histcost/rates — Rate Provider.
 *
 * Resolves the monthly rate for a (currency, date) pair and converts
 * amounts into the reporting currency.
 *
 * Rules:
 * - The reporting currency always has rate "1" and is never fetched
 * - Each month table is fetched at most once; concurrent lookups for the
 *   same month share one in-flight request
 * - A currency absent from its month table is fatal, never defaulted
 * - Conversion rounds half-up to the reporting currency's decimals
 */

import type { Money } from "@histcost/types";
import { convertAmount, multiplyAmount, parseDecimal } from "@histcost/ledger";
import { periodKey, periodOf } from "./period.js";
import type {
  MonthlyRateTable,
  RateFetchLogEntry,
  RatePeriod,
  RateProviderOptions,
  RateSource,
} from "./types.js";
import { RateError } from "./types.js";

const RATE_FORMAT = /^\d+(\.\d+)?$/;

export class RateProvider {
  readonly reportingCurrency: string;
  readonly reportingDecimals: number;

  private readonly source: RateSource;
  private readonly onFetch: ((entry: RateFetchLogEntry) => void) | undefined;
  private readonly months = new Map<string, Promise<MonthlyRateTable>>();
  private readonly rates = new Map<string, string>();
  private fetches = 0;

  constructor(options: RateProviderOptions) {
    this.source = options.source;
    this.reportingCurrency = (options.reportingCurrency ?? "GBP").toUpperCase();
    this.reportingDecimals = options.reportingDecimals ?? 2;
    this.onFetch = options.onFetch;
  }

  /**
   * Foreign units per one reporting unit, for the month `date` falls in.
   */
  async getRate(currency: string, date: string): Promise<string> {
    const code = currency.trim().toUpperCase();
    const period = periodOf(date);
    if (code === this.reportingCurrency) {
      return "1";
    }

    const key = periodKey(period);
    const cacheKey = `${code}@${key}`;
    const cached = this.rates.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    const table = await this.loadMonth(period);
    const rate = table.get(code);
    if (rate === undefined) {
      throw new RateError("RATE_UNAVAILABLE", `No ${code} rate published for ${key}`, {
        currency: code,
        period: key,
      });
    }
    if (!RATE_FORMAT.test(rate) || parseDecimal(rate).value === 0n) {
      throw new RateError("INVALID_RATE", `Invalid ${code} rate for ${key}: "${rate}"`, {
        currency: code,
        period: key,
      });
    }

    this.rates.set(cacheKey, rate);
    return rate;
  }

  /**
   * Convert a transaction-currency amount into reporting currency.
   */
  async toReporting(amount: string, currency: string, date: string): Promise<Money> {
    const rate = await this.getRate(currency, date);
    return {
      amount: convertAmount(amount, rate, this.reportingDecimals),
      currency: this.reportingCurrency,
      decimals: this.reportingDecimals,
    };
  }

  /**
   * Convert a reporting-currency amount back into `currency`.
   */
  async fromReporting(amount: string, currency: string, date: string, decimals = 2): Promise<string> {
    const rate = await this.getRate(currency, date);
    return multiplyAmount(amount, rate, decimals);
  }

  /**
   * Months requested so far (loaded or loading), in order.
   */
  cachedPeriods(): readonly string[] {
    return [...this.months.keys()].sort();
  }

  /** Number of month tables requested from the source. */
  get fetchCount(): number {
    return this.fetches;
  }

  private loadMonth(period: RatePeriod): Promise<MonthlyRateTable> {
    const key = periodKey(period);
    const pending = this.months.get(key);
    if (pending !== undefined) {
      return pending;
    }
    const request = this.fetchMonth(period, key);
    this.months.set(key, request);
    return request;
  }

  private async fetchMonth(period: RatePeriod, key: string): Promise<MonthlyRateTable> {
    this.fetches += 1;
    const start = Date.now();
    try {
      const table = await this.source.fetchMonth(period);
      this.onFetch?.({
        source: this.source.name,
        period: key,
        currencyCount: table.size,
        durationMs: Date.now() - start,
      });
      return table;
    } catch (error) {
      this.months.delete(key);
      throw error;
    }
  }
}
