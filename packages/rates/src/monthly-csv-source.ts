/**
 * @histcost/rates — Monthly CSV rate source.
 *
 * Fetches one published CSV per month over HTTP with native fetch():
 * - URL built from a template with {year} and {month} placeholders
 * - Timeout via AbortController
 * - No retry; any failure is fatal for the run
 * - Custom fetch function for testing
 */

import { parseRateCsv } from "./csv-table.js";
import { periodKey } from "./period.js";
import type { MonthlyRateTable, RatePeriod, RateSource } from "./types.js";
import { RateError } from "./types.js";

/**
 * Month is not zero-padded: monthly_csv_2024-3.csv.
 */
export const DEFAULT_RATE_URL_TEMPLATE =
  "https://www.trade-tariff.service.gov.uk/uk/api/exchange_rates/files/monthly_csv_{year}-{month}.csv";

export interface MonthlyCsvRateSourceConfig {
  readonly urlTemplate?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs?: number | undefined;
  /** Custom fetch function (for testing) */
  readonly fetchFn?: typeof fetch | undefined;
}

export function rateUrl(template: string, period: RatePeriod): string {
  return template
    .replaceAll("{year}", String(period.year))
    .replaceAll("{month}", String(period.month));
}

export class MonthlyCsvRateSource implements RateSource {
  readonly name = "monthly-csv";

  private readonly urlTemplate: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: MonthlyCsvRateSourceConfig = {}) {
    this.urlTemplate = config.urlTemplate ?? DEFAULT_RATE_URL_TEMPLATE;
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async fetchMonth(period: RatePeriod): Promise<MonthlyRateTable> {
    const key = periodKey(period);
    const url = rateUrl(this.urlTemplate, period);

    let body: string;
    try {
      body = await this.fetchWithTimeout(url, key);
    } catch (error) {
      if (error instanceof RateError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new RateError("RATE_FETCH_FAILED", `Failed to fetch rates for ${key}: ${reason}`, { period: key });
    }

    return parseRateCsv(body);
  }

  /**
   * Fetch and read the body under one timeout, so a stalled body aborts
   * like a stalled connection.
   */
  private async fetchWithTimeout(url: string, key: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        headers: { Accept: "text/csv" },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new RateError(
          "RATE_FETCH_FAILED",
          `Failed to fetch rates for ${key}: HTTP ${String(response.status)}`,
          { period: key },
        );
      }
      return await response.text();
    } catch (error) {
      if (controller.signal.aborted || (error instanceof Error && error.name === "AbortError")) {
        throw new RateError(
          "RATE_FETCH_FAILED",
          `Rate request for ${key} timed out after ${String(this.timeoutMs)}ms`,
          { period: key },
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
