/**
 * @histcost/rates — Static rate source for offline runs.
 *
 * Rates come from an in-memory table keyed by "YYYY-MM", typically read
 * from a JSON file shaped `{ "2024-03": { "USD": "1.2716" } }`.
 */

import { parsePeriodKey, periodKey } from "./period.js";
import type { MonthlyRateTable, RatePeriod, RateSource } from "./types.js";
import { RateError } from "./types.js";

export type StaticRateTable = Readonly<Record<string, Readonly<Record<string, string>>>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class StaticRateSource implements RateSource {
  readonly name = "static";

  private readonly months: ReadonlyMap<string, MonthlyRateTable>;

  constructor(table: StaticRateTable) {
    const months = new Map<string, MonthlyRateTable>();
    for (const [key, rates] of Object.entries(table)) {
      const normalised = periodKey(parsePeriodKey(key));
      months.set(
        normalised,
        new Map(Object.entries(rates).map(([code, rate]) => [code.trim().toUpperCase(), rate.trim()])),
      );
    }
    this.months = months;
  }

  /**
   * Build from parsed JSON, rejecting anything that is not a
   * period → currency → rate-string mapping.
   */
  static fromJson(value: unknown): StaticRateSource {
    if (!isRecord(value)) {
      throw new RateError("INVALID_RATE", "Rate file must be a JSON object keyed by YYYY-MM");
    }
    const table: Record<string, Record<string, string>> = {};
    for (const [key, rates] of Object.entries(value)) {
      if (!isRecord(rates)) {
        throw new RateError("INVALID_RATE", `Rates for "${key}" must be an object`, { period: key });
      }
      const month: Record<string, string> = {};
      for (const [code, rate] of Object.entries(rates)) {
        if (typeof rate === "string") {
          month[code] = rate;
        } else if (typeof rate === "number" && Number.isFinite(rate)) {
          month[code] = String(rate);
        } else {
          throw new RateError("INVALID_RATE", `Rate for ${code} in ${key} is not a number`, {
            currency: code,
            period: key,
          });
        }
      }
      table[key] = month;
    }
    return new StaticRateSource(table);
  }

  fetchMonth(period: RatePeriod): Promise<MonthlyRateTable> {
    const key = periodKey(period);
    const month = this.months.get(key);
    if (month === undefined) {
      return Promise.reject(
        new RateError("RATE_FETCH_FAILED", `No rates loaded for ${key}`, { period: key }),
      );
    }
    return Promise.resolve(month);
  }
}
