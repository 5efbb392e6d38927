/**
 * @histcost/rates — Monthly exchange rates and reporting-currency conversion.
 */

export { RateProvider } from "./rate-provider.js";
export { MonthlyCsvRateSource, DEFAULT_RATE_URL_TEMPLATE, rateUrl } from "./monthly-csv-source.js";
export type { MonthlyCsvRateSourceConfig } from "./monthly-csv-source.js";
export { StaticRateSource } from "./static-source.js";
export type { StaticRateTable } from "./static-source.js";
export { parseRateCsv } from "./csv-table.js";
export { periodOf, periodKey, parsePeriodKey } from "./period.js";

export type {
  RatePeriod,
  MonthlyRateTable,
  RateSource,
  RateFetchLogEntry,
  RateProviderOptions,
  RateErrorCode,
} from "./types.js";
export { RateError } from "./types.js";
