/**
 * @histcost/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { DEFAULT_RATE_URL_TEMPLATE } from "@histcost/rates";

// =============================================================================
// Schema
// =============================================================================

const CalendarDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

const CurrencyCode = z
  .string()
  .regex(/^[A-Za-z]{3}$/, "Expected a three-letter currency code")
  .transform((code) => code.toUpperCase());

export const ConfigSchema = z.object({
  // Inputs
  LEDGER_FILE: z.string().min(1, "LEDGER_FILE is required"),
  SECONDARY_LEDGER_FILE: z.string().min(1).optional(),
  PERIOD_END: CalendarDate.optional(),

  // Reporting
  REPORTING_CURRENCY: CurrencyCode.default("GBP"),
  REPORTING_DECIMALS: z.coerce.number().int().min(0).max(8).default(2),
  DEFAULT_CURRENCY: CurrencyCode.default("USD"),
  TRANSACTION_COST_POLICY: z.enum(["capitalize", "expense"]).default("capitalize"),
  REPORT_FILE: z.string().min(1).optional(),

  // Rates
  RATE_URL_TEMPLATE: z.string().url().default(DEFAULT_RATE_URL_TEMPLATE),
  RATES_FILE: z.string().min(1).optional(),
  RATE_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
