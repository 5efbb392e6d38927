/**
 * Cash movement classification.
 *
 * Ordered keyword rules over the lower-cased broker type label; the
 * first rule that matches wins. "Withholding Tax on Dividends" is
 * therefore withholding tax, not a dividend.
 */

import type { CashMovementCategory } from "@histcost/types";

export interface CashRule {
  readonly category: CashMovementCategory;
  readonly matches: (type: string) => boolean;
}

export const CASH_RULES: readonly CashRule[] = [
  {
    category: "dividend",
    matches: (t) => t.includes("dividend") && !t.includes("withhold"),
  },
  {
    category: "withholding-tax",
    matches: (t) => t.includes("withhold") || t.includes("tax"),
  },
  {
    category: "interest",
    matches: (t) => t.includes("interest"),
  },
  {
    category: "fee",
    matches: (t) => t.includes("fee") || t.includes("commission"),
  },
  {
    category: "capital",
    matches: (t) => t.includes("deposit") || t.includes("withdraw") || t.includes("transfer"),
  },
];

export function classifyCashType(
  type: string,
  rules: readonly CashRule[] = CASH_RULES,
): CashMovementCategory {
  const lowered = type.toLowerCase();
  return rules.find((rule) => rule.matches(lowered))?.category ?? "other";
}
