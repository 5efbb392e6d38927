/**
 * @histcost/ledger — Deterministic decimal arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all Money operations
 * - Amounts must be valid decimal strings
 * - Rounding, where it happens, is half-up (away from zero on ties)
 */

import type { Money } from "@histcost/types";
import { LedgerError } from "./types.js";

const DECIMAL_FORMAT = /^-?\d+(\.\d+)?$/;

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!DECIMAL_FORMAT.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const paddedFrac = fracPart.padEnd(decimals, "0");
  const value = BigInt(intPart + paddedFrac);

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * A decimal held at its own natural scale: value × 10^-scale.
 */
export interface ScaledDecimal {
  readonly value: bigint;
  readonly scale: number;
}

/**
 * Parse a decimal string at the scale it is written with.
 *
 * "1.2716" → { value: 12716n, scale: 4 }
 */
export function parseDecimal(amount: string): ScaledDecimal {
  const trimmed = typeof amount === "string" ? amount.trim() : "";
  if (!DECIMAL_FORMAT.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid decimal: "${String(amount)}"`);
  }
  const dot = trimmed.indexOf(".");
  const scale = dot === -1 ? 0 : trimmed.length - dot - 1;
  return { value: parseAmount(trimmed, scale), scale };
}

/**
 * Integer division rounding half-up (ties away from zero).
 */
export function divideRounded(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "Division by zero");
  }
  const negative = (numerator < 0n) !== (denominator < 0n);
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;
  let quotient = n / d;
  if ((n % d) * 2n >= d) {
    quotient += 1n;
  }
  return negative ? -quotient : quotient;
}

/**
 * Change the scale of a bigint, rounding half-up when scale shrinks.
 */
export function rescale(value: bigint, fromDecimals: number, toDecimals: number): bigint {
  if (toDecimals >= fromDecimals) {
    return value * 10n ** BigInt(toDecimals - fromDecimals);
  }
  return divideRounded(value, 10n ** BigInt(fromDecimals - toDecimals));
}

/**
 * Divide a decimal amount by a rate, rounded half-up to `decimals`.
 *
 * convertAmount("100", "1.25", 2) → "80.00"
 */
export function convertAmount(amount: string, rate: string, decimals: number): string {
  const a = parseDecimal(amount);
  const r = parseDecimal(rate);
  if (r.value <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Rate must be positive, got "${rate}"`);
  }
  const numerator = a.value * 10n ** BigInt(r.scale + decimals);
  const denominator = r.value * 10n ** BigInt(a.scale);
  return formatAmount(divideRounded(numerator, denominator), decimals);
}

/**
 * Multiply a decimal amount by a rate, rounded half-up to `decimals`.
 *
 * multiplyAmount("80.00", "1.25", 2) → "100.00"
 */
export function multiplyAmount(amount: string, rate: string, decimals: number): string {
  const a = parseDecimal(amount);
  const r = parseDecimal(rate);
  const product = a.value * r.value * 10n ** BigInt(decimals);
  return formatAmount(divideRounded(product, 10n ** BigInt(a.scale + r.scale)), decimals);
}

// ─── Money API ───────────────────────────────────────────────────────────

/**
 * Validate that a Money object is well-formed.
 * Throws LedgerError if invalid.
 */
export function validateMoney(money: Money): void {
  if (typeof money.amount !== "string" || money.amount.trim() === "") {
    throw new LedgerError("INVALID_MONEY", `Money amount must be a non-empty string, got: "${String(money.amount)}"`);
  }

  if (typeof money.currency !== "string" || money.currency.trim() === "") {
    throw new LedgerError("INVALID_MONEY", `Money currency must be a non-empty string, got: "${String(money.currency)}"`);
  }

  if (typeof money.decimals !== "number" || !Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new LedgerError("INVALID_MONEY", `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`);
  }

  parseAmount(money.amount, money.decimals);
}

/**
 * Assert two Money values have the same currency and decimals.
 */
export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
    );
  }
  if (a.decimals !== b.decimals) {
    throw new LedgerError(
      "CURRENCY_MISMATCH",
      `Decimal mismatch for currency "${a.currency}": ${String(a.decimals)} vs ${String(b.decimals)}`,
    );
  }
}

/**
 * Build a Money value from a scaled bigint.
 */
export function moneyFromScaled(scaled: bigint, currency: string, decimals: number): Money {
  return { amount: formatAmount(scaled, decimals), currency, decimals };
}

/**
 * The scaled bigint held by a Money value.
 */
export function toScaled(money: Money): bigint {
  return parseAmount(money.amount, money.decimals);
}

export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return moneyFromScaled(toScaled(a) + toScaled(b), a.currency, a.decimals);
}

/**
 * Subtract b from a. They must have the same currency.
 */
export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return moneyFromScaled(toScaled(a) - toScaled(b), a.currency, a.decimals);
}

/**
 * Sum a list of Money values; an empty list sums to `zero`.
 */
export function sumMoney(values: readonly Money[], zero: Money): Money {
  return values.reduce((acc, m) => addMoney(acc, m), zero);
}

/**
 * `money × part / whole`, rounded half-up. Used to apportion a lot's
 * cost to the quantity consumed from it.
 */
export function allocateMoney(money: Money, part: bigint, whole: bigint): Money {
  const scaled = divideRounded(toScaled(money) * part, whole);
  return moneyFromScaled(scaled, money.currency, money.decimals);
}

export function isZero(money: Money): boolean {
  return toScaled(money) === 0n;
}

export function isPositive(money: Money): boolean {
  return toScaled(money) > 0n;
}

export function isNegative(money: Money): boolean {
  return toScaled(money) < 0n;
}

/**
 * Create a zero Money value for a given currency.
 */
export function zeroMoney(currency: string, decimals: number): Money {
  return moneyFromScaled(0n, currency, decimals);
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const va = toScaled(a);
  const vb = toScaled(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function absMoney(money: Money): Money {
  const scaled = toScaled(money);
  return moneyFromScaled(scaled < 0n ? -scaled : scaled, money.currency, money.decimals);
}

export function negateMoney(money: Money): Money {
  return moneyFromScaled(-toScaled(money), money.currency, money.decimals);
}
