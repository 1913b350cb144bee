/**
 * @ledgerbook/ledger — Deterministic monetary arithmetic.
 *
 * Amounts travel as decimal strings with two fractional digits and are
 * converted to bigint minor units (cents) for arithmetic.
 *
 * Rules:
 * - No floating-point operations
 * - Input may carry 0, 1 or 2 fractional digits; output always carries 2
 * - Zero runtime dependencies
 */

import { ValidationError } from "./errors.js";

/** Fractional digits kept for every amount and balance. */
export const DECIMALS = 2;

const AMOUNT_FORMAT = /^-?\d+(\.\d+)?$/;

// ─── Parsing & Formatting ───────────────────────────────────────────────

/**
 * Parse a decimal string into minor units.
 *
 * "100.5" → 10050n
 * "-50.25" → -5025n
 *
 * Throws ValidationError (tagged with `field`) on malformed input or
 * more than two fractional digits.
 */
export function parseAmount(amount: string, field = "amount"): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new ValidationError(field, `Invalid ${field}: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!AMOUNT_FORMAT.test(trimmed)) {
    throw new ValidationError(field, `Invalid ${field} format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > DECIMALS) {
    throw new ValidationError(
      field,
      `${field} "${trimmed}" has ${String(fracPart.length)} decimal places, at most ${String(DECIMALS)} allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(DECIMALS, "0"));
  return negative ? -value : value;
}

/**
 * Convert minor units back to a decimal string.
 *
 * 10050n → "100.50"
 * -5n → "-0.05"
 */
export function formatAmount(cents: bigint): string {
  const negative = cents < 0n;
  const abs = negative ? -cents : cents;
  const str = abs.toString().padStart(DECIMALS + 1, "0");
  const result = `${str.slice(0, str.length - DECIMALS)}.${str.slice(str.length - DECIMALS)}`;
  return negative ? `-${result}` : result;
}

const CURRENCY_MARKER = /^(₹|INR|Rs\.?|\$)\s*/i;

/**
 * Parse an amount typed by a person.
 *
 * Strips a leading currency marker (₹, Rs., Rs, INR, $) and digit-grouping
 * commas before parsing: "₹1,25,000.50" → 12500050n.
 */
export function parseAmountInput(input: string, field = "amount"): bigint {
  const cleaned = input.trim().replace(CURRENCY_MARKER, "").replace(/,/g, "");
  return parseAmount(cleaned, field);
}

// ─── Arithmetic ─────────────────────────────────────────────────────────

/**
 * Compare two amounts. Returns -1, 0, or 1.
 */
export function compareAmounts(a: string, b: string): -1 | 0 | 1 {
  const va = parseAmount(a);
  const vb = parseAmount(b);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

/**
 * Divide minor units by a count, rounding half away from zero.
 * A count of zero yields zero.
 */
export function divideAmount(cents: bigint, count: number): bigint {
  if (count === 0) return 0n;
  const divisor = BigInt(count);
  const negative = cents < 0n;
  const abs = negative ? -cents : cents;
  const quotient = (abs * 2n + divisor) / (divisor * 2n);
  return negative ? -quotient : quotient;
}

export const ZERO = formatAmount(0n);
