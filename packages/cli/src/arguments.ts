/**
 * @ledgerbook/cli — Argument parsing.
 *
 * Converts raw command-line strings into domain values. Every failure is
 * a ValidationError naming the argument.
 */

import { isId } from "@ledgerbook/types";
import { ValidationError, formatAmount, parseAmountInput } from "@ledgerbook/ledger";

export function parseId(text: string, field = "id"): number {
  const value = /^\d+$/.test(text.trim()) ? Number(text.trim()) : NaN;
  if (!isId(value)) {
    throw new ValidationError(field, `Invalid ${field} "${text}". Expected a positive whole number`);
  }
  return value;
}

/** "₹1,25,000.50" → "125000.50" */
export function parseAmountArg(text: string, field = "amount"): string {
  return formatAmount(parseAmountInput(text, field));
}

/** A whole number, zero included. */
export function parseCount(text: string, field: string): number {
  const value = /^\d+$/.test(text.trim()) ? Number(text.trim()) : NaN;
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(field, `Invalid ${field} "${text}". Expected a whole number`);
  }
  return value;
}
