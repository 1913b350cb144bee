/**
 * @ledgerbook/ledger — Field validation for account and transaction input.
 */

import { ValidationError } from "./errors.js";

export const MAX_NAME_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 500;
export const MAX_REFERENCE_LENGTH = 100;
export const MAX_EMAIL_LENGTH = 254;

const EMAIL = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const PHONE_SEPARATORS = /[\s\-().]/g;
const PHONE_DIGITS = /^\d{10,15}$/;

/** Trimmed, non-empty, bounded name. */
export function requireName(value: string, field = "name"): string {
  const trimmed = value.trim();
  if (trimmed === "") {
    throw new ValidationError(field, `${field} is required`);
  }
  if (trimmed.length > MAX_NAME_LENGTH) {
    throw new ValidationError(field, `${field} must be at most ${String(MAX_NAME_LENGTH)} characters`);
  }
  return trimmed;
}

/** Trimmed free text, "" when absent. */
export function optionalText(value: string | undefined, field: string, max: number): string {
  const trimmed = (value ?? "").trim();
  if (trimmed.length > max) {
    throw new ValidationError(field, `${field} must be at most ${String(max)} characters`);
  }
  return trimmed;
}

/** Empty, or a plausible address of the form local@domain.tld. */
export function optionalEmail(value: string | undefined, field = "email"): string {
  const trimmed = optionalText(value, field, MAX_EMAIL_LENGTH);
  if (trimmed !== "" && !EMAIL.test(trimmed)) {
    throw new ValidationError(field, `Invalid ${field} "${trimmed}"`);
  }
  return trimmed;
}

/** Empty, or 10-15 digits once common separators are removed. */
export function optionalPhone(value: string | undefined, field = "phone"): string {
  const trimmed = (value ?? "").trim();
  if (trimmed !== "" && !PHONE_DIGITS.test(trimmed.replace(PHONE_SEPARATORS, ""))) {
    throw new ValidationError(field, `Invalid ${field} "${trimmed}"`);
  }
  return trimmed;
}
