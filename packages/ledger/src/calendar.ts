/**
 * @ledgerbook/ledger — Dates and clocks.
 *
 * Transaction dates are calendar dates (YYYY-MM-DD) with no time of day.
 * Insertion timestamps come from an injected clock so tests can pin them.
 */

import { ValidationError } from "./errors.js";

/** Source of the current time. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for a real calendar date in YYYY-MM-DD form ("2025-02-30" is not).
 */
export function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE.exec(value);
  if (match === null) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));

  return (
    probe.getUTCFullYear() === year &&
    probe.getUTCMonth() === month - 1 &&
    probe.getUTCDate() === day
  );
}

export function assertCalendarDate(value: string, field = "date"): string {
  if (!isCalendarDate(value)) {
    throw new ValidationError(field, `Invalid ${field} "${value}". Expected YYYY-MM-DD`);
  }
  return value;
}

/** Local calendar date of an instant. */
export function localDate(instant: Date): string {
  const y = String(instant.getFullYear()).padStart(4, "0");
  const m = String(instant.getMonth() + 1).padStart(2, "0");
  const d = String(instant.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}
