/**
 * Shared test doubles for the ledger package.
 */

import type { Company, Transaction, User } from "@ledgerbook/types";
import type { Clock } from "../src/calendar.js";
import type { BookEvent, Journal } from "../src/events.js";

/**
 * Clock that starts at `start` and advances `stepMs` after every reading,
 * so consecutive records get strictly increasing timestamps.
 */
export class SteppingClock implements Clock {
  private _ms: number;

  constructor(
    start = "2025-03-10T12:00:00.000Z",
    private readonly stepMs = 1000,
  ) {
    this._ms = Date.parse(start);
  }

  now(): Date {
    const instant = new Date(this._ms);
    this._ms += this.stepMs;
    return instant;
  }
}

/** Journal that keeps events in memory and can be told to fail once. */
export class RecordingJournal implements Journal {
  readonly events: BookEvent[] = [];
  failNext = false;

  record(event: BookEvent): void {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("journal unavailable");
    }
    this.events.push(event);
  }
}

export function company(id: number, name: string, balance = "0.00"): Company {
  return {
    id,
    name,
    balance,
    createdAt: "2025-01-01T00:00:00.000Z",
    address: "",
    phone: "",
    email: "",
  };
}

export function user(id: number, name: string, companyId: number | null = null, balance = "0.00"): User {
  return {
    id,
    name,
    balance,
    createdAt: "2025-01-01T00:00:00.000Z",
    companyId,
    email: "",
    role: "",
    department: "",
  };
}

export function tx(
  id: number,
  fields: Pick<Transaction, "date" | "amount" | "from" | "to"> & Partial<Transaction>,
): Transaction {
  return {
    id,
    description: "",
    reference: "",
    createdAt: `2025-01-01T00:00:${String(id).padStart(2, "0")}.000Z`,
    ...fields,
  };
}
