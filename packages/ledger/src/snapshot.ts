/**
 * @ledgerbook/ledger — Snapshot types.
 *
 * A snapshot is the complete book state: every account, every live
 * transaction in insertion order, and the id counters. Restoring one
 * re-validates it and recomputes balances from the transactions.
 */

import type { Company, Transaction, User } from "@ledgerbook/types";
import { isCompany, isId, isTransaction, isUser } from "@ledgerbook/types";

/** Next id to assign, per record kind. */
export interface BookSequences {
  readonly company: number;
  readonly user: number;
  readonly transaction: number;
}

/**
 * Serializable snapshot of the entire book.
 */
export interface BookSnapshot {
  readonly version: 1;
  readonly companies: readonly Company[];
  readonly users: readonly User[];
  /** Insertion order */
  readonly transactions: readonly Transaction[];
  readonly sequences: BookSequences;
  readonly createdAt: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isSequences(value: unknown): value is BookSequences {
  if (!isRecord(value)) return false;
  return isId(value.company) && isId(value.user) && isId(value.transaction);
}

/**
 * Structural check only. Referential and balance checks happen when the
 * snapshot is loaded into a Book.
 */
export function isBookSnapshot(value: unknown): value is BookSnapshot {
  if (!isRecord(value)) return false;
  return (
    value.version === 1 &&
    Array.isArray(value.companies) &&
    value.companies.every(isCompany) &&
    Array.isArray(value.users) &&
    value.users.every(isUser) &&
    Array.isArray(value.transactions) &&
    value.transactions.every(isTransaction) &&
    isSequences(value.sequences) &&
    typeof value.createdAt === "string"
  );
}
