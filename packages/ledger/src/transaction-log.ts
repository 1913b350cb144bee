/**
 * @ledgerbook/ledger — Transaction log.
 *
 * Append-mostly record of money movements, kept in insertion order.
 * Deletion is supported (the balance maintainer reverses balances first).
 *
 * Chronological order is (date, createdAt) with insertion order breaking
 * any remaining tie. Ids are never used for ordering: back-dated
 * transactions get larger ids than the ones they precede.
 */

import type { Endpoint, Transaction } from "@ledgerbook/types";
import { NotFoundError } from "./errors.js";
import { sameEndpoint } from "./endpoints.js";

export type SortOrder = "asc" | "desc";

/**
 * Compare two transactions by (date, createdAt).
 * Returns 0 for ties so a stable sort keeps insertion order.
 */
export function compareChronological(a: Transaction, b: Transaction): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return 0;
}

/**
 * Sort into chronological order without mutating the input.
 * Descending order is the exact reverse of ascending order.
 */
export function sortChronological(
  transactions: readonly Transaction[],
  order: SortOrder = "asc",
): Transaction[] {
  const sorted = [...transactions].sort(compareChronological);
  return order === "asc" ? sorted : sorted.reverse();
}

export function touches(transaction: Transaction, endpoint: Endpoint): boolean {
  return sameEndpoint(transaction.from, endpoint) || sameEndpoint(transaction.to, endpoint);
}

export class TransactionLog {
  /** Insertion order */
  private readonly _records: Transaction[] = [];
  private readonly _byId = new Map<number, Transaction>();
  private _nextId = 1;

  /** The id the next inserted transaction will receive. */
  get nextId(): number {
    return this._nextId;
  }

  get size(): number {
    return this._records.length;
  }

  insert(transaction: Transaction): void {
    this._records.push(transaction);
    this._byId.set(transaction.id, transaction);
    if (transaction.id >= this._nextId) {
      this._nextId = transaction.id + 1;
    }
  }

  get(id: number): Transaction | undefined {
    return this._byId.get(id);
  }

  require(id: number): Transaction {
    const transaction = this._byId.get(id);
    if (transaction === undefined) {
      throw new NotFoundError("transaction", id);
    }
    return transaction;
  }

  remove(id: number): Transaction {
    const transaction = this.require(id);
    const index = this._records.indexOf(transaction);
    this._records.splice(index, 1);
    this._byId.delete(id);
    return transaction;
  }

  /** All live transactions in insertion order. */
  all(): readonly Transaction[] {
    return [...this._records];
  }

  /** Transactions where the endpoint is either side, in insertion order. */
  touching(endpoint: Endpoint): readonly Transaction[] {
    return this._records.filter((t) => touches(t, endpoint));
  }

  references(endpoint: Endpoint): boolean {
    return this._records.some((t) => touches(t, endpoint));
  }

  chronological(order: SortOrder = "asc"): Transaction[] {
    return sortChronological(this._records, order);
  }

  /** Replace all contents, keeping the given insertion order. */
  load(transactions: readonly Transaction[], nextId: number): void {
    this._records.length = 0;
    this._byId.clear();
    this._nextId = Math.max(this._nextId, nextId);
    for (const transaction of transactions) this.insert(transaction);
  }
}
