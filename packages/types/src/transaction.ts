/**
 * Transaction Types
 *
 * A transaction moves a positive amount from one endpoint to another.
 * Amounts are strings to avoid floating-point errors.
 */

import type { AccountEndpoint, Endpoint } from "./endpoint.js";

export interface Transaction {
  /** Monotonically assigned, never reused */
  readonly id: number;

  /** Calendar date, YYYY-MM-DD */
  readonly date: string;

  /** Positive amount with two fractional digits, e.g. "500.00" */
  readonly amount: string;

  readonly from: Endpoint;
  readonly to: Endpoint;

  readonly description: string;
  readonly reference: string;

  /** ISO 8601 insertion timestamp; orders transactions sharing a date */
  readonly createdAt: string;
}

/**
 * Direction of a transaction relative to one account.
 * Credit = the account received money; debit = the account sent it.
 */
export type EntryDirection = "credit" | "debit";

/**
 * One line of an account statement, produced by replaying every
 * transaction that touches the account in chronological order.
 */
export interface LedgerLine {
  readonly transactionId: number;
  readonly date: string;
  readonly direction: EntryDirection;
  readonly amount: string;

  /** Running balance immediately after this transaction */
  readonly balanceAfter: string;

  /** The opposite endpoint of the transaction */
  readonly counterparty: Endpoint;

  /** Counterparty display name, or "Cash Deposit" / "Cash Withdrawal" */
  readonly counterpartyName: string;

  readonly description: string;
  readonly reference: string;
  readonly createdAt: string;
}

/** The account a statement was produced for, with its lines. */
export interface AccountStatement {
  readonly account: AccountEndpoint;
  readonly name: string;
  readonly balance: string;
  readonly lines: readonly LedgerLine[];
}
