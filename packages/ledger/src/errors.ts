/**
 * @ledgerbook/ledger — Error types.
 *
 * Every failure in the ledger engine is thrown as a LedgerError subclass
 * carrying a machine-readable code. Nothing is mutated before an error
 * is thrown.
 */

import type { AccountEndpoint } from "@ledgerbook/types";

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "VALIDATION_FAILED"
  | "NOT_FOUND"
  | "INSUFFICIENT_BALANCE"
  | "CONFLICT"
  | "INCONSISTENT_STATE"
  | "INVALID_SNAPSHOT"
  | "CORRUPT_JOURNAL";

/**
 * Structured error from the ledger engine.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

/** Malformed or out-of-range input. */
export class ValidationError extends LedgerError {
  /** The offending input field */
  public readonly field: string;

  constructor(field: string, message: string) {
    super("VALIDATION_FAILED", message);
    this.name = "ValidationError";
    this.field = field;
  }
}

export type ResourceKind = "company" | "user" | "transaction" | "backup";

/** A referenced account, transaction or backup does not exist. */
export class NotFoundError extends LedgerError {
  public readonly resource: ResourceKind;
  /** null when no particular one was asked for, as with "the latest backup" */
  public readonly id: number | null;

  constructor(resource: ResourceKind, id: number | null, message?: string) {
    super("NOT_FOUND", message ?? `Unknown ${resource}: ${String(id)}`);
    this.name = "NotFoundError";
    this.resource = resource;
    this.id = id;
  }
}

/** A withdrawal to cash exceeds the account's current balance. */
export class InsufficientBalanceError extends LedgerError {
  public readonly account: AccountEndpoint;
  public readonly balance: string;
  public readonly requested: string;

  constructor(account: AccountEndpoint, balance: string, requested: string) {
    super(
      "INSUFFICIENT_BALANCE",
      `Insufficient balance in ${account.kind} ${String(account.id)}: balance ${balance}, requested ${requested}`,
    );
    this.name = "InsufficientBalanceError";
    this.account = account;
    this.balance = balance;
    this.requested = requested;
  }
}

export type ConflictReason = "DUPLICATE_NAME" | "ACCOUNT_IN_USE" | "BACKUP_EXISTS";

/** The operation collides with existing state. */
export class ConflictError extends LedgerError {
  public readonly reason: ConflictReason;

  constructor(reason: ConflictReason, message: string) {
    super("CONFLICT", message);
    this.name = "ConflictError";
    this.reason = reason;
  }
}

/** Stored balance and ledger replay disagree for one account. */
export interface BalanceDiscrepancy {
  readonly account: AccountEndpoint;
  readonly name: string;
  readonly stored: string;
  readonly replayed: string;
}

/**
 * Stored balances diverged from the transaction history.
 * Never expected in correct operation.
 */
export class ConsistencyError extends LedgerError {
  public readonly discrepancies: readonly BalanceDiscrepancy[];

  constructor(discrepancies: readonly BalanceDiscrepancy[]) {
    const summary = discrepancies
      .map((d) => `${d.account.kind} ${String(d.account.id)} stored=${d.stored} replayed=${d.replayed}`)
      .join("; ");
    super("INCONSISTENT_STATE", `Balances diverged from history: ${summary}`);
    this.name = "ConsistencyError";
    this.discrepancies = discrepancies;
  }
}
