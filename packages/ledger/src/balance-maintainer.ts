/**
 * @ledgerbook/ledger — Balance maintainer.
 *
 * The only code that changes stored balances. Every money movement goes
 * through createTransaction() or deleteTransaction():
 *
 * 1. Validate the request completely (nothing is touched on failure)
 * 2. Record the event in the journal
 * 3. Apply it: insert or remove the record, adjust both real endpoints
 *
 * applyCreated()/applyDeleted() are the apply half on their own, used
 * when replaying a journal.
 *
 * Only withdrawals (real account → cash) are checked for sufficient
 * balance. Transfers between accounts may drive the sender negative.
 */

import type { AccountEndpoint, Endpoint, Transaction } from "@ledgerbook/types";
import { isEndpoint } from "@ledgerbook/types";
import type { AccountStore } from "./accounts.js";
import type { Clock } from "./calendar.js";
import { assertCalendarDate, localDate } from "./calendar.js";
import { CASH, sameEndpoint } from "./endpoints.js";
import { InsufficientBalanceError, ValidationError } from "./errors.js";
import type { Journal } from "./events.js";
import { formatAmount, parseAmount } from "./money-math.js";
import type { TransactionLog } from "./transaction-log.js";
import {
  MAX_DESCRIPTION_LENGTH,
  MAX_REFERENCE_LENGTH,
  optionalText,
} from "./validation.js";

export const DEPOSIT_DESCRIPTION = "Cash Deposit";
export const WITHDRAWAL_DESCRIPTION = "Cash Withdrawal";
export const DEPOSIT_REFERENCE = "DEPOSIT";
export const WITHDRAWAL_REFERENCE = "WITHDRAW";

export interface CreateTransactionInput {
  /** YYYY-MM-DD; defaults to today's local date */
  readonly date?: string | undefined;
  readonly amount: string;
  readonly from: Endpoint;
  readonly to: Endpoint;
  readonly description?: string | undefined;
  readonly reference?: string | undefined;
}

/**
 * The stored transaction plus the balances of the real accounts it
 * touched, read after the transaction was applied.
 */
export interface TransactionReceipt {
  readonly transaction: Transaction;
  readonly balances: {
    readonly from?: string;
    readonly to?: string;
  };
}

export class BalanceMaintainer {
  constructor(
    private readonly accounts: AccountStore,
    private readonly log: TransactionLog,
    private readonly journal: Journal,
    private readonly clock: Clock,
  ) {}

  // ─── Commands ───────────────────────────────────────────────────────

  createTransaction(input: CreateTransactionInput): TransactionReceipt {
    const transaction = this.prepare(input);

    this.journal.record({ type: "transaction.created", transaction });
    this.applyCreated(transaction);

    return { transaction, balances: this.balancesAfter(transaction) };
  }

  /**
   * Remove a transaction and reverse its effect on both endpoints.
   * Reversal is not checked for sufficiency.
   */
  deleteTransaction(id: number): Transaction {
    this.log.require(id);
    this.journal.record({ type: "transaction.deleted", id });
    return this.applyDeleted(id);
  }

  deposit(
    account: AccountEndpoint,
    amount: string,
    description: string = DEPOSIT_DESCRIPTION,
  ): TransactionReceipt {
    return this.createTransaction({
      amount,
      from: CASH,
      to: account,
      description,
      reference: DEPOSIT_REFERENCE,
    });
  }

  withdraw(
    account: AccountEndpoint,
    amount: string,
    description: string = WITHDRAWAL_DESCRIPTION,
  ): TransactionReceipt {
    return this.createTransaction({
      amount,
      from: account,
      to: CASH,
      description,
      reference: WITHDRAWAL_REFERENCE,
    });
  }

  getBalance(account: AccountEndpoint): string {
    return this.accounts.require(account).balance;
  }

  // ─── Apply ──────────────────────────────────────────────────────────

  applyCreated(transaction: Transaction): void {
    const amount = parseAmount(transaction.amount);

    // Existence first so a bad replay cannot half-apply
    if (transaction.from.kind !== "cash") this.accounts.require(transaction.from);
    if (transaction.to.kind !== "cash") this.accounts.require(transaction.to);

    this.log.insert(transaction);
    if (transaction.from.kind !== "cash") this.accounts.adjustBalance(transaction.from, -amount);
    if (transaction.to.kind !== "cash") this.accounts.adjustBalance(transaction.to, amount);
  }

  applyDeleted(id: number): Transaction {
    const transaction = this.log.require(id);
    const amount = parseAmount(transaction.amount);

    if (transaction.from.kind !== "cash") this.accounts.adjustBalance(transaction.from, amount);
    if (transaction.to.kind !== "cash") this.accounts.adjustBalance(transaction.to, -amount);

    return this.log.remove(id);
  }

  // ─── Internals ──────────────────────────────────────────────────────

  /**
   * Run every check and build the record. Pure with respect to state.
   */
  private prepare(input: CreateTransactionInput): Transaction {
    const now = this.clock.now();
    const date = input.date === undefined
      ? localDate(now)
      : assertCalendarDate(input.date.trim());

    const cents = parseAmount(input.amount);
    if (cents <= 0n) {
      throw new ValidationError("amount", `amount must be greater than zero, got "${input.amount}"`);
    }
    const amount = formatAmount(cents);

    const { from, to } = input;
    if (!isEndpoint(from)) {
      throw new ValidationError("from", "from must be company:<id>, user:<id> or cash");
    }
    if (!isEndpoint(to)) {
      throw new ValidationError("to", "to must be company:<id>, user:<id> or cash");
    }
    if (from.kind === "cash" && to.kind === "cash") {
      throw new ValidationError("to", "A transaction cannot move money from cash to cash");
    }
    if (sameEndpoint(from, to)) {
      throw new ValidationError("to", "from and to must be different accounts");
    }

    const description = optionalText(input.description, "description", MAX_DESCRIPTION_LENGTH);
    const reference = optionalText(input.reference, "reference", MAX_REFERENCE_LENGTH);

    if (from.kind !== "cash") this.accounts.require(from);
    if (to.kind !== "cash") this.accounts.require(to);

    if (from.kind !== "cash" && to.kind === "cash") {
      const balance = this.accounts.require(from).balance;
      if (parseAmount(balance) < cents) {
        throw new InsufficientBalanceError(from, balance, amount);
      }
    }

    return {
      id: this.log.nextId,
      date,
      amount,
      from: copyEndpoint(from),
      to: copyEndpoint(to),
      description,
      reference,
      createdAt: now.toISOString(),
    };
  }

  private balancesAfter(transaction: Transaction): TransactionReceipt["balances"] {
    const from = transaction.from.kind === "cash"
      ? undefined
      : this.accounts.require(transaction.from).balance;
    const to = transaction.to.kind === "cash"
      ? undefined
      : this.accounts.require(transaction.to).balance;

    return {
      ...(from !== undefined ? { from } : {}),
      ...(to !== undefined ? { to } : {}),
    };
  }
}

/** Strip anything beyond the tagged fields a caller may have attached. */
function copyEndpoint(endpoint: Endpoint): Endpoint {
  switch (endpoint.kind) {
    case "cash":
      return CASH;
    case "company":
      return { kind: "company", id: endpoint.id };
    case "user":
      return { kind: "user", id: endpoint.id };
  }
}
