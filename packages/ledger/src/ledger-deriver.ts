/**
 * @ledgerbook/ledger — Ledger deriver.
 *
 * Derives an account statement by replaying, in chronological order,
 * every transaction that touches the account, starting from zero.
 * Read-only: nothing here mutates the store or the log.
 *
 * The final running balance of a complete replay equals the stored
 * balance. The consistency checker relies on that.
 */

import type {
  AccountEndpoint,
  AccountStatement,
  Endpoint,
  LedgerLine,
  Transaction,
} from "@ledgerbook/types";
import type { AccountStore } from "./accounts.js";
import { sameEndpoint } from "./endpoints.js";
import { ValidationError } from "./errors.js";
import { formatAmount, parseAmount } from "./money-math.js";
import type { TransactionLog } from "./transaction-log.js";
import { sortChronological, touches } from "./transaction-log.js";

export const CASH_DEPOSIT_LABEL = "Cash Deposit";
export const CASH_WITHDRAWAL_LABEL = "Cash Withdrawal";

/** Resolves an account endpoint to its display name. */
export type NameResolver = (endpoint: AccountEndpoint) => string;

/**
 * Build statement lines for `subject`, newest first.
 *
 * `transactions` must be in insertion order; lines sharing a date and
 * createdAt keep that order in the forward pass.
 */
export function deriveLedger(
  subject: AccountEndpoint,
  transactions: readonly Transaction[],
  nameOf: NameResolver,
): LedgerLine[] {
  const relevant = sortChronological(transactions.filter((t) => touches(t, subject)));

  let running = 0n;
  const lines: LedgerLine[] = [];

  for (const transaction of relevant) {
    const credit = sameEndpoint(transaction.to, subject);
    const counterparty: Endpoint = credit ? transaction.from : transaction.to;
    const amount = parseAmount(transaction.amount);

    running = credit ? running + amount : running - amount;

    lines.push({
      transactionId: transaction.id,
      date: transaction.date,
      direction: credit ? "credit" : "debit",
      amount: transaction.amount,
      balanceAfter: formatAmount(running),
      counterparty,
      counterpartyName: counterpartyLabel(counterparty, credit, nameOf),
      description: transaction.description,
      reference: transaction.reference,
      createdAt: transaction.createdAt,
    });
  }

  return lines.reverse();
}

/**
 * Balance obtained by replaying every transaction touching `subject`.
 * Order does not affect the sum.
 */
export function replayBalance(
  subject: AccountEndpoint,
  transactions: readonly Transaction[],
): string {
  let total = 0n;
  for (const transaction of transactions) {
    if (sameEndpoint(transaction.to, subject)) total += parseAmount(transaction.amount);
    if (sameEndpoint(transaction.from, subject)) total -= parseAmount(transaction.amount);
  }
  return formatAmount(total);
}

function counterpartyLabel(
  counterparty: Endpoint,
  credit: boolean,
  nameOf: NameResolver,
): string {
  if (counterparty.kind === "cash") {
    return credit ? CASH_DEPOSIT_LABEL : CASH_WITHDRAWAL_LABEL;
  }
  return nameOf(counterparty);
}

/**
 * Statement queries over the live store and log.
 */
export class LedgerDeriver {
  constructor(
    private readonly accounts: AccountStore,
    private readonly log: TransactionLog,
  ) {}

  /**
   * Statement lines for a real account, newest first.
   * Throws ValidationError for cash and NotFoundError for a missing account.
   */
  getLedger(account: Endpoint): LedgerLine[] {
    const subject = this.subject(account);
    return deriveLedger(subject, this.log.all(), this.nameOf);
  }

  statement(account: Endpoint): AccountStatement {
    const subject = this.subject(account);
    const stored = this.accounts.require(subject);
    return {
      account: subject,
      name: stored.name,
      balance: stored.balance,
      lines: deriveLedger(subject, this.log.all(), this.nameOf),
    };
  }

  replayBalance(account: AccountEndpoint): string {
    return replayBalance(account, this.log.all());
  }

  /** Display name; ids of accounts that no longer exist render as "company #3". */
  readonly nameOf: NameResolver = (endpoint) => {
    const account = this.accounts.get(endpoint);
    return account?.name ?? `${endpoint.kind} #${String(endpoint.id)}`;
  };

  private subject(account: Endpoint): AccountEndpoint {
    if (account.kind === "cash") {
      throw new ValidationError("account", "The cash pool has no ledger; choose a company or user");
    }
    this.accounts.require(account);
    return account;
  }
}
