/**
 * @ledgerbook/ledger — Reports.
 *
 * Aggregates over accounts and transactions. All functions are pure.
 */

import type { AccountEndpoint, Company, Endpoint, Transaction, User } from "@ledgerbook/types";
import { compareAmounts, divideAmount, formatAmount, parseAmount } from "./money-math.js";
import type { SortOrder } from "./transaction-log.js";
import { sortChronological } from "./transaction-log.js";

// ─── Totals ─────────────────────────────────────────────────────────────

export interface BalanceTotals {
  readonly companyTotal: string;
  readonly userTotal: string;
  /** companyTotal + userTotal */
  readonly grandTotal: string;
  /**
   * Net money handed out to the cash pool: withdrawals minus deposits.
   * grandTotal + cashPosition is always zero.
   */
  readonly cashPosition: string;
}

function sumBalances(accounts: readonly (Company | User)[]): bigint {
  let total = 0n;
  for (const account of accounts) total += parseAmount(account.balance);
  return total;
}

export function computeTotals(
  companies: readonly Company[],
  users: readonly User[],
  transactions: readonly Transaction[],
): BalanceTotals {
  const companyTotal = sumBalances(companies);
  const userTotal = sumBalances(users);

  let cash = 0n;
  for (const transaction of transactions) {
    if (transaction.to.kind === "cash") cash += parseAmount(transaction.amount);
    if (transaction.from.kind === "cash") cash -= parseAmount(transaction.amount);
  }

  return {
    companyTotal: formatAmount(companyTotal),
    userTotal: formatAmount(userTotal),
    grandTotal: formatAmount(companyTotal + userTotal),
    cashPosition: formatAmount(cash),
  };
}

// ─── Balance Ranking ────────────────────────────────────────────────────

/**
 * Accounts by balance, highest first. The sort is stable: accounts with
 * equal balances keep the order they came in.
 */
export function rankByBalance<T extends Company | User>(accounts: readonly T[]): T[] {
  return [...accounts].sort((a, b) => compareAmounts(b.balance, a.balance));
}

// ─── Summary ────────────────────────────────────────────────────────────

export interface TransactionSummary {
  readonly count: number;
  readonly totalAmount: string;
  /** Rounded half up to cents; "0.00" when there are no transactions */
  readonly averageAmount: string;
}

export function summarizeTransactions(transactions: readonly Transaction[]): TransactionSummary {
  let total = 0n;
  for (const transaction of transactions) total += parseAmount(transaction.amount);

  return {
    count: transactions.length,
    totalAmount: formatAmount(total),
    averageAmount: formatAmount(divideAmount(total, transactions.length)),
  };
}

// ─── Labels & Search ────────────────────────────────────────────────────

const KIND_LABEL = { company: "Company", user: "User" } as const;

/**
 * Human-readable kind of transfer: "Deposit", "Withdrawal",
 * or "<Kind> to <Kind>" between accounts.
 */
export function describeTransfer(transaction: Pick<Transaction, "from" | "to">): string {
  const { from, to } = transaction;
  if (from.kind === "cash") return "Deposit";
  if (to.kind === "cash") return "Withdrawal";
  return `${KIND_LABEL[from.kind]} to ${KIND_LABEL[to.kind]}`;
}

/**
 * Case-insensitive substring search over description, reference and the
 * display names of both real endpoints. Results are newest first.
 * An empty term matches everything.
 */
export function searchTransactions(
  transactions: readonly Transaction[],
  term: string,
  nameOf: (endpoint: AccountEndpoint) => string,
): Transaction[] {
  const needle = term.trim().toLowerCase();
  const partyName = (endpoint: Endpoint): string =>
    endpoint.kind === "cash" ? "" : nameOf(endpoint);

  const matches = transactions.filter((t) =>
    [t.description, t.reference, partyName(t.from), partyName(t.to)]
      .some((field) => field.toLowerCase().includes(needle)),
  );

  return sortChronological(matches, "desc");
}

export interface ListOptions {
  /** Default "desc" (newest first) */
  readonly order?: SortOrder | undefined;
  readonly limit?: number | undefined;
}

export function listTransactions(
  transactions: readonly Transaction[],
  options: ListOptions = {},
): Transaction[] {
  const sorted = sortChronological(transactions, options.order ?? "desc");
  return options.limit === undefined ? sorted : sorted.slice(0, Math.max(0, options.limit));
}
