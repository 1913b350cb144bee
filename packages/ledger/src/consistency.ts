/**
 * @ledgerbook/ledger — Consistency verification.
 *
 * Replays every account's history and compares the result with the
 * incrementally maintained balance. A discrepancy means the store and
 * the log disagree and is never expected in correct operation.
 */

import type { AccountEndpoint, Transaction } from "@ledgerbook/types";
import type { AccountStore } from "./accounts.js";
import { companyEndpoint, userEndpoint } from "./endpoints.js";
import type { BalanceDiscrepancy } from "./errors.js";
import { replayBalance } from "./ledger-deriver.js";
import { compareAmounts } from "./money-math.js";

export interface ConsistencyReport {
  readonly checkedAccounts: number;
  readonly consistent: boolean;
  readonly discrepancies: readonly BalanceDiscrepancy[];
}

export function verifyBalances(
  accounts: AccountStore,
  transactions: readonly Transaction[],
): ConsistencyReport {
  const subjects: { endpoint: AccountEndpoint; name: string; balance: string }[] = [
    ...accounts.listCompanies().map((c) => ({ endpoint: companyEndpoint(c.id), name: c.name, balance: c.balance })),
    ...accounts.listUsers().map((u) => ({ endpoint: userEndpoint(u.id), name: u.name, balance: u.balance })),
  ];

  const discrepancies: BalanceDiscrepancy[] = [];
  for (const subject of subjects) {
    const replayed = replayBalance(subject.endpoint, transactions);
    if (compareAmounts(replayed, subject.balance) !== 0) {
      discrepancies.push({
        account: subject.endpoint,
        name: subject.name,
        stored: subject.balance,
        replayed,
      });
    }
  }

  return {
    checkedAccounts: subjects.length,
    consistent: discrepancies.length === 0,
    discrepancies,
  };
}
