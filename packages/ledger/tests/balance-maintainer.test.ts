/**
 * Tests for the balance maintainer.
 *
 * Covers:
 * - Deposits, withdrawals and transfers
 * - Validation order and error fields
 * - Withdrawal guard (and its absence for transfers)
 * - Atomicity: failures, including journal failures, change nothing
 * - Deletion and reversal
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AccountStore } from "../src/accounts.js";
import { BalanceMaintainer } from "../src/balance-maintainer.js";
import { localDate } from "../src/calendar.js";
import { CASH, companyEndpoint, userEndpoint } from "../src/endpoints.js";
import {
  InsufficientBalanceError,
  LedgerError,
  NotFoundError,
  ValidationError,
} from "../src/errors.js";
import { TransactionLog } from "../src/transaction-log.js";
import { RecordingJournal, SteppingClock, company, user } from "./fixtures.js";

const ACME = companyEndpoint(1);
const BEA = userEndpoint(1);

function fieldOf(run: () => unknown): string | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) return error.field;
    throw error;
  }
  return undefined;
}

describe("BalanceMaintainer", () => {
  let store: AccountStore;
  let log: TransactionLog;
  let journal: RecordingJournal;
  let balances: BalanceMaintainer;

  beforeEach(() => {
    store = new AccountStore();
    log = new TransactionLog();
    journal = new RecordingJournal();
    balances = new BalanceMaintainer(store, log, journal, new SteppingClock());
    store.putCompany(company(1, "Acme"));
    store.putUser(user(1, "Bea"));
  });

  // ─── Deposits & Withdrawals ──────────────────────────────────────────

  describe("deposit", () => {
    it("credits the account from cash", () => {
      const receipt = balances.deposit(ACME, "1000");

      expect(receipt.transaction).toEqual({
        id: 1,
        date: localDate(new Date("2025-03-10T12:00:00.000Z")),
        amount: "1000.00",
        from: { kind: "cash" },
        to: { kind: "company", id: 1 },
        description: "Cash Deposit",
        reference: "DEPOSIT",
        createdAt: "2025-03-10T12:00:00.000Z",
      });
      expect(receipt.balances).toEqual({ to: "1000.00" });
      expect(balances.getBalance(ACME)).toBe("1000.00");
    });

    it("accepts a custom description", () => {
      const receipt = balances.deposit(BEA, "5", "Salary advance");
      expect(receipt.transaction.description).toBe("Salary advance");
      expect(receipt.transaction.reference).toBe("DEPOSIT");
    });

    it("journals the event before returning", () => {
      balances.deposit(ACME, "10");
      expect(journal.events).toHaveLength(1);
      expect(journal.events[0]?.type).toBe("transaction.created");
    });
  });

  describe("withdraw", () => {
    it("debits the account to cash", () => {
      balances.deposit(ACME, "300");
      const receipt = balances.withdraw(ACME, "120.50");

      expect(receipt.transaction.to).toEqual({ kind: "cash" });
      expect(receipt.transaction.description).toBe("Cash Withdrawal");
      expect(receipt.transaction.reference).toBe("WITHDRAW");
      expect(receipt.balances).toEqual({ from: "179.50" });
    });

    it("allows withdrawing the whole balance", () => {
      balances.deposit(ACME, "300");
      expect(balances.withdraw(ACME, "300").balances.from).toBe("0.00");
    });

    it("rejects a withdrawal above the balance and changes nothing", () => {
      balances.deposit(ACME, "100");

      try {
        balances.withdraw(ACME, "150");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InsufficientBalanceError);
        if (error instanceof InsufficientBalanceError) {
          expect(error.code).toBe("INSUFFICIENT_BALANCE");
          expect(error.account).toEqual({ kind: "company", id: 1 });
          expect(error.balance).toBe("100.00");
          expect(error.requested).toBe("150.00");
        }
      }

      expect(balances.getBalance(ACME)).toBe("100.00");
      expect(log.size).toBe(1);
      expect(journal.events).toHaveLength(1);
    });
  });

  // ─── Transfers ───────────────────────────────────────────────────────

  describe("createTransaction", () => {
    it("moves money between accounts without a sufficiency check", () => {
      const receipt = balances.createTransaction({
        date: "2025-03-01",
        amount: "250",
        from: ACME,
        to: BEA,
        description: "  Invoice 14  ",
        reference: " INV-14 ",
      });

      expect(receipt.balances).toEqual({ from: "-250.00", to: "250.00" });
      expect(receipt.transaction.description).toBe("Invoice 14");
      expect(receipt.transaction.reference).toBe("INV-14");
      expect(receipt.transaction.date).toBe("2025-03-01");
    });

    it("assigns increasing ids and timestamps", () => {
      const first = balances.deposit(ACME, "1").transaction;
      const second = balances.deposit(ACME, "1").transaction;
      expect(second.id).toBe(first.id + 1);
      expect(second.createdAt).toBe("2025-03-10T12:00:01.000Z");
    });

    it("stores a copy of the endpoints", () => {
      const from = { kind: "company" as const, id: 1, extra: "ignored" };
      const { transaction } = balances.createTransaction({ date: "2025-03-01", amount: "1", from, to: BEA });
      expect(transaction.from).toEqual({ kind: "company", id: 1 });
    });

    it("validates the date first", () => {
      expect(fieldOf(() =>
        balances.createTransaction({ date: "2025-02-30", amount: "-1", from: CASH, to: CASH }),
      )).toBe("date");
    });

    it("validates the amount before the endpoints", () => {
      expect(fieldOf(() =>
        balances.createTransaction({ date: "2025-02-28", amount: "0", from: CASH, to: CASH }),
      )).toBe("amount");
    });

    it.each([
      ["0"],
      ["-5"],
      ["1.005"],
      ["ten"],
    ])("rejects amount %s", (amount) => {
      expect(fieldOf(() => balances.createTransaction({ amount, from: CASH, to: ACME }))).toBe("amount");
    });

    it("rejects cash to cash", () => {
      expect(fieldOf(() => balances.createTransaction({ amount: "1", from: CASH, to: CASH }))).toBe("to");
    });

    it("rejects identical endpoints", () => {
      expect(fieldOf(() => balances.createTransaction({ amount: "1", from: BEA, to: userEndpoint(1) }))).toBe("to");
    });

    it("rejects an over-long description", () => {
      expect(fieldOf(() =>
        balances.createTransaction({ amount: "1", from: CASH, to: BEA, description: "x".repeat(501) }),
      )).toBe("description");
    });

    it("rejects unknown accounts with NotFoundError", () => {
      expect(() => balances.createTransaction({ amount: "1", from: ACME, to: userEndpoint(9) }))
        .toThrow(new NotFoundError("user", 9));
      expect(log.size).toBe(0);
    });

    it("leaves state untouched when the journal write fails", () => {
      journal.failNext = true;

      expect(() => balances.deposit(ACME, "50")).toThrow("journal unavailable");
      expect(balances.getBalance(ACME)).toBe("0.00");
      expect(log.size).toBe(0);
      expect(log.nextId).toBe(1);
    });
  });

  // ─── Deletion ────────────────────────────────────────────────────────

  describe("deleteTransaction", () => {
    it("reverses both sides and removes the record", () => {
      balances.deposit(ACME, "500");
      balances.createTransaction({ date: "2025-03-02", amount: "200", from: ACME, to: BEA });

      const deleted = balances.deleteTransaction(2);

      expect(deleted.amount).toBe("200.00");
      expect(balances.getBalance(ACME)).toBe("500.00");
      expect(balances.getBalance(BEA)).toBe("0.00");
      expect(log.get(2)).toBeUndefined();
      expect(journal.events.at(-1)).toEqual({ type: "transaction.deleted", id: 2 });
    });

    it("may drive a balance negative when reversing", () => {
      balances.deposit(ACME, "100");
      balances.createTransaction({ date: "2025-03-02", amount: "100", from: ACME, to: BEA });

      balances.deleteTransaction(1);

      expect(balances.getBalance(ACME)).toBe("-100.00");
    });

    it("throws NotFoundError for an unknown id without journaling", () => {
      expect(() => balances.deleteTransaction(42)).toThrow(NotFoundError);
      expect(journal.events).toHaveLength(0);
    });

    it("does not reuse the id of a deleted transaction", () => {
      balances.deposit(ACME, "1");
      balances.deleteTransaction(1);
      expect(balances.deposit(ACME, "1").transaction.id).toBe(2);
    });
  });

  // ─── Replay ──────────────────────────────────────────────────────────

  describe("apply", () => {
    it("replays journaled events into fresh state", () => {
      balances.deposit(ACME, "500");
      balances.createTransaction({ date: "2025-03-02", amount: "75.25", from: ACME, to: BEA });
      balances.deleteTransaction(1);

      const replayStore = new AccountStore();
      replayStore.putCompany(company(1, "Acme"));
      replayStore.putUser(user(1, "Bea"));
      const replayLog = new TransactionLog();
      const replay = new BalanceMaintainer(replayStore, replayLog, journal, new SteppingClock());

      for (const event of journal.events) {
        if (event.type === "transaction.created") replay.applyCreated(event.transaction);
        if (event.type === "transaction.deleted") replay.applyDeleted(event.id);
      }

      expect(replay.getBalance(ACME)).toBe(balances.getBalance(ACME));
      expect(replay.getBalance(BEA)).toBe("75.25");
      expect(replayLog.all()).toEqual(log.all());
    });

    it("refuses a transaction for a missing account without inserting it", () => {
      const empty = new BalanceMaintainer(new AccountStore(), log, journal, new SteppingClock());
      expect(() =>
        empty.applyCreated({
          id: 1,
          date: "2025-01-01",
          amount: "1.00",
          from: CASH,
          to: ACME,
          description: "",
          reference: "",
          createdAt: "2025-01-01T00:00:00.000Z",
        }),
      ).toThrow(LedgerError);
      expect(log.size).toBe(0);
    });
  });

  it("getBalance throws for a missing account", () => {
    expect(() => balances.getBalance(companyEndpoint(5))).toThrow("Unknown company: 5");
  });
});
