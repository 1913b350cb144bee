/**
 * Tests for the Book facade.
 *
 * Covers:
 * - Company and user management (validation, conflicts, removal rules)
 * - Money movement through the facade
 * - Reports and verification
 * - Journal replay
 * - Snapshot, fromSnapshot and restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { BookSnapshot } from "../src/snapshot.js";
import { Book } from "../src/book.js";
import { CASH, companyEndpoint, userEndpoint } from "../src/endpoints.js";
import {
  ConflictError,
  ConsistencyError,
  LedgerError,
  NotFoundError,
  ValidationError,
} from "../src/errors.js";
import { RecordingJournal, SteppingClock } from "./fixtures.js";

function errorOf(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
}

describe("Book", () => {
  let journal: RecordingJournal;
  let book: Book;

  beforeEach(() => {
    journal = new RecordingJournal();
    book = new Book({ journal, clock: new SteppingClock() });
  });

  // ─── Companies ───────────────────────────────────────────────────────

  describe("companies", () => {
    it("adds a company with trimmed fields and a zero balance", () => {
      const company = book.addCompany({
        name: "  Acme Traders ",
        address: " 12 Market Road ",
        phone: "98765 43210",
        email: "ops@acme.test",
      });

      expect(company).toEqual({
        id: 1,
        name: "Acme Traders",
        balance: "0.00",
        createdAt: "2025-03-10T12:00:00.000Z",
        address: "12 Market Road",
        phone: "98765 43210",
        email: "ops@acme.test",
      });
      expect(journal.events).toEqual([{ type: "company.added", company }]);
    });

    it("rejects duplicate names", () => {
      book.addCompany({ name: "Acme" });
      const error = errorOf(() => book.addCompany({ name: " Acme " }));
      expect(error).toBeInstanceOf(ConflictError);
      if (error instanceof ConflictError) expect(error.reason).toBe("DUPLICATE_NAME");
      expect(book.listCompanies()).toHaveLength(1);
    });

    it.each([
      [{ name: "   " }, "name"],
      [{ name: "x".repeat(101) }, "name"],
      [{ name: "Acme", email: "not-an-email" }, "email"],
      [{ name: "Acme", phone: "12345" }, "phone"],
    ])("rejects %o on field %s", (input, field) => {
      const error = errorOf(() => book.addCompany(input));
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) expect(error.field).toBe(field);
    });

    it("updates only the given fields", () => {
      book.addCompany({ name: "Acme", address: "Old Street" });
      const updated = book.updateCompany(1, { email: "hello@acme.test" });

      expect(updated.address).toBe("Old Street");
      expect(updated.email).toBe("hello@acme.test");
      expect(journal.events.at(-1)).toEqual({
        type: "company.updated",
        id: 1,
        changes: { email: "hello@acme.test" },
      });
    });

    it("allows keeping the same name but not taking another company's", () => {
      book.addCompany({ name: "Acme" });
      book.addCompany({ name: "Globex" });

      expect(book.updateCompany(1, { name: "Acme" }).name).toBe("Acme");
      expect(() => book.updateCompany(1, { name: "Globex" })).toThrow(ConflictError);
    });

    it("refuses to remove a company with transactions", () => {
      book.addCompany({ name: "Acme" });
      book.deposit(companyEndpoint(1), "10");

      const error = errorOf(() => book.removeCompany(1));
      expect(error).toBeInstanceOf(ConflictError);
      if (error instanceof ConflictError) expect(error.reason).toBe("ACCOUNT_IN_USE");
      expect(book.getCompany(1)).toBeDefined();
    });

    it("clears the company reference of its users on removal", () => {
      book.addCompany({ name: "Acme" });
      book.addUser({ name: "Bea", companyId: 1 });

      expect(book.removeCompany(1).name).toBe("Acme");
      expect(book.getCompany(1)).toBeUndefined();
      expect(book.getUser(1)?.companyId).toBeNull();
    });

    it("does not reuse the id of a removed company", () => {
      book.addCompany({ name: "Acme" });
      book.removeCompany(1);
      expect(book.addCompany({ name: "Acme" }).id).toBe(2);
    });

    it("leaves state untouched when the journal fails", () => {
      journal.failNext = true;
      expect(() => book.addCompany({ name: "Acme" })).toThrow("journal unavailable");
      expect(book.listCompanies()).toEqual([]);
      expect(book.addCompany({ name: "Acme" }).id).toBe(1);
    });
  });

  // ─── Users ───────────────────────────────────────────────────────────

  describe("users", () => {
    beforeEach(() => {
      book.addCompany({ name: "Acme" });
    });

    it("adds a user linked to a company", () => {
      const user = book.addUser({ name: "Bea", companyId: 1, role: " Accountant ", email: "bea@acme.test" });
      expect(user).toMatchObject({ id: 1, companyId: 1, role: "Accountant", department: "", balance: "0.00" });
    });

    it("rejects an unknown company", () => {
      expect(() => book.addUser({ name: "Bea", companyId: 5 })).toThrow(new NotFoundError("company", 5));
    });

    it("filters users by company", () => {
      book.addUser({ name: "Zed", companyId: 1 });
      book.addUser({ name: "Ann" });
      book.addUser({ name: "Bea", companyId: 1 });

      expect(book.listUsers().map((u) => u.name)).toEqual(["Ann", "Bea", "Zed"]);
      expect(book.listUsers({ companyId: 1 }).map((u) => u.name)).toEqual(["Bea", "Zed"]);
    });

    it("updates and clears the company reference", () => {
      book.addUser({ name: "Bea", companyId: 1 });
      expect(book.updateUser(1, { companyId: null, department: "Ops" })).toMatchObject({
        companyId: null,
        department: "Ops",
      });
    });

    it("refuses to remove a user with transactions", () => {
      book.addUser({ name: "Bea" });
      book.deposit(userEndpoint(1), "5");
      expect(() => book.removeUser(1)).toThrow(ConflictError);
    });

    it("removes an unused user", () => {
      book.addUser({ name: "Bea" });
      expect(book.removeUser(1).name).toBe("Bea");
      expect(book.getUser(1)).toBeUndefined();
      expect(() => book.removeUser(1)).toThrow(NotFoundError);
    });
  });

  // ─── Money & Reports ─────────────────────────────────────────────────

  describe("money movement and reports", () => {
    beforeEach(() => {
      book.addCompany({ name: "Acme" });
      book.addUser({ name: "Bea" });
      book.deposit(companyEndpoint(1), "1000");
      book.createTransaction({ date: "2025-03-01", amount: "400", from: companyEndpoint(1), to: userEndpoint(1), description: "Salary" });
      book.withdraw(userEndpoint(1), "150");
    });

    it("keeps stored balances current", () => {
      expect(book.getBalance(companyEndpoint(1))).toBe("600.00");
      expect(book.getBalance(userEndpoint(1))).toBe("250.00");
      expect(book.transactionCount).toBe(3);
    });

    it("balances total against the cash position", () => {
      expect(book.totals()).toEqual({
        companyTotal: "600.00",
        userTotal: "250.00",
        grandTotal: "850.00",
        cashPosition: "-850.00",
      });
    });

    it("summarizes all transactions", () => {
      expect(book.summary()).toEqual({ count: 3, totalAmount: "1550.00", averageAmount: "516.67" });
    });

    it("derives the ledger through the facade", () => {
      const lines = book.getLedger(userEndpoint(1));
      expect(lines.map((l) => l.balanceAfter)).toEqual(["250.00", "400.00"]);
      expect(() => book.getLedger(CASH)).toThrow(ValidationError);
    });

    it("ranks companies and users by balance", () => {
      book.addCompany({ name: "Beta" });
      book.addUser({ name: "Abe" });

      expect(book.companiesByBalance().map((c) => c.name)).toEqual(["Acme", "Beta"]);
      expect(book.usersByBalance().map((u) => [u.name, u.balance])).toEqual([
        ["Bea", "250.00"],
        ["Abe", "0.00"],
      ]);
    });

    it("searches by party name and labels endpoints", () => {
      expect(book.searchTransactions("bea").map((t) => t.id)).toEqual([3, 2]);
      expect(book.nameOf(CASH)).toBe("Cash");
      expect(book.nameOf(companyEndpoint(1))).toBe("Acme");
    });

    it("lists transactions newest first", () => {
      // Transaction 2 is back-dated to March 1st
      expect(book.listTransactions().map((t) => t.id)).toEqual([3, 1, 2]);
      expect(book.listTransactions({ order: "asc", limit: 1 }).map((t) => t.id)).toEqual([2]);
    });

    it("describes transfers", () => {
      const salary = book.getTransaction(2);
      expect(salary === undefined ? undefined : book.describeTransfer(salary)).toBe("Company to User");
    });

    it("verifies consistency", () => {
      expect(book.verify()).toEqual({ checkedAccounts: 2, consistent: true, discrepancies: [] });
      expect(() => book.assertConsistent()).not.toThrow();
    });

    it("stays consistent after deletions", () => {
      book.deleteTransaction(2);
      expect(book.getBalance(companyEndpoint(1))).toBe("1000.00");
      expect(book.getBalance(userEndpoint(1))).toBe("-150.00");
      expect(book.verify().consistent).toBe(true);
    });
  });

  // ─── Replay ──────────────────────────────────────────────────────────

  describe("journal replay", () => {
    it("rebuilds an identical book from its events", () => {
      book.addCompany({ name: "Acme" });
      book.addCompany({ name: "Globex" });
      book.addUser({ name: "Bea", companyId: 2 });
      book.deposit(companyEndpoint(1), "500");
      book.createTransaction({ date: "2025-02-01", amount: "120.40", from: companyEndpoint(1), to: userEndpoint(1) });
      book.deleteTransaction(1);
      book.updateUser(1, { role: "Lead" });
      book.removeCompany(2);

      const replayed = new Book({ clock: new SteppingClock() });
      for (const event of journal.events) replayed.apply(event);

      const { createdAt: _a, ...expected } = book.snapshot();
      const { createdAt: _b, ...actual } = replayed.snapshot();
      expect(actual).toEqual(expected);
      expect(replayed.getUser(1)).toMatchObject({ role: "Lead", companyId: null, balance: "120.40" });
    });
  });

  // ─── Snapshots ───────────────────────────────────────────────────────

  describe("snapshots", () => {
    let snapshot: BookSnapshot;

    beforeEach(() => {
      book.addCompany({ name: "Acme" });
      book.addUser({ name: "Bea", companyId: 1 });
      book.deposit(companyEndpoint(1), "900");
      book.createTransaction({ date: "2025-03-05", amount: "300", from: companyEndpoint(1), to: userEndpoint(1) });
      snapshot = book.snapshot();
    });

    it("captures every record and the id counters", () => {
      expect(snapshot.version).toBe(1);
      expect(snapshot.companies.map((c) => c.balance)).toEqual(["600.00"]);
      expect(snapshot.transactions.map((t) => t.id)).toEqual([1, 2]);
      expect(snapshot.sequences).toEqual({ company: 2, user: 2, transaction: 3 });
    });

    it("round-trips through fromSnapshot", () => {
      const copy = Book.fromSnapshot(snapshot);
      expect(copy.getBalance(userEndpoint(1))).toBe("300.00");
      expect(copy.snapshot().transactions).toEqual(snapshot.transactions);
      expect(copy.deposit(userEndpoint(1), "1").transaction.id).toBe(3);
    });

    it("rejects a snapshot whose balances disagree with its history", () => {
      const [acme] = snapshot.companies;
      const tampered = {
        ...snapshot,
        companies: acme === undefined ? [] : [{ ...acme, balance: "9999.00" }],
      };

      const error = errorOf(() => Book.fromSnapshot(tampered));
      expect(error).toBeInstanceOf(ConsistencyError);
      if (error instanceof ConsistencyError) {
        expect(error.discrepancies).toEqual([
          { account: { kind: "company", id: 1 }, name: "Acme", stored: "9999.00", replayed: "600.00" },
        ]);
      }
    });

    it("rejects malformed content", () => {
      const error = errorOf(() => Book.fromSnapshot({ version: 2 }));
      expect(error).toBeInstanceOf(LedgerError);
      if (error instanceof LedgerError) expect(error.code).toBe("INVALID_SNAPSHOT");
    });

    it("rejects transactions that point at unknown accounts", () => {
      const orphaned = { ...snapshot, users: [] };
      expect(() => Book.fromSnapshot(orphaned)).toThrow(/refers to unknown user 1/);
    });

    it("restores in place and journals the restore", () => {
      book.deleteTransaction(2);
      book.restore(snapshot);

      expect(book.getBalance(userEndpoint(1))).toBe("300.00");
      expect(journal.events.at(-1)).toEqual({ type: "book.restored", snapshot });
    });

    it("never hands out an id again after restoring an older snapshot", () => {
      book.addCompany({ name: "Beta" });
      book.addUser({ name: "Cal" });
      book.deposit(companyEndpoint(1), "50");

      book.restore(snapshot);

      expect(book.getCompany(2)).toBeUndefined();
      expect(book.deposit(userEndpoint(1), "1").transaction.id).toBe(4);
      expect(book.addCompany({ name: "Gamma" }).id).toBe(3);
      expect(book.addUser({ name: "Dee" }).id).toBe(3);
    });

    it("replays a restore to the same id counters", () => {
      book.deposit(companyEndpoint(1), "50");
      book.restore(snapshot);

      const replayed = new Book();
      for (const event of journal.events) replayed.apply(event);

      expect(replayed.snapshot().sequences).toEqual({ company: 2, user: 2, transaction: 4 });
      expect(book.snapshot().sequences).toEqual({ company: 2, user: 2, transaction: 4 });
    });

    it("does not journal an invalid restore", () => {
      const count = journal.events.length;
      expect(() => book.restore({ ...snapshot, version: 3 })).toThrow(LedgerError);
      expect(journal.events).toHaveLength(count);
    });
  });
});
