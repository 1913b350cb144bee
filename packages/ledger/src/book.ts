/**
 * @ledgerbook/ledger — Book.
 *
 * The bookkeeping facade: one AccountStore, one TransactionLog, and the
 * components that work over them.
 *
 * API surface:
 * - addCompany() / updateCompany() / removeCompany(), and the same for users
 * - createTransaction() / deleteTransaction() / deposit() / withdraw()
 * - getBalance() / getLedger() / statement()
 * - listTransactions() / searchTransactions() / totals() / summary()
 * - companiesByBalance() / usersByBalance()
 * - verify() / assertConsistent()
 * - snapshot() / fromSnapshot() / restore()
 * - apply(): replay one journaled event
 *
 * Every mutation is validated in full, recorded in the journal, and only
 * then applied. apply() is the same code path used for replay, so a book
 * rebuilt from its journal matches the book that wrote it.
 */

import type {
  AccountEndpoint,
  AccountStatement,
  Company,
  Endpoint,
  LedgerLine,
  Transaction,
  User,
} from "@ledgerbook/types";
import { AccountStore } from "./accounts.js";
import type { CreateTransactionInput, TransactionReceipt } from "./balance-maintainer.js";
import { BalanceMaintainer } from "./balance-maintainer.js";
import type { Clock } from "./calendar.js";
import { isCalendarDate, systemClock } from "./calendar.js";
import type { ConsistencyReport } from "./consistency.js";
import { verifyBalances } from "./consistency.js";
import { companyEndpoint, sameEndpoint, userEndpoint } from "./endpoints.js";
import { ConflictError, ConsistencyError, LedgerError } from "./errors.js";
import type { BookEvent, CompanyChanges, Journal, UserChanges } from "./events.js";
import { NO_JOURNAL } from "./events.js";
import { LedgerDeriver } from "./ledger-deriver.js";
import { ZERO, parseAmount } from "./money-math.js";
import type { BalanceTotals, ListOptions, TransactionSummary } from "./reports.js";
import {
  computeTotals,
  describeTransfer,
  listTransactions,
  rankByBalance,
  searchTransactions,
  summarizeTransactions,
} from "./reports.js";
import type { BookSnapshot } from "./snapshot.js";
import { isBookSnapshot } from "./snapshot.js";
import { TransactionLog } from "./transaction-log.js";
import {
  MAX_DESCRIPTION_LENGTH,
  MAX_NAME_LENGTH,
  optionalEmail,
  optionalPhone,
  optionalText,
  requireName,
} from "./validation.js";

export interface BookOptions {
  /** Where events are recorded before they are applied (default: nowhere) */
  readonly journal?: Journal | undefined;
  readonly clock?: Clock | undefined;
}

export interface NewCompany {
  readonly name: string;
  readonly address?: string | undefined;
  readonly phone?: string | undefined;
  readonly email?: string | undefined;
}

export interface NewUser {
  readonly name: string;
  readonly companyId?: number | null | undefined;
  readonly email?: string | undefined;
  readonly role?: string | undefined;
  readonly department?: string | undefined;
}

export interface UserFilter {
  readonly companyId?: number | undefined;
}

export class Book {
  private readonly _accounts = new AccountStore();
  private readonly _log = new TransactionLog();
  private readonly _journal: Journal;
  private readonly _clock: Clock;
  private readonly _balances: BalanceMaintainer;
  private readonly _ledger: LedgerDeriver;

  constructor(options: BookOptions = {}) {
    this._journal = options.journal ?? NO_JOURNAL;
    this._clock = options.clock ?? systemClock;
    this._balances = new BalanceMaintainer(this._accounts, this._log, this._journal, this._clock);
    this._ledger = new LedgerDeriver(this._accounts, this._log);
  }

  // ─── Companies ───────────────────────────────────────────────────────

  addCompany(input: NewCompany): Company {
    const name = requireName(input.name);
    this.assertCompanyNameFree(name);

    const company: Company = {
      id: this._accounts.nextCompanyId,
      name,
      balance: ZERO,
      createdAt: this._clock.now().toISOString(),
      address: optionalText(input.address, "address", MAX_DESCRIPTION_LENGTH),
      phone: optionalPhone(input.phone),
      email: optionalEmail(input.email),
    };

    this.commit({ type: "company.added", company });
    return company;
  }

  updateCompany(id: number, changes: CompanyChanges): Company {
    const existing = this._accounts.requireCompany(id);
    const normalized: { -readonly [K in keyof CompanyChanges]: CompanyChanges[K] } = {};

    if (changes.name !== undefined) {
      const name = requireName(changes.name);
      if (name !== existing.name) this.assertCompanyNameFree(name);
      normalized.name = name;
    }
    if (changes.address !== undefined) {
      normalized.address = optionalText(changes.address, "address", MAX_DESCRIPTION_LENGTH);
    }
    if (changes.phone !== undefined) normalized.phone = optionalPhone(changes.phone);
    if (changes.email !== undefined) normalized.email = optionalEmail(changes.email);

    this.commit({ type: "company.updated", id, changes: normalized });
    return this._accounts.requireCompany(id);
  }

  /**
   * Remove a company no transaction refers to. Users that referenced it
   * keep existing with companyId set to null.
   */
  removeCompany(id: number): Company {
    const company = this._accounts.requireCompany(id);
    this.assertUnreferenced(companyEndpoint(id), company.name);

    this.commit({ type: "company.removed", id });
    return company;
  }

  getCompany(id: number): Company | undefined {
    return this._accounts.getCompany(id);
  }

  listCompanies(): readonly Company[] {
    return this._accounts.listCompanies();
  }

  // ─── Users ───────────────────────────────────────────────────────────

  addUser(input: NewUser): User {
    const name = requireName(input.name);
    const companyId = input.companyId ?? null;
    if (companyId !== null) this._accounts.requireCompany(companyId);

    const user: User = {
      id: this._accounts.nextUserId,
      name,
      balance: ZERO,
      createdAt: this._clock.now().toISOString(),
      companyId,
      email: optionalEmail(input.email),
      role: optionalText(input.role, "role", MAX_NAME_LENGTH),
      department: optionalText(input.department, "department", MAX_NAME_LENGTH),
    };

    this.commit({ type: "user.added", user });
    return user;
  }

  updateUser(id: number, changes: UserChanges): User {
    this._accounts.requireUser(id);
    const normalized: { -readonly [K in keyof UserChanges]: UserChanges[K] } = {};

    if (changes.name !== undefined) normalized.name = requireName(changes.name);
    if (changes.email !== undefined) normalized.email = optionalEmail(changes.email);
    if (changes.role !== undefined) {
      normalized.role = optionalText(changes.role, "role", MAX_NAME_LENGTH);
    }
    if (changes.department !== undefined) {
      normalized.department = optionalText(changes.department, "department", MAX_NAME_LENGTH);
    }
    if (changes.companyId !== undefined) {
      if (changes.companyId !== null) this._accounts.requireCompany(changes.companyId);
      normalized.companyId = changes.companyId;
    }

    this.commit({ type: "user.updated", id, changes: normalized });
    return this._accounts.requireUser(id);
  }

  removeUser(id: number): User {
    const user = this._accounts.requireUser(id);
    this.assertUnreferenced(userEndpoint(id), user.name);

    this.commit({ type: "user.removed", id });
    return user;
  }

  getUser(id: number): User | undefined {
    return this._accounts.getUser(id);
  }

  listUsers(filter: UserFilter = {}): readonly User[] {
    return this._accounts.listUsers(filter.companyId);
  }

  // ─── Money Movement ──────────────────────────────────────────────────

  createTransaction(input: CreateTransactionInput): TransactionReceipt {
    return this._balances.createTransaction(input);
  }

  deleteTransaction(id: number): Transaction {
    return this._balances.deleteTransaction(id);
  }

  deposit(account: AccountEndpoint, amount: string, description?: string): TransactionReceipt {
    return this._balances.deposit(account, amount, description);
  }

  withdraw(account: AccountEndpoint, amount: string, description?: string): TransactionReceipt {
    return this._balances.withdraw(account, amount, description);
  }

  getBalance(account: AccountEndpoint): string {
    return this._balances.getBalance(account);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getTransaction(id: number): Transaction | undefined {
    return this._log.get(id);
  }

  getLedger(account: Endpoint): LedgerLine[] {
    return this._ledger.getLedger(account);
  }

  statement(account: Endpoint): AccountStatement {
    return this._ledger.statement(account);
  }

  listTransactions(options?: ListOptions): Transaction[] {
    return listTransactions(this._log.all(), options);
  }

  searchTransactions(term: string): Transaction[] {
    return searchTransactions(this._log.all(), term, this._ledger.nameOf);
  }

  describeTransfer(transaction: Transaction): string {
    return describeTransfer(transaction);
  }

  /** Display name of an endpoint ("Cash" for the cash pool). */
  nameOf(endpoint: Endpoint): string {
    return endpoint.kind === "cash" ? "Cash" : this._ledger.nameOf(endpoint);
  }

  totals(): BalanceTotals {
    return computeTotals(this._accounts.listCompanies(), this._accounts.listUsers(), this._log.all());
  }

  /** Companies by balance, highest first; equal balances in name order. */
  companiesByBalance(): Company[] {
    return rankByBalance(this._accounts.listCompanies());
  }

  /** Users by balance, highest first; equal balances in name order. */
  usersByBalance(): User[] {
    return rankByBalance(this._accounts.listUsers());
  }

  summary(): TransactionSummary {
    return summarizeTransactions(this._log.all());
  }

  get transactionCount(): number {
    return this._log.size;
  }

  // ─── Verification ────────────────────────────────────────────────────

  verify(): ConsistencyReport {
    return verifyBalances(this._accounts, this._log.all());
  }

  assertConsistent(): void {
    const report = this.verify();
    if (!report.consistent) {
      throw new ConsistencyError(report.discrepancies);
    }
  }

  // ─── Snapshots ───────────────────────────────────────────────────────

  snapshot(): BookSnapshot {
    return {
      version: 1,
      companies: [...this._accounts.listCompanies()].sort((a, b) => a.id - b.id),
      users: [...this._accounts.listUsers()].sort((a, b) => a.id - b.id),
      transactions: this._log.all(),
      sequences: {
        company: this._accounts.nextCompanyId,
        user: this._accounts.nextUserId,
        transaction: this._log.nextId,
      },
      createdAt: this._clock.now().toISOString(),
    };
  }

  /**
   * Build a book from a snapshot. Every record is checked and every
   * balance recomputed from the transactions.
   *
   * Throws LedgerError("INVALID_SNAPSHOT") for malformed content and
   * ConsistencyError when a stored balance disagrees with the history.
   */
  static fromSnapshot(snapshot: unknown, options: BookOptions = {}): Book {
    const book = new Book(options);
    book.load(checkSnapshot(snapshot));
    return book;
  }

  /**
   * Replace the whole book with a snapshot, in place.
   */
  restore(snapshot: unknown): void {
    const checked = checkSnapshot(snapshot);
    this.commit({ type: "book.restored", snapshot: checked });
  }

  // ─── Event Application ───────────────────────────────────────────────

  /**
   * Apply one event without journaling it. Used to replay a journal into
   * a fresh book.
   */
  apply(event: BookEvent): void {
    switch (event.type) {
      case "company.added":
        this._accounts.putCompany(event.company);
        return;

      case "company.updated": {
        const company = this._accounts.requireCompany(event.id);
        this._accounts.putCompany({
          ...company,
          name: event.changes.name ?? company.name,
          address: event.changes.address ?? company.address,
          phone: event.changes.phone ?? company.phone,
          email: event.changes.email ?? company.email,
        });
        return;
      }

      case "company.removed":
        this._accounts.deleteCompany(event.id);
        for (const user of this._accounts.listUsers(event.id)) {
          this._accounts.putUser({ ...user, companyId: null });
        }
        return;

      case "user.added":
        this._accounts.putUser(event.user);
        return;

      case "user.updated": {
        const user = this._accounts.requireUser(event.id);
        const { changes } = event;
        this._accounts.putUser({
          ...user,
          name: changes.name ?? user.name,
          email: changes.email ?? user.email,
          role: changes.role ?? user.role,
          department: changes.department ?? user.department,
          companyId: changes.companyId === undefined ? user.companyId : changes.companyId,
        });
        return;
      }

      case "user.removed":
        this._accounts.deleteUser(event.id);
        return;

      case "transaction.created":
        this._balances.applyCreated(event.transaction);
        return;

      case "transaction.deleted":
        this._balances.applyDeleted(event.id);
        return;

      case "book.restored":
        this.load(event.snapshot);
        return;
    }
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private commit(event: BookEvent): void {
    this._journal.record(event);
    this.apply(event);
  }

  private assertCompanyNameFree(name: string): void {
    if (this._accounts.findCompanyByName(name) !== undefined) {
      throw new ConflictError("DUPLICATE_NAME", `A company named "${name}" already exists`);
    }
  }

  private assertUnreferenced(endpoint: AccountEndpoint, name: string): void {
    if (this._log.references(endpoint)) {
      throw new ConflictError(
        "ACCOUNT_IN_USE",
        `${endpoint.kind} "${name}" has transactions; delete them before removing the account`,
      );
    }
  }

  private load(snapshot: BookSnapshot): void {
    this._accounts.load(snapshot.companies, snapshot.users, snapshot.sequences);
    this._log.load(snapshot.transactions, snapshot.sequences.transaction);
  }
}

// ─── Snapshot Checks ─────────────────────────────────────────────────────

function invalid(message: string): LedgerError {
  return new LedgerError("INVALID_SNAPSHOT", message);
}

/**
 * Structural, referential and balance checks for a snapshot.
 * Returns the snapshot unchanged when all of them pass.
 */
function checkSnapshot(snapshot: unknown): BookSnapshot {
  if (!isBookSnapshot(snapshot)) {
    throw invalid("Snapshot does not have the expected shape");
  }

  const scratch = new AccountStore();
  const names = new Set<string>();
  for (const company of snapshot.companies) {
    if (scratch.getCompany(company.id) !== undefined) {
      throw invalid(`Duplicate company id ${String(company.id)}`);
    }
    if (names.has(company.name)) {
      throw invalid(`Duplicate company name "${company.name}"`);
    }
    names.add(company.name);
    scratch.putCompany(company);
  }
  for (const user of snapshot.users) {
    if (scratch.getUser(user.id) !== undefined) {
      throw invalid(`Duplicate user id ${String(user.id)}`);
    }
    if (user.companyId !== null && scratch.getCompany(user.companyId) === undefined) {
      throw invalid(`User ${String(user.id)} refers to unknown company ${String(user.companyId)}`);
    }
    scratch.putUser(user);
  }

  const ids = new Set<number>();
  for (const transaction of snapshot.transactions) {
    const label = `Transaction ${String(transaction.id)}`;
    if (ids.has(transaction.id)) throw invalid(`Duplicate transaction id ${String(transaction.id)}`);
    ids.add(transaction.id);

    if (!isCalendarDate(transaction.date)) throw invalid(`${label} has invalid date "${transaction.date}"`);
    if (parseAmount(transaction.amount) <= 0n) throw invalid(`${label} has non-positive amount`);
    if (transaction.from.kind === "cash" && transaction.to.kind === "cash") {
      throw invalid(`${label} moves cash to cash`);
    }
    if (sameEndpoint(transaction.from, transaction.to)) throw invalid(`${label} has identical endpoints`);
    for (const endpoint of [transaction.from, transaction.to]) {
      if (endpoint.kind !== "cash" && !scratch.has(endpoint)) {
        throw invalid(`${label} refers to unknown ${endpoint.kind} ${String(endpoint.id)}`);
      }
    }
  }

  const report = verifyBalances(scratch, snapshot.transactions);
  if (!report.consistent) {
    throw new ConsistencyError(report.discrepancies);
  }

  return snapshot;
}
