/**
 * @ledgerbook/ledger — Account store.
 *
 * Holds companies and users with their running balances. This class is
 * plain state: it does not validate input or journal changes. The Book
 * validates, and the balance maintainer is the only caller of
 * adjustBalance().
 *
 * Rules:
 * - Ids are assigned per kind from a counter that never goes backwards
 * - Company names are unique
 * - Listings are ordered by name, then id
 */

import type { Account, AccountEndpoint, Company, User } from "@ledgerbook/types";
import { NotFoundError } from "./errors.js";
import { formatAmount, parseAmount } from "./money-math.js";

function byName<T extends Account>(a: T, b: T): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return a.id - b.id;
}

export class AccountStore {
  private readonly _companies = new Map<number, Company>();
  private readonly _users = new Map<number, User>();
  private _nextCompanyId = 1;
  private _nextUserId = 1;

  // ─── Ids ────────────────────────────────────────────────────────────

  /** The id the next inserted company will receive. */
  get nextCompanyId(): number {
    return this._nextCompanyId;
  }

  /** The id the next inserted user will receive. */
  get nextUserId(): number {
    return this._nextUserId;
  }

  // ─── Companies ──────────────────────────────────────────────────────

  getCompany(id: number): Company | undefined {
    return this._companies.get(id);
  }

  requireCompany(id: number): Company {
    const company = this._companies.get(id);
    if (company === undefined) {
      throw new NotFoundError("company", id);
    }
    return company;
  }

  findCompanyByName(name: string): Company | undefined {
    for (const company of this._companies.values()) {
      if (company.name === name) return company;
    }
    return undefined;
  }

  /** Insert or replace a company record. */
  putCompany(company: Company): void {
    this._companies.set(company.id, company);
    if (company.id >= this._nextCompanyId) {
      this._nextCompanyId = company.id + 1;
    }
  }

  deleteCompany(id: number): Company {
    const company = this.requireCompany(id);
    this._companies.delete(id);
    return company;
  }

  listCompanies(): readonly Company[] {
    return [...this._companies.values()].sort(byName);
  }

  // ─── Users ──────────────────────────────────────────────────────────

  getUser(id: number): User | undefined {
    return this._users.get(id);
  }

  requireUser(id: number): User {
    const user = this._users.get(id);
    if (user === undefined) {
      throw new NotFoundError("user", id);
    }
    return user;
  }

  /** Insert or replace a user record. */
  putUser(user: User): void {
    this._users.set(user.id, user);
    if (user.id >= this._nextUserId) {
      this._nextUserId = user.id + 1;
    }
  }

  deleteUser(id: number): User {
    const user = this.requireUser(id);
    this._users.delete(id);
    return user;
  }

  /**
   * All users, or only those whose weak company reference matches.
   */
  listUsers(companyId?: number): readonly User[] {
    const users = [...this._users.values()];
    const filtered = companyId === undefined
      ? users
      : users.filter((u) => u.companyId === companyId);
    return filtered.sort(byName);
  }

  // ─── Either Kind ────────────────────────────────────────────────────

  get(endpoint: AccountEndpoint): Account | undefined {
    switch (endpoint.kind) {
      case "company":
        return this._companies.get(endpoint.id);
      case "user":
        return this._users.get(endpoint.id);
    }
  }

  require(endpoint: AccountEndpoint): Account {
    switch (endpoint.kind) {
      case "company":
        return this.requireCompany(endpoint.id);
      case "user":
        return this.requireUser(endpoint.id);
    }
  }

  has(endpoint: AccountEndpoint): boolean {
    return this.get(endpoint) !== undefined;
  }

  /**
   * Add a signed delta (in minor units) to an account balance.
   * Returns the new balance.
   */
  adjustBalance(endpoint: AccountEndpoint, delta: bigint): string {
    switch (endpoint.kind) {
      case "company": {
        const company = this.requireCompany(endpoint.id);
        const balance = formatAmount(parseAmount(company.balance) + delta);
        this._companies.set(company.id, { ...company, balance });
        return balance;
      }
      case "user": {
        const user = this.requireUser(endpoint.id);
        const balance = formatAmount(parseAmount(user.balance) + delta);
        this._users.set(user.id, { ...user, balance });
        return balance;
      }
    }
  }

  // ─── Bulk ───────────────────────────────────────────────────────────

  /**
   * Replace all contents. Counters never move backwards, so ids handed
   * out before the load are not assigned again.
   */
  load(
    companies: readonly Company[],
    users: readonly User[],
    nextIds: { readonly company: number; readonly user: number },
  ): void {
    this._companies.clear();
    this._users.clear();
    this._nextCompanyId = Math.max(this._nextCompanyId, nextIds.company);
    this._nextUserId = Math.max(this._nextUserId, nextIds.user);
    for (const company of companies) this.putCompany(company);
    for (const user of users) this.putUser(user);
  }
}
