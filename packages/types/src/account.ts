/**
 * Account Types
 *
 * The two kinds of account the book stores. Both carry a running
 * balance that only the balance maintainer mutates.
 *
 * Rules:
 * - Balances are decimal strings with two fractional digits ("0.00", "-12.50")
 * - Ids are positive integers assigned per kind, never reused
 * - Descriptive fields default to "" rather than being absent
 */

/** Kinds of account held in the account store. */
export type AccountKind = "company" | "user";

/** Fields shared by every stored account. */
export interface AccountBase {
  /** Unique within its kind */
  readonly id: number;

  /** Display name (non-empty) */
  readonly name: string;

  /** Running balance, e.g. "1250.00" */
  readonly balance: string;

  /** ISO 8601 timestamp of creation */
  readonly createdAt: string;
}

export interface Company extends AccountBase {
  readonly address: string;
  readonly phone: string;
  readonly email: string;
}

export interface User extends AccountBase {
  /** Weak reference to a company (lookup only, no ownership) */
  readonly companyId: number | null;
  readonly email: string;
  readonly role: string;
  readonly department: string;
}

/** A stored account of either kind. */
export type Account = Company | User;
