/**
 * @ledgerbook/ledger — Book events and the journal seam.
 *
 * Every mutation of a Book is expressed as a BookEvent. The Book records
 * the event in its Journal first and applies it second, so a journal that
 * refuses the write leaves the book untouched, and replaying a journal
 * rebuilds the same state.
 */

import type { Company, Transaction, User } from "@ledgerbook/types";
import { isCompany, isId, isTransaction, isUser } from "@ledgerbook/types";
import { LedgerError } from "./errors.js";
import type { BookSnapshot } from "./snapshot.js";
import { isBookSnapshot } from "./snapshot.js";

// ─── Change Sets ─────────────────────────────────────────────────────────

export interface CompanyChanges {
  readonly name?: string | undefined;
  readonly address?: string | undefined;
  readonly phone?: string | undefined;
  readonly email?: string | undefined;
}

export interface UserChanges {
  readonly name?: string | undefined;
  readonly email?: string | undefined;
  readonly role?: string | undefined;
  readonly department?: string | undefined;
  /** null clears the company reference */
  readonly companyId?: number | null | undefined;
}

// ─── Events ──────────────────────────────────────────────────────────────

export type BookEvent =
  | { readonly type: "company.added"; readonly company: Company }
  | { readonly type: "company.updated"; readonly id: number; readonly changes: CompanyChanges }
  | { readonly type: "company.removed"; readonly id: number }
  | { readonly type: "user.added"; readonly user: User }
  | { readonly type: "user.updated"; readonly id: number; readonly changes: UserChanges }
  | { readonly type: "user.removed"; readonly id: number }
  | { readonly type: "transaction.created"; readonly transaction: Transaction }
  | { readonly type: "transaction.deleted"; readonly id: number }
  | { readonly type: "book.restored"; readonly snapshot: BookSnapshot };

export type BookEventType = BookEvent["type"];

/**
 * Durable sink for book events. record() must either persist the event
 * or throw.
 */
export interface Journal {
  record(event: BookEvent): void;
}

/** Journal for books that live only in memory. */
export const NO_JOURNAL: Journal = {
  record: () => undefined,
};

// ─── Wire Form ───────────────────────────────────────────────────────────

export interface EncodedEvent {
  readonly type: BookEventType;
  readonly payload: Readonly<Record<string, unknown>>;
}

export function encodeEvent(event: BookEvent): EncodedEvent {
  switch (event.type) {
    case "company.added":
      return { type: event.type, payload: { company: event.company } };
    case "user.added":
      return { type: event.type, payload: { user: event.user } };
    case "company.updated":
    case "user.updated":
      return { type: event.type, payload: { id: event.id, changes: event.changes } };
    case "company.removed":
    case "user.removed":
    case "transaction.deleted":
      return { type: event.type, payload: { id: event.id } };
    case "transaction.created":
      return { type: event.type, payload: { transaction: event.transaction } };
    case "book.restored":
      return { type: event.type, payload: { snapshot: event.snapshot } };
  }
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readCompanyChanges(value: unknown): CompanyChanges | undefined {
  if (!isRecord(value)) return undefined;
  const changes: Mutable<CompanyChanges> = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== "string") return undefined;
    switch (key) {
      case "name": changes.name = v; break;
      case "address": changes.address = v; break;
      case "phone": changes.phone = v; break;
      case "email": changes.email = v; break;
      default: return undefined;
    }
  }
  return changes;
}

function readUserChanges(value: unknown): UserChanges | undefined {
  if (!isRecord(value)) return undefined;
  const changes: Mutable<UserChanges> = {};
  for (const [key, v] of Object.entries(value)) {
    if (key === "companyId") {
      if (v !== null && !isId(v)) return undefined;
      changes.companyId = v;
      continue;
    }
    if (typeof v !== "string") return undefined;
    switch (key) {
      case "name": changes.name = v; break;
      case "email": changes.email = v; break;
      case "role": changes.role = v; break;
      case "department": changes.department = v; break;
      default: return undefined;
    }
  }
  return changes;
}

/**
 * Rebuild a BookEvent from its stored form.
 * Throws LedgerError("CORRUPT_JOURNAL") if the payload does not match.
 */
export function decodeEvent(
  type: string,
  payload: Readonly<Record<string, unknown>>,
): BookEvent {
  switch (type) {
    case "company.added":
      if (isCompany(payload.company)) return { type, company: payload.company };
      break;
    case "user.added":
      if (isUser(payload.user)) return { type, user: payload.user };
      break;
    case "company.updated": {
      const changes = readCompanyChanges(payload.changes);
      if (isId(payload.id) && changes !== undefined) return { type, id: payload.id, changes };
      break;
    }
    case "user.updated": {
      const changes = readUserChanges(payload.changes);
      if (isId(payload.id) && changes !== undefined) return { type, id: payload.id, changes };
      break;
    }
    case "company.removed":
    case "user.removed":
    case "transaction.deleted":
      if (isId(payload.id)) return { type, id: payload.id };
      break;
    case "transaction.created":
      if (isTransaction(payload.transaction)) return { type, transaction: payload.transaction };
      break;
    case "book.restored":
      if (isBookSnapshot(payload.snapshot)) return { type, snapshot: payload.snapshot };
      break;
    default:
      throw new LedgerError("CORRUPT_JOURNAL", `Unknown event type "${type}"`);
  }

  throw new LedgerError("CORRUPT_JOURNAL", `Malformed "${type}" event payload`);
}
