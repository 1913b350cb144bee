/**
 * Runtime Type Guards
 *
 * Narrowing functions for Ledgerbook domain types.
 * Used at system boundaries: journal records read back from disk,
 * snapshot files, and command-line input.
 */

import type { Company, User } from "./account.js";
import type { AccountEndpoint, Endpoint } from "./endpoint.js";
import type { Transaction } from "./transaction.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Primitives
// =============================================================================

const DECIMAL_2 = /^-?\d+\.\d{2}$/;
const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Positive safe integer, the shape of every stored id. */
export function isId(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

/** Signed decimal string with exactly two fractional digits. */
export function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && DECIMAL_2.test(value);
}

// =============================================================================
// Endpoint guards
// =============================================================================

export function isAccountEndpoint(value: unknown): value is AccountEndpoint {
  if (!isRecord(value)) return false;
  return (value.kind === "company" || value.kind === "user") && isId(value.id);
}

export function isEndpoint(value: unknown): value is Endpoint {
  if (!isRecord(value)) return false;
  return value.kind === "cash" || isAccountEndpoint(value);
}

// =============================================================================
// Account guards
// =============================================================================

function hasAccountBase(v: Record<string, unknown>): boolean {
  return (
    isId(v.id) &&
    typeof v.name === "string" &&
    v.name.trim().length > 0 &&
    isDecimalString(v.balance) &&
    typeof v.createdAt === "string"
  );
}

export function isCompany(value: unknown): value is Company {
  if (!isRecord(value)) return false;
  return (
    hasAccountBase(value) &&
    typeof value.address === "string" &&
    typeof value.phone === "string" &&
    typeof value.email === "string"
  );
}

export function isUser(value: unknown): value is User {
  if (!isRecord(value)) return false;
  return (
    hasAccountBase(value) &&
    (value.companyId === null || isId(value.companyId)) &&
    typeof value.email === "string" &&
    typeof value.role === "string" &&
    typeof value.department === "string"
  );
}

// =============================================================================
// Transaction guards
// =============================================================================

export function isTransaction(value: unknown): value is Transaction {
  if (!isRecord(value)) return false;
  return (
    isId(value.id) &&
    typeof value.date === "string" &&
    CALENDAR_DATE.test(value.date) &&
    isDecimalString(value.amount) &&
    isEndpoint(value.from) &&
    isEndpoint(value.to) &&
    typeof value.description === "string" &&
    typeof value.reference === "string" &&
    typeof value.createdAt === "string"
  );
}

// =============================================================================
// Event guards
// =============================================================================

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string"
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    value.type.length > 0 &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
