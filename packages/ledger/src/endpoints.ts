/**
 * @ledgerbook/ledger — Endpoint helpers.
 *
 * Endpoints are written as "company:<id>", "user:<id>" or "cash" at the
 * edges (command line, log lines, map keys).
 */

import type {
  AccountEndpoint,
  CashEndpoint,
  CompanyEndpoint,
  Endpoint,
  UserEndpoint,
} from "@ledgerbook/types";
import { isId } from "@ledgerbook/types";
import { ValidationError } from "./errors.js";

export const CASH: CashEndpoint = { kind: "cash" };

export function companyEndpoint(id: number): CompanyEndpoint {
  return { kind: "company", id };
}

export function userEndpoint(id: number): UserEndpoint {
  return { kind: "user", id };
}

/**
 * Endpoint equality. The cash pool is compared by kind only.
 */
export function sameEndpoint(a: Endpoint, b: Endpoint): boolean {
  switch (a.kind) {
    case "cash":
      return b.kind === "cash";
    case "company":
    case "user":
      return b.kind === a.kind && b.id === a.id;
  }
}

/** Stable string form, also used as a map key. */
export function endpointKey(endpoint: Endpoint): string {
  switch (endpoint.kind) {
    case "cash":
      return "cash";
    case "company":
    case "user":
      return `${endpoint.kind}:${String(endpoint.id)}`;
  }
}

/**
 * Parse "company:3", "user:12" or "cash".
 */
export function parseEndpoint(text: string, field = "endpoint"): Endpoint {
  const trimmed = text.trim().toLowerCase();
  if (trimmed === "cash") {
    return CASH;
  }

  const match = /^(company|user):(\d+)$/.exec(trimmed);
  const id = match?.[2] !== undefined ? Number(match[2]) : NaN;
  if (match === null || !isId(id)) {
    throw new ValidationError(
      field,
      `Invalid ${field} "${text}". Expected company:<id>, user:<id> or cash`,
    );
  }

  return match[1] === "company" ? companyEndpoint(id) : userEndpoint(id);
}

/**
 * Parse an endpoint that must name a stored account.
 */
export function parseAccountEndpoint(text: string, field = "account"): AccountEndpoint {
  const endpoint = parseEndpoint(text, field);
  if (endpoint.kind === "cash") {
    throw new ValidationError(field, `The cash pool is not an account; expected company:<id> or user:<id>`);
  }
  return endpoint;
}
