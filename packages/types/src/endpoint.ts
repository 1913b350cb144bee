/**
 * Endpoint Types
 *
 * One side of a transaction: a stored account, or the virtual cash pool
 * that money enters from (deposits) and leaves to (withdrawals).
 *
 * There is exactly one cash pool, so the cash variant carries no id.
 */

export interface CompanyEndpoint {
  readonly kind: "company";
  readonly id: number;
}

export interface UserEndpoint {
  readonly kind: "user";
  readonly id: number;
}

export interface CashEndpoint {
  readonly kind: "cash";
}

/** An endpoint backed by a stored account. */
export type AccountEndpoint = CompanyEndpoint | UserEndpoint;

/** Either side of a transaction. */
export type Endpoint = AccountEndpoint | CashEndpoint;

/** Discriminant values of {@link Endpoint}. */
export type EndpointKind = Endpoint["kind"];
