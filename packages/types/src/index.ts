/**
 * @ledgerbook/types — Shared domain types for the Ledgerbook stack.
 *
 * - Accounts (companies, users)
 * - Transaction endpoints, including the virtual cash pool
 * - Transactions and statement lines
 * - Journal events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Account types
export type {
  AccountKind,
  AccountBase,
  Company,
  User,
  Account,
} from "./account.js";

// Endpoint types
export type {
  CompanyEndpoint,
  UserEndpoint,
  CashEndpoint,
  AccountEndpoint,
  Endpoint,
  EndpointKind,
} from "./endpoint.js";

// Transaction types
export type {
  Transaction,
  EntryDirection,
  LedgerLine,
  AccountStatement,
} from "./transaction.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isId,
  isDecimalString,
  isAccountEndpoint,
  isEndpoint,
  isCompany,
  isUser,
  isTransaction,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
