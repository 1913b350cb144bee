/**
 * @ledgerbook/ledger — Single-user bookkeeping engine.
 *
 * Companies and users each carry one running balance. Transactions move
 * a positive amount between two endpoints, one of which may be the cash
 * pool (deposits and withdrawals).
 *
 * Design rules:
 * - All types are readonly
 * - All monetary arithmetic uses bigint minor units (no floating point)
 * - Fail-closed: invalid requests throw before anything is mutated
 * - Every mutation is journaled before it is applied
 * - Zero runtime dependencies, no I/O
 */

// Facade
export { Book } from "./book.js";
export type { BookOptions, NewCompany, NewUser, UserFilter } from "./book.js";

// Components
export { AccountStore } from "./accounts.js";
export { TransactionLog, compareChronological, sortChronological, touches } from "./transaction-log.js";
export type { SortOrder } from "./transaction-log.js";
export {
  BalanceMaintainer,
  DEPOSIT_DESCRIPTION,
  DEPOSIT_REFERENCE,
  WITHDRAWAL_DESCRIPTION,
  WITHDRAWAL_REFERENCE,
} from "./balance-maintainer.js";
export type { CreateTransactionInput, TransactionReceipt } from "./balance-maintainer.js";
export {
  LedgerDeriver,
  deriveLedger,
  replayBalance,
  CASH_DEPOSIT_LABEL,
  CASH_WITHDRAWAL_LABEL,
} from "./ledger-deriver.js";
export type { NameResolver } from "./ledger-deriver.js";

// Reports & verification
export {
  computeTotals,
  rankByBalance,
  summarizeTransactions,
  describeTransfer,
  searchTransactions,
  listTransactions,
} from "./reports.js";
export type { BalanceTotals, TransactionSummary, ListOptions } from "./reports.js";
export { verifyBalances } from "./consistency.js";
export type { ConsistencyReport } from "./consistency.js";

// Events & snapshots
export { NO_JOURNAL, encodeEvent, decodeEvent } from "./events.js";
export type {
  BookEvent,
  BookEventType,
  CompanyChanges,
  EncodedEvent,
  Journal,
  UserChanges,
} from "./events.js";
export { isBookSnapshot } from "./snapshot.js";
export type { BookSnapshot, BookSequences } from "./snapshot.js";

// Endpoints, dates, money
export {
  CASH,
  companyEndpoint,
  userEndpoint,
  sameEndpoint,
  endpointKey,
  parseEndpoint,
  parseAccountEndpoint,
} from "./endpoints.js";
export { systemClock, isCalendarDate, assertCalendarDate, localDate } from "./calendar.js";
export type { Clock } from "./calendar.js";
export {
  DECIMALS,
  ZERO,
  parseAmount,
  parseAmountInput,
  formatAmount,
  compareAmounts,
  divideAmount,
} from "./money-math.js";
export {
  MAX_NAME_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  MAX_REFERENCE_LENGTH,
  requireName,
  optionalText,
  optionalEmail,
  optionalPhone,
} from "./validation.js";

// Errors
export {
  LedgerError,
  ValidationError,
  NotFoundError,
  InsufficientBalanceError,
  ConflictError,
  ConsistencyError,
} from "./errors.js";
export type {
  LedgerErrorCode,
  ResourceKind,
  ConflictReason,
  BalanceDiscrepancy,
} from "./errors.js";
