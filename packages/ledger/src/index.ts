/**
 * @tally/ledger — Accounts payable and receivable.
 *
 * Tracks what the business owes and is owed, from registration
 * through settlement:
 * - Sequential per-kind ids (CP001, CR001), never reused
 * - Due status derived from the due date on every read
 * - Settlement happens once and is recorded with date and actor
 * - Soft deletion keeps records for audit
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All types are readonly; records are replaced, never mutated
 * - Fail-closed: invalid input throws LedgerError before any change
 * - Storage is injected (LedgerStore), the clock too
 */

// Core engine
export {
  Ledger,
  nextRecordId,
  DEFAULT_CURRENCY,
  DEFAULT_DECIMALS,
  PAYABLE_ID_PREFIX,
  RECEIVABLE_ID_PREFIX,
} from "./ledger.js";

// Due status
export { resolveDueStatus, deriveDueStatus, DUE_SOON_DAYS } from "./due-status.js";

// Calendar
export {
  parseDate,
  isValidDate,
  isLeapYear,
  daysInMonth,
  daysBetween,
  monthBounds,
  formatDate,
  formatTimestamp,
  todayIn,
  systemClock,
  MIN_YEAR,
  MAX_YEAR,
} from "./calendar.js";
export type { CalendarDay, MonthBounds } from "./calendar.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  validateMoney,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  sumMoney,
  toMoney,
  isPositive,
  isNegative,
  zeroMoney,
} from "./money-math.js";

// Types
export type {
  Clock,
  LedgerOptions,
  RegisterPayableInput,
  RegisterReceivableInput,
  SettleOptions,
  PayableFilter,
  ReceivableFilter,
  SearchResult,
  RefreshResult,
  DueAlerts,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
