/**
 * @tally/types — Shared domain types for the Tally back office.
 *
 * These types are used across all Tally packages:
 * - Financial primitives (Money)
 * - Payable / receivable records and their statuses
 * - Category taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Statuses are closed unions, checked by guards at the boundary
 */

// Financial types
export type { Money, Currency } from "./financial.js";

// Record types
export type {
  RecordKind,
  PayableStatus,
  ReceivableStatus,
  SettlementStatus,
  DateDueStatus,
  DueStatus,
  PayableRecord,
  ReceivableRecord,
  LedgerRecord,
} from "./record.js";

// Category types
export type {
  CategoryType,
  Category,
  CategoryMap,
  CategoryTaxonomy,
} from "./category.js";

// Runtime type guards
export {
  isMoney,
  isPositiveMoney,
  isRecordKind,
  isPayableStatus,
  isReceivableStatus,
  isDateDueStatus,
  isDueStatus,
  isPayableRecord,
  isReceivableRecord,
  isCategoryType,
  isCategory,
  isCategoryMap,
  isCategoryTaxonomy,
} from "./guards.js";
