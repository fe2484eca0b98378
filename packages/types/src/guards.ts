/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tally domain types.
 * These enable safe runtime validation at system boundaries
 * (persisted files, API inputs).
 */

import type { Money } from "./financial.js";
import type {
  DateDueStatus,
  DueStatus,
  PayableRecord,
  PayableStatus,
  ReceivableRecord,
  ReceivableStatus,
  RecordKind,
} from "./record.js";
import type { Category, CategoryMap, CategoryTaxonomy, CategoryType } from "./category.js";

// =============================================================================
// Financial guards
// =============================================================================

const DECIMAL_AMOUNT = /^-?\d+(\.\d+)?$/;

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.amount === "string" &&
    DECIMAL_AMOUNT.test(v.amount) &&
    typeof v.currency === "string" &&
    v.currency.length > 0 &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0
  );
}

/**
 * A Money whose amount is greater than zero and fits its scale.
 * Every stored record amount must be one.
 */
export function isPositiveMoney(value: unknown): value is Money {
  if (!isMoney(value)) return false;
  const fraction = value.amount.split(".")[1] ?? "";
  return (
    !value.amount.startsWith("-") &&
    fraction.length <= value.decimals &&
    /[1-9]/.test(value.amount)
  );
}

// =============================================================================
// Status guards
// =============================================================================

const RECORD_KINDS = new Set<string>(["payable", "receivable"]);
const PAYABLE_STATUSES = new Set<string>(["pending", "paid"]);
const RECEIVABLE_STATUSES = new Set<string>(["pending", "received"]);
const DATE_DUE_STATUSES = new Set<string>([
  "overdue", "due_today", "due_soon", "on_time", "invalid_date",
]);
const CATEGORY_TYPES = new Set<string>(["fixed", "variable"]);

export function isRecordKind(value: unknown): value is RecordKind {
  return typeof value === "string" && RECORD_KINDS.has(value);
}

export function isPayableStatus(value: unknown): value is PayableStatus {
  return typeof value === "string" && PAYABLE_STATUSES.has(value);
}

export function isReceivableStatus(value: unknown): value is ReceivableStatus {
  return typeof value === "string" && RECEIVABLE_STATUSES.has(value);
}

export function isDateDueStatus(value: unknown): value is DateDueStatus {
  return typeof value === "string" && DATE_DUE_STATUSES.has(value);
}

export function isDueStatus(value: unknown): value is DueStatus {
  return isDateDueStatus(value) || value === "paid" || value === "received";
}

// =============================================================================
// Record guards
// =============================================================================

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === "string";
}

function hasRecordBase(v: Record<string, unknown>): boolean {
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.description === "string" &&
    typeof v.category === "string" &&
    isPositiveMoney(v.amount) &&
    typeof v.dueDate === "string" &&
    isDueStatus(v.dueStatus) &&
    typeof v.notes === "string" &&
    typeof v.createdAt === "string" &&
    typeof v.createdBy === "string" &&
    isNullableString(v.settlementDate) &&
    isNullableString(v.settledBy) &&
    typeof v.active === "boolean" &&
    isOptionalString(v.deactivatedAt) &&
    isOptionalString(v.deactivatedBy)
  );
}

export function isPayableRecord(value: unknown): value is PayableRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    v.kind === "payable" &&
    hasRecordBase(v) &&
    isPayableStatus(v.status) &&
    typeof v.supplier === "string"
  );
}

export function isReceivableRecord(value: unknown): value is ReceivableRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    v.kind === "receivable" &&
    hasRecordBase(v) &&
    isReceivableStatus(v.status) &&
    typeof v.payer === "string"
  );
}

// =============================================================================
// Category guards
// =============================================================================

export function isCategoryType(value: unknown): value is CategoryType {
  return typeof value === "string" && CATEGORY_TYPES.has(value);
}

export function isCategory(value: unknown): value is Category {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.name === "string" &&
    v.name.length > 0 &&
    isCategoryType(v.type) &&
    typeof v.tag === "string"
  );
}

export function isCategoryMap(value: unknown): value is CategoryMap {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.values(value).every(isCategory);
}

export function isCategoryTaxonomy(value: unknown): value is CategoryTaxonomy {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isCategoryMap(v.contas_pagar) && isCategoryMap(v.contas_receber);
}
