/**
 * @tally/reports — Period Aggregator.
 *
 * Summarises active records whose DUE date falls in an optional,
 * inclusive [from, to] window. Overdue status is resolved freshly
 * against `asOf`, never read from the stored cache.
 *
 * Design:
 * - Pure function over a ledger snapshot, no I/O
 * - bigint accumulation via money-math: category subtotals always
 *   add up to the grand totals
 */

import type {
  LedgerRecord,
  Money,
  PayableRecord,
  ReceivableRecord,
} from "@tally/types";
import type { LedgerState } from "@tally/store";
import { resolveDueStatus, subtractMoney, sumMoney } from "@tally/ledger";
import type {
  CategoryBreakdown,
  CategoryBreakdownMap,
  LedgerSummary,
  RecordCounts,
  SummaryOptions,
} from "./types.js";
import { requireDate, requireRange, resolveCurrency } from "./validate.js";
import type { ResolvedCurrency } from "./validate.js";

// =============================================================================
// Helpers
// =============================================================================

function isSettled(record: LedgerRecord): boolean {
  return record.status !== "pending";
}

function inWindow(record: LedgerRecord, from: string | undefined, to: string | undefined): boolean {
  if (!record.active) return false;
  if (from !== undefined && record.dueDate < from) return false;
  if (to !== undefined && record.dueDate > to) return false;
  return true;
}

function total(records: readonly LedgerRecord[], money: ResolvedCurrency): Money {
  return sumMoney(records.map((r) => r.amount), money.currency, money.decimals);
}

function countsOf(records: readonly LedgerRecord[], overdue: readonly LedgerRecord[]): RecordCounts {
  const settled = records.filter(isSettled).length;
  return {
    total: records.length,
    pending: records.length - settled,
    settled,
    overdue: overdue.length,
  };
}

/**
 * Per-category subtotals, in order of first appearance.
 */
function breakdown(records: readonly LedgerRecord[], money: ResolvedCurrency): CategoryBreakdownMap {
  const groups = new Map<string, LedgerRecord[]>();
  for (const record of records) {
    const group = groups.get(record.category);
    if (group === undefined) {
      groups.set(record.category, [record]);
    } else {
      group.push(record);
    }
  }

  const result: Record<string, CategoryBreakdown> = {};
  for (const [category, group] of groups) {
    result[category] = {
      total: total(group, money),
      settled: total(group.filter(isSettled), money),
      pending: total(group.filter((r) => !isSettled(r)), money),
    };
  }
  return result;
}

function overdueOf<T extends LedgerRecord>(records: readonly T[], asOf: string): T[] {
  return records
    .filter((r) => !isSettled(r) && resolveDueStatus(r.dueDate, asOf) === "overdue")
    .map((r) => ({ ...r, dueStatus: "overdue" }));
}

// =============================================================================
// Summary
// =============================================================================

/**
 * Build the period summary.
 *
 * Throws ReportError INVALID_DATE for a malformed bound or reference day,
 * INVALID_RANGE when `from` is after `to`.
 */
export function summarize(state: LedgerState, options: SummaryOptions): LedgerSummary {
  const { from, to } = options;
  if (from !== undefined && to !== undefined) {
    requireRange(from, to);
  } else if (from !== undefined) {
    requireDate(from, "start date");
  } else if (to !== undefined) {
    requireDate(to, "end date");
  }
  const asOf = requireDate(options.asOf, "reference date");
  const money = resolveCurrency(options);

  const payables: readonly PayableRecord[] = state.payables.filter((r) => inWindow(r, from, to));
  const receivables: readonly ReceivableRecord[] = state.receivables.filter((r) => inWindow(r, from, to));

  const overduePayables = overdueOf(payables, asOf);
  const overdueReceivables = overdueOf(receivables, asOf);

  const payable = total(payables, money);
  const receivable = total(receivables, money);
  const paid = total(payables.filter(isSettled), money);
  const received = total(receivables.filter(isSettled), money);

  return {
    from: from ?? null,
    to: to ?? null,
    asOf,
    generatedAt: options.generatedAt,
    totals: {
      payable,
      receivable,
      paid,
      received,
      payablePending: subtractMoney(payable, paid),
      receivablePending: subtractMoney(receivable, received),
      payableOverdue: total(overduePayables, money),
      receivableOverdue: total(overdueReceivables, money),
      netBalance: subtractMoney(received, paid),
      projectedBalance: subtractMoney(receivable, payable),
    },
    payables: countsOf(payables, overduePayables),
    receivables: countsOf(receivables, overdueReceivables),
    payableCategories: breakdown(payables, money),
    receivableCategories: breakdown(receivables, money),
    overdue: {
      payables: overduePayables,
      receivables: overdueReceivables,
    },
  };
}
