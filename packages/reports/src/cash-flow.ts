/**
 * @tally/reports — Cash-Flow Reconstructor.
 *
 * Realized movement, keyed by SETTLEMENT date. Due dates play no part
 * here: a payable due in January but paid in March is March outflow.
 *
 * Only active, settled records count:
 * - inflows: receivables with status "received"
 * - outflows: payables with status "paid"
 */

import type { LedgerRecord, Money, PayableRecord, ReceivableRecord } from "@tally/types";
import type { LedgerState } from "@tally/store";
import {
  MAX_YEAR,
  MIN_YEAR,
  addMoney,
  isValidDate,
  monthBounds,
  subtractMoney,
  sumMoney,
  zeroMoney,
} from "@tally/ledger";
import type {
  CashFlowSide,
  CategorizedCashFlowSide,
  DailyCashFlow,
  DailyCashFlowPoint,
  MonthlyCashFlow,
  RangeCashFlow,
  ReportCurrency,
} from "./types.js";
import { ReportError } from "./types.js";
import { requireDate, requireRange, resolveCurrency } from "./validate.js";
import type { ResolvedCurrency } from "./validate.js";

export const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
] as const;

// =============================================================================
// Selection
// =============================================================================

type DateMatch = (settlementDate: string) => boolean;

/** Settlement dates that do not parse are skipped. */
function settledWithin(record: LedgerRecord, match: DateMatch): boolean {
  return (
    record.active &&
    record.settlementDate !== null &&
    isValidDate(record.settlementDate) &&
    match(record.settlementDate)
  );
}

function settledInflows(state: LedgerState, match: DateMatch): ReceivableRecord[] {
  return state.receivables.filter(
    (r) => r.status === "received" && settledWithin(r, match),
  );
}

function settledOutflows(state: LedgerState, match: DateMatch): PayableRecord[] {
  return state.payables.filter(
    (r) => r.status === "paid" && settledWithin(r, match),
  );
}

function sideOf<R extends LedgerRecord>(records: readonly R[], money: ResolvedCurrency): CashFlowSide<R> {
  return {
    transactions: records,
    total: sumMoney(records.map((r) => r.amount), money.currency, money.decimals),
    count: records.length,
  };
}

function categorizedSideOf<R extends LedgerRecord>(
  records: readonly R[],
  money: ResolvedCurrency,
): CategorizedCashFlowSide<R> {
  const byCategory: Record<string, Money> = {};
  for (const record of records) {
    const current = byCategory[record.category] ?? zeroMoney(money.currency, money.decimals);
    byCategory[record.category] = addMoney(current, record.amount);
  }
  return { ...sideOf(records, money), byCategory };
}

/**
 * Group settled movement by settlement date, in date order.
 */
function dailySeries(
  inflows: readonly ReceivableRecord[],
  outflows: readonly PayableRecord[],
  money: ResolvedCurrency,
): DailyCashFlowPoint[] {
  const zero = zeroMoney(money.currency, money.decimals);
  const days = new Map<string, { inflow: Money; outflow: Money }>();

  for (const record of inflows) {
    if (record.settlementDate === null) continue;
    const day = days.get(record.settlementDate) ?? { inflow: zero, outflow: zero };
    days.set(record.settlementDate, { ...day, inflow: addMoney(day.inflow, record.amount) });
  }
  for (const record of outflows) {
    if (record.settlementDate === null) continue;
    const day = days.get(record.settlementDate) ?? { inflow: zero, outflow: zero };
    days.set(record.settlementDate, { ...day, outflow: addMoney(day.outflow, record.amount) });
  }

  return [...days.keys()].sort().map((date) => {
    const day = days.get(date) ?? { inflow: zero, outflow: zero };
    return {
      date,
      inflow: day.inflow,
      outflow: day.outflow,
      balance: subtractMoney(day.inflow, day.outflow),
    };
  });
}

// =============================================================================
// Reports
// =============================================================================

/**
 * Movement settled on a single day.
 */
export function dailyCashFlow(state: LedgerState, date: string, options?: ReportCurrency): DailyCashFlow {
  requireDate(date, "date");
  const money = resolveCurrency(options);

  const inflows = sideOf(settledInflows(state, (d) => d === date), money);
  const outflows = sideOf(settledOutflows(state, (d) => d === date), money);

  return {
    kind: "daily",
    date,
    inflows,
    outflows,
    balance: subtractMoney(inflows.total, outflows.total),
  };
}

/**
 * Movement settled within a calendar month, with per-category totals
 * and a day-by-day series.
 *
 * Throws ReportError INVALID_PERIOD for a year outside 1..9999 or a
 * month outside 1..12.
 */
export function monthlyCashFlow(
  state: LedgerState,
  year: number,
  month: number,
  options?: ReportCurrency,
): MonthlyCashFlow {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new ReportError("INVALID_PERIOD", `Year out of range: ${String(year)}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ReportError("INVALID_PERIOD", `Month out of range: ${String(month)}`);
  }
  const money = resolveCurrency(options);
  const { startDate, endDate } = monthBounds(year, month);
  const within: DateMatch = (d) => d >= startDate && d <= endDate;

  const inflowRecords = settledInflows(state, within);
  const outflowRecords = settledOutflows(state, within);
  const inflows = categorizedSideOf(inflowRecords, money);
  const outflows = categorizedSideOf(outflowRecords, money);

  return {
    kind: "monthly",
    year,
    month,
    monthName: MONTH_NAMES[month - 1] ?? String(month),
    startDate,
    endDate,
    inflows,
    outflows,
    balance: subtractMoney(inflows.total, outflows.total),
    daily: dailySeries(inflowRecords, outflowRecords, money),
  };
}

/**
 * Movement settled between two days, both inclusive.
 *
 * Throws ReportError INVALID_RANGE when `from` is after `to`.
 */
export function rangeCashFlow(
  state: LedgerState,
  from: string,
  to: string,
  options?: ReportCurrency,
): RangeCashFlow {
  requireRange(from, to);
  const money = resolveCurrency(options);
  const within: DateMatch = (d) => d >= from && d <= to;

  const inflows = sideOf(settledInflows(state, within), money);
  const outflows = sideOf(settledOutflows(state, within), money);

  return {
    kind: "range",
    startDate: from,
    endDate: to,
    inflows,
    outflows,
    balance: subtractMoney(inflows.total, outflows.total),
  };
}
