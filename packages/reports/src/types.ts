/**
 * @tally/reports — Core types.
 *
 * Two views over the same records:
 * - Summary: obligations keyed by DUE date (what is owed, when)
 * - Cash flow: realized movement keyed by SETTLEMENT date (what moved, when)
 *
 * Every amount is a Money in the ledger currency; no floats.
 */

import type { Money, PayableRecord, ReceivableRecord } from "@tally/types";

// =============================================================================
// Options
// =============================================================================

/** Currency the report totals are expressed in. Default BRL / 2. */
export interface ReportCurrency {
  readonly currency?: string | undefined;
  readonly decimals?: number | undefined;
}

export interface SummaryOptions extends ReportCurrency {
  /** Inclusive lower bound on due date (YYYY-MM-DD) */
  readonly from?: string | undefined;
  /** Inclusive upper bound on due date (YYYY-MM-DD) */
  readonly to?: string | undefined;
  /** Reference day for overdue classification */
  readonly asOf: string;
  /** Local timestamp stamped on the report */
  readonly generatedAt: string;
}

// =============================================================================
// Period Summary
// =============================================================================

export interface SummaryTotals {
  readonly payable: Money;
  readonly receivable: Money;
  readonly paid: Money;
  readonly received: Money;
  readonly payablePending: Money;
  readonly receivablePending: Money;
  readonly payableOverdue: Money;
  readonly receivableOverdue: Money;
  /** received − paid */
  readonly netBalance: Money;
  /** receivable − payable */
  readonly projectedBalance: Money;
}

export interface RecordCounts {
  readonly total: number;
  readonly pending: number;
  readonly settled: number;
  readonly overdue: number;
}

export interface CategoryBreakdown {
  readonly total: Money;
  readonly settled: Money;
  readonly pending: Money;
}

/** Category code → subtotal, only for categories present in the period. */
export type CategoryBreakdownMap = Readonly<Record<string, CategoryBreakdown>>;

export interface LedgerSummary {
  readonly from: string | null;
  readonly to: string | null;
  readonly asOf: string;
  readonly generatedAt: string;
  readonly totals: SummaryTotals;
  readonly payables: RecordCounts;
  readonly receivables: RecordCounts;
  readonly payableCategories: CategoryBreakdownMap;
  readonly receivableCategories: CategoryBreakdownMap;
  readonly overdue: {
    readonly payables: readonly PayableRecord[];
    readonly receivables: readonly ReceivableRecord[];
  };
}

// =============================================================================
// Cash Flow
// =============================================================================

export interface CashFlowSide<R> {
  readonly transactions: readonly R[];
  readonly total: Money;
  readonly count: number;
}

export interface CategorizedCashFlowSide<R> extends CashFlowSide<R> {
  /** Category code → settled total */
  readonly byCategory: Readonly<Record<string, Money>>;
}

/** One day of settled movement, for charting. */
export interface DailyCashFlowPoint {
  readonly date: string;
  readonly inflow: Money;
  readonly outflow: Money;
  /** inflow − outflow */
  readonly balance: Money;
}

export interface DailyCashFlow {
  readonly kind: "daily";
  readonly date: string;
  readonly inflows: CashFlowSide<ReceivableRecord>;
  readonly outflows: CashFlowSide<PayableRecord>;
  readonly balance: Money;
}

export interface MonthlyCashFlow {
  readonly kind: "monthly";
  readonly year: number;
  readonly month: number;
  readonly monthName: string;
  readonly startDate: string;
  readonly endDate: string;
  readonly inflows: CategorizedCashFlowSide<ReceivableRecord>;
  readonly outflows: CategorizedCashFlowSide<PayableRecord>;
  readonly balance: Money;
  /** Days with movement, in date order */
  readonly daily: readonly DailyCashFlowPoint[];
}

export interface RangeCashFlow {
  readonly kind: "range";
  readonly startDate: string;
  readonly endDate: string;
  readonly inflows: CashFlowSide<ReceivableRecord>;
  readonly outflows: CashFlowSide<PayableRecord>;
  readonly balance: Money;
}

export type CashFlowReport = DailyCashFlow | MonthlyCashFlow | RangeCashFlow;

/** Series for charting a cash-flow report. */
export interface CashFlowChartData {
  readonly title: string;
  readonly totals: {
    readonly inflow: Money;
    readonly outflow: Money;
  };
  /** Empty unless monthly */
  readonly inflowCategories: Readonly<Record<string, Money>>;
  readonly outflowCategories: Readonly<Record<string, Money>>;
  /** Empty unless monthly */
  readonly daily: readonly DailyCashFlowPoint[];
}

// =============================================================================
// Error Types
// =============================================================================

export type ReportErrorCode =
  | "INVALID_DATE"
  | "INVALID_RANGE"
  | "INVALID_PERIOD";

/**
 * Structured error from report generation.
 * Always thrown, never returned as an empty report.
 */
export class ReportError extends Error {
  public readonly code: ReportErrorCode;

  constructor(code: ReportErrorCode, message: string) {
    super(message);
    this.name = "ReportError";
    this.code = code;
  }
}
