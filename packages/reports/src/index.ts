/**
 * @tally/reports — Summaries and cash flow over a Tally ledger.
 *
 * Pure functions over a LedgerState snapshot:
 * - summarize(): obligations by due date, per category, with overdue sets
 * - dailyCashFlow() / monthlyCashFlow() / rangeCashFlow(): realized
 *   movement by settlement date
 * - cashFlowChartData() / renderCashFlowTable() / renderCashFlowReport():
 *   presentation of a cash-flow result
 */

export { summarize } from "./summary.js";

export {
  dailyCashFlow,
  monthlyCashFlow,
  rangeCashFlow,
  MONTH_NAMES,
} from "./cash-flow.js";

export { cashFlowChartData, cashFlowHeading } from "./chart.js";
export { renderCashFlowTable, renderCashFlowReport, TABLE_WIDTH, DAILY_PREVIEW_DAYS } from "./render.js";
export { formatMoney } from "./format.js";

export type {
  ReportCurrency,
  SummaryOptions,
  SummaryTotals,
  RecordCounts,
  CategoryBreakdown,
  CategoryBreakdownMap,
  LedgerSummary,
  CashFlowSide,
  CategorizedCashFlowSide,
  DailyCashFlowPoint,
  DailyCashFlow,
  MonthlyCashFlow,
  RangeCashFlow,
  CashFlowReport,
  CashFlowChartData,
  ReportErrorCode,
} from "./types.js";

export { ReportError } from "./types.js";
