/**
 * @tally/reports — Chart series for cash-flow reports.
 */

import type { CashFlowChartData, CashFlowReport } from "./types.js";

/** Heading shared by the chart title and the rendered table. */
export function cashFlowHeading(report: CashFlowReport): string {
  switch (report.kind) {
    case "daily":
      return report.date;
    case "monthly":
      return `${report.monthName}/${String(report.year)}`;
    case "range":
      return `${report.startDate} to ${report.endDate}`;
  }
}

/**
 * Totals plus, for monthly reports, per-category totals and the
 * day-by-day series.
 */
export function cashFlowChartData(report: CashFlowReport): CashFlowChartData {
  const monthly = report.kind === "monthly" ? report : undefined;

  return {
    title: `Cash Flow - ${cashFlowHeading(report)}`,
    totals: {
      inflow: report.inflows.total,
      outflow: report.outflows.total,
    },
    inflowCategories: monthly?.inflows.byCategory ?? {},
    outflowCategories: monthly?.outflows.byCategory ?? {},
    daily: monthly?.daily ?? [],
  };
}
