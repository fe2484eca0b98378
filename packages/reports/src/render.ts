/**
 * @tally/reports — Fixed-width text rendering.
 *
 * Layout (80 columns):
 *
 *   ================================================================
 *   CASH FLOW - <date | Month/Year | start to end>
 *   ================================================================
 *
 *   SUMMARY:
 *      Inflows: N transactions - BRL X
 *      Outflows: N transactions - BRL Y
 *      Balance: +BRL Z [OK]            (or "-BRL Z [NEGATIVE]")
 *
 *   INFLOWS (Received):
 *   ID       Payer                Description               Amount       Date
 *   ...
 *
 * Party names are cut to 18 characters and descriptions to 23, counted
 * in code points so an emoji is never split.
 * Trailing spaces are trimmed from every line.
 */

import type { LedgerRecord, PayableRecord, ReceivableRecord } from "@tally/types";
import { isNegative } from "@tally/ledger";
import { cashFlowChartData, cashFlowHeading } from "./chart.js";
import { formatMoney } from "./format.js";
import type { CashFlowReport, CashFlowSide } from "./types.js";

export const TABLE_WIDTH = 80;
export const DAILY_PREVIEW_DAYS = 5;

const COLUMNS = { id: 8, party: 20, description: 25, amount: 12, date: 12 } as const;
const PARTY_MAX = 18;
const DESCRIPTION_MAX = 23;

// ─── Rows ────────────────────────────────────────────────────────────────

function truncate(text: string, max: number): string {
  return Array.from(text).slice(0, max).join("");
}

function pad(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - Array.from(text).length));
}

function row(cells: readonly [string, string, string, string, string]): string {
  const widths = [COLUMNS.id, COLUMNS.party, COLUMNS.description, COLUMNS.amount, COLUMNS.date];
  return cells
    .map((cell, i) => pad(cell, widths[i] ?? 0))
    .join(" ")
    .trimEnd();
}

function recordRow(record: LedgerRecord, party: string): string {
  return row([
    record.id,
    truncate(party, PARTY_MAX),
    truncate(record.description, DESCRIPTION_MAX),
    formatMoney(record.amount),
    record.settlementDate ?? "N/A",
  ]);
}

function sideSection<R extends LedgerRecord>(
  label: string,
  caption: string,
  partyHeader: string,
  side: CashFlowSide<R>,
  partyOf: (record: R) => string,
): string[] {
  if (side.count === 0) {
    return ["", `${label}: No transactions found`];
  }
  return [
    "",
    `${label} (${caption}):`,
    "-".repeat(TABLE_WIDTH),
    row(["ID", partyHeader, "Description", "Amount", "Date"]),
    "-".repeat(TABLE_WIDTH),
    ...side.transactions.map((record) => recordRow(record, partyOf(record))),
  ];
}

// ─── Table ───────────────────────────────────────────────────────────────

export function renderCashFlowTable(report: CashFlowReport): string {
  const balance = isNegative(report.balance)
    ? `${formatMoney(report.balance)} [NEGATIVE]`
    : `+${formatMoney(report.balance)} [OK]`;

  const lines = [
    "=".repeat(TABLE_WIDTH),
    `CASH FLOW - ${cashFlowHeading(report)}`,
    "=".repeat(TABLE_WIDTH),
    "",
    "SUMMARY:",
    `   Inflows: ${String(report.inflows.count)} transactions - ${formatMoney(report.inflows.total)}`,
    `   Outflows: ${String(report.outflows.count)} transactions - ${formatMoney(report.outflows.total)}`,
    `   Balance: ${balance}`,
    ...sideSection<ReceivableRecord>("INFLOWS", "Received", "Payer", report.inflows, (r) => r.payer),
    ...sideSection<PayableRecord>("OUTFLOWS", "Paid", "Supplier", report.outflows, (r) => r.supplier),
    "",
    "=".repeat(TABLE_WIDTH),
  ];

  return lines.join("\n");
}

// ─── Full Report ─────────────────────────────────────────────────────────

/**
 * The table followed by the chart data in text form. Only the first
 * few days of the daily series are listed.
 */
export function renderCashFlowReport(report: CashFlowReport): string {
  const chart = cashFlowChartData(report);
  const lines = [
    renderCashFlowTable(report),
    "",
    "CHART DATA:",
    "-".repeat(40),
    `Title: ${chart.title}`,
    `Total Inflows: ${formatMoney(chart.totals.inflow)}`,
    `Total Outflows: ${formatMoney(chart.totals.outflow)}`,
  ];

  const inflowCategories = Object.entries(chart.inflowCategories);
  if (inflowCategories.length > 0) {
    lines.push("", "Inflow Categories:");
    for (const [category, total] of inflowCategories) {
      lines.push(`  ${category}: ${formatMoney(total)}`);
    }
  }

  const outflowCategories = Object.entries(chart.outflowCategories);
  if (outflowCategories.length > 0) {
    lines.push("", "Outflow Categories:");
    for (const [category, total] of outflowCategories) {
      lines.push(`  ${category}: ${formatMoney(total)}`);
    }
  }

  if (chart.daily.length > 0) {
    lines.push("", `Daily Movement (${String(chart.daily.length)} days):`);
    for (const point of chart.daily.slice(0, DAILY_PREVIEW_DAYS)) {
      lines.push(
        `  ${point.date}: In=${formatMoney(point.inflow)}, Out=${formatMoney(point.outflow)}, Balance=${formatMoney(point.balance)}`,
      );
    }
    if (chart.daily.length > DAILY_PREVIEW_DAYS) {
      lines.push(`  ... and ${String(chart.daily.length - DAILY_PREVIEW_DAYS)} more days`);
    }
  }

  return lines.join("\n") + "\n";
}
