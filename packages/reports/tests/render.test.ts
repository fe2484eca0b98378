/**
 * Tests for chart data, text tables and money formatting.
 */

import { describe, it, expect } from "vitest";
import { cashFlowChartData } from "../src/chart.js";
import { dailyCashFlow, monthlyCashFlow, rangeCashFlow } from "../src/cash-flow.js";
import { formatMoney } from "../src/format.js";
import { renderCashFlowReport, renderCashFlowTable } from "../src/render.js";
import { brl, emptyLedger, sampleLedger } from "./fixtures.js";

const RULE = "=".repeat(80);
const DASH = "-".repeat(80);
const state = sampleLedger().snapshot();

// ─── formatMoney ─────────────────────────────────────────────────────────

describe("formatMoney", () => {
  it("groups thousands", () => {
    expect(formatMoney(brl("1500.00"))).toBe("BRL 1,500.00");
    expect(formatMoney(brl("1234567.89"))).toBe("BRL 1,234,567.89");
  });

  it("leaves small amounts ungrouped", () => {
    expect(formatMoney(brl("980.50"))).toBe("BRL 980.50");
    expect(formatMoney(brl("0.00"))).toBe("BRL 0.00");
  });

  it("puts the sign before the currency", () => {
    expect(formatMoney(brl("-20.00"))).toBe("-BRL 20.00");
  });

  it("pads to the currency scale", () => {
    expect(formatMoney(brl("7.5"))).toBe("BRL 7.50");
  });

  it("formats zero-decimal currencies", () => {
    expect(formatMoney({ amount: "12000", currency: "JPY", decimals: 0 })).toBe("JPY 12,000");
  });
});

// ─── Chart Data ──────────────────────────────────────────────────────────

describe("cashFlowChartData", () => {
  it("titles each report kind", () => {
    expect(cashFlowChartData(dailyCashFlow(state, "2024-03-10")).title).toBe("Cash Flow - 2024-03-10");
    expect(cashFlowChartData(monthlyCashFlow(state, 2024, 3)).title).toBe("Cash Flow - March/2024");
    expect(cashFlowChartData(rangeCashFlow(state, "2024-03-01", "2024-03-31")).title).toBe(
      "Cash Flow - 2024-03-01 to 2024-03-31",
    );
  });

  it("carries categories and the daily series only for monthly reports", () => {
    const monthly = cashFlowChartData(monthlyCashFlow(state, 2024, 3));
    expect(monthly.totals).toEqual({ inflow: brl("980.50"), outflow: brl("1500.00") });
    expect(monthly.outflowCategories).toEqual({ rent: brl("1500.00") });
    expect(monthly.daily).toHaveLength(2);

    const daily = cashFlowChartData(dailyCashFlow(state, "2024-03-10"));
    expect(daily.inflowCategories).toEqual({});
    expect(daily.daily).toEqual([]);
  });
});

// ─── Table ───────────────────────────────────────────────────────────────

describe("renderCashFlowTable", () => {
  it("renders a daily report line by line", () => {
    const lines = renderCashFlowTable(dailyCashFlow(state, "2024-03-10")).split("\n");

    expect(lines).toEqual([
      RULE,
      "CASH FLOW - 2024-03-10",
      RULE,
      "",
      "SUMMARY:",
      "   Inflows: 0 transactions - BRL 0.00",
      "   Outflows: 1 transactions - BRL 1,500.00",
      "   Balance: -BRL 1,500.00 [NEGATIVE]",
      "",
      "INFLOWS: No transactions found",
      "",
      "OUTFLOWS (Paid):",
      DASH,
      "ID       Supplier             Description               Amount       Date",
      DASH,
      "CP001    Landlord Ltd         Rent                      BRL 1,500.00 2024-03-10",
      "",
      RULE,
    ]);
  });

  it("marks a non-negative balance", () => {
    const table = renderCashFlowTable(dailyCashFlow(state, "2024-03-09"));
    expect(table.split("\n")).toContain("   Balance: +BRL 980.50 [OK]");
    expect(table.split("\n")).toContain("CR001    ACME Corp            Consulting invoice        BRL 980.50   2024-03-09");
    expect(table.split("\n")).toContain("ID       Payer                Description               Amount       Date");
  });

  it("treats a zero balance as OK", () => {
    const table = renderCashFlowTable(dailyCashFlow(state, "2024-01-01"));
    expect(table.split("\n")).toContain("   Balance: +BRL 0.00 [OK]");
    expect(table.split("\n")).toContain("OUTFLOWS: No transactions found");
  });

  it("truncates long party names and descriptions", () => {
    const ledger = emptyLedger();
    ledger.registerPayable({
      description: "Quarterly maintenance of the HVAC system",
      category: "maintenance",
      amount: "1500.00",
      dueDate: "2024-03-10",
      supplier: "Very Long Supplier Name Inc",
      actor: "alice",
    });
    ledger.recordPayment("CP001", { actor: "alice" });

    const table = renderCashFlowTable(dailyCashFlow(ledger.snapshot(), "2024-03-10"));
    expect(table.split("\n")).toContain(
      "CP001    Very Long Supplier   Quarterly maintenance o   BRL 1,500.00 2024-03-10",
    );
  });

  it("cuts names by code point without splitting an emoji", () => {
    const ledger = emptyLedger();
    ledger.registerPayable({
      description: "Seeds",
      category: "maintenance",
      amount: "1500.00",
      dueDate: "2024-03-10",
      supplier: `Bean Co ${"\u{1F331}".repeat(13)}`,
      actor: "alice",
    });
    ledger.recordPayment("CP001", { actor: "alice" });

    const table = renderCashFlowTable(dailyCashFlow(ledger.snapshot(), "2024-03-10"));
    expect(table.split("\n")).toContain(
      `CP001    Bean Co ${"\u{1F331}".repeat(10)}   Seeds${" ".repeat(21)}BRL 1,500.00 2024-03-10`,
    );
  });

  it("heads monthly and range reports", () => {
    expect(renderCashFlowTable(monthlyCashFlow(state, 2024, 3)).split("\n")[1]).toBe("CASH FLOW - March/2024");
    expect(renderCashFlowTable(rangeCashFlow(state, "2024-03-01", "2024-03-09")).split("\n")[1]).toBe(
      "CASH FLOW - 2024-03-01 to 2024-03-09",
    );
  });
});

// ─── Full Report ─────────────────────────────────────────────────────────

describe("renderCashFlowReport", () => {
  it("appends the chart data section", () => {
    const report = renderCashFlowReport(monthlyCashFlow(state, 2024, 3));
    const chartSection = report.slice(report.indexOf("CHART DATA:")).split("\n");

    expect(chartSection).toEqual([
      "CHART DATA:",
      "-".repeat(40),
      "Title: Cash Flow - March/2024",
      "Total Inflows: BRL 980.50",
      "Total Outflows: BRL 1,500.00",
      "",
      "Inflow Categories:",
      "  service: BRL 980.50",
      "",
      "Outflow Categories:",
      "  rent: BRL 1,500.00",
      "",
      "Daily Movement (2 days):",
      "  2024-03-09: In=BRL 980.50, Out=BRL 0.00, Balance=BRL 980.50",
      "  2024-03-10: In=BRL 0.00, Out=BRL 1,500.00, Balance=-BRL 1,500.00",
      "",
    ]);
  });

  it("previews only the first five days", () => {
    const ledger = emptyLedger();
    for (let day = 1; day <= 7; day++) {
      const date = `2024-03-0${String(day)}`;
      const record = ledger.registerReceivable({
        payer: "ACME", description: "Daily sale", category: "sale",
        amount: "10.00", dueDate: date, actor: "alice",
      });
      ledger.recordReceipt(record.id, { settlementDate: date, actor: "alice" });
    }

    const lines = renderCashFlowReport(monthlyCashFlow(ledger.snapshot(), 2024, 3)).split("\n");

    expect(lines).toContain("Daily Movement (7 days):");
    expect(lines).toContain("  2024-03-05: In=BRL 10.00, Out=BRL 0.00, Balance=BRL 10.00");
    expect(lines).not.toContain("  2024-03-06: In=BRL 10.00, Out=BRL 0.00, Balance=BRL 10.00");
    expect(lines).toContain("  ... and 2 more days");
  });

  it("omits categories and series for daily reports", () => {
    const report = renderCashFlowReport(dailyCashFlow(state, "2024-03-10"));
    expect(report.endsWith("Total Outflows: BRL 1,500.00\n")).toBe(true);
  });
});
