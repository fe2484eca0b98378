/**
 * Tests for the Cash-Flow Reconstructor.
 *
 * Cash flow is keyed by settlement date; the summary is keyed by due
 * date. Several cases below pin that distinction.
 */

import { describe, it, expect } from "vitest";
import { dailyCashFlow, monthlyCashFlow, rangeCashFlow } from "../src/cash-flow.js";
import { ReportError } from "../src/types.js";
import type { ReportErrorCode } from "../src/types.js";
import { brl, emptyLedger, sampleLedger } from "./fixtures.js";

function expectCode(fn: () => unknown, code: ReportErrorCode): void {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(ReportError);
    if (err instanceof ReportError) expect(err.code).toBe(code);
    return;
  }
  expect.fail(`expected ReportError ${code}`);
}

const state = sampleLedger().snapshot();

// ─── Daily ───────────────────────────────────────────────────────────────

describe("dailyCashFlow", () => {
  it("lists payments settled on the day as outflows", () => {
    const flow = dailyCashFlow(state, "2024-03-10");

    expect(flow.kind).toBe("daily");
    expect(flow.outflows.transactions.map((r) => r.id)).toEqual(["CP001"]);
    expect(flow.outflows.total).toEqual(brl("1500.00"));
    expect(flow.outflows.count).toBe(1);
    expect(flow.inflows.count).toBe(0);
    expect(flow.inflows.total).toEqual(brl("0.00"));
    expect(flow.balance).toEqual(brl("-1500.00"));
  });

  it("lists receipts settled on the day as inflows", () => {
    const flow = dailyCashFlow(state, "2024-03-09");
    expect(flow.inflows.transactions.map((r) => r.id)).toEqual(["CR001"]);
    expect(flow.balance).toEqual(brl("980.50"));
  });

  it("ignores due dates", () => {
    const flow = dailyCashFlow(state, "2024-03-05");
    expect(flow.outflows.count).toBe(0);
  });

  it("sums cents exactly", () => {
    const ledger = emptyLedger();
    for (const amount of ["0.10", "0.20"]) {
      const record = ledger.registerReceivable({
        payer: "ACME", description: "Tip", category: "other_income",
        amount, dueDate: "2024-03-10", actor: "alice",
      });
      ledger.recordReceipt(record.id, { settlementDate: "2024-03-10", actor: "alice" });
    }

    expect(dailyCashFlow(ledger.snapshot(), "2024-03-10").inflows.total).toEqual(brl("0.30"));
  });

  it("rejects invalid dates", () => {
    expectCode(() => dailyCashFlow(state, "2024-02-30"), "INVALID_DATE");
  });
});

// ─── Monthly ─────────────────────────────────────────────────────────────

describe("monthlyCashFlow", () => {
  const flow = monthlyCashFlow(state, 2024, 3);

  it("bounds the month", () => {
    expect(flow.startDate).toBe("2024-03-01");
    expect(flow.endDate).toBe("2024-03-31");
    expect(flow.monthName).toBe("March");
  });

  it("excludes deactivated records", () => {
    expect(flow.outflows.transactions.map((r) => r.id)).toEqual(["CP001"]);
  });

  it("totals by category", () => {
    expect(flow.inflows.byCategory).toEqual({ service: brl("980.50") });
    expect(flow.outflows.byCategory).toEqual({ rent: brl("1500.00") });
    expect(flow.balance).toEqual(brl("-519.50"));
  });

  it("builds a date-ordered daily series", () => {
    expect(flow.daily).toEqual([
      { date: "2024-03-09", inflow: brl("980.50"), outflow: brl("0.00"), balance: brl("980.50") },
      { date: "2024-03-10", inflow: brl("0.00"), outflow: brl("1500.00"), balance: brl("-1500.00") },
    ]);
  });

  it("bounds leap-year February", () => {
    const february = monthlyCashFlow(state, 2024, 2);
    expect(february.startDate).toBe("2024-02-01");
    expect(february.endDate).toBe("2024-02-29");
    expect(february.inflows.count).toBe(0);
    expect(february.daily).toEqual([]);
  });

  it("bounds December within its year", () => {
    const december = monthlyCashFlow(state, 2023, 12);
    expect(december.startDate).toBe("2023-12-01");
    expect(december.endDate).toBe("2023-12-31");
  });

  it("counts a payable by its settlement month, not its due month", () => {
    const ledger = emptyLedger();
    ledger.registerPayable({
      description: "Late tax", category: "tax", amount: "300.00",
      dueDate: "2024-01-31", actor: "alice",
    });
    ledger.recordPayment("CP001", { settlementDate: "2024-02-29", actor: "alice" });

    expect(monthlyCashFlow(ledger.snapshot(), 2024, 1).outflows.count).toBe(0);
    expect(monthlyCashFlow(ledger.snapshot(), 2024, 2).outflows.total).toEqual(brl("300.00"));
  });

  it("rejects out-of-range periods", () => {
    expectCode(() => monthlyCashFlow(state, 2024, 13), "INVALID_PERIOD");
    expectCode(() => monthlyCashFlow(state, 2024, 0), "INVALID_PERIOD");
    expectCode(() => monthlyCashFlow(state, 0, 1), "INVALID_PERIOD");
    expectCode(() => monthlyCashFlow(state, 2024, 2.5), "INVALID_PERIOD");
  });
});

// ─── Range ───────────────────────────────────────────────────────────────

describe("rangeCashFlow", () => {
  it("includes both bounds", () => {
    const flow = rangeCashFlow(state, "2024-03-09", "2024-03-10");

    expect(flow.kind).toBe("range");
    expect(flow.inflows.count).toBe(1);
    expect(flow.outflows.count).toBe(1);
    expect(flow.balance).toEqual(brl("-519.50"));
  });

  it("accepts a single-day range", () => {
    expect(rangeCashFlow(state, "2024-03-09", "2024-03-09").inflows.total).toEqual(brl("980.50"));
  });

  it("fails when start is after end", () => {
    expectCode(() => rangeCashFlow(state, "2024-03-10", "2024-03-01"), "INVALID_RANGE");
  });

  it("fails on malformed bounds", () => {
    expectCode(() => rangeCashFlow(state, "2024-03-01", "March"), "INVALID_DATE");
  });
});

// ─── Scenario ────────────────────────────────────────────────────────────

describe("scenario: rent paid late", () => {
  it("is overdue, then paid, then shows as the day's outflow", () => {
    const ledger = emptyLedger();
    ledger.registerPayable({
      description: "Rent", category: "rent", amount: "1500.00",
      dueDate: "2024-03-05", actor: "alice",
    });

    expect(ledger.listPayables({ asOf: "2024-03-10" })[0]?.dueStatus).toBe("overdue");

    const paid = ledger.recordPayment("CP001", { settlementDate: "2024-03-10", actor: "alice" });
    expect(paid.status).toBe("paid");

    const flow = dailyCashFlow(ledger.snapshot(), "2024-03-10");
    expect(flow.outflows.transactions.map((r) => r.id)).toEqual(["CP001"]);
    expect(flow.outflows.total).toEqual(brl("1500.00"));
  });
});
