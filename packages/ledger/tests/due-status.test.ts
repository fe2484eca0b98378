/**
 * Tests for due-status resolution.
 */

import { describe, it, expect } from "vitest";
import type { PayableRecord, ReceivableRecord } from "@tally/types";
import { deriveDueStatus, resolveDueStatus } from "../src/due-status.js";

const REFERENCE = "2024-03-10";

describe("resolveDueStatus", () => {
  it("is overdue before the reference day", () => {
    expect(resolveDueStatus("2024-03-05", REFERENCE)).toBe("overdue");
    expect(resolveDueStatus("2024-03-09", REFERENCE)).toBe("overdue");
  });

  it("is due today on the reference day", () => {
    expect(resolveDueStatus("2024-03-10", REFERENCE)).toBe("due_today");
  });

  it("is due soon from one to seven days ahead", () => {
    expect(resolveDueStatus("2024-03-11", REFERENCE)).toBe("due_soon");
    expect(resolveDueStatus("2024-03-17", REFERENCE)).toBe("due_soon");
  });

  it("is on time from eight days ahead", () => {
    expect(resolveDueStatus("2024-03-18", REFERENCE)).toBe("on_time");
  });

  it("is invalid for unparseable due dates", () => {
    expect(resolveDueStatus("2024-02-30", REFERENCE)).toBe("invalid_date");
    expect(resolveDueStatus("soon", REFERENCE)).toBe("invalid_date");
  });

  it("is invalid for an unparseable reference day", () => {
    expect(resolveDueStatus("2024-03-10", "today")).toBe("invalid_date");
  });
});

describe("deriveDueStatus", () => {
  const payable: PayableRecord = {
    id: "CP001",
    kind: "payable",
    description: "Rent",
    category: "rent",
    amount: { amount: "1500.00", currency: "BRL", decimals: 2 },
    dueDate: "2024-03-05",
    status: "pending",
    dueStatus: "on_time",
    supplier: "",
    notes: "",
    createdAt: "2024-03-01 09:00:00",
    createdBy: "alice",
    settlementDate: null,
    settledBy: null,
    active: true,
  };

  it("resolves pending records from the due date", () => {
    expect(deriveDueStatus(payable, REFERENCE)).toBe("overdue");
  });

  it("pins paid payables", () => {
    expect(deriveDueStatus({ ...payable, status: "paid" }, REFERENCE)).toBe("paid");
  });

  it("pins received receivables", () => {
    const receivable: ReceivableRecord = {
      ...payable,
      id: "CR001",
      kind: "receivable",
      status: "received",
      payer: "ACME",
    };
    expect(deriveDueStatus(receivable, REFERENCE)).toBe("received");
  });
});
