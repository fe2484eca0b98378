/**
 * Ledger Record Types
 *
 * Payables (amounts owed to a third party) and receivables (amounts owed
 * by a third party), tracked from registration through settlement.
 *
 * Rules:
 * - Records are replaced, never mutated in place
 * - Settlement happens once: pending → paid | received
 * - Soft deletion flips `active`; the record stays in storage for audit
 */

import type { Money } from "./financial.js";

/** Which side of the books a record belongs to. */
export type RecordKind = "payable" | "receivable";

/** Settlement lifecycle of a payable. */
export type PayableStatus = "pending" | "paid";

/** Settlement lifecycle of a receivable. */
export type ReceivableStatus = "pending" | "received";

export type SettlementStatus = PayableStatus | ReceivableStatus;

/**
 * How a record's due date relates to a reference day.
 * Derived, recomputed from the due date on every read.
 */
export type DateDueStatus =
  | "overdue"
  | "due_today"
  | "due_soon"
  | "on_time"
  | "invalid_date";

/** Due status including the terminal overrides for settled records. */
export type DueStatus = DateDueStatus | "paid" | "received";

/** Fields shared by both record kinds. */
interface RecordBase {
  /** "CP001" for payables, "CR001" for receivables */
  readonly id: string;
  readonly description: string;
  /** Category code within the taxonomy for this kind */
  readonly category: string;
  readonly amount: Money;
  /** YYYY-MM-DD */
  readonly dueDate: string;
  /** Last refreshed due status */
  readonly dueStatus: DueStatus;
  readonly notes: string;
  /** YYYY-MM-DD HH:MM:SS, local wall-clock */
  readonly createdAt: string;
  readonly createdBy: string;
  /** YYYY-MM-DD, null until settled */
  readonly settlementDate: string | null;
  readonly settledBy: string | null;
  readonly active: boolean;
  readonly deactivatedAt?: string | undefined;
  readonly deactivatedBy?: string | undefined;
}

export interface PayableRecord extends RecordBase {
  readonly kind: "payable";
  readonly status: PayableStatus;
  /** Supplier name, may be empty */
  readonly supplier: string;
}

export interface ReceivableRecord extends RecordBase {
  readonly kind: "receivable";
  readonly status: ReceivableStatus;
  /** Name of the party paying us */
  readonly payer: string;
}

export type LedgerRecord = PayableRecord | ReceivableRecord;
