/**
 * @tally/ledger — Due-status resolution.
 *
 * Pure functions. The stored `dueStatus` on a record is only a cache of
 * the last refresh; these recompute it from the due date.
 */

import type { DateDueStatus, DueStatus, LedgerRecord } from "@tally/types";
import { daysBetween, isValidDate } from "./calendar.js";

/** Records due within this many days (inclusive) are "due_soon". */
export const DUE_SOON_DAYS = 7;

/**
 * Classify a due date against a reference day.
 *
 * Total: any malformed input on either side gives "invalid_date".
 */
export function resolveDueStatus(dueDate: string, referenceDate: string): DateDueStatus {
  if (!isValidDate(dueDate) || !isValidDate(referenceDate)) {
    return "invalid_date";
  }

  const days = daysBetween(referenceDate, dueDate);
  if (days < 0) return "overdue";
  if (days === 0) return "due_today";
  if (days <= DUE_SOON_DAYS) return "due_soon";
  return "on_time";
}

/**
 * Due status of a record, with settled records pinned to their
 * terminal status.
 */
export function deriveDueStatus(record: LedgerRecord, referenceDate: string): DueStatus {
  if (record.status === "paid") return "paid";
  if (record.status === "received") return "received";
  return resolveDueStatus(record.dueDate, referenceDate);
}
