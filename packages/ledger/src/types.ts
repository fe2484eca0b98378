/**
 * @tally/ledger — Ledger-specific types.
 *
 * Inputs and results of the Ledger operations, plus the structured
 * error every failed operation throws.
 */

import type {
  DueStatus,
  LedgerRecord,
  PayableRecord,
  PayableStatus,
  ReceivableRecord,
  ReceivableStatus,
} from "@tally/types";
import type { LedgerStore, LoadIssueHandler } from "@tally/store";

// ─── Clock ───────────────────────────────────────────────────────────────

/** Source of "now". Injected so tests can pin the reference day. */
export type Clock = () => Date;

// ─── Options ─────────────────────────────────────────────────────────────

export interface LedgerOptions {
  readonly store: LedgerStore;
  /** ISO 4217 code for every amount in this ledger. Default "BRL". */
  readonly currency?: string | undefined;
  /** Fractional digits of the currency. Default 2. */
  readonly decimals?: number | undefined;
  readonly clock?: Clock | undefined;
  /** Told how many loaded records were left out, per collection. */
  readonly onLoadIssue?: LoadIssueHandler | undefined;
}

// ─── Registration ────────────────────────────────────────────────────────

interface RegisterInputBase {
  readonly description: string;
  /** Category code within the taxonomy for this kind */
  readonly category: string;
  /** Positive decimal string, at most `decimals` fractional digits */
  readonly amount: string;
  /** YYYY-MM-DD */
  readonly dueDate: string;
  readonly notes?: string | undefined;
  /** Opaque identifier of whoever performs the operation */
  readonly actor: string;
}

export interface RegisterPayableInput extends RegisterInputBase {
  readonly supplier?: string | undefined;
}

export interface RegisterReceivableInput extends RegisterInputBase {
  readonly payer: string;
}

// ─── Settlement ──────────────────────────────────────────────────────────

export interface SettleOptions {
  /** YYYY-MM-DD. Defaults to today. */
  readonly settlementDate?: string | undefined;
  readonly actor: string;
}

// ─── Queries ─────────────────────────────────────────────────────────────

interface ListFilterBase {
  readonly category?: string | undefined;
  readonly dueStatus?: DueStatus | undefined;
  /** Reference day for due status (YYYY-MM-DD). Defaults to today. */
  readonly asOf?: string | undefined;
}

export interface PayableFilter extends ListFilterBase {
  readonly status?: PayableStatus | undefined;
}

export interface ReceivableFilter extends ListFilterBase {
  readonly status?: ReceivableStatus | undefined;
}

export interface SearchResult {
  readonly payables: readonly PayableRecord[];
  readonly receivables: readonly ReceivableRecord[];
}

/** Number of records whose stored due status changed. */
export interface RefreshResult {
  readonly payables: number;
  readonly receivables: number;
}

/** Unsettled active records grouped by urgency, payables first. */
export interface DueAlerts {
  readonly asOf: string;
  readonly dueToday: readonly LedgerRecord[];
  readonly dueSoon: readonly LedgerRecord[];
  readonly overdue: readonly LedgerRecord[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "CURRENCY_MISMATCH"
  | "INVALID_DATE"
  | "INVALID_CATEGORY"
  | "MISSING_FIELD"
  | "RECORD_NOT_FOUND"
  | "RECORD_INACTIVE"
  | "ALREADY_SETTLED";

/**
 * Structured error from the ledger.
 * Always thrown before any state changes, so a failed call is a no-op.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
