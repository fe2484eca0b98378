/**
 * @tally/ledger — Core Ledger class.
 *
 * Accounts payable and receivable, from registration through
 * settlement. The ledger owns the in-memory collections for the
 * process lifetime and writes the full snapshot back to its store
 * after every mutation.
 *
 * API surface:
 * - registerPayable() / registerReceivable() — Create a pending record
 * - listPayables() / listReceivables() — Filtered, due-date ordered view (pure)
 * - refreshDueStatuses() — Recompute and persist stored due statuses
 * - searchPayables() / searchReceivables() / search() — Substring lookup
 * - getPayable() / getReceivable() — Single active record
 * - recordPayment() / recordReceipt() — Settle a record once
 * - deactivatePayable() / deactivateReceivable() — Soft delete
 * - dueAlerts() — Unsettled records grouped by urgency
 * - snapshot() — Every record, inactive ones included
 *
 * Every operation validates before touching state. A thrown
 * LedgerError leaves both memory and storage as they were.
 */

import type {
  CategoryMap,
  CategoryTaxonomy,
  DueStatus,
  LedgerRecord,
  Money,
  PayableRecord,
  ReceivableRecord,
} from "@tally/types";
import type { CollectionName, LedgerState, LedgerStore, LoadIssueHandler } from "@tally/store";
import {
  formatTimestamp,
  isValidDate,
  systemClock,
  todayIn,
} from "./calendar.js";
import { deriveDueStatus, resolveDueStatus } from "./due-status.js";
import { isPositive, toMoney, validateMoney } from "./money-math.js";
import type {
  Clock,
  DueAlerts,
  LedgerOptions,
  PayableFilter,
  ReceivableFilter,
  RefreshResult,
  RegisterPayableInput,
  RegisterReceivableInput,
  SearchResult,
  SettleOptions,
} from "./types.js";
import { LedgerError } from "./types.js";

export const DEFAULT_CURRENCY = "BRL";
export const DEFAULT_DECIMALS = 2;

export const PAYABLE_ID_PREFIX = "CP";
export const RECEIVABLE_ID_PREFIX = "CR";

// ─── Helpers ─────────────────────────────────────────────────────────────

/**
 * Next sequential id for a prefix: highest numeric suffix in use + 1,
 * zero-padded to three digits. Soft-deleted records still hold their ids.
 */
export function nextRecordId(prefix: string, records: readonly LedgerRecord[]): string {
  let max = 0;
  for (const record of records) {
    if (!record.id.startsWith(prefix)) continue;
    const suffix = record.id.slice(prefix.length);
    if (!/^\d+$/.test(suffix)) continue;
    max = Math.max(max, Number(suffix));
  }
  return `${prefix}${String(max + 1).padStart(3, "0")}`;
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

function matchesTerm(term: string, ...fields: readonly string[]): boolean {
  return fields.some((field) => field.toLowerCase().includes(term));
}

function byDueDate<T extends LedgerRecord>(a: T, b: T): number {
  if (a.dueDate < b.dueDate) return -1;
  if (a.dueDate > b.dueDate) return 1;
  return 0;
}

/** Fields every registration shares once validated. */
interface ValidatedRegistration {
  readonly description: string;
  readonly category: string;
  readonly amount: Money;
  readonly dueDate: string;
  readonly notes: string;
  readonly createdAt: string;
  readonly createdBy: string;
}

// ─── Ledger ──────────────────────────────────────────────────────────────

export class Ledger {
  private readonly _store: LedgerStore;
  private readonly _clock: Clock;
  private readonly _currency: string;
  private readonly _decimals: number;
  private _payables: readonly PayableRecord[];
  private _receivables: readonly ReceivableRecord[];
  private readonly _categories: CategoryTaxonomy;

  constructor(options: LedgerOptions) {
    const decimals = options.decimals ?? DEFAULT_DECIMALS;
    if (!Number.isInteger(decimals) || decimals < 0) {
      throw new LedgerError("INVALID_MONEY", `Decimals must be a non-negative integer, got: ${String(decimals)}`);
    }
    const currency = options.currency ?? DEFAULT_CURRENCY;
    if (currency.trim() === "") {
      throw new LedgerError("INVALID_MONEY", "Currency must be a non-empty string");
    }

    this._store = options.store;
    this._clock = options.clock ?? systemClock;
    this._currency = currency;
    this._decimals = decimals;

    const state = this._store.load();
    this._payables = this._admit("payables", state.payables, options.onLoadIssue);
    this._receivables = this._admit("receivables", state.receivables, options.onLoadIssue);
    this._categories = this._store.initDefaultCategories();
  }

  /** Currency every amount in this ledger is held in. */
  get currency(): string {
    return this._currency;
  }

  get decimals(): number {
    return this._decimals;
  }

  /** Today's date per the ledger clock. */
  today(): string {
    return todayIn(this._clock);
  }

  // ─── Registration ────────────────────────────────────────────────────

  /**
   * Register a pending payable.
   *
   * Throws LedgerError:
   * - MISSING_FIELD: empty description or category
   * - INVALID_AMOUNT: not a positive decimal in this currency's scale
   * - INVALID_CATEGORY: category not in the payable taxonomy
   * - INVALID_DATE: due date is not a YYYY-MM-DD calendar day
   */
  registerPayable(input: RegisterPayableInput): PayableRecord {
    const base = this._validateRegistration(input, this._categories.contas_pagar, "payable");

    const record: PayableRecord = {
      id: nextRecordId(PAYABLE_ID_PREFIX, this._payables),
      kind: "payable",
      description: base.description,
      category: base.category,
      amount: base.amount,
      dueDate: base.dueDate,
      status: "pending",
      dueStatus: resolveDueStatus(base.dueDate, this.today()),
      supplier: input.supplier ?? "",
      notes: base.notes,
      createdAt: base.createdAt,
      createdBy: base.createdBy,
      settlementDate: null,
      settledBy: null,
      active: true,
    };

    this._commit([...this._payables, record], this._receivables);
    return record;
  }

  /**
   * Register a pending receivable. Same rules as registerPayable,
   * plus a non-empty payer.
   */
  registerReceivable(input: RegisterReceivableInput): ReceivableRecord {
    if (isBlank(input.payer)) {
      throw new LedgerError("MISSING_FIELD", "Payer is required");
    }
    const base = this._validateRegistration(input, this._categories.contas_receber, "receivable");

    const record: ReceivableRecord = {
      id: nextRecordId(RECEIVABLE_ID_PREFIX, this._receivables),
      kind: "receivable",
      description: base.description,
      category: base.category,
      amount: base.amount,
      dueDate: base.dueDate,
      status: "pending",
      dueStatus: resolveDueStatus(base.dueDate, this.today()),
      payer: input.payer,
      notes: base.notes,
      createdAt: base.createdAt,
      createdBy: base.createdBy,
      settlementDate: null,
      settledBy: null,
      active: true,
    };

    this._commit(this._payables, [...this._receivables, record]);
    return record;
  }

  // ─── Listing ─────────────────────────────────────────────────────────

  /**
   * Active payables with due status derived as of `filter.asOf`,
   * filtered and ordered by due date. Writes nothing.
   */
  listPayables(filter: PayableFilter = {}): PayableRecord[] {
    const asOf = this._referenceDate(filter.asOf);
    return this._activeView(this._payables, asOf)
      .filter((r) => filter.status === undefined || r.status === filter.status)
      .filter((r) => filter.category === undefined || r.category === filter.category)
      .filter((r) => filter.dueStatus === undefined || r.dueStatus === filter.dueStatus)
      .sort(byDueDate);
  }

  listReceivables(filter: ReceivableFilter = {}): ReceivableRecord[] {
    const asOf = this._referenceDate(filter.asOf);
    return this._activeView(this._receivables, asOf)
      .filter((r) => filter.status === undefined || r.status === filter.status)
      .filter((r) => filter.category === undefined || r.category === filter.category)
      .filter((r) => filter.dueStatus === undefined || r.dueStatus === filter.dueStatus)
      .sort(byDueDate);
  }

  /**
   * Recompute the stored due status of every active record and persist.
   * Returns how many records changed on each side.
   */
  refreshDueStatuses(asOf?: string): RefreshResult {
    const reference = this._referenceDate(asOf);
    let payablesChanged = 0;
    let receivablesChanged = 0;

    const payables = this._payables.map((record) => {
      const next = this._refreshed(record, reference);
      if (next !== record) payablesChanged++;
      return next;
    });
    const receivables = this._receivables.map((record) => {
      const next = this._refreshed(record, reference);
      if (next !== record) receivablesChanged++;
      return next;
    });

    this._commit(payables, receivables);
    return { payables: payablesChanged, receivables: receivablesChanged };
  }

  // ─── Search ──────────────────────────────────────────────────────────

  /** Case-insensitive match on id, description and supplier. */
  searchPayables(term: string): PayableRecord[] {
    const needle = term.toLowerCase();
    return this._activeView(this._payables, this.today()).filter((r) =>
      matchesTerm(needle, r.id, r.description, r.supplier),
    );
  }

  /** Case-insensitive match on id, description and payer. */
  searchReceivables(term: string): ReceivableRecord[] {
    const needle = term.toLowerCase();
    return this._activeView(this._receivables, this.today()).filter((r) =>
      matchesTerm(needle, r.id, r.description, r.payer),
    );
  }

  search(term: string): SearchResult {
    return {
      payables: this.searchPayables(term),
      receivables: this.searchReceivables(term),
    };
  }

  // ─── Lookup ──────────────────────────────────────────────────────────

  getPayable(id: string): PayableRecord {
    return this._withDueStatus(this._findActive(this._payables, id, "Payable"), this.today());
  }

  getReceivable(id: string): ReceivableRecord {
    return this._withDueStatus(this._findActive(this._receivables, id, "Receivable"), this.today());
  }

  // ─── Settlement ──────────────────────────────────────────────────────

  /**
   * Mark a payable as paid. Settles exactly once.
   *
   * Throws RECORD_NOT_FOUND (unknown or inactive id), ALREADY_SETTLED,
   * or INVALID_DATE (bad settlement date).
   */
  recordPayment(id: string, options: SettleOptions): PayableRecord {
    const current = this._findActive(this._payables, id, "Payable");
    if (current.status === "paid") {
      throw new LedgerError("ALREADY_SETTLED", `Payable "${id}" is already paid`);
    }
    const settlementDate = this._settlementDate(options.settlementDate);

    const settled: PayableRecord = {
      ...current,
      status: "paid",
      dueStatus: "paid",
      settlementDate,
      settledBy: options.actor,
    };
    this._commit(this._replace(this._payables, settled), this._receivables);
    return settled;
  }

  /** Mark a receivable as received. Same rules as recordPayment. */
  recordReceipt(id: string, options: SettleOptions): ReceivableRecord {
    const current = this._findActive(this._receivables, id, "Receivable");
    if (current.status === "received") {
      throw new LedgerError("ALREADY_SETTLED", `Receivable "${id}" is already received`);
    }
    const settlementDate = this._settlementDate(options.settlementDate);

    const settled: ReceivableRecord = {
      ...current,
      status: "received",
      dueStatus: "received",
      settlementDate,
      settledBy: options.actor,
    };
    this._commit(this._payables, this._replace(this._receivables, settled));
    return settled;
  }

  // ─── Soft Deletion ───────────────────────────────────────────────────

  /**
   * Soft-delete a payable. The record stays in storage for audit but
   * drops out of every listing, search and report.
   * A second call fails with RECORD_INACTIVE.
   */
  deactivatePayable(id: string, actor: string): PayableRecord {
    const deactivated = this._deactivated(this._payables, id, actor, "Payable");
    this._commit(this._replace(this._payables, deactivated), this._receivables);
    return deactivated;
  }

  deactivateReceivable(id: string, actor: string): ReceivableRecord {
    const deactivated = this._deactivated(this._receivables, id, actor, "Receivable");
    this._commit(this._payables, this._replace(this._receivables, deactivated));
    return deactivated;
  }

  // ─── Views ───────────────────────────────────────────────────────────

  categories(): CategoryTaxonomy {
    return this._categories;
  }

  /** Full state, inactive records included. */
  snapshot(): LedgerState {
    return {
      payables: this._payables,
      receivables: this._receivables,
      categories: this._categories,
    };
  }

  /**
   * Unsettled active records due today, within the next seven days,
   * or already overdue. Records with unparseable due dates are left out.
   */
  dueAlerts(asOf?: string): DueAlerts {
    const reference = this._referenceDate(asOf);
    const dueToday: LedgerRecord[] = [];
    const dueSoon: LedgerRecord[] = [];
    const overdue: LedgerRecord[] = [];

    const records: readonly LedgerRecord[] = [...this._payables, ...this._receivables];
    for (const record of records) {
      if (!record.active || record.status !== "pending") continue;

      const status = resolveDueStatus(record.dueDate, reference);
      const view = { ...record, dueStatus: status };
      if (status === "due_today") dueToday.push(view);
      else if (status === "due_soon") dueSoon.push(view);
      else if (status === "overdue") overdue.push(view);
    }

    return { asOf: reference, dueToday, dueSoon, overdue };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _validateRegistration(
    input: RegisterPayableInput | RegisterReceivableInput,
    taxonomy: CategoryMap,
    kind: "payable" | "receivable",
  ): ValidatedRegistration {
    if (isBlank(input.description)) {
      throw new LedgerError("MISSING_FIELD", "Description is required");
    }
    if (isBlank(input.category)) {
      throw new LedgerError("MISSING_FIELD", "Category is required");
    }

    const amount = toMoney(input.amount, this._currency, this._decimals);
    if (!isPositive(amount)) {
      throw new LedgerError("INVALID_AMOUNT", `Amount must be greater than zero, got: "${input.amount}"`);
    }

    if (!Object.hasOwn(taxonomy, input.category)) {
      throw new LedgerError("INVALID_CATEGORY", `Unknown ${kind} category: "${input.category}"`);
    }
    if (!isValidDate(input.dueDate)) {
      throw new LedgerError("INVALID_DATE", `Invalid due date "${input.dueDate}", expected YYYY-MM-DD`);
    }

    return {
      description: input.description,
      category: input.category,
      amount,
      dueDate: input.dueDate,
      notes: input.notes ?? "",
      createdAt: formatTimestamp(this._clock()),
      createdBy: input.actor,
    };
  }

  private _referenceDate(asOf: string | undefined): string {
    if (asOf === undefined) return this.today();
    if (!isValidDate(asOf)) {
      throw new LedgerError("INVALID_DATE", `Invalid reference date "${asOf}", expected YYYY-MM-DD`);
    }
    return asOf;
  }

  private _settlementDate(value: string | undefined): string {
    const date = value ?? this.today();
    if (!isValidDate(date)) {
      throw new LedgerError("INVALID_DATE", `Invalid settlement date "${date}", expected YYYY-MM-DD`);
    }
    return date;
  }

  private _withDueStatus<T extends LedgerRecord>(record: T, asOf: string): T {
    return { ...record, dueStatus: deriveDueStatus(record, asOf) };
  }

  private _activeView<T extends LedgerRecord>(records: readonly T[], asOf: string): T[] {
    return records.filter((r) => r.active).map((r) => this._withDueStatus(r, asOf));
  }

  /** Same object when nothing changes, so callers can count changes by identity. */
  private _refreshed<T extends LedgerRecord>(record: T, asOf: string): T {
    if (!record.active) return record;
    const dueStatus: DueStatus = deriveDueStatus(record, asOf);
    return dueStatus === record.dueStatus ? record : { ...record, dueStatus };
  }

  private _findActive<T extends LedgerRecord>(records: readonly T[], id: string, label: string): T {
    const record = records.find((r) => r.id === id && r.active);
    if (record === undefined) {
      throw new LedgerError("RECORD_NOT_FOUND", `${label} not found: "${id}"`);
    }
    return record;
  }

  private _deactivated<T extends LedgerRecord>(
    records: readonly T[],
    id: string,
    actor: string,
    label: string,
  ): T {
    const record = records.find((r) => r.id === id);
    if (record === undefined) {
      throw new LedgerError("RECORD_NOT_FOUND", `${label} not found: "${id}"`);
    }
    if (!record.active) {
      throw new LedgerError("RECORD_INACTIVE", `${label} "${id}" is already inactive`);
    }
    return {
      ...record,
      active: false,
      deactivatedAt: formatTimestamp(this._clock()),
      deactivatedBy: actor,
    };
  }

  /**
   * Keep loaded records whose amount is a positive value in this ledger's
   * currency and scale, first occurrence of each id only.
   */
  private _admit<T extends LedgerRecord>(
    collection: CollectionName,
    records: readonly T[],
    onLoadIssue: LoadIssueHandler | undefined,
  ): readonly T[] {
    const seen = new Set<string>();
    const admitted = records.filter((record) => {
      if (seen.has(record.id) || !this._holdsLedgerMoney(record.amount)) return false;
      seen.add(record.id);
      return true;
    });

    const skipped = records.length - admitted.length;
    if (skipped > 0) {
      onLoadIssue?.({ collection, reason: "skipped_entries", skipped });
    }
    return admitted;
  }

  private _holdsLedgerMoney(amount: Money): boolean {
    if (amount.currency !== this._currency || amount.decimals !== this._decimals) {
      return false;
    }
    try {
      validateMoney(amount);
      return isPositive(amount);
    } catch (error) {
      if (error instanceof LedgerError) return false;
      throw error;
    }
  }

  private _replace<T extends LedgerRecord>(records: readonly T[], next: T): T[] {
    return records.map((r) => (r.id === next.id ? next : r));
  }

  /**
   * Persist the next collections, then adopt them. A failed write
   * leaves the in-memory state untouched and propagates.
   */
  private _commit(payables: readonly PayableRecord[], receivables: readonly ReceivableRecord[]): void {
    this._store.save({ payables, receivables, categories: this._categories });
    this._payables = payables;
    this._receivables = receivables;
  }
}
