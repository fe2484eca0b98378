/**
 * LedgerService — Facade over the ledger and its reports.
 *
 * One instance per process. Owns the Ledger (and through it the store),
 * stamps the reports with the ledger's currency and clock, and logs
 * every mutation.
 */

import type { Logger } from "pino";
import type {
  CategoryTaxonomy,
  PayableRecord,
  ReceivableRecord,
} from "@tally/types";
import type { LedgerStore, LoadIssueHandler } from "@tally/store";
import { Ledger, formatTimestamp, systemClock } from "@tally/ledger";
import type {
  Clock,
  DueAlerts,
  PayableFilter,
  ReceivableFilter,
  RefreshResult,
  RegisterPayableInput,
  RegisterReceivableInput,
  SearchResult,
  SettleOptions,
} from "@tally/ledger";
import {
  dailyCashFlow,
  monthlyCashFlow,
  rangeCashFlow,
  summarize,
} from "@tally/reports";
import type {
  DailyCashFlow,
  LedgerSummary,
  MonthlyCashFlow,
  RangeCashFlow,
  ReportCurrency,
} from "@tally/reports";

// =============================================================================
// Config
// =============================================================================

export interface LedgerServiceConfig {
  readonly store: LedgerStore;
  readonly logger: Logger;
  readonly currency?: string | undefined;
  readonly decimals?: number | undefined;
  readonly clock?: Clock | undefined;
  readonly onLoadIssue?: LoadIssueHandler | undefined;
}

export interface SummaryRequest {
  readonly from?: string | undefined;
  readonly to?: string | undefined;
  readonly asOf?: string | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  private readonly ledger: Ledger;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(config: LedgerServiceConfig) {
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger;
    this.ledger = new Ledger({
      store: config.store,
      currency: config.currency,
      decimals: config.decimals,
      clock: this.clock,
      onLoadIssue: config.onLoadIssue,
    });
  }

  get currency(): string {
    return this.ledger.currency;
  }

  today(): string {
    return this.ledger.today();
  }

  // ─── Payables ────────────────────────────────────────────────────

  registerPayable(input: RegisterPayableInput): PayableRecord {
    const record = this.ledger.registerPayable(input);
    this.logger.info(
      { id: record.id, amount: record.amount.amount, actor: input.actor },
      "Payable registered",
    );
    return record;
  }

  listPayables(filter?: PayableFilter): PayableRecord[] {
    return this.ledger.listPayables(filter);
  }

  getPayable(id: string): PayableRecord {
    return this.ledger.getPayable(id);
  }

  recordPayment(id: string, options: SettleOptions): PayableRecord {
    const record = this.ledger.recordPayment(id, options);
    this.logger.info(
      { id, settlementDate: record.settlementDate, actor: options.actor },
      "Payment recorded",
    );
    return record;
  }

  deactivatePayable(id: string, actor: string): PayableRecord {
    const record = this.ledger.deactivatePayable(id, actor);
    this.logger.info({ id, actor }, "Payable deactivated");
    return record;
  }

  // ─── Receivables ─────────────────────────────────────────────────

  registerReceivable(input: RegisterReceivableInput): ReceivableRecord {
    const record = this.ledger.registerReceivable(input);
    this.logger.info(
      { id: record.id, amount: record.amount.amount, actor: input.actor },
      "Receivable registered",
    );
    return record;
  }

  listReceivables(filter?: ReceivableFilter): ReceivableRecord[] {
    return this.ledger.listReceivables(filter);
  }

  getReceivable(id: string): ReceivableRecord {
    return this.ledger.getReceivable(id);
  }

  recordReceipt(id: string, options: SettleOptions): ReceivableRecord {
    const record = this.ledger.recordReceipt(id, options);
    this.logger.info(
      { id, settlementDate: record.settlementDate, actor: options.actor },
      "Receipt recorded",
    );
    return record;
  }

  deactivateReceivable(id: string, actor: string): ReceivableRecord {
    const record = this.ledger.deactivateReceivable(id, actor);
    this.logger.info({ id, actor }, "Receivable deactivated");
    return record;
  }

  // ─── Ledger-wide ─────────────────────────────────────────────────

  categories(): CategoryTaxonomy {
    return this.ledger.categories();
  }

  search(term: string): SearchResult {
    return this.ledger.search(term);
  }

  refreshDueStatuses(asOf?: string): RefreshResult {
    const result = this.ledger.refreshDueStatuses(asOf);
    this.logger.info(result, "Due statuses refreshed");
    return result;
  }

  dueAlerts(asOf?: string): DueAlerts {
    return this.ledger.dueAlerts(asOf);
  }

  // ─── Reports ─────────────────────────────────────────────────────

  summary(request: SummaryRequest = {}): LedgerSummary {
    return summarize(this.ledger.snapshot(), {
      ...this.reportCurrency(),
      from: request.from,
      to: request.to,
      asOf: request.asOf ?? this.ledger.today(),
      generatedAt: formatTimestamp(this.clock()),
    });
  }

  dailyCashFlow(date?: string): DailyCashFlow {
    return dailyCashFlow(
      this.ledger.snapshot(),
      date ?? this.ledger.today(),
      this.reportCurrency(),
    );
  }

  monthlyCashFlow(year: number, month: number): MonthlyCashFlow {
    return monthlyCashFlow(this.ledger.snapshot(), year, month, this.reportCurrency());
  }

  rangeCashFlow(from: string, to: string): RangeCashFlow {
    return rangeCashFlow(this.ledger.snapshot(), from, to, this.reportCurrency());
  }

  private reportCurrency(): ReportCurrency {
    return { currency: this.ledger.currency, decimals: this.ledger.decimals };
  }
}
