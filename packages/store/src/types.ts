/**
 * @tally/store — Core types.
 *
 * Defines the persistence contract for the ledger's three collections:
 * payables, receivables and the category taxonomy.
 *
 * Design principles:
 * - The store owns no derived logic; it loads and saves snapshots
 * - Loading never fails: missing or corrupt sources degrade to empty
 * - Saving replaces each file whole; write errors reach the caller
 * - Single process, single writer; there is no locking
 */

import type {
  CategoryTaxonomy,
  PayableRecord,
  ReceivableRecord,
} from "@tally/types";

// =============================================================================
// State
// =============================================================================

/**
 * Full in-memory state of the ledger, as persisted.
 * Includes soft-deleted records (audit retention).
 */
export interface LedgerState {
  readonly payables: readonly PayableRecord[];
  readonly receivables: readonly ReceivableRecord[];
  readonly categories: CategoryTaxonomy;
}

export const EMPTY_TAXONOMY: CategoryTaxonomy = {
  contas_pagar: {},
  contas_receber: {},
};

export function isEmptyTaxonomy(taxonomy: CategoryTaxonomy): boolean {
  return (
    Object.keys(taxonomy.contas_pagar).length === 0 &&
    Object.keys(taxonomy.contas_receber).length === 0
  );
}

// =============================================================================
// Load Issues
// =============================================================================

/** Which persisted collection a load issue concerns. */
export type CollectionName = "payables" | "receivables" | "categories";

/**
 * A degraded load. Reported to the optional listener, never thrown.
 *
 * - invalid_json: the file could not be parsed; the collection loads empty
 * - invalid_shape: the document has the wrong top-level shape; loads empty
 * - skipped_entries: some entries failed validation and were dropped
 */
export interface LoadIssue {
  readonly collection: CollectionName;
  readonly reason: "invalid_json" | "invalid_shape" | "skipped_entries";
  readonly skipped?: number | undefined;
}

export type LoadIssueHandler = (issue: LoadIssue) => void;

// =============================================================================
// Store Interface
// =============================================================================

/**
 * Ledger store interface.
 *
 * Implementations: InMemoryLedgerStore (tests, dev),
 * JsonFileLedgerStore (production).
 */
export interface LedgerStore {
  /**
   * Read the persisted state.
   * Missing or corrupt collections load as empty. Never throws.
   */
  load(): LedgerState;

  /**
   * Replace the persisted state with the given snapshot.
   * Write failures propagate; nothing is retried.
   */
  save(state: LedgerState): void;

  /**
   * Seed the default category taxonomy when none exists.
   * Idempotent: returns the existing taxonomy untouched otherwise.
   */
  initDefaultCategories(): CategoryTaxonomy;
}
