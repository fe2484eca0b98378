/**
 * @tally/store — Ledger persistence.
 *
 * Owns the three persisted collections of the back office:
 * payables, receivables and the category taxonomy.
 *
 * Implementations:
 * - JsonFileLedgerStore: one indented JSON document per collection
 * - InMemoryLedgerStore: cloned in-memory snapshot (tests, dev)
 */

// Types
export type {
  LedgerState,
  LedgerStore,
  CollectionName,
  LoadIssue,
  LoadIssueHandler,
} from "./types.js";
export { EMPTY_TAXONOMY, isEmptyTaxonomy } from "./types.js";

// Implementations
export { JsonFileLedgerStore, DEFAULT_FILE_NAMES } from "./json-file-store.js";
export type { JsonFileLedgerStoreOptions, LedgerFileNames } from "./json-file-store.js";
export { InMemoryLedgerStore } from "./in-memory-store.js";

// Decoding
export { decodeRecords, decodeTaxonomy, defaultCategories } from "./codec.js";
export type { Decoded } from "./codec.js";
