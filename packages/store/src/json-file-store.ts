/**
 * @tally/store — File-based JSON LedgerStore implementation.
 *
 * Stores each collection as one human-readable JSON document:
 *   <directory>/payables.json      — array of payable records
 *   <directory>/receivables.json   — array of receivable records
 *   <directory>/categories.json    — { contas_pagar, contas_receber }
 *
 * Crash safety:
 * - Each save writes a temp file, fsyncs it, then renames it over the target
 * - A reader never sees a half-written document
 * - Corrupt documents load as empty collections (reported, never thrown)
 *
 * Properties:
 * - O(n) load and save (whole documents)
 * - No locking: one process owns the directory for its lifetime
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import type { CategoryTaxonomy } from "@tally/types";
import { isPayableRecord, isReceivableRecord } from "@tally/types";
import { decodeRecords, decodeTaxonomy, defaultCategories } from "./codec.js";
import type { Decoded } from "./codec.js";
import type {
  CollectionName,
  LedgerState,
  LedgerStore,
  LoadIssueHandler,
} from "./types.js";
import { EMPTY_TAXONOMY, isEmptyTaxonomy } from "./types.js";

/**
 * File names for each collection, relative to the store directory.
 */
export interface LedgerFileNames {
  readonly payables: string;
  readonly receivables: string;
  readonly categories: string;
}

export const DEFAULT_FILE_NAMES: LedgerFileNames = {
  payables: "payables.json",
  receivables: "receivables.json",
  categories: "categories.json",
};

/**
 * Options for creating a JsonFileLedgerStore.
 */
export interface JsonFileLedgerStoreOptions {
  /** Directory holding the collection files (created if missing) */
  readonly directory: string;
  /** Override individual file names */
  readonly files?: Partial<LedgerFileNames> | undefined;
  /** Called for every degraded load */
  readonly onLoadIssue?: LoadIssueHandler | undefined;
}

/**
 * File-based JSON ledger store.
 */
export class JsonFileLedgerStore implements LedgerStore {
  private readonly _directory: string;
  private readonly _files: LedgerFileNames;
  private readonly _onLoadIssue: LoadIssueHandler | undefined;

  constructor(options: JsonFileLedgerStoreOptions) {
    this._directory = options.directory;
    this._files = { ...DEFAULT_FILE_NAMES, ...options.files };
    this._onLoadIssue = options.onLoadIssue;

    mkdirSync(this._directory, { recursive: true });
  }

  // ─── Load ───────────────────────────────────────────────────────────

  load(): LedgerState {
    return {
      payables: this._loadCollection("payables", (text) =>
        decodeRecords("payables", text, isPayableRecord),
      ) ?? [],
      receivables: this._loadCollection("receivables", (text) =>
        decodeRecords("receivables", text, isReceivableRecord),
      ) ?? [],
      categories: this._loadCategories(),
    };
  }

  // ─── Save ───────────────────────────────────────────────────────────

  save(state: LedgerState): void {
    this._writeAtomic(this.pathOf("payables"), state.payables);
    this._writeAtomic(this.pathOf("receivables"), state.receivables);
    this._writeAtomic(this.pathOf("categories"), state.categories);
  }

  // ─── Categories ─────────────────────────────────────────────────────

  initDefaultCategories(): CategoryTaxonomy {
    const existing = this._loadCategories();
    if (!isEmptyTaxonomy(existing)) {
      return existing;
    }

    const seed = defaultCategories();
    this._writeAtomic(this.pathOf("categories"), seed);
    return seed;
  }

  // ─── Paths ──────────────────────────────────────────────────────────

  /** Directory holding the collection files. */
  get directory(): string {
    return this._directory;
  }

  /** Absolute path of a collection file. */
  pathOf(collection: CollectionName): string {
    return join(this._directory, this._files[collection]);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _loadCategories(): CategoryTaxonomy {
    return this._loadCollection("categories", decodeTaxonomy) ?? EMPTY_TAXONOMY;
  }

  /**
   * Read and decode one collection file.
   * Returns undefined when the file does not exist yet.
   */
  private _loadCollection<T>(
    collection: CollectionName,
    decode: (text: string) => Decoded<T>,
  ): T | undefined {
    const filePath = this.pathOf(collection);
    if (!existsSync(filePath)) {
      return undefined;
    }

    let text: string;
    try {
      text = readFileSync(filePath, "utf-8");
    } catch {
      // Unreadable (permissions, raced deletion): degrade like corrupt JSON
      this._onLoadIssue?.({ collection, reason: "invalid_json" });
      return undefined;
    }

    const decoded = decode(text);
    if (decoded.issue !== undefined) {
      this._onLoadIssue?.(decoded.issue);
    }
    return decoded.value;
  }

  /**
   * Write a JSON document via temp file + fsync + rename.
   */
  private _writeAtomic(filePath: string, value: unknown): void {
    const tmpPath = `${filePath}.tmp`;
    const fd = openSync(tmpPath, "w");
    try {
      writeFileSync(fd, JSON.stringify(value, null, 2) + "\n", "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmpPath, filePath);
  }
}
