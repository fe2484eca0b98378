/**
 * @tally/store — In-memory LedgerStore implementation.
 *
 * Holds a cloned snapshot in memory. Suitable for tests and development.
 * Loads and saves copy the state so callers never share references
 * with the store, matching the file store's semantics.
 */

import type { CategoryTaxonomy } from "@tally/types";
import { defaultCategories } from "./codec.js";
import type { LedgerState, LedgerStore } from "./types.js";
import { EMPTY_TAXONOMY, isEmptyTaxonomy } from "./types.js";

export class InMemoryLedgerStore implements LedgerStore {
  private _state: LedgerState;
  private _saveCount = 0;

  constructor(initial?: Partial<LedgerState>) {
    this._state = structuredClone({
      payables: initial?.payables ?? [],
      receivables: initial?.receivables ?? [],
      categories: initial?.categories ?? EMPTY_TAXONOMY,
    });
  }

  load(): LedgerState {
    return structuredClone(this._state);
  }

  save(state: LedgerState): void {
    this._state = structuredClone(state);
    this._saveCount++;
  }

  initDefaultCategories(): CategoryTaxonomy {
    if (!isEmptyTaxonomy(this._state.categories)) {
      return structuredClone(this._state.categories);
    }

    const seed = defaultCategories();
    this._state = { ...this._state, categories: structuredClone(seed) };
    return structuredClone(seed);
  }

  /** Number of save() calls so far. */
  get saveCount(): number {
    return this._saveCount;
  }
}
