/**
 * @tally/store — Decoding of persisted documents.
 *
 * Every document read from disk is untrusted. Collections are arrays of
 * records, each checked with the @tally/types guards; entries that fail
 * are dropped and counted rather than failing the whole load.
 */

import { readFileSync } from "node:fs";
import type { CategoryTaxonomy } from "@tally/types";
import { isCategoryTaxonomy } from "@tally/types";
import type { CollectionName, LoadIssue } from "./types.js";
import { EMPTY_TAXONOMY } from "./types.js";

/**
 * Result of decoding one collection document.
 */
export interface Decoded<T> {
  readonly value: T;
  readonly issue?: LoadIssue | undefined;
}

/**
 * Parse JSON text without throwing.
 */
export function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch {
    return { ok: false };
  }
}

/**
 * Decode a record collection from raw document text.
 * Only the first record holding a given id is kept.
 */
export function decodeRecords<T extends { readonly id: string }>(
  collection: CollectionName,
  text: string,
  guard: (value: unknown) => value is T,
): Decoded<readonly T[]> {
  const parsed = parseJson(text);
  if (!parsed.ok) {
    return { value: [], issue: { collection, reason: "invalid_json" } };
  }

  if (!Array.isArray(parsed.value)) {
    return { value: [], issue: { collection, reason: "invalid_shape" } };
  }

  const records: T[] = [];
  const seen = new Set<string>();
  let skipped = 0;
  for (const entry of parsed.value) {
    if (guard(entry) && !seen.has(entry.id)) {
      seen.add(entry.id);
      records.push(entry);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    return { value: records, issue: { collection, reason: "skipped_entries", skipped } };
  }
  return { value: records };
}

/**
 * Decode the category taxonomy from raw document text.
 */
export function decodeTaxonomy(text: string): Decoded<CategoryTaxonomy> {
  const parsed = parseJson(text);
  if (!parsed.ok) {
    return { value: EMPTY_TAXONOMY, issue: { collection: "categories", reason: "invalid_json" } };
  }

  if (!isCategoryTaxonomy(parsed.value)) {
    return { value: EMPTY_TAXONOMY, issue: { collection: "categories", reason: "invalid_shape" } };
  }
  return { value: parsed.value };
}

// =============================================================================
// Default Taxonomy
// =============================================================================

const DEFAULT_CATEGORIES_URL = new URL("../data/default-categories.json", import.meta.url);

let _defaultCategories: CategoryTaxonomy | undefined;

/**
 * The seed taxonomy written on first use.
 * Read once from the bundled data file; each caller gets its own copy.
 */
export function defaultCategories(): CategoryTaxonomy {
  if (_defaultCategories === undefined) {
    const decoded = decodeTaxonomy(readFileSync(DEFAULT_CATEGORIES_URL, "utf-8"));
    if (decoded.issue !== undefined) {
      throw new Error(`Default category data is malformed (${decoded.issue.reason})`);
    }
    _defaultCategories = decoded.value;
  }
  return structuredClone(_defaultCategories);
}
