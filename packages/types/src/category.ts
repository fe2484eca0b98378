/**
 * Category Types
 *
 * Two namespaces: payable categories and receivable categories.
 * Categories are seeded once and only referenced afterwards.
 */

/** Fixed (recurring, predictable) or variable expense/income. */
export type CategoryType = "fixed" | "variable";

export interface Category {
  /** Display name */
  readonly name: string;
  readonly type: CategoryType;
  /** Display tag (colour name) */
  readonly tag: string;
}

/** Category code → category. */
export type CategoryMap = Readonly<Record<string, Category>>;

/**
 * Persisted taxonomy. Key names are part of the file format.
 */
export interface CategoryTaxonomy {
  readonly contas_pagar: CategoryMap;
  readonly contas_receber: CategoryMap;
}
