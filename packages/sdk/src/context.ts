/**
 * Normalization context
 *
 * Owns the fold table and the collator. Callers create one at startup and
 * pass it to whatever indexes, queries or sorts; nothing here is global.
 */

import { FoldTable } from "./fold.js";
import { buildIndexedContent, buildSearchQuery } from "./search.js";
import { compareText, createCollator, sortRows } from "./collation.js";
import type { Ordering } from "./types.js";

/**
 * Locale used when none is configured
 */
export const DEFAULT_LOCALE = "pl-PL";

/**
 * Options for creating a normalization context
 */
export interface NormalizationOptions {
  /** BCP 47 locale for collation (default: DEFAULT_LOCALE) */
  locale?: string;
  /** Numeric collation of digit runs (default: false) */
  numeric?: boolean;
  /** Extra fold overrides, keyed by single character */
  overrides?: Readonly<Record<string, string>>;
  /** Memoize fold entries (default: true) */
  cache?: boolean;
}

export interface NormalizationContext {
  readonly locale: string;
  readonly table: FoldTable;
  readonly collator: Intl.Collator;
  foldText(text: string): string;
  buildIndexedContent(fields: readonly (string | null | undefined)[]): string;
  buildSearchQuery(raw: string): string;
  compare(a: string, b: string): Ordering;
  sortRows<Row>(
    rows: readonly Row[],
    select: (row: Row) => string | null | undefined,
    descending: boolean
  ): Row[];
}

export function createNormalizationContext(
  options: NormalizationOptions = {}
): NormalizationContext {
  const locale = options.locale ?? DEFAULT_LOCALE;
  const table = new FoldTable({ overrides: options.overrides, cache: options.cache });
  const collator = createCollator(locale, { numeric: options.numeric });

  return {
    locale,
    table,
    collator,
    foldText: (text) => table.foldText(text),
    buildIndexedContent: (fields) => buildIndexedContent(fields, table),
    buildSearchQuery: (raw) => buildSearchQuery(raw, table),
    compare: (a, b) => compareText(collator, a, b),
    sortRows: (rows, select, descending) => sortRows(rows, select, descending, collator),
  };
}
