/**
 * Locale-aware ordering for displayed rows
 */

import type { Book, BookColumn, Ordering, SortState } from "./types.js";

/**
 * Collator options exposed to callers
 */
export interface CollatorOptions {
  /** Compare digit runs by value ("2" < "10"); default false */
  numeric?: boolean;
}

/**
 * Sort used before the user picks a column
 */
export const DEFAULT_SORT: SortState = { column: "author", descending: false };

/**
 * Create a collator for on-screen sorting
 *
 * @throws RangeError if `locale` is not a well-formed language tag
 */
export function createCollator(locale: string, options: CollatorOptions = {}): Intl.Collator {
  return new Intl.Collator(locale, {
    usage: "sort",
    numeric: options.numeric ?? false,
  });
}

/**
 * Compare two display strings by collation (not by codepoint)
 */
export function compareText(collator: Intl.Collator, a: string, b: string): Ordering {
  const cmp = collator.compare(a, b);
  return cmp < 0 ? -1 : cmp > 0 ? 1 : 0;
}

/**
 * Stable sort of rows by the collated value of one column
 *
 * Absent values sort as the empty string. Descending order negates the
 * comparison, so rows that compare equal keep their prior relative order
 * in both directions.
 *
 * @returns New sorted array; `rows` is not modified
 */
export function sortRows<Row>(
  rows: readonly Row[],
  select: (row: Row) => string | null | undefined,
  descending: boolean,
  collator: Intl.Collator
): Row[] {
  const keyed = rows.map((row, index) => ({ row, index, key: select(row) ?? "" }));

  keyed.sort((a, b) => {
    const cmp = compareText(collator, a.key, b.key);
    if (cmp !== 0) {
      return descending ? -cmp : cmp;
    }
    return a.index - b.index;
  });

  return keyed.map((entry) => entry.row);
}

/**
 * Next sort state after the user picks `column`
 *
 * Picking the current column flips direction; any other column starts
 * ascending.
 */
export function toggleSort<C extends string>(state: SortState<C>, column: C): SortState<C> {
  if (state.column === column) {
    return { column, descending: !state.descending };
  }
  return { column, descending: false };
}

/**
 * Display value of a book column for sorting
 */
export function columnText(book: Book, column: BookColumn): string {
  return String(book[column]);
}
