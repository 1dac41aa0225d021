/**
 * Indexed content and prefix-query construction
 *
 * Both sides fold through the same table; if they ever diverge, search
 * recall drops without any error.
 */

import type { FoldTable } from "./fold.js";
import type { Book } from "./types.js";

/**
 * Fields folded into the full-text index, in index order
 */
export const SEARCHABLE_COLUMNS = ["author", "title", "translator", "originalTitle"] as const;

export type SearchableColumn = (typeof SEARCHABLE_COLUMNS)[number];

/**
 * Marker the index reads as "match the rest of the word"
 */
export const PREFIX_WILDCARD = "*";

/**
 * Build the folded blob stored in the full-text index
 *
 * Empty and absent fields are dropped; the rest are joined with one space.
 */
export function buildIndexedContent(
  fields: readonly (string | null | undefined)[],
  table: FoldTable
): string {
  const present = fields.filter((field): field is string => Boolean(field));
  return table.foldText(present.join(" "));
}

/**
 * Indexed content for a book's searchable fields
 */
export function indexedContentOf(book: Pick<Book, SearchableColumn>, table: FoldTable): string {
  return buildIndexedContent(
    SEARCHABLE_COLUMNS.map((column) => book[column]),
    table
  );
}

/**
 * Split raw input into non-empty whitespace-separated tokens
 */
export function tokenize(raw: string): string[] {
  return raw.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Build a prefix-match query expression from raw user input
 *
 * @example
 * buildSearchQuery("Stanisław  Lem", table) // => "Stanislaw* Lem*"
 */
export function buildSearchQuery(raw: string, table: FoldTable): string {
  const expression = tokenize(raw)
    .map((token) => `${token}${PREFIX_WILDCARD}`)
    .join(" ");
  return table.foldText(expression);
}

/**
 * Result of feeding input to a QueryMemo
 */
export interface QueryUpdate {
  /** Query expression for the current input */
  query: string;
  /** False when the input equals the previous input */
  changed: boolean;
}

/**
 * Rebuilds the query only when the raw input changes
 *
 * Keystrokes that leave the search text as it was (cursor keys, modifiers)
 * do not re-run the search.
 */
export class QueryMemo {
  readonly #table: FoldTable;
  #lastRaw: string | null = null;
  #lastQuery = "";

  constructor(table: FoldTable) {
    this.#table = table;
  }

  update(raw: string): QueryUpdate {
    if (raw === this.#lastRaw) {
      return { query: this.#lastQuery, changed: false };
    }
    this.#lastRaw = raw;
    this.#lastQuery = buildSearchQuery(raw, this.#table);
    return { query: this.#lastQuery, changed: true };
  }

  /**
   * Forget the last input so the next update re-runs the search
   * (after a write changed what the same query returns)
   */
  reset(): void {
    this.#lastRaw = null;
  }

  get query(): string {
    return this.#lastQuery;
  }
}
