/**
 * Core types for the Bookshelf catalog
 */

import type { NormalizationContext } from "./context.js";

/**
 * A catalog record as stored in the `Books` table
 */
export interface Book {
  /** Stable row identifier, shared with the full-text index rowid */
  id: number;
  shelf: string;
  author: string;
  title: string;
  translator: string;
  originalTitle: string;
  /** Free text, usually who has the book */
  borrowed: string;
}

/**
 * Any column a book can be sorted or displayed by
 */
export type BookColumn = keyof Book;

/**
 * Book fields accepted on insert and update (before validation)
 */
export interface BookDraft {
  shelf: string;
  author: string;
  title: string;
  translator?: string;
  originalTitle?: string;
  borrowed?: string;
}

/**
 * Validated book fields, whitespace collapsed and optional fields defaulted
 */
export type BookFields = Omit<Book, "id">;

/**
 * -1, 0 or 1
 */
export type Ordering = -1 | 0 | 1;

/**
 * Current sort of a result list
 *
 * Treated as an immutable value: use `toggleSort` to derive the next one.
 */
export interface SortState<C extends string = BookColumn> {
  readonly column: C;
  readonly descending: boolean;
}

/**
 * Options for opening a catalog
 */
export interface CatalogOptions {
  /** SQLite file path, or ":memory:" (default) */
  path?: string;
  /** Folding and collation context (default: `createNormalizationContext()`) */
  context?: NormalizationContext;
}

/**
 * Catalog interface
 */
export interface Catalog {
  /** The context used for indexing, querying and sorting */
  readonly context: NormalizationContext;

  /**
   * Insert a book and its index row
   * @throws BookValidationError if required fields are missing
   */
  add(draft: BookDraft): Book;

  /**
   * Replace a book's fields and its index row
   * @throws BookNotFoundError if no book has this id
   */
  update(id: number, draft: BookDraft): Book;

  /**
   * Delete a book and its index row
   * @throws BookNotFoundError if no book has this id
   */
  remove(id: number): void;

  get(id: number): Book | null;

  count(): number;

  /**
   * Search by free-form user input (prefix match on every term)
   */
  search(raw: string, sort?: SortState): Book[];

  /**
   * Run an already-built query expression; "" lists every book
   * @throws SearchQueryError if the index rejects the expression
   */
  match(expression: string, sort?: SortState): Book[];

  /**
   * Rebuild every index row from the stored books
   * @returns Number of books reindexed
   */
  reindex(): number;

  close(): void;
}
