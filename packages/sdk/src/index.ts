/**
 * Bookshelf SDK
 *
 * Home library catalog with accent-insensitive prefix search and
 * locale-aware sorting
 */

// Re-export types
export type {
  Book,
  BookColumn,
  BookDraft,
  BookFields,
  Ordering,
  SortState,
  Catalog,
  CatalogOptions,
} from "./types.js";

// Folding
export type { FoldTableOptions, FoldStats } from "./fold.js";
export { FoldTable, FOLD_OVERRIDES } from "./fold.js";

// Query and index content
export type { QueryUpdate, SearchableColumn } from "./search.js";
export {
  SEARCHABLE_COLUMNS,
  PREFIX_WILDCARD,
  buildIndexedContent,
  indexedContentOf,
  buildSearchQuery,
  tokenize,
  QueryMemo,
} from "./search.js";

// Collation
export type { CollatorOptions } from "./collation.js";
export {
  DEFAULT_SORT,
  createCollator,
  compareText,
  sortRows,
  toggleSort,
  columnText,
} from "./collation.js";

// Context
export type { NormalizationContext, NormalizationOptions } from "./context.js";
export { DEFAULT_LOCALE, createNormalizationContext } from "./context.js";

// Validation
export { BookDraftSchema, validateBookDraft, parseBookId, collapseWhitespace } from "./validation.js";

// Logging
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { Logger, logger, parseLogLevel } from "./observability/logs.js";

// Re-export errors
export {
  BookshelfError,
  BookNotFoundError,
  BookValidationError,
  CatalogOpenError,
  CatalogWriteError,
  SearchQueryError,
} from "./errors.js";

export { openCatalog } from "./catalog.js";
