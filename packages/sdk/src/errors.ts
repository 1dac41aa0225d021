/**
 * Error types for catalog operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all Bookshelf errors
 */
export abstract class BookshelfError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when no book has the requested id
 */
export class BookNotFoundError extends BookshelfError {
  readonly code = "NOT_FOUND";

  constructor(
    public readonly id: number,
    options?: ErrorOptions
  ) {
    super(`Book not found: ${id}`, options);
  }
}

/**
 * Thrown when book fields fail validation
 */
export class BookValidationError extends BookshelfError {
  readonly code = "VALIDATION_ERROR";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid book: ${issues.join("; ")}`, options);
  }
}

/**
 * Thrown when the catalog database cannot be opened or initialized
 */
export class CatalogOpenError extends BookshelfError {
  readonly code = "OPEN_ERROR";

  constructor(path: string, options?: ErrorOptions) {
    super(`Failed to open catalog: ${path}`, options);
  }
}

/**
 * Thrown when an insert, update, delete or reindex fails in the database
 */
export class CatalogWriteError extends BookshelfError {
  readonly code = "WRITE_ERROR";

  constructor(operation: string, options?: ErrorOptions) {
    super(`Catalog ${operation} failed`, options);
  }
}

/**
 * Thrown when the full-text index rejects a query expression
 *
 * The index's own message is kept in the message and as `cause`.
 */
export class SearchQueryError extends BookshelfError {
  readonly code = "QUERY_ERROR";

  constructor(
    public readonly expression: string,
    options?: ErrorOptions
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Search query rejected by index "${expression}"${reason}`, options);
  }
}
