/**
 * SQLite-backed book catalog with an FTS4 full-text index
 *
 * Each book lives in `Books`; its folded searchable fields live in
 * `BooksFTS` under the same rowid. Every write touches both tables in one
 * transaction.
 */

import Database from "better-sqlite3";
import { z } from "zod";
import { createNormalizationContext, type NormalizationContext } from "./context.js";
import { indexedContentOf } from "./search.js";
import { DEFAULT_SORT, columnText } from "./collation.js";
import { validateBookDraft } from "./validation.js";
import {
  BookshelfError,
  BookNotFoundError,
  CatalogOpenError,
  CatalogWriteError,
  SearchQueryError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import type { Book, BookDraft, BookFields, Catalog, CatalogOptions, SortState } from "./types.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS Books(
    id INTEGER PRIMARY KEY,
    shelf TEXT,
    author TEXT,
    title TEXT,
    translator TEXT,
    original_title TEXT,
    borrowed TEXT
);

CREATE VIRTUAL TABLE IF NOT EXISTS BooksFTS USING fts4(content);
`;

const BOOK_COLUMNS = "id, shelf, author, title, translator, original_title, borrowed";

const nullableText = z
  .string()
  .nullable()
  .transform((value) => value ?? "");

const BookRowSchema = z
  .object({
    id: z.number().int(),
    shelf: nullableText,
    author: nullableText,
    title: nullableText,
    translator: nullableText,
    original_title: nullableText,
    borrowed: nullableText,
  })
  .transform(
    (row): Book => ({
      id: row.id,
      shelf: row.shelf,
      author: row.author,
      title: row.title,
      translator: row.translator,
      originalTitle: row.original_title,
      borrowed: row.borrowed,
    })
  );

const CountRowSchema = z.object({ count: z.number().int() });

function toParams(fields: BookFields): string[] {
  return [
    fields.shelf,
    fields.author,
    fields.title,
    fields.translator,
    fields.originalTitle,
    fields.borrowed,
  ];
}

class SqliteCatalog implements Catalog {
  readonly context: NormalizationContext;
  #db: Database.Database;
  #path: string;

  constructor(db: Database.Database, path: string, context: NormalizationContext) {
    this.#db = db;
    this.#path = path;
    this.context = context;
  }

  add(draft: BookDraft): Book {
    const fields = validateBookDraft(draft);

    const id = this.#write("insert", () => {
      const result = this.#db
        .prepare(
          `INSERT INTO Books(shelf, author, title, translator, original_title, borrowed)
           VALUES(?, ?, ?, ?, ?, ?)`
        )
        .run(...toParams(fields));
      const rowid = Number(result.lastInsertRowid);
      this.#insertIndexRow(rowid, fields);
      return rowid;
    });

    logger.info("book.add", { details: { id } });
    return { id, ...fields };
  }

  update(id: number, draft: BookDraft): Book {
    const fields = validateBookDraft(draft);

    this.#write("update", () => {
      const result = this.#db
        .prepare(
          `UPDATE Books
           SET shelf = ?, author = ?, title = ?,
               translator = ?, original_title = ?, borrowed = ?
           WHERE id = ?`
        )
        .run(...toParams(fields), id);
      if (result.changes === 0) {
        throw new BookNotFoundError(id);
      }

      const indexed = this.#db
        .prepare(`UPDATE BooksFTS SET content = ? WHERE rowid = ?`)
        .run(indexedContentOf(fields, this.context.table), id);
      if (indexed.changes === 0) {
        this.#insertIndexRow(id, fields);
      }
    });

    logger.info("book.update", { details: { id } });
    return { id, ...fields };
  }

  remove(id: number): void {
    this.#write("delete", () => {
      const result = this.#db.prepare(`DELETE FROM Books WHERE id = ?`).run(id);
      if (result.changes === 0) {
        throw new BookNotFoundError(id);
      }
      this.#db.prepare(`DELETE FROM BooksFTS WHERE rowid = ?`).run(id);
    });

    logger.info("book.remove", { details: { id } });
  }

  get(id: number): Book | null {
    const row: unknown = this.#db.prepare(`SELECT ${BOOK_COLUMNS} FROM Books WHERE id = ?`).get(id);
    return row === undefined ? null : BookRowSchema.parse(row);
  }

  count(): number {
    const row: unknown = this.#db.prepare(`SELECT COUNT(*) AS count FROM Books`).get();
    return CountRowSchema.parse(row).count;
  }

  search(raw: string, sort: SortState = DEFAULT_SORT): Book[] {
    return this.match(this.context.buildSearchQuery(raw), sort);
  }

  match(expression: string, sort: SortState = DEFAULT_SORT): Book[] {
    const rows = this.#select(expression);
    const books = rows.map((row) => BookRowSchema.parse(row));

    logger.debug("search.run", { details: { expression, results: books.length } });
    return this.context.sortRows(books, (book) => columnText(book, sort.column), sort.descending);
  }

  reindex(): number {
    const count = this.#write("reindex", () => {
      const books = this.#select("").map((row) => BookRowSchema.parse(row));
      this.#db.prepare(`DELETE FROM BooksFTS`).run();
      for (const book of books) {
        this.#insertIndexRow(book.id, book);
      }
      return books.length;
    });

    logger.info("catalog.reindex", { details: { count } });
    return count;
  }

  close(): void {
    this.#db.close();
    logger.info("catalog.close", { details: { path: this.#path } });
  }

  /**
   * Rows for a query expression; "" selects every book (FTS4 matches
   * nothing for an empty expression)
   */
  #select(expression: string): unknown[] {
    if (expression === "") {
      return this.#db.prepare(`SELECT ${BOOK_COLUMNS} FROM Books ORDER BY id`).all();
    }

    try {
      return this.#db
        .prepare(
          `SELECT ${BOOK_COLUMNS}
           FROM Books
           JOIN BooksFTS ON Books.id = BooksFTS.rowid
           WHERE BooksFTS.content MATCH ?
           ORDER BY Books.id`
        )
        .all(expression);
    } catch (err) {
      logger.warn("search.error", {
        message: err instanceof Error ? err.message : String(err),
        details: { expression },
      });
      throw new SearchQueryError(expression, { cause: err });
    }
  }

  #insertIndexRow(id: number, fields: BookFields): void {
    this.#db
      .prepare(`INSERT INTO BooksFTS(rowid, content) VALUES(?, ?)`)
      .run(id, indexedContentOf(fields, this.context.table));
  }

  /**
   * Run `fn` in a transaction; database failures become CatalogWriteError
   */
  #write<T>(operation: string, fn: () => T): T {
    try {
      return this.#db.transaction(fn)();
    } catch (err) {
      if (err instanceof BookshelfError) {
        throw err;
      }
      logger.error("catalog.write", {
        message: err instanceof Error ? err.message : String(err),
        details: { operation },
      });
      throw new CatalogWriteError(operation, { cause: err });
    }
  }
}

function openDatabase(path: string): Database.Database {
  let db: Database.Database | undefined;
  try {
    db = new Database(path);
    db.exec(SCHEMA);
    return db;
  } catch (err) {
    db?.close();
    throw new CatalogOpenError(path, { cause: err });
  }
}

/**
 * Open (or create) a catalog
 *
 * @throws CatalogOpenError if the file cannot be opened or initialized
 */
export function openCatalog(options: CatalogOptions = {}): Catalog {
  const path = options.path ?? ":memory:";
  const context = options.context ?? createNormalizationContext();
  const db = openDatabase(path);

  logger.info("catalog.open", { details: { path, locale: context.locale } });
  return new SqliteCatalog(db, path, context);
}
