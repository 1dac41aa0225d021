/**
 * Line-oriented search session
 *
 * Every input line is a search. A line identical to the previous one is
 * skipped. Lines starting with ":" are commands:
 *   :sort <column>  sort by column, or flip direction if already sorted by it
 *   :refresh        run the last search again
 *   :quit           end the session (also :q)
 */

import { InvalidArgumentError } from "commander";
import {
  DEFAULT_SORT,
  QueryMemo,
  SearchQueryError,
  columnText,
  toggleSort,
  type Book,
  type Catalog,
  type SortState,
} from "@bookshelf/sdk";
import { parseColumn } from "./arg.js";
import { columnLabel, countLabel, formatTable } from "./render.js";

export interface BrowseOptions {
  /** Initial ordering (default: author ascending) */
  sort?: SortState;
  /** Output sink, one line per call */
  write: (line: string) => void;
}

export interface BrowseSummary {
  /** Searches actually sent to the catalog */
  searches: number;
  sort: SortState;
}

export async function runBrowse(
  catalog: Catalog,
  lines: AsyncIterable<string>,
  options: BrowseOptions
): Promise<BrowseSummary> {
  const { write } = options;
  const memo = new QueryMemo(catalog.context.table);
  let sort = options.sort ?? DEFAULT_SORT;
  let results: Book[] = [];
  let lastLine = "";
  let searches = 0;

  const show = (books: Book[]): void => {
    for (const row of formatTable(books)) {
      write(row);
    }
    write(countLabel(books.length));
  };

  const run = (line: string): void => {
    const { query, changed } = memo.update(line);
    if (!changed) {
      return;
    }
    lastLine = line;
    searches++;
    try {
      results = catalog.match(query, sort);
    } catch (err) {
      if (err instanceof SearchQueryError) {
        results = [];
        write(`Error: ${err.message}`);
        return;
      }
      throw err;
    }
    show(results);
  };

  for await (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed.startsWith(":")) {
      run(line);
      continue;
    }

    const [command = "", argument] = trimmed.slice(1).trim().split(/\s+/);
    if (command === "quit" || command === "q") {
      break;
    }

    if (command === "sort") {
      if (argument === undefined) {
        write("Error: :sort needs a column");
        continue;
      }
      try {
        sort = toggleSort(sort, parseColumn(argument));
      } catch (err) {
        if (err instanceof InvalidArgumentError) {
          write(`Error: ${err.message}`);
          continue;
        }
        throw err;
      }
      const direction = sort.descending ? "descending" : "ascending";
      write(`Sorted by ${columnLabel(sort.column)} (${direction})`);
      results = catalog.context.sortRows(
        results,
        (book) => columnText(book, sort.column),
        sort.descending
      );
      show(results);
      continue;
    }

    if (command === "refresh") {
      memo.reset();
      run(lastLine);
      continue;
    }

    write(`Error: unknown command ":${command}"`);
  }

  return { searches, sort };
}
