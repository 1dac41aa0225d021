/**
 * Output rendering helpers
 */

import type { Book, BookColumn } from "@bookshelf/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Columns shown by `search` and `browse`
 */
export const DISPLAYED_COLUMNS: readonly BookColumn[] = ["id", "shelf", "author", "title", "borrowed"];

const COLUMN_LABELS: Record<BookColumn, string> = {
  id: "ID",
  shelf: "Shelf",
  author: "Author",
  title: "Title",
  translator: "Translator",
  originalTitle: "Original title",
  borrowed: "Borrowed",
};

/**
 * Print JSON to stdout
 * @param options.raw - Compact output without indentation
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  console.log(json);
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  return `${codes[color]}${text}\x1b[0m`;
}

export function columnLabel(column: BookColumn): string {
  return COLUMN_LABELS[column];
}

/**
 * Render books as a left-aligned table with a header row
 */
export function formatTable(
  books: readonly Book[],
  columns: readonly BookColumn[] = DISPLAYED_COLUMNS
): string[] {
  const rows = [
    columns.map(columnLabel),
    ...books.map((book) => columns.map((column) => String(book[column]))),
  ];

  const widths = columns.map((_, index) =>
    Math.max(...rows.map((row) => [...(row[index] ?? "")].length))
  );

  return rows.map((row) =>
    row
      .map((cell, index) => cell + " ".repeat((widths[index] ?? 0) - [...cell].length))
      .join("  ")
      .trimEnd()
  );
}

/**
 * "1 book", "3 books"
 */
export function countLabel(count: number): string {
  return `${count} ${count === 1 ? "book" : "books"}`;
}
