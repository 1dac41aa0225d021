/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { BookValidationError, parseBookId, type BookColumn } from "@bookshelf/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse a book id argument
 */
export function parseIdArgument(value: string): number {
  try {
    return parseBookId(value);
  } catch (err) {
    if (err instanceof BookValidationError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}

const COLUMN_ALIASES = new Map<string, BookColumn>([
  ["id", "id"],
  ["shelf", "shelf"],
  ["author", "author"],
  ["title", "title"],
  ["translator", "translator"],
  ["original-title", "originalTitle"],
  ["originaltitle", "originalTitle"],
  ["borrowed", "borrowed"],
]);

/**
 * Parse a sort column name (case-insensitive, kebab or camel case)
 */
export function parseColumn(value: string): BookColumn {
  const column = COLUMN_ALIASES.get(value.trim().toLowerCase());
  if (column === undefined) {
    throw new InvalidArgumentError(
      `Unknown column "${value}" (expected one of: id, shelf, author, title, translator, original-title, borrowed)`
    );
  }
  return column;
}
