/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { DEFAULT_LOCALE } from "@bookshelf/sdk";

/**
 * In-memory SQLite database name, passed through untouched
 */
const MEMORY_DB = ":memory:";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the catalog database file
 * Priority: CLI option > BOOKSHELF_DB env var > default "./books.sqlite3"
 */
export function resolveDbPath(cliPath?: string): string {
  const dbPath = cliPath ?? process.env.BOOKSHELF_DB ?? "./books.sqlite3";
  if (dbPath === MEMORY_DB) {
    return dbPath;
  }
  return path.resolve(expandTilde(dbPath));
}

/**
 * Resolve the collation locale
 * Priority: CLI option > BOOKSHELF_LOCALE env var > DEFAULT_LOCALE
 */
export function resolveLocale(cliLocale?: string): string {
  return cliLocale ?? process.env.BOOKSHELF_LOCALE ?? DEFAULT_LOCALE;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.BOOKSHELF_CLI_DEBUG === "1";
}
