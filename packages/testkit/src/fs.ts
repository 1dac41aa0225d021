/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openCatalog } from "@bookshelf/sdk";
import type { BookDraft, Catalog, CatalogOptions } from "@bookshelf/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "bookshelf-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "bookshelf-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

export interface TempCatalogOptions extends Omit<CatalogOptions, "path"> {
  /** Books added before fn runs */
  seed?: readonly BookDraft[];
}

/**
 * Execute a function with a catalog in a temporary file, cleaning up after
 * @param fn - Receives the open catalog and its database path
 * @returns Result of fn
 */
export async function withTempCatalog<T>(
  fn: (catalog: Catalog, path: string) => Promise<T> | T,
  options: TempCatalogOptions = {}
): Promise<T> {
  const { seed = [], ...catalogOptions } = options;
  const dir = await createTempDir();
  const path = join(dir, "books.sqlite3");

  let catalog: Catalog;
  try {
    catalog = openCatalog({ ...catalogOptions, path });
    for (const draft of seed) {
      catalog.add(draft);
    }
  } catch (err) {
    await removeDir(dir);
    throw err;
  }

  try {
    return await fn(catalog, path);
  } finally {
    catalog.close();
    await removeDir(dir);
  }
}
