/**
 * Catalog setup for CLI commands
 */

import {
  createNormalizationContext,
  openCatalog,
  type Catalog,
  type NormalizationContext,
} from "@bookshelf/sdk";
import { resolveDbPath, resolveLocale } from "./env.js";
import { CliError } from "./errors.js";
import type { CommandTimer } from "./telemetry.js";

/**
 * Global options shared by every command
 */
export type GlobalOptions = {
  db?: string;
  locale?: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Build a normalization context for the configured locale
 */
export function createCliContext(locale?: string): NormalizationContext {
  const resolved = resolveLocale(locale);
  try {
    return createNormalizationContext({ locale: resolved });
  } catch (err) {
    if (err instanceof RangeError) {
      throw new CliError(`Invalid locale "${resolved}"`, { cause: err });
    }
    throw err;
  }
}

/**
 * Open the catalog named by --db / BOOKSHELF_DB
 */
export function openCliCatalog(options: GlobalOptions): Catalog {
  return openCatalog({
    path: resolveDbPath(options.db),
    context: createCliContext(options.locale),
  });
}

/**
 * Run a function against an open catalog, closing it afterwards
 * @param timer - Tagged with the database path when given
 */
export async function withCatalog<T>(
  options: GlobalOptions,
  fn: (catalog: Catalog) => Promise<T> | T,
  timer?: CommandTimer
): Promise<T> {
  timer?.tag("db", resolveDbPath(options.db));
  const catalog = openCliCatalog(options);
  try {
    return await fn(catalog);
  } finally {
    catalog.close();
  }
}
