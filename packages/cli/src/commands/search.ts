/**
 * Search commands: search, browse
 */

import type { Command } from "commander";
import { DEFAULT_SORT, type BookColumn, type SortState } from "@bookshelf/sdk";
import { parseColumn, parseNonNegativeInt } from "../lib/arg.js";
import { runBrowse } from "../lib/browse.js";
import { withCatalog, type GlobalOptions } from "../lib/catalog.js";
import { isStdinTTY, openLineReader, writeStderr } from "../lib/io.js";
import { countLabel, formatTable, printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface SortOptions {
  sort?: BookColumn;
  desc?: boolean;
}

function sortFrom(options: SortOptions): SortState {
  return {
    column: options.sort ?? DEFAULT_SORT.column,
    descending: options.desc ?? false,
  };
}

export function registerSearchCommands(program: Command): void {
  program
    .command("search")
    .description("Find books by author, title, translator or original title")
    .argument("[terms...]", "Word prefixes; every term must match")
    .option("--sort <column>", "Sort column (default: author)", parseColumn)
    .option("--desc", "Sort descending")
    .option("--json", "Output as JSON array")
    .option("--limit <n>", "Maximum number of results", (val) => parseNonNegativeInt(val, "--limit"))
    .action(async (terms: string[], options: SortOptions & { json?: boolean; limit?: number }) => {
      await withTiming("cli.search", async (timer) => {
        const opts = program.opts<GlobalOptions>();

        await withCatalog(opts, (catalog) => {
          let books = catalog.search(terms.join(" "), sortFrom(options));

          if (options.limit !== undefined) {
            books = books.slice(0, options.limit);
          }
          timer.tag("results", books.length);

          if (options.json) {
            printJson(books);
            return;
          }

          printLines(formatTable(books));
          if (!opts.quiet) {
            console.log(countLabel(books.length));
          }
        }, timer);
      });
    });

  program
    .command("browse")
    .description("Interactive search: one query per line, :sort <column>, :quit")
    .option("--sort <column>", "Initial sort column (default: author)", parseColumn)
    .option("--desc", "Sort descending")
    .action(async (options: SortOptions) => {
      await withTiming("cli.browse", async (timer) => {
        const opts = program.opts<GlobalOptions>();

        if (isStdinTTY() && !opts.quiet) {
          writeStderr("Type to search. :sort <column> changes order, :quit exits.\n");
        }

        await withCatalog(opts, async (catalog) => {
          const reader = openLineReader();
          try {
            const summary = await runBrowse(catalog, reader, {
              sort: sortFrom(options),
              write: (line) => console.log(line),
            });
            timer.tag("searches", summary.searches);
          } finally {
            reader.close();
          }
        }, timer);
      });
    });
}
