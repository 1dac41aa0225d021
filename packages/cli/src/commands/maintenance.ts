/**
 * Catalog maintenance commands: count, reindex, fold
 */

import type { Command } from "commander";
import { FoldTable } from "@bookshelf/sdk";
import { withCatalog, type GlobalOptions } from "../lib/catalog.js";
import { countLabel } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

export function registerMaintenanceCommands(program: Command): void {
  program
    .command("count")
    .description("Print the number of books")
    .action(async () => {
      await withTiming("cli.count", async (timer) => {
        const opts = program.opts<GlobalOptions>();
        await withCatalog(opts, (catalog) => {
          const count = catalog.count();
          timer.tag("books", count);
          console.log(countLabel(count));
        }, timer);
      });
    });

  program
    .command("reindex")
    .description("Rebuild the search index from the stored books")
    .action(async () => {
      await withTiming("cli.reindex", async (timer) => {
        const opts = program.opts<GlobalOptions>();
        await withCatalog(opts, (catalog) => {
          const count = catalog.reindex();
          timer.tag("books", count);
          if (!opts.quiet) {
            console.log(`Reindexed ${countLabel(count)}`);
          }
        }, timer);
      });
    });

  program
    .command("fold")
    .description("Print text the way the search index sees it")
    .argument("<text...>", "Text to fold")
    .action(async (text: string[]) => {
      await withTiming("cli.fold", async () => {
        console.log(new FoldTable().foldText(text.join(" ")));
      });
    });
}
