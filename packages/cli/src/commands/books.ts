/**
 * Book commands: add, edit, rm, get
 */

import type { Command } from "commander";
import { BookNotFoundError, type BookDraft, type BookFields } from "@bookshelf/sdk";
import { parseIdArgument } from "../lib/arg.js";
import { withCatalog, type GlobalOptions } from "../lib/catalog.js";
import { CliError } from "../lib/errors.js";
import { confirm, isStdinTTY } from "../lib/io.js";
import { printJson } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

interface FieldOptions {
  shelf?: string;
  author?: string;
  title?: string;
  translator?: string;
  originalTitle?: string;
  borrowed?: string;
}

/**
 * Overlay field options on an existing book (or on nothing)
 */
export function mergeDraft(base: BookFields | null, options: FieldOptions): BookDraft {
  return {
    shelf: options.shelf ?? base?.shelf ?? "",
    author: options.author ?? base?.author ?? "",
    title: options.title ?? base?.title ?? "",
    translator: options.translator ?? base?.translator,
    originalTitle: options.originalTitle ?? base?.originalTitle,
    borrowed: options.borrowed ?? base?.borrowed,
  };
}

function hasFields(options: FieldOptions): boolean {
  return Object.values(options).some((value) => value !== undefined);
}

function withFieldOptions(command: Command): Command {
  return command
    .option("--shelf <shelf>", "Shelf label")
    .option("--author <author>", "Author")
    .option("--title <title>", "Title")
    .option("--translator <translator>", "Translator")
    .option("--original-title <title>", "Title in the original language")
    .option("--borrowed <name>", "Who has the book (empty string clears it)");
}

export function registerBookCommands(program: Command): void {
  withFieldOptions(
    program
      .command("add")
      .description("Add a book to the catalog")
      .option("--from <id>", "Start from a copy of an existing book", parseIdArgument)
  ).action(async (options: FieldOptions & { from?: number }) => {
    await withTiming("cli.add", async (timer) => {
      const opts = program.opts<GlobalOptions>();

      await withCatalog(opts, (catalog) => {
        const { from, ...fields } = options;
        let base: BookFields | null = null;
        if (from !== undefined) {
          base = catalog.get(from);
          if (base === null) {
            throw new BookNotFoundError(from);
          }
        }

        const book = catalog.add(mergeDraft(base, fields));
        timer.tag("id", book.id);

        if (!opts.quiet) {
          console.log(`Added book ${book.id}`);
        }
      }, timer);
    });
  });

  withFieldOptions(
    program
      .command("edit")
      .description("Change fields of a book")
      .argument("<id>", "Book id", parseIdArgument)
  ).action(async (id: number, options: FieldOptions) => {
    await withTiming("cli.edit", async (timer) => {
      const opts = program.opts<GlobalOptions>();

      if (!hasFields(options)) {
        throw new CliError("Nothing to change; pass at least one field option");
      }

      await withCatalog(opts, (catalog) => {
        const current = catalog.get(id);
        if (current === null) {
          throw new BookNotFoundError(id);
        }

        catalog.update(id, mergeDraft(current, options));

        if (!opts.quiet) {
          console.log(`Updated book ${id}`);
        }
      }, timer);
    });
  });

  program
    .command("rm")
    .description("Remove a book")
    .argument("<id>", "Book id", parseIdArgument)
    .option("--force", "Remove without confirmation")
    .action(async (id: number, options: { force?: boolean }) => {
      await withTiming("cli.rm", async (timer) => {
        const opts = program.opts<GlobalOptions>();

        await withCatalog(opts, async (catalog) => {
          const book = catalog.get(id);
          if (book === null) {
            throw new BookNotFoundError(id);
          }

          if (!options.force) {
            if (!isStdinTTY()) {
              throw new CliError("Use --force to confirm removal in non-interactive mode");
            }
            if (!(await confirm(`Remove book ${id} "${book.title}"?`))) {
              throw new CliError("Aborted by user");
            }
          }

          catalog.remove(id);

          if (!opts.quiet) {
            console.log(`Removed book ${id}`);
          }
        }, timer);
      });
    });

  program
    .command("get")
    .description("Print a book as JSON")
    .argument("<id>", "Book id", parseIdArgument)
    .option("--raw", "Output raw JSON without formatting")
    .action(async (id: number, options: { raw?: boolean }) => {
      await withTiming("cli.get", async (timer) => {
        const opts = program.opts<GlobalOptions>();

        await withCatalog(opts, (catalog) => {
          const book = catalog.get(id);
          if (book === null) {
            throw new CliError(`Book not found: ${id}`, { exitCode: 2 });
          }
          printJson(book, { raw: options.raw });
        }, timer);
      });
    });
}
