/**
 * Command tree for the bookshelf CLI
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { logger } from "@bookshelf/sdk";
import { registerBookCommands } from "./commands/books.js";
import { registerMaintenanceCommands } from "./commands/maintenance.js";
import { registerSearchCommands } from "./commands/search.js";
import type { GlobalOptions } from "./lib/catalog.js";
import { colorize } from "./lib/render.js";

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

/**
 * Build the program. Parse failures throw CommanderError instead of exiting.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program
    .name("bookshelf")
    .description("Home library catalog with accent-insensitive search")
    .version(readVersion())
    .option("--db <path>", "Catalog database file")
    .option("--locale <tag>", "Collation locale for sorting")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .hook("preAction", () => {
      if (program.opts<GlobalOptions>().verbose) {
        logger.setLevel("debug");
      }
    });

  registerBookCommands(program);
  registerSearchCommands(program);
  registerMaintenanceCommands(program);

  return program;
}
