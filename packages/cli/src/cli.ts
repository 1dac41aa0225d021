#!/usr/bin/env -S node --import tsx

/**
 * Bookshelf CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import type { GlobalOptions } from "./lib/catalog.js";
import { isVerbose } from "./lib/env.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already printed its own message (or help/version)
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      return;
    }

    const verbose = program.opts<GlobalOptions>().verbose ?? isVerbose();
    console.error(`Error: ${formatCliError(err, verbose)}`);
    process.exitCode = mapErrorToExitCode(err);
  }
}

void main();
