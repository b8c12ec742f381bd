#!/usr/bin/env node

/**
 * kvdoc CLI entry point
 */

import { CommanderError, InvalidArgumentError } from "commander";
import { createProgram } from "./program.js";
import type { GlobalOptions } from "./commands/options.js";
import { isVerbose } from "./lib/env.js";
import { mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";

// Top-level error handler
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already reported parse errors, help and version;
    // InvalidArgumentError thrown from an action has not been printed yet
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      process.exit(err.exitCode);
    }

    const opts = program.opts<GlobalOptions>();
    console.error(`Error: ${formatCliError(err, isVerbose(opts.verbose))}`);
    process.exit(mapSdkErrorToExitCode(err));
  }
}

void main();
