#!/usr/bin/env node

/**
 * geofeature CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { isVerbose, type GlobalOptions } from "./lib/env.js";

async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Help and version output arrive as CommanderErrors with exit code 0
    if (err instanceof CommanderError && err.exitCode === 0) {
      return;
    }

    const verbose = isVerbose(program.opts<GlobalOptions>());
    // Commander already printed its own usage errors
    if (!(err instanceof CommanderError)) {
      console.error(`Error: ${formatCliError(err, verbose)}`);
    }
    process.exitCode = mapErrorToExitCode(err);
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${formatCliError(err, true)}`);
  process.exitCode = 1;
});
