/**
 * Command tree for the geofeature CLI
 */

import { Command } from "commander";
import { metrics } from "@geofeature/core";
import { createDumpCommand } from "./commands/dump.js";
import { createEnvelopeCommand } from "./commands/envelope.js";
import { createSchemaCommand } from "./commands/schema.js";
import { isVerbose, type GlobalOptions } from "./lib/env.js";
import { paintError } from "./lib/render.js";
import { emitMetric } from "./lib/telemetry.js";
import { VERSION } from "./version.js";

/**
 * Build the program. Commander errors from the root and from every
 * subcommand are thrown (never exit the process), so callers decide how to
 * map them to exit codes.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(paintError(str)),
    })
    .exitOverride();

  program
    .name("geofeature")
    .description("Inspect GeoJSON as schema-sharing feature records")
    .version(VERSION)
    .option("--verbose", "Print metrics and error details on stderr")
    .option("--quiet", "Suppress non-error output");

  // addCommand() does not pass exitOverride or output settings down
  for (const command of [
    createDumpCommand(program),
    createEnvelopeCommand(program),
    createSchemaCommand(program),
  ]) {
    program.addCommand(command.copyInheritedSettings(program));
  }

  program.hook("postAction", () => {
    emitMetric(isVerbose(program.opts<GlobalOptions>()), "core.fields", {
      ...metrics.totals(),
    });
  });

  return program;
}
