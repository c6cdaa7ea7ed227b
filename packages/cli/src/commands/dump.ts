/**
 * dump: print the debug text of each feature
 */

import { Command } from "commander";
import type { Feature } from "@geofeature/core";
import { parseLimit } from "../lib/arg.js";
import { isVerbose, type GlobalOptions } from "../lib/env.js";
import { loadFeatures } from "../lib/load.js";
import { writeStdout } from "../lib/io.js";
import { timedLoad } from "../lib/telemetry.js";

/**
 * Concatenated debug text of the first `limit` features (all when omitted)
 */
export function renderDump(features: readonly Feature[], limit?: number): string {
  const selected = limit === undefined ? features : features.slice(0, limit);
  return selected.map((feature) => feature.toText()).join("");
}

export function createDumpCommand(program: Command): Command {
  return new Command("dump")
    .description("Print every feature in debug text form")
    .argument("[file]", "GeoJSON file (default: GEOFEATURE_INPUT or stdin)")
    .option("--limit <n>", "Only print the first n features", parseLimit)
    .action(async (file: string | undefined, options: { limit?: number }) => {
      const globals = program.opts<GlobalOptions>();
      const { features } = await timedLoad("cli.dump", isVerbose(globals), () =>
        loadFeatures(file)
      );
      if (!globals.quiet) {
        writeStdout(renderDump(features, options.limit));
      }
    });
}
