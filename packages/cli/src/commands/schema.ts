/**
 * schema: list the attribute slots discovered in the input
 */

import { Command } from "commander";
import type { Feature, Schema } from "@geofeature/core";
import { loadFeatures } from "../lib/load.js";
import { printJson, printLines } from "../lib/render.js";
import { timedLoad } from "../lib/telemetry.js";
import { isVerbose, type GlobalOptions } from "../lib/env.js";

export interface SlotInfo {
  name: string;
  index: number;
  /** Features whose value array covers this slot */
  coverage: number;
}

/**
 * Slots in schema (name) order with per-slot coverage
 */
export function describeSchema(schema: Schema, features: readonly Feature[]): SlotInfo[] {
  return schema.entries().map(([name, index]) => ({
    name,
    index,
    coverage: features.filter((feature) => index < feature.size).length,
  }));
}

export function formatSchemaLines(slots: readonly SlotInfo[], featureCount: number): string[] {
  return slots.map((slot) => `${slot.index}\t${slot.name}\t${slot.coverage}/${featureCount}`);
}

export function createSchemaCommand(program: Command): Command {
  return new Command("schema")
    .description("List attribute names and their slot indices")
    .argument("[file]", "GeoJSON file (default: GEOFEATURE_INPUT or stdin)")
    .option("--json", "Output JSON")
    .action(async (file: string | undefined, options: { json?: boolean }) => {
      const globals = program.opts<GlobalOptions>();
      const { schema, features } = await timedLoad("cli.schema", isVerbose(globals), () =>
        loadFeatures(file)
      );
      if (globals.quiet) return;

      const slots = describeSchema(schema, features);
      if (options.json) {
        printJson({ size: schema.size, features: features.length, slots });
      } else {
        printLines(formatSchemaLines(slots, features.length));
      }
    });
}
