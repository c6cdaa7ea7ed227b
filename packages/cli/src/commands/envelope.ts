/**
 * envelope: bounding boxes per feature and overall
 */

import { Command } from "commander";
import { Box2d, type BoxTuple, type Feature } from "@geofeature/core";
import { loadFeatures } from "../lib/load.js";
import { printJson, printLines } from "../lib/render.js";
import { timedLoad } from "../lib/telemetry.js";
import { isVerbose, type GlobalOptions } from "../lib/env.js";

export interface EnvelopeSummary {
  features: Array<{ id: number; bbox: BoxTuple | null }>;
  bbox: BoxTuple | null;
}

function toTuple(box: Box2d): BoxTuple | null {
  return box.isEmpty() ? null : box.toArray();
}

export function summarizeEnvelopes(features: readonly Feature[]): EnvelopeSummary {
  const total = Box2d.empty();
  const rows = features.map((feature) => {
    const box = feature.envelope();
    total.expandToInclude(box);
    return { id: feature.id, bbox: toTuple(box) };
  });
  return { features: rows, bbox: toTuple(total) };
}

/**
 * One `<id>\t<box>` line per feature, then `total\t<box>`
 */
export function formatEnvelopeLines(features: readonly Feature[]): string[] {
  const total = Box2d.empty();
  const lines = features.map((feature) => {
    const box = feature.envelope();
    total.expandToInclude(box);
    return `${feature.id}\t${box.toString()}`;
  });
  lines.push(`total\t${total.toString()}`);
  return lines;
}

export function createEnvelopeCommand(program: Command): Command {
  return new Command("envelope")
    .description("Print the bounding box of each feature and of the whole input")
    .argument("[file]", "GeoJSON file (default: GEOFEATURE_INPUT or stdin)")
    .option("--json", "Output JSON")
    .action(async (file: string | undefined, options: { json?: boolean }) => {
      const globals = program.opts<GlobalOptions>();
      const { features } = await timedLoad("cli.envelope", isVerbose(globals), () =>
        loadFeatures(file)
      );
      if (globals.quiet) return;

      if (options.json) {
        printJson(summarizeEnvelopes(features));
      } else {
        printLines(formatEnvelopeLines(features));
      }
    });
}
