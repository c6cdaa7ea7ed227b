/**
 * Command metrics on stderr, printed as `metric <key> name=value ...` in
 * verbose mode only
 */

import type { ReadResult } from "@geofeature/core";
import { writeStderr } from "./io.js";

export type MetricFields = Record<string, string | number | boolean>;

export function formatMetric(key: string, fields: MetricFields): string {
  const pairs = Object.entries(fields).map(([name, value]) => `${name}=${value}`);
  return [`metric ${key}`, ...pairs].join(" ");
}

export function emitMetric(verbose: boolean, key: string, fields: MetricFields): void {
  if (verbose) {
    writeStderr(`${formatMetric(key, fields)}\n`);
  }
}

/**
 * Run `load` and report how long it took, how many features it produced and
 * how many slots their schema ended up with. Failures are reported with
 * `success=false` and rethrown.
 */
export async function timedLoad(
  key: string,
  verbose: boolean,
  load: () => Promise<ReadResult>
): Promise<ReadResult> {
  const start = Date.now();
  try {
    const result = await load();
    emitMetric(verbose, key, {
      duration_ms: Date.now() - start,
      features: result.features.length,
      slots: result.schema.size,
      success: true,
    });
    return result;
  } catch (err) {
    emitMetric(verbose, key, { duration_ms: Date.now() - start, success: false });
    throw err;
  }
}
