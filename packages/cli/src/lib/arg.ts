/**
 * Option and input decoding
 */

import { InvalidArgumentError } from "commander";

/**
 * Value of `--limit`: a whole number of features, zero included
 */
export function parseLimit(value: string): number {
  const limit = value.trim() === "" ? Number.NaN : Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError("Expected a non-negative whole number.");
  }
  if (!Number.isSafeInteger(limit)) {
    throw new InvalidArgumentError("Limit is too large.");
  }
  return limit;
}

/**
 * Decode JSON text read from `source`, ignoring a leading byte order mark
 */
export function decodeJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text.replace(/^\uFEFF/, ""));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`${source} is not valid JSON: ${err.message}`);
    }
    throw err;
  }
}
