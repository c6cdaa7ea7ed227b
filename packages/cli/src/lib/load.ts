/**
 * Load features for a command from a file or stdin
 */

import { InvalidArgumentError } from "commander";
import { readFeatures, type ReadResult } from "@geofeature/core";
import { decodeJson } from "./arg.js";
import { resolveInput } from "./env.js";
import { isStdinTTY, readJsonFromFile, readStdin } from "./io.js";

export async function loadFeatures(cliPath?: string): Promise<ReadResult> {
  const input = resolveInput(cliPath);
  if (input) {
    return readFeatures(await readJsonFromFile(input));
  }

  if (isStdinTTY()) {
    throw new InvalidArgumentError(
      "No input provided. Pass a file, set GEOFEATURE_INPUT, or pipe GeoJSON to stdin"
    );
  }

  let stdin: string;
  try {
    stdin = await readStdin(); // Size limit enforced during streaming
  } catch (err) {
    throw new InvalidArgumentError(
      err instanceof Error ? err.message : "Failed to read from stdin"
    );
  }
  if (!stdin.trim()) {
    throw new InvalidArgumentError("stdin is empty");
  }
  return readFeatures(decodeJson(stdin, "stdin"));
}
