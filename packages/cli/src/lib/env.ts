/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the GeoJSON input file
 * Priority: CLI argument > GEOFEATURE_INPUT env var > stdin (undefined)
 */
export function resolveInput(cliPath?: string): string | undefined {
  const input = cliPath ?? process.env.GEOFEATURE_INPUT;
  if (input === undefined || input === "" || input === "-") {
    return undefined;
  }
  return path.resolve(expandTilde(input));
}

/**
 * Options declared on the root command and read by every subcommand
 */
export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Verbose when `--verbose` was passed or GEOFEATURE_CLI_DEBUG=1
 */
export function isVerbose(options: GlobalOptions = {}): boolean {
  return options.verbose === true || process.env.GEOFEATURE_CLI_DEBUG === "1";
}
