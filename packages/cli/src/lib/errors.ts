/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { KeyNotFoundError } from "@geofeature/core";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Map errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: input file or key not found
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CliError || error instanceof CommanderError) {
    return error.exitCode;
  }
  if (error instanceof KeyNotFoundError) {
    return 2;
  }
  if (error instanceof Error && "code" in error && error.code === "ENOENT") {
    return 2;
  }
  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
