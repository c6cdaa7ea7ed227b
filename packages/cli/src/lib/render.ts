/**
 * Stdout rendering for command results
 */

import { writeStdout } from "./io.js";

export function printJson(data: unknown): void {
  writeStdout(`${JSON.stringify(data, null, 2)}\n`);
}

/**
 * All lines in a single write; an empty list prints nothing
 */
export function printLines(lines: readonly string[]): void {
  if (lines.length > 0) {
    writeStdout(`${lines.join("\n")}\n`);
  }
}

/**
 * Red on a terminal, unchanged otherwise
 */
export function paintError(text: string, stream: NodeJS.WriteStream = process.stderr): string {
  return stream.isTTY ? `\x1b[31m${text}\x1b[0m` : text;
}
