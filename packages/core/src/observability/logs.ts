/**
 * Structured logging for schema and feature events
 *
 * Lines read `[timestamp] [LEVEL] [event] featureId/field message {details}`.
 * Debug lines are printed only when GEOFEATURE_DEBUG is set.
 */

import { resolveConfig } from "../config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  featureId?: number;
  field?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export interface LogEntry extends LogFields {
  timestamp: string;
  level: LogLevel;
  event: string;
}

/**
 * Receives every formatted line that passes the level gate
 */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  console[level](line);
};

export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  // Subject is `id/field`, with either side blank when unknown
  if (entry.featureId !== undefined || entry.field !== undefined) {
    parts.push(`${entry.featureId ?? ""}/${entry.field ?? ""}`);
  }
  if (entry.message) parts.push(entry.message);
  if (entry.details) parts.push(JSON.stringify(entry.details));

  return parts.join(" ");
}

class Logger {
  #enabled = true;
  #sink: LogSink = consoleSink;

  log(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (!this.#enabled) return;
    if (level === "debug" && !resolveConfig().debug) return;

    this.#sink(
      level,
      formatLogEntry({ ...fields, timestamp: new Date().toISOString(), level, event })
    );
  }

  debug(event: string, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.log("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.log("error", event, fields);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  /**
   * Route lines somewhere other than the console; no argument restores it
   */
  setSink(sink?: LogSink): void {
    this.#sink = sink ?? consoleSink;
  }
}

export const logger = new Logger();
