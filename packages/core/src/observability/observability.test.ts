import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { formatLogEntry, logger, type LogLevel } from "./logs.js";
import { metrics } from "./metrics.js";
import { Feature } from "../feature.js";
import { Schema } from "../schema.js";

describe("logger", () => {
  let originalDebug: string | undefined;

  beforeEach(() => {
    originalDebug = process.env.GEOFEATURE_DEBUG;
  });

  afterEach(() => {
    if (originalDebug !== undefined) {
      process.env.GEOFEATURE_DEBUG = originalDebug;
    } else {
      delete process.env.GEOFEATURE_DEBUG;
    }
    logger.setEnabled(true);
    logger.setSink();
    vi.restoreAllMocks();
  });

  it("should print debug events only when GEOFEATURE_DEBUG is set", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    delete process.env.GEOFEATURE_DEBUG;
    logger.debug("schema.grow", { field: "a" });
    expect(debug).not.toHaveBeenCalled();

    process.env.GEOFEATURE_DEBUG = "1";
    logger.debug("schema.grow", { field: "a" });
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0]?.[0]).toMatch(/\[DEBUG\] \[schema\.grow\] \/a$/);
  });

  it("should log dropped writes with the feature and field", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    process.env.GEOFEATURE_DEBUG = "1";

    const schema = new Schema();
    const lagging = new Feature(schema, 9);
    schema.registerSlot("a");
    lagging.writeOrRegister("b", 1);

    const lines = debug.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.includes("[feature.write_dropped] 9/b"))).toBe(true);
  });

  it("should hand formatted lines to a custom sink", () => {
    const lines: Array<[LogLevel, string]> = [];
    logger.setSink((level, line) => lines.push([level, line]));

    logger.warn("feature.write_rejected", { featureId: 3, field: "pop", message: "no slot" });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.[0]).toBe("warn");
    expect(lines[0]?.[1]).toMatch(/^\[.+\] \[WARN\] \[feature\.write_rejected\] 3\/pop no slot$/);
  });

  it("should stay silent when disabled", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    logger.setEnabled(false);

    logger.warn("anything");

    expect(warn).not.toHaveBeenCalled();
  });
});

describe("formatLogEntry", () => {
  it("should lay out the subject, message and details", () => {
    expect(
      formatLogEntry({
        timestamp: "2024-01-01T00:00:00.000Z",
        level: "debug",
        event: "feature.write_dropped",
        featureId: 9,
        field: "b",
        details: { slot: 1, size: 0 },
      })
    ).toBe('[2024-01-01T00:00:00.000Z] [DEBUG] [feature.write_dropped] 9/b {"slot":1,"size":0}');
  });

  it("should leave out an absent subject", () => {
    expect(
      formatLogEntry({ timestamp: "t", level: "info", event: "cli.start", message: "hello" })
    ).toBe("[t] [INFO] [cli.start] hello");
  });

  it("should keep the slash when only the feature id is known", () => {
    expect(formatLogEntry({ timestamp: "t", level: "debug", event: "e", featureId: 0 })).toBe(
      "[t] [DEBUG] [e] 0/"
    );
  });
});

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should sum counters over fields", () => {
    metrics.recordGrowth("a");
    metrics.recordGrowth("b");
    metrics.recordDroppedWrite("b");
    metrics.recordRejectedWrite("c");

    expect(metrics.totals()).toEqual({ growths: 2, droppedWrites: 1, rejectedWrites: 1 });
  });

  it("should reset a single field", () => {
    metrics.recordGrowth("a");
    metrics.recordGrowth("b");

    metrics.reset("a");

    expect(metrics.getMetrics("a")).toBeUndefined();
    expect(metrics.getMetrics("b")).toEqual({ growths: 1, droppedWrites: 0, rejectedWrites: 0 });
  });

  it("should hand out copies", () => {
    metrics.recordGrowth("a");
    const snapshot = metrics.getMetrics("a");
    metrics.recordGrowth("a");

    expect(snapshot?.growths).toBe(1);
  });
});
