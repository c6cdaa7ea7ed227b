import { describe, it, expect } from "vitest";
import { resolveConfig } from "./config.js";

describe("resolveConfig", () => {
  it("should use defaults for an empty environment", () => {
    expect(resolveConfig({})).toEqual({ debug: false, idStart: 1 });
  });

  it("should read debug and id start", () => {
    expect(resolveConfig({ GEOFEATURE_DEBUG: "1", GEOFEATURE_ID_START: "100" })).toEqual({
      debug: true,
      idStart: 100,
    });
  });

  it("should treat 0 and empty as debug off", () => {
    expect(resolveConfig({ GEOFEATURE_DEBUG: "0" }).debug).toBe(false);
    expect(resolveConfig({ GEOFEATURE_DEBUG: "" }).debug).toBe(false);
  });

  it("should ignore an id start that is not an integer", () => {
    expect(resolveConfig({ GEOFEATURE_ID_START: "abc" }).idStart).toBe(1);
    expect(resolveConfig({ GEOFEATURE_ID_START: "1.5" }).idStart).toBe(1);
    expect(resolveConfig({ GEOFEATURE_ID_START: " -4 " }).idStart).toBe(-4);
  });
});
