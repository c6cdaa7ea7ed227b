import { describe, it, expect } from "vitest";
import { NULL_VALUE, formatValue, isNull, toPrimitive, toValue, valueEquals } from "./value.js";

describe("toValue", () => {
  it("should tag primitives", () => {
    expect(toValue(3)).toEqual({ kind: "integer", value: 3 });
    expect(toValue(2.5)).toEqual({ kind: "double", value: 2.5 });
    expect(toValue("x")).toEqual({ kind: "string", value: "x" });
    expect(toValue(false)).toEqual({ kind: "boolean", value: false });
  });

  it("should map null to the shared null value", () => {
    expect(toValue(null)).toBe(NULL_VALUE);
    expect(isNull(toValue(null))).toBe(true);
  });

  it("should pass tagged values through", () => {
    const value = { kind: "double", value: 1 } as const;
    expect(toValue(value)).toBe(value);
  });

  it("should treat non-finite numbers as doubles", () => {
    expect(toValue(Number.POSITIVE_INFINITY).kind).toBe("double");
  });
});

describe("valueEquals", () => {
  it("should compare integers and doubles numerically", () => {
    expect(valueEquals(toValue(1), { kind: "double", value: 1 })).toBe(true);
    expect(valueEquals(toValue(1), toValue(1.5))).toBe(false);
  });

  it("should only match null with null", () => {
    expect(valueEquals(NULL_VALUE, { kind: "null" })).toBe(true);
    expect(valueEquals(NULL_VALUE, toValue(0))).toBe(false);
    expect(valueEquals(toValue(""), NULL_VALUE)).toBe(false);
  });

  it("should not coerce across kinds", () => {
    expect(valueEquals(toValue("1"), toValue(1))).toBe(false);
    expect(valueEquals(toValue(true), toValue(1))).toBe(false);
    expect(valueEquals(toValue("a"), toValue("a"))).toBe(true);
  });
});

describe("formatValue", () => {
  it("should format each kind", () => {
    expect(formatValue(toValue(100))).toBe("100");
    expect(formatValue(toValue(-0.5))).toBe("-0.5");
    expect(formatValue(toValue(true))).toBe("true");
    expect(formatValue(toValue("NYC"))).toBe("NYC");
    expect(formatValue(NULL_VALUE)).toBe("");
  });
});

describe("toPrimitive", () => {
  it("should unwrap values", () => {
    expect(toPrimitive(toValue("a"))).toBe("a");
    expect(toPrimitive(toValue(7))).toBe(7);
    expect(toPrimitive(NULL_VALUE)).toBeNull();
  });
});
