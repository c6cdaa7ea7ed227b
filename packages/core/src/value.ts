/**
 * Attribute values stored in feature slots
 */

export type AttributeValue =
  | { readonly kind: "null" }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "integer"; readonly value: number }
  | { readonly kind: "double"; readonly value: number }
  | { readonly kind: "string"; readonly value: string };

export type ValueKind = AttributeValue["kind"];

/**
 * Anything a feature write accepts: a tagged value or a plain JS primitive
 */
export type ValueInput = AttributeValue | string | number | boolean | null;

/**
 * The distinguished null/default value. Every fresh slot holds this instance.
 */
export const NULL_VALUE: AttributeValue = Object.freeze({ kind: "null" });

/**
 * Wrap a primitive as an AttributeValue.
 * Integral finite numbers become "integer", every other number "double".
 */
export function toValue(input: ValueInput): AttributeValue {
  if (input === null) return NULL_VALUE;

  switch (typeof input) {
    case "boolean":
      return { kind: "boolean", value: input };
    case "number":
      return Number.isInteger(input)
        ? { kind: "integer", value: input }
        : { kind: "double", value: input };
    case "string":
      return { kind: "string", value: input };
    default:
      return input;
  }
}

export function isNull(value: AttributeValue): boolean {
  return value.kind === "null";
}

/**
 * Value equality. Integers and doubles compare numerically, so 1 equals 1.0;
 * null only equals null.
 */
export function valueEquals(a: AttributeValue, b: AttributeValue): boolean {
  if (a.kind === "null" || b.kind === "null") {
    return a.kind === b.kind;
  }
  if (isNumeric(a) && isNumeric(b)) {
    return a.value === b.value;
  }
  if (a.kind === "boolean" && b.kind === "boolean") {
    return a.value === b.value;
  }
  if (a.kind === "string" && b.kind === "string") {
    return a.value === b.value;
  }
  return false;
}

function isNumeric(
  v: AttributeValue
): v is { readonly kind: "integer" | "double"; readonly value: number } {
  return v.kind === "integer" || v.kind === "double";
}

/**
 * Text form used by the debug dump. Null formats as the empty string;
 * callers that need the literal "null" check for it first.
 */
export function formatValue(value: AttributeValue): string {
  switch (value.kind) {
    case "null":
      return "";
    case "boolean":
      return value.value ? "true" : "false";
    case "integer":
    case "double":
      return String(value.value);
    case "string":
      return value.value;
  }
}

/**
 * Unwrap to the JS primitive (null for the null value)
 */
export function toPrimitive(value: AttributeValue): string | number | boolean | null {
  return value.kind === "null" ? null : value.value;
}
