/**
 * Key/value traversal of a feature in schema order
 */

import type { SchemaEntry } from "./schema.js";
import type { AttributeValue } from "./value.js";

export type FeatureKeyValue = readonly [name: string, value: AttributeValue];

/**
 * The slice of a feature the cursor needs
 */
export interface KeyValueSource {
  read(index: number): AttributeValue;
}

/**
 * Walk `entries` (a snapshot of the schema's sorted entries) and pair each
 * name with the source's value at that slot. Slots past the source's array
 * yield the null value rather than being skipped.
 *
 * Mutating the feature or its schema while a cursor is open is undefined.
 */
export function* keyValueCursor(
  source: KeyValueSource,
  entries: readonly SchemaEntry[]
): Generator<FeatureKeyValue, void, undefined> {
  for (const [name, index] of entries) {
    yield [name, source.read(index)];
  }
}
