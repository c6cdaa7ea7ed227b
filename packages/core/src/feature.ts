/**
 * Feature: one geospatial entity built against a shared Schema
 *
 * Invariants:
 * - The value array starts at the schema size at construction and only grows
 *   through writeOrRegister or bulkReplace; schema growth alone never resizes it
 * - A slot valid in the schema may lie beyond this feature's array
 * - Reads never throw; strict writes do
 * - Geometries are owned by exactly one feature
 */

import { Box2d } from "./box.js";
import {
  GeometryOwnershipError,
  IndexOutOfRangeError,
  InvalidFeatureIdError,
  KeyNotFoundError,
} from "./errors.js";
import type { Geometry } from "./geometry.js";
import { keyValueCursor, type FeatureKeyValue } from "./kv.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import type { Raster } from "./raster.js";
import type { Schema } from "./schema.js";
import {
  NULL_VALUE,
  formatValue,
  toValue,
  valueEquals,
  type AttributeValue,
  type ValueInput,
} from "./value.js";

/**
 * Tracks which feature owns each geometry
 */
const owners = new WeakMap<Geometry, Feature>();

function checkId(id: number): number {
  if (!Number.isSafeInteger(id)) {
    throw new InvalidFeatureIdError(id);
  }
  return id;
}

export class Feature implements Iterable<FeatureKeyValue> {
  #id: number;
  readonly #schema: Schema;
  #data: AttributeValue[];
  #geometries: Geometry[] = [];
  #raster: Raster | undefined;

  constructor(schema: Schema, id: number) {
    this.#id = checkId(id);
    this.#schema = schema;
    this.#data = new Array<AttributeValue>(schema.size).fill(NULL_VALUE);
  }

  get id(): number {
    return this.#id;
  }

  setId(id: number): void {
    this.#id = checkId(id);
  }

  get schema(): Schema {
    return this.#schema;
  }

  /**
   * Current value array length (may be smaller than the schema size)
   */
  get size(): number {
    return this.#data.length;
  }

  /**
   * How many schema slots this feature's array does not cover
   */
  get lag(): number {
    return Math.max(0, this.#schema.size - this.#data.length);
  }

  /**
   * Overwrite the value of an existing slot.
   * @throws KeyNotFoundError if `key` is not in the schema or its slot is
   *   beyond this feature's array
   */
  write(key: string, value: ValueInput): void {
    const index = this.#slotOf(key);
    if (index === undefined) {
      metrics.recordRejectedWrite(key);
      logger.debug("feature.write_rejected", { featureId: this.#id, field: key });
      throw new KeyNotFoundError(key);
    }
    this.#data[index] = toValue(value);
  }

  /**
   * Write `key`, registering it in the shared schema when this feature has no
   * slot for it.
   *
   * After registration the value is appended only if the slot handed out
   * equals this feature's array length. When the schema has already grown past
   * this feature (a sibling registered fields first) the value is discarded;
   * the schema keeps the new name either way.
   *
   * @returns true if the value was stored, false if it was discarded
   */
  writeOrRegister(key: string, value: ValueInput): boolean {
    const existing = this.#slotOf(key);
    if (existing !== undefined) {
      this.#data[existing] = toValue(value);
      return true;
    }

    const index = this.#schema.registerSlot(key);
    if (index === this.#data.length) {
      this.#data.push(toValue(value));
      return true;
    }

    metrics.recordDroppedWrite(key);
    logger.debug("feature.write_dropped", {
      featureId: this.#id,
      field: key,
      details: { slot: index, size: this.#data.length, schemaSize: this.#schema.size },
    });
    return false;
  }

  /**
   * Schema membership only; the slot may still be beyond this feature's array
   */
  hasKey(key: string): boolean {
    return this.#schema.has(key);
  }

  /**
   * Value for a key or slot index; the null value on any miss
   */
  read(keyOrIndex: string | number): AttributeValue {
    const index =
      typeof keyOrIndex === "string" ? this.#schema.lookup(keyOrIndex) : keyOrIndex;
    if (index === undefined || !Number.isInteger(index) || index < 0) {
      return NULL_VALUE;
    }
    return this.#data[index] ?? NULL_VALUE;
  }

  bulkGet(): readonly AttributeValue[] {
    return this.#data;
  }

  /**
   * Replace the whole value array. Keeping it aligned with the schema is up
   * to the caller.
   */
  bulkReplace(values: readonly ValueInput[]): void {
    this.#data = values.map(toValue);
  }

  /**
   * Take ownership of `geometry`
   * @throws GeometryOwnershipError if another (or this) feature already owns it
   */
  addGeometry(geometry: Geometry): void {
    const owner = owners.get(geometry);
    if (owner) {
      throw new GeometryOwnershipError(owner.id);
    }
    owners.set(geometry, this);
    this.#geometries.push(geometry);
  }

  get geometryCount(): number {
    return this.#geometries.length;
  }

  /**
   * @throws IndexOutOfRangeError
   */
  geometryAt(index: number): Geometry {
    const geometry = Number.isInteger(index) ? this.#geometries[index] : undefined;
    if (geometry === undefined) {
      throw new IndexOutOfRangeError(index, this.#geometries.length);
    }
    return geometry;
  }

  geometries(): readonly Geometry[] {
    return this.#geometries;
  }

  /**
   * Bounding box of all geometries, recomputed on every call.
   * Seeded from the first geometry's box; empty when there are none.
   */
  envelope(): Box2d {
    const result = Box2d.empty();
    this.#geometries.forEach((geometry, i) => {
      const box = geometry.envelope();
      if (i === 0) {
        if (!box.isEmpty()) result.init(box.minX, box.minY, box.maxX, box.maxY);
      } else {
        result.expandToInclude(box);
      }
    });
    return result;
  }

  get raster(): Raster | undefined {
    return this.#raster;
  }

  setRaster(raster: Raster | undefined): void {
    this.#raster = raster;
  }

  /**
   * Lazy (name, value) pairs in schema order. Each call starts a fresh cursor.
   */
  entries(): Generator<FeatureKeyValue, void, undefined> {
    return keyValueCursor(this, this.#schema.entries());
  }

  [Symbol.iterator](): Iterator<FeatureKeyValue> {
    return this.entries();
  }

  /**
   * Debug dump. Unlike entries(), slots beyond this feature's array are left out.
   */
  toText(): string {
    let out = `Feature ( id=${this.#id}\n`;
    for (const [name, index] of this.#schema.entries()) {
      const value = this.#data[index];
      if (value === undefined) continue;
      out += valueEquals(value, NULL_VALUE)
        ? `  ${name}:null\n`
        : `  ${name}:${formatValue(value)}\n`;
    }
    out += ")\n";
    return out;
  }

  toString(): string {
    return this.toText();
  }

  /**
   * Release owned geometries (calling their dispose hooks) and the raster
   */
  dispose(): void {
    const geometries = this.#geometries;
    this.#geometries = [];
    this.#raster = undefined;
    for (const geometry of geometries) {
      owners.delete(geometry);
      geometry.dispose?.();
    }
  }

  #slotOf(key: string): number | undefined {
    const index = this.#schema.lookup(key);
    return index !== undefined && index < this.#data.length ? index : undefined;
  }
}
