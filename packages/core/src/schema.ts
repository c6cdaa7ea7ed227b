/**
 * Shared attribute schema: attribute name → slot index
 *
 * One Schema is shared by many features, so attribute names are stored once.
 * Indices handed out by growth are dense (0, 1, 2, …) and never reused.
 * Iteration is sorted by name in code point order, not insertion order.
 *
 * Growth is not synchronised. When features built on one schema are filled
 * from several async flows or workers, route every registration through a
 * single writer.
 */

import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

export type SchemaEntry = readonly [name: string, index: number];

/**
 * Compare strings by Unicode code point (the byte order of their UTF-8 forms)
 */
export function compareCodePoints(a: string, b: string): number {
  const ai = a[Symbol.iterator]();
  const bi = b[Symbol.iterator]();
  for (;;) {
    const ac = ai.next();
    const bc = bi.next();
    if (ac.done || bc.done) {
      return (ac.done ? 0 : 1) - (bc.done ? 0 : 1);
    }
    const diff = (ac.value.codePointAt(0) ?? 0) - (bc.value.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
}

export class Schema {
  #mapping = new Map<string, number>();
  #sorted: SchemaEntry[] | null = null;
  #version = 0;

  /**
   * @param names - Names to register in order, receiving slots 0..n-1
   */
  constructor(names: Iterable<string> = []) {
    for (const name of names) {
      this.registerSlot(name);
    }
  }

  /**
   * Register `name` at the next free slot.
   *
   * The returned index is computed before the insert is attempted, so for a
   * name that is already registered it is the would-be next slot, not the
   * stored one. Use `lookup` for the stored index.
   */
  registerSlot(name: string): number {
    const index = this.#mapping.size;
    this.#insert(name, index);
    return index;
  }

  /**
   * Register `name` at an externally assigned slot. An existing entry is kept.
   */
  registerExisting(name: string, index: number): void {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`Slot index must be a non-negative integer, got ${index}`);
    }
    this.#insert(name, index);
  }

  /**
   * Number of distinct names
   */
  get size(): number {
    return this.#mapping.size;
  }

  /**
   * Incremented on every successful insertion
   */
  get version(): number {
    return this.#version;
  }

  lookup(name: string): number | undefined {
    return this.#mapping.get(name);
  }

  has(name: string): boolean {
    return this.#mapping.has(name);
  }

  /**
   * (name, index) pairs sorted by name
   */
  entries(): readonly SchemaEntry[] {
    if (!this.#sorted) {
      this.#sorted = [...this.#mapping.entries()].sort(([a], [b]) => compareCodePoints(a, b));
    }
    return this.#sorted;
  }

  names(): string[] {
    return this.entries().map(([name]) => name);
  }

  #insert(name: string, index: number): void {
    if (this.#mapping.has(name)) return;

    this.#mapping.set(name, index);
    this.#sorted = null;
    this.#version++;

    metrics.recordGrowth(name);
    logger.debug("schema.grow", { field: name, details: { index, size: this.#mapping.size } });
  }
}
