/**
 * Axis-aligned bounding box
 */

export type BoxTuple = [minX: number, minY: number, maxX: number, maxY: number];

/**
 * Mutable rectangle with an explicit empty state.
 *
 * The empty box stores (+Inf, +Inf, -Inf, -Inf), which is also what
 * @turf/bbox reports for geometries without coordinates. `expandToInclude`
 * skips empty boxes, and an empty receiver takes the other box as is.
 */
export class Box2d {
  #minX = Infinity;
  #minY = Infinity;
  #maxX = -Infinity;
  #maxY = -Infinity;

  constructor(minX?: number, minY?: number, maxX?: number, maxY?: number) {
    if (
      minX !== undefined &&
      minY !== undefined &&
      maxX !== undefined &&
      maxY !== undefined
    ) {
      this.init(minX, minY, maxX, maxY);
    }
  }

  static empty(): Box2d {
    return new Box2d();
  }

  static from([minX, minY, maxX, maxY]: readonly [number, number, number, number]): Box2d {
    const box = new Box2d();
    // Keep the empty sentinel as reported rather than reordering it
    if (minX > maxX || minY > maxY) return box;
    box.init(minX, minY, maxX, maxY);
    return box;
  }

  get minX(): number {
    return this.#minX;
  }

  get minY(): number {
    return this.#minY;
  }

  get maxX(): number {
    return this.#maxX;
  }

  get maxY(): number {
    return this.#maxY;
  }

  get width(): number {
    return this.isEmpty() ? 0 : this.#maxX - this.#minX;
  }

  get height(): number {
    return this.isEmpty() ? 0 : this.#maxY - this.#minY;
  }

  /**
   * Set all four edges. Corners may be given in any order.
   */
  init(x0: number, y0: number, x1: number, y1: number): this {
    this.#minX = Math.min(x0, x1);
    this.#minY = Math.min(y0, y1);
    this.#maxX = Math.max(x0, x1);
    this.#maxY = Math.max(y0, y1);
    return this;
  }

  isEmpty(): boolean {
    return !(this.#minX <= this.#maxX && this.#minY <= this.#maxY);
  }

  /**
   * Grow to cover `other` (union in place)
   */
  expandToInclude(other: Box2d): this {
    if (other.isEmpty()) return this;
    if (this.isEmpty()) {
      return this.init(other.minX, other.minY, other.maxX, other.maxY);
    }
    this.#minX = Math.min(this.#minX, other.minX);
    this.#minY = Math.min(this.#minY, other.minY);
    this.#maxX = Math.max(this.#maxX, other.maxX);
    this.#maxY = Math.max(this.#maxY, other.maxY);
    return this;
  }

  equals(other: Box2d): boolean {
    if (this.isEmpty() || other.isEmpty()) {
      return this.isEmpty() && other.isEmpty();
    }
    return (
      this.#minX === other.minX &&
      this.#minY === other.minY &&
      this.#maxX === other.maxX &&
      this.#maxY === other.maxY
    );
  }

  clone(): Box2d {
    const copy = new Box2d();
    if (!this.isEmpty()) copy.init(this.#minX, this.#minY, this.#maxX, this.#maxY);
    return copy;
  }

  toArray(): BoxTuple {
    return [this.#minX, this.#minY, this.#maxX, this.#maxY];
  }

  toString(): string {
    if (this.isEmpty()) return "box2d(empty)";
    return `box2d(${this.#minX},${this.#minY},${this.#maxX},${this.#maxY})`;
  }
}
