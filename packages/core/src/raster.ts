/**
 * Raster contract and an in-memory RGBA implementation
 */

import { Box2d } from "./box.js";

/**
 * Pixel data attached to a feature. Features hold a shared reference and
 * never look inside it.
 */
export interface Raster {
  readonly extent: Box2d;
  readonly width: number;
  readonly height: number;
}

/**
 * RGBA image covering a geographic extent
 */
export class ImageRaster implements Raster {
  readonly extent: Box2d;
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;

  constructor(extent: Box2d, width: number, height: number, data?: Uint8ClampedArray) {
    if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
      throw new RangeError(`Raster dimensions must be positive integers, got ${width}x${height}`);
    }

    const expected = width * height * 4;
    if (data && data.length !== expected) {
      throw new RangeError(`Raster data must hold ${expected} bytes, got ${data.length}`);
    }

    this.extent = extent.clone();
    this.width = width;
    this.height = height;
    this.data = data ?? new Uint8ClampedArray(expected);
  }
}
