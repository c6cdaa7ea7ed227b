/**
 * Geometry stand-ins with a fixed bounding box
 */

import { Box2d, type Geometry } from "@geofeature/core";

/**
 * Geometry reporting a fixed box. Counts envelope calls and dispose calls.
 */
export class RectGeometry implements Geometry {
  readonly box: Box2d;
  envelopeCalls = 0;
  disposeCalls = 0;

  constructor(minX: number, minY: number, maxX: number, maxY: number) {
    this.box = new Box2d(minX, minY, maxX, maxY);
  }

  envelope(): Box2d {
    this.envelopeCalls++;
    return this.box.clone();
  }

  dispose(): void {
    this.disposeCalls++;
  }
}

/**
 * Geometry without coordinates: its envelope is always empty
 */
export class EmptyGeometry implements Geometry {
  envelope(): Box2d {
    return Box2d.empty();
  }
}
