/**
 * Geometry contract and the GeoJSON-backed implementation
 */

import { bbox } from "@turf/bbox";
import type { Geometry as GeoJsonGeometryObject, GeometryCollection } from "geojson";
import { Box2d } from "./box.js";
import { GeometryDisposedError } from "./errors.js";

/**
 * Anything a feature can own. Features only ever ask for the bounding box,
 * and call `dispose` (when present) once they release the geometry.
 */
export interface Geometry {
  envelope(): Box2d;
  dispose?(): void;
}

/**
 * Single-part geometry types (the parts Multi* geometries split into)
 */
export type SimpleGeometryObject = Exclude<
  GeoJsonGeometryObject,
  GeometryCollection
>;

/**
 * Geometry wrapping a GeoJSON geometry object
 */
export class GeoJsonGeometry implements Geometry {
  #geometry: GeoJsonGeometryObject | undefined;

  constructor(geometry: GeoJsonGeometryObject) {
    this.#geometry = geometry;
  }

  get type(): GeoJsonGeometryObject["type"] {
    return this.#object().type;
  }

  get disposed(): boolean {
    return this.#geometry === undefined;
  }

  envelope(): Box2d {
    const [minX, minY, maxX, maxY] = bbox(this.#object());
    return Box2d.from([minX, minY, maxX, maxY]);
  }

  toGeoJSON(): GeoJsonGeometryObject {
    return this.#object();
  }

  dispose(): void {
    this.#geometry = undefined;
  }

  #object(): GeoJsonGeometryObject {
    if (!this.#geometry) {
      throw new GeometryDisposedError();
    }
    return this.#geometry;
  }
}

/**
 * Split a GeoJSON geometry into single-part geometries.
 * Multi* types yield one part per member; collections are flattened recursively.
 */
export function splitGeometry(geometry: GeoJsonGeometryObject): SimpleGeometryObject[] {
  switch (geometry.type) {
    case "MultiPoint":
      return geometry.coordinates.map(
        (coordinates): SimpleGeometryObject => ({ type: "Point", coordinates })
      );
    case "MultiLineString":
      return geometry.coordinates.map(
        (coordinates): SimpleGeometryObject => ({ type: "LineString", coordinates })
      );
    case "MultiPolygon":
      return geometry.coordinates.map(
        (coordinates): SimpleGeometryObject => ({ type: "Polygon", coordinates })
      );
    case "GeometryCollection":
      return geometry.geometries.flatMap(splitGeometry);
    default:
      return [geometry];
  }
}
