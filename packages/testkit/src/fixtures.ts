/**
 * Schema, feature and GeoJSON builders
 */

import type { Feature as GeoJsonFeature, FeatureCollection, Geometry } from "geojson";
import { Feature, Schema, type ValueInput } from "@geofeature/core";

/**
 * Schema with `names` registered in order (slots 0..n-1)
 */
export function buildSchema(...names: string[]): Schema {
  return new Schema(names);
}

/**
 * Feature whose slots are filled by strict writes
 */
export function buildFeature(
  schema: Schema,
  id: number,
  values: Record<string, ValueInput> = {}
): Feature {
  const feature = new Feature(schema, id);
  for (const [key, value] of Object.entries(values)) {
    feature.write(key, value);
  }
  return feature;
}

export function pointFeature(
  x: number,
  y: number,
  properties: Record<string, unknown> = {},
  id?: number | string
): GeoJsonFeature<Geometry> {
  return {
    type: "Feature",
    ...(id === undefined ? {} : { id }),
    geometry: { type: "Point", coordinates: [x, y] },
    properties,
  };
}

export function featureCollection(
  ...features: GeoJsonFeature<Geometry | null>[]
): FeatureCollection<Geometry | null> {
  return { type: "FeatureCollection", features };
}
