/**
 * GeoJSON bridge: build features from a FeatureCollection and back
 */

import { z } from "zod";
import type {
  Feature as GeoJsonFeature,
  Geometry as GeoJsonGeometryObject,
} from "geojson";
import { GeoJsonParseError } from "./errors.js";
import { Feature } from "./feature.js";
import { GeoJsonGeometry, splitGeometry } from "./geometry.js";
import { logger } from "./observability/logs.js";
import { resolveConfig } from "./config.js";
import { Schema } from "./schema.js";
import { toPrimitive, type ValueInput } from "./value.js";

const PositionSchema = z.array(z.number()).min(2);
const RingSchema = z.array(PositionSchema);

export const GeometrySchema: z.ZodType<GeoJsonGeometryObject> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("Point"), coordinates: PositionSchema }),
    z.object({ type: z.literal("MultiPoint"), coordinates: z.array(PositionSchema) }),
    z.object({ type: z.literal("LineString"), coordinates: RingSchema }),
    z.object({ type: z.literal("MultiLineString"), coordinates: z.array(RingSchema) }),
    z.object({ type: z.literal("Polygon"), coordinates: z.array(RingSchema) }),
    z.object({ type: z.literal("MultiPolygon"), coordinates: z.array(z.array(RingSchema)) }),
    z.object({ type: z.literal("GeometryCollection"), geometries: z.array(GeometrySchema) }),
  ])
);

const FeatureSchema = z.object({
  type: z.literal("Feature"),
  id: z.union([z.string(), z.number()]).optional(),
  geometry: GeometrySchema.nullable(),
  properties: z.record(z.string(), z.unknown()).nullable().optional(),
});

const FeatureCollectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(FeatureSchema),
});

const InputSchema = z.union([FeatureCollectionSchema, FeatureSchema]);

export type ParsedFeature = z.infer<typeof FeatureSchema>;

export interface ReadOptions {
  /** Schema to build against (default: a fresh one shared by the result) */
  schema?: Schema;
  /** Id for the first feature lacking an integer id (default: GEOFEATURE_ID_START or 1) */
  idStart?: number;
}

export interface ReadResult {
  schema: Schema;
  features: Feature[];
}

/**
 * Validate a FeatureCollection or single Feature
 * @throws GeoJsonParseError listing every issue
 */
export function parseFeatureCollection(input: unknown): ParsedFeature[] {
  const result = InputSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`
    );
    throw new GeoJsonParseError(issues, { cause: result.error });
  }
  return result.data.type === "FeatureCollection" ? result.data.features : [result.data];
}

/**
 * Build features against one shared schema.
 *
 * Features are built one after another, each against the schema as grown by
 * its predecessors, so new property names are always appended and never
 * dropped.
 */
export function readFeatures(input: unknown, options: ReadOptions = {}): ReadResult {
  const parsed = parseFeatureCollection(input);
  const schema = options.schema ?? new Schema();
  let nextId = options.idStart ?? resolveConfig().idStart;

  const features = parsed.map((source) => {
    const id =
      typeof source.id === "number" && Number.isSafeInteger(source.id) ? source.id : nextId++;
    const feature = new Feature(schema, id);

    for (const [key, raw] of Object.entries(source.properties ?? {})) {
      feature.writeOrRegister(key, toValueInput(raw));
    }

    if (source.geometry) {
      for (const part of splitGeometry(source.geometry)) {
        feature.addGeometry(new GeoJsonGeometry(part));
      }
    } else {
      logger.debug("geojson.feature_without_geometry", { featureId: id });
    }

    return feature;
  });

  return { schema, features };
}

/**
 * Map a GeoJSON property value onto what a feature slot holds.
 * Nested objects and arrays are kept as their JSON text.
 */
export function toValueInput(raw: unknown): ValueInput {
  if (raw === null || raw === undefined) return null;
  switch (typeof raw) {
    case "string":
    case "number":
    case "boolean":
      return raw;
    case "bigint":
      return Number(raw);
    default:
      return JSON.stringify(raw) ?? null;
  }
}

/**
 * Convert a feature to a GeoJSON Feature.
 * Properties follow entries(), so slots past the feature's array appear as null.
 * Several geometries become a GeometryCollection.
 */
export function toGeoJSON(feature: Feature): GeoJsonFeature<GeoJsonGeometryObject | null> {
  const properties: Record<string, string | number | boolean | null> = {};
  for (const [name, value] of feature.entries()) {
    properties[name] = toPrimitive(value);
  }

  const parts: GeoJsonGeometryObject[] = [];
  for (const geometry of feature.geometries()) {
    if (geometry instanceof GeoJsonGeometry) {
      parts.push(geometry.toGeoJSON());
    }
  }

  let geometry: GeoJsonGeometryObject | null = null;
  if (parts.length === 1 && parts[0]) {
    geometry = parts[0];
  } else if (parts.length > 1) {
    geometry = { type: "GeometryCollection", geometries: parts };
  }

  return { type: "Feature", id: feature.id, geometry, properties };
}
