/**
 * geofeature core
 *
 * Compact attribute records for geospatial features sharing one schema
 */

// Values
export type { AttributeValue, ValueKind, ValueInput } from "./value.js";
export {
  NULL_VALUE,
  toValue,
  isNull,
  valueEquals,
  formatValue,
  toPrimitive,
} from "./value.js";

// Schema
export type { SchemaEntry } from "./schema.js";
export { Schema, compareCodePoints } from "./schema.js";

// Feature
export { Feature } from "./feature.js";
export type { FeatureKeyValue, KeyValueSource } from "./kv.js";
export { keyValueCursor } from "./kv.js";

// Geometry, boxes and rasters
export type { BoxTuple } from "./box.js";
export { Box2d } from "./box.js";
export type { Geometry, SimpleGeometryObject } from "./geometry.js";
export { GeoJsonGeometry, splitGeometry } from "./geometry.js";
export type { Raster } from "./raster.js";
export { ImageRaster } from "./raster.js";

// GeoJSON bridge
export type { ParsedFeature, ReadOptions, ReadResult } from "./geojson.js";
export {
  GeometrySchema,
  parseFeatureCollection,
  readFeatures,
  toValueInput,
  toGeoJSON,
} from "./geojson.js";

// Configuration & observability
export type { GeoFeatureConfig } from "./config.js";
export { resolveConfig } from "./config.js";
export type { LogLevel, LogEntry, LogFields, LogSink } from "./observability/logs.js";
export { logger, formatLogEntry } from "./observability/logs.js";
export type { FieldMetrics } from "./observability/metrics.js";
export { metrics } from "./observability/metrics.js";

// Errors
export {
  GeoFeatureError,
  KeyNotFoundError,
  IndexOutOfRangeError,
  GeometryOwnershipError,
  GeometryDisposedError,
  InvalidFeatureIdError,
  GeoJsonParseError,
} from "./errors.js";
