/**
 * Error types for feature and schema operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Reads never throw; only strict writes and geometry access do
 */

/**
 * Base class for all geofeature errors
 */
export abstract class GeoFeatureError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown by a strict write when the key is not in the schema, or when its
 * slot lies beyond the feature's own value array
 */
export class KeyNotFoundError extends GeoFeatureError {
  readonly code = "E_KEY_NOT_FOUND";

  constructor(
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(`Key does not exist: '${key}'`, options);
  }
}

/**
 * Thrown when a geometry index is outside the feature's collection
 */
export class IndexOutOfRangeError extends GeoFeatureError {
  readonly code = "E_INDEX_RANGE";

  constructor(
    public readonly index: number,
    public readonly length: number,
    options?: ErrorOptions
  ) {
    super(`Geometry index ${index} out of range (count: ${length})`, options);
  }
}

/**
 * Thrown when a geometry that already belongs to a feature is added again
 */
export class GeometryOwnershipError extends GeoFeatureError {
  readonly code = "E_GEOMETRY_OWNED";

  constructor(
    public readonly ownerId: number,
    options?: ErrorOptions
  ) {
    super(`Geometry is already owned by feature ${ownerId}`, options);
  }
}

/**
 * Thrown when a geometry is used after it has been disposed
 */
export class GeometryDisposedError extends GeoFeatureError {
  readonly code = "E_GEOMETRY_DISPOSED";

  constructor(options?: ErrorOptions) {
    super("Geometry has been disposed", options);
  }
}

/**
 * Thrown when a feature id is not a safe integer
 */
export class InvalidFeatureIdError extends GeoFeatureError {
  readonly code = "E_FEATURE_ID";

  constructor(id: number, options?: ErrorOptions) {
    super(`Feature id must be a safe integer, got ${id}`, options);
  }
}

/**
 * Thrown when GeoJSON input fails validation
 */
export class GeoJsonParseError extends GeoFeatureError {
  readonly code = "E_GEOJSON";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid GeoJSON: ${issues.join("; ")}`, options);
  }
}
