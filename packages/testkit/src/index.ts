/**
 * Test helpers for geofeature packages
 */

export { createTempDir, removeDir, writeJsonFixture, withTempDir } from "./fs.js";
export { RectGeometry, EmptyGeometry } from "./geometry.js";
export { buildSchema, buildFeature, pointFeature, featureCollection } from "./fixtures.js";
