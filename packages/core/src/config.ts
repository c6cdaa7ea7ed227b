/**
 * Environment-driven configuration
 */

export interface GeoFeatureConfig {
  /** Print debug log events (GEOFEATURE_DEBUG) */
  debug: boolean;
  /** First id handed out to imported features without an integer id (GEOFEATURE_ID_START) */
  idStart: number;
}

const DEFAULT_ID_START = 1;

/**
 * Resolve configuration from environment variables
 * @param env - Environment to read (default: process.env)
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): GeoFeatureConfig {
  const debugFlag = env.GEOFEATURE_DEBUG;
  const debug = debugFlag !== undefined && debugFlag !== "" && debugFlag !== "0";

  let idStart = DEFAULT_ID_START;
  const rawIdStart = env.GEOFEATURE_ID_START?.trim();
  if (rawIdStart && /^-?\d+$/.test(rawIdStart)) {
    const parsed = Number.parseInt(rawIdStart, 10);
    if (Number.isSafeInteger(parsed)) {
      idStart = parsed;
    }
  }

  return { debug, idStart };
}
