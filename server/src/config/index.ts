/**
 * Pipeline constants.
 * Values that never vary per deployment live here; anything environment-driven
 * belongs in env.ts.
 */

// === Area resolution ===

/** Half-width (degrees) of the square synthesized when the geocoder reports no extent (~1km). */
export const BBOX_FALLBACK_HALF_WIDTH_DEG = 0.009;

// === POI extraction ===

/** Default search radius around the resolved coordinate. */
export const DEFAULT_POI_RADIUS_METERS = 1500;

/** Server-side timeout (seconds) embedded in the Overpass QL header. */
export const OVERPASS_QUERY_TIMEOUT_S = 300;

/** Statuses that mean "this mirror is overloaded, try the next one". */
export const OVERPASS_RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 503, 504]);

/** Pause between failover attempts. */
export const OVERPASS_FAILOVER_DELAY_MS = 500;

// === Geometry ===

export const BOUNDARY_STYLE = Object.freeze({
    fillColor: '#0070f3',
    fillOpacity: 0.2,
    strokeColor: '#0070f3',
    strokeWidth: 2
});

/** Palette cycled over raw categories in the legacy color mode. */
export const LEGACY_CATEGORY_PALETTE: readonly string[] = Object.freeze([
    '#0088FE',
    '#00C49F',
    '#FFBB28',
    '#FF8042',
    '#AF19FF',
    '#FF1919'
]);

// === LLM ===

/** Sampling temperature for enrichment prompts. */
export const LLM_TEMPERATURE = 0.2;

// === Rating ===

export const RATING_MIN = 0;
export const RATING_MAX = 100;
