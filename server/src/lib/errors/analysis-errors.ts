/**
 * Analysis pipeline error taxonomy
 *
 * Mandatory stages (geocode, POI source) fail the request.
 * Enrichment errors are normally absorbed by the caller and only
 * reach the HTTP layer in strict summary mode.
 */

export type AnalysisStage = 'geocode' | 'poi_source' | 'enrichment' | 'internal';

export abstract class AnalysisError extends Error {
  abstract readonly stage: AnalysisStage;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Geocoder returned no match, was unreachable, or answered with unusable data. */
export class GeocodeError extends AnalysisError {
  readonly stage = 'geocode' as const;
  readonly statusCode = 500;
}

/** Map-data query failed outright; no partial analysis is produced. */
export class PoiSourceError extends AnalysisError {
  readonly stage = 'poi_source' as const;
  readonly statusCode = 500;
}

/** Generative response was absent, unparseable or had the wrong shape. */
export class EnrichmentParseError extends AnalysisError {
  readonly stage = 'enrichment' as const;
  readonly statusCode = 502;
}

/** Generative service not configured, failed, or timed out. */
export class EnrichmentUnavailable extends AnalysisError {
  readonly stage = 'enrichment' as const;
  readonly statusCode = 502;
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
