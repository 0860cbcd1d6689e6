/**
 * Geometry Synthesizer
 *
 * Builds the boundary + POI FeatureCollection. When an LLM provider is
 * available and enrichment is requested, the model is asked for the
 * document first; anything that fails validation falls back to the
 * deterministic builders.
 */

import type { Logger } from 'pino';
import type { LLMProvider } from '../../llm/types.js';
import { extractJsonBlock } from '../../llm/json-extract.js';
import {
  EnrichmentParseError,
  EnrichmentUnavailable,
  errorMessage
} from '../../lib/errors/analysis-errors.js';
import type { BoundingBox, CategorizedPois } from '../pois/poi.types.js';
import { buildDeterministicDocument } from './geometry-builders.js';
import { buildGeometryMessages } from './geometry.prompt.js';
import {
  GeometryDocumentSchema,
  isBoundaryFeature,
  isPoiFeature,
  type ColorMode,
  type GeometryDocument
} from './geometry.types.js';

export interface SynthesizeOptions {
  colorMode?: ColorMode;
  /** Ask the LLM first. Ignored when no provider is configured. */
  enrich?: boolean;
}

function positionKey(lon: number, lat: number): string {
  return `${lon},${lat}`;
}

/**
 * Validate a model-produced value against the expected document shape.
 * Beyond the GeoJSON schema, the document must hold exactly one boundary and
 * exactly one point per input POI (matched by coordinate). In `super-category`
 * mode every point must also carry `super_category` and `display_name`.
 *
 * @throws EnrichmentParseError
 */
export function validateEnrichedDocument(
  value: unknown,
  pois: CategorizedPois,
  mode: ColorMode = 'super-category'
): GeometryDocument {
  if (typeof value !== 'object' || value === null) {
    throw new EnrichmentParseError('Enriched geometry is not an object');
  }
  if (!('type' in value) || value.type !== 'FeatureCollection') {
    throw new EnrichmentParseError('Enriched geometry is not a FeatureCollection');
  }
  if (!('features' in value)) {
    throw new EnrichmentParseError('Enriched geometry has no features');
  }

  const parsed = GeometryDocumentSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new EnrichmentParseError(
      `Enriched geometry failed schema validation at ${issue ? issue.path.join('.') : '<root>'}`
    );
  }
  const doc = parsed.data;

  const boundaries = doc.features.filter(isBoundaryFeature).length;
  if (boundaries !== 1) {
    throw new EnrichmentParseError(`Enriched geometry has ${boundaries} boundary features`);
  }

  const expected = new Map<string, number>();
  for (const list of pois.values()) {
    for (const poi of list) {
      const key = positionKey(poi.coordinate.lon, poi.coordinate.lat);
      expected.set(key, (expected.get(key) ?? 0) + 1);
    }
  }

  for (const feature of doc.features.filter(isPoiFeature)) {
    const [lon, lat] = feature.geometry.coordinates;
    const key = positionKey(lon, lat);
    const { super_category, display_name } = feature.properties;
    if (mode === 'super-category' && (super_category === undefined || display_name === undefined)) {
      throw new EnrichmentParseError(`Enriched geometry point at ${key} lacks super-category properties`);
    }
    const remaining = expected.get(key);
    if (!remaining) {
      throw new EnrichmentParseError(`Enriched geometry has an unexpected point at ${key}`);
    }
    if (remaining === 1) expected.delete(key);
    else expected.set(key, remaining - 1);
  }

  if (expected.size > 0) {
    throw new EnrichmentParseError(`Enriched geometry is missing ${expected.size} POI location(s)`);
  }

  return doc;
}

export class GeometrySynthesizer {
  constructor(
    private readonly llm: LLMProvider | null,
    private readonly logger: Logger
  ) {}

  async synthesize(
    area: string,
    city: string,
    pois: CategorizedPois,
    bbox: BoundingBox,
    options: SynthesizeOptions = {}
  ): Promise<GeometryDocument> {
    const mode = options.colorMode ?? 'super-category';
    const enrich = options.enrich ?? true;

    if (enrich && this.llm) {
      try {
        const doc = await this.enrich(this.llm, area, city, pois, bbox, mode);
        this.logger.info({ event: 'geometry_synthesized', path: 'enrichment', features: doc.features.length }, '[Geometry] Enriched document accepted');
        return doc;
      } catch (err) {
        this.logger.warn(
          {
            event: 'geometry_enrichment_rejected',
            reason: err instanceof EnrichmentParseError ? 'parse' : 'unavailable',
            error: errorMessage(err)
          },
          '[Geometry] Falling back to deterministic document'
        );
      }
    }

    const doc = buildDeterministicDocument(area, city, pois, bbox, mode);
    this.logger.info({ event: 'geometry_synthesized', path: 'deterministic', features: doc.features.length }, '[Geometry] Deterministic document built');
    return doc;
  }

  private async enrich(
    llm: LLMProvider,
    area: string,
    city: string,
    pois: CategorizedPois,
    bbox: BoundingBox,
    mode: ColorMode
  ): Promise<GeometryDocument> {
    let text: string;
    try {
      text = await llm.complete(buildGeometryMessages(area, city, pois, bbox, mode));
    } catch (err) {
      throw new EnrichmentUnavailable(`Geometry enrichment failed: ${errorMessage(err)}`, { cause: err });
    }

    const extracted = extractJsonBlock(text);
    if (!extracted.ok) {
      throw new EnrichmentParseError(`Geometry enrichment returned ${extracted.reason}`);
    }
    return validateEnrichedDocument(extracted.value, pois, mode);
  }
}
