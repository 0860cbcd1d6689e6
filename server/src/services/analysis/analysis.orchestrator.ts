/**
 * Analysis Request Orchestrator
 *
 * resolve → extract → (summary ∥ geometry + aggregate) → response.
 * Geocode and POI-source failures propagate; enrichment failures degrade
 * unless strict summary mode is on.
 */

import type { Logger } from 'pino';
import type { AreaResolver, ResolvedArea } from '../area/area-resolver.service.js';
import type { PoiExtractor } from '../pois/poi-extractor.service.js';
import type { GeometrySynthesizer } from '../geometry/geometry-synthesizer.service.js';
import type { SummaryService } from './summary.service.js';
import { aggregate } from '../aggregation/aggregator.js';
import { buildPoiDocument } from '../geometry/geometry-builders.js';
import { serializeCategorizedPois } from '../pois/poi.serialize.js';
import { countPois, type CategorizedPois } from '../pois/poi.types.js';
import {
  toPieSlices,
  type AnalyzeAreaRequest,
  type AreaAnalysisResponse,
  type AreaGeometryRequest,
  type AreaGeometryResponse,
  type GeocodeDto
} from '../../contracts/analysis.contracts.js';

export interface OrchestratorDeps {
  resolver: AreaResolver;
  extractor: PoiExtractor;
  geometry: GeometrySynthesizer;
  summary: SummaryService;
  radiusMeters: number;
  strictSummary: boolean;
}

function toGeocodeDto(resolved: ResolvedArea): GeocodeDto {
  return {
    lat: resolved.coordinate.lat,
    lon: resolved.coordinate.lon,
    display_name: resolved.displayName
  };
}

export class AnalysisOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async analyze(request: AnalyzeAreaRequest, log: Logger): Promise<AreaAnalysisResponse> {
    const { city, area } = request;
    const { summary } = this.deps;
    log.info({ event: 'analysis_start', area, city }, '[Analysis] Starting');

    const { resolved, pois } = await this.collect(area, city, log);

    const summaryTask = this.deps.strictSummary
      ? summary.summarize(area, city, pois)
      : summary.summarizeOrEmpty(area, city, pois);

    // Local work is synchronous; it runs while the summary request is in flight.
    const geojson = buildPoiDocument(pois, 'super-category');
    const chart = aggregate(pois);

    const narrative = await summaryTask;

    log.info(
      { event: 'analysis_done', rating: narrative.rating, slices: chart.length, features: geojson.features.length },
      '[Analysis] Completed'
    );

    return {
      summary: narrative.summary,
      pie_chart_data: toPieSlices(chart),
      ai_rating: narrative.rating,
      geocode: toGeocodeDto(resolved),
      bbox: resolved.boundingBox,
      geojson,
      pois: serializeCategorizedPois(pois)
    };
  }

  async geometry(request: AreaGeometryRequest, log: Logger): Promise<AreaGeometryResponse> {
    const { city, area, colorMode, enrich } = request;
    log.info({ event: 'geometry_start', area, city, colorMode, enrich }, '[Geometry] Starting');

    const { resolved, pois } = await this.collect(area, city, log);
    const geojson = await this.deps.geometry.synthesize(area, city, pois, resolved.boundingBox, {
      colorMode,
      enrich
    });

    return { geocode: toGeocodeDto(resolved), bbox: resolved.boundingBox, geojson };
  }

  private async collect(
    area: string,
    city: string,
    log: Logger
  ): Promise<{ resolved: ResolvedArea; pois: CategorizedPois }> {
    const resolved = await this.deps.resolver.resolve(area, city);
    const pois = await this.deps.extractor.extract(resolved.coordinate, this.deps.radiusMeters);
    log.info({ event: 'pois_collected', total: countPois(pois), categories: pois.size }, '[Analysis] POIs collected');
    return { resolved, pois };
  }
}
