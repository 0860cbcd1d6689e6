/**
 * Composition root: wires config, clients and services into an orchestrator.
 */

import type { Logger } from 'pino';
import type { AppConfig } from './config/env.js';
import type { LLMProvider } from './llm/types.js';
import { createLLMProvider } from './llm/factory.js';
import { AreaResolver } from './services/area/area-resolver.service.js';
import { OverpassClient } from './services/pois/overpass.client.js';
import { PoiExtractor } from './services/pois/poi-extractor.service.js';
import { GeometrySynthesizer } from './services/geometry/geometry-synthesizer.service.js';
import { SummaryService } from './services/analysis/summary.service.js';
import { AnalysisOrchestrator } from './services/analysis/analysis.orchestrator.js';

export interface ContainerOverrides {
  fetchImpl?: typeof fetch;
  /** `null` disables enrichment; omitted means "build from config". */
  llm?: LLMProvider | null;
  overpassFailoverDelayMs?: number;
}

export function createOrchestrator(
  config: AppConfig,
  logger: Logger,
  overrides: ContainerOverrides = {}
): AnalysisOrchestrator {
  const llm = overrides.llm !== undefined ? overrides.llm : createLLMProvider(config, logger);

  const resolver = new AreaResolver({
    searchUrl: config.nominatimUrl,
    timeoutMs: config.geocodeTimeoutMs,
    userAgent: config.userAgent,
    logger,
    fetchImpl: overrides.fetchImpl
  });

  const overpass = new OverpassClient({
    endpoints: config.overpassUrls,
    timeoutMs: config.overpassTimeoutMs,
    userAgent: config.userAgent,
    logger,
    fetchImpl: overrides.fetchImpl,
    failoverDelayMs: overrides.overpassFailoverDelayMs
  });

  return new AnalysisOrchestrator({
    resolver,
    extractor: new PoiExtractor(overpass, logger),
    geometry: new GeometrySynthesizer(llm, logger),
    summary: new SummaryService(llm, logger),
    radiusMeters: config.poiRadiusMeters,
    strictSummary: config.strictSummary
  });
}
