/**
 * API v1 Router Aggregator
 *
 * Route Structure:
 * - /api/v1/analyze-area    POST (summary, chart data, rating, POI geometry)
 * - /api/v1/area-geometry   POST (boundary + POI FeatureCollection)
 */

import { Router } from 'express';
import { createAnalysisRouter } from '../../controllers/analysis/analysis.controller.js';
import type { AnalysisOrchestrator } from '../../services/analysis/analysis.orchestrator.js';

export function createV1Router(orchestrator: AnalysisOrchestrator): Router {
  const router = Router();
  router.use('/', createAnalysisRouter(orchestrator));
  return router;
}
