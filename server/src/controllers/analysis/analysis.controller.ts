import { Router, type Request, type Response, type NextFunction } from 'express';
import type { ZodError } from 'zod';
import type { AnalysisOrchestrator } from '../../services/analysis/analysis.orchestrator.js';
import {
  AnalyzeAreaRequestSchema,
  AreaGeometryRequestSchema,
  type ErrorResponse
} from '../../contracts/analysis.contracts.js';

function invalidRequest(res: Response<ErrorResponse>, error: ZodError): void {
  res.status(400).json({ error: 'Invalid request', stage: 'request', details: error.flatten() });
}

/**
 * POST /analyze-area   summary, chart data, rating, POI geometry
 * POST /area-geometry  boundary + POI FeatureCollection
 */
export function createAnalysisRouter(orchestrator: AnalysisOrchestrator): Router {
  const router = Router();

  router.post('/analyze-area', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = AnalyzeAreaRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      req.log.warn({ issues: parsed.error.issues }, '[Analysis] Invalid request');
      return invalidRequest(res, parsed.error);
    }

    try {
      res.json(await orchestrator.analyze(parsed.data, req.log));
    } catch (err) {
      next(err);
    }
  });

  router.post('/area-geometry', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = AreaGeometryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      req.log.warn({ issues: parsed.error.issues }, '[Geometry] Invalid request');
      return invalidRequest(res, parsed.error);
    }

    try {
      res.json(await orchestrator.geometry(parsed.data, req.log));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
