/**
 * Error Handler Middleware
 * Maps pipeline errors to their HTTP status and stage; client errors raised by
 * body parsing keep their 4xx status; everything else is a 500.
 */

import type { Request, Response, NextFunction } from 'express';
import { isAnalysisError } from '../lib/errors/analysis-errors.js';
import type { ErrorResponse } from '../contracts/analysis.contracts.js';

/** 4xx carried as `status`/`statusCode` (body-parser, http-errors). */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function errorHandlerMiddleware(
  err: unknown,
  req: Request,
  res: Response<ErrorResponse>,
  _next: NextFunction
): void {
  if (isAnalysisError(err)) {
    req.log.error({ stage: err.stage, statusCode: err.statusCode, err }, `[Analysis] ${err.name}`);
    res.status(err.statusCode).json({ error: err.message, stage: err.stage });
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    req.log.warn({ statusCode: status, err }, '[HTTP] Rejected request body');
    res.status(status).json({ error: status === 413 ? 'Request body too large' : 'Invalid request body', stage: 'request' });
    return;
  }

  req.log.error({ err }, '[Analysis] Unexpected error');
  res.status(500).json({ error: 'Unexpected error', stage: 'internal' });
}
