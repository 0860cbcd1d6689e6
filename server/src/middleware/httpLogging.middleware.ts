/**
 * HTTP Logging Middleware
 *
 * One log line per request and one per response,
 * with the response level picked from the status code.
 */

import type { Request, Response, NextFunction } from 'express';

export function httpLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();

  req.log.info({
    method: req.method,
    path: req.path
  }, 'HTTP request');

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const level = res.statusCode >= 500 ? 'error'
                : res.statusCode >= 400 ? 'warn'
                : 'info';

    req.log[level]({
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: duration
    }, 'HTTP response');
  });

  next();
}
