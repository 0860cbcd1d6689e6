import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { createV1Router } from './routes/v1/index.js';
import { createAnalysisRouter } from './controllers/analysis/analysis.controller.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorHandlerMiddleware } from './middleware/errorHandler.middleware.js';
import { getConfig } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import { createOrchestrator } from './container.js';
import type { AnalysisOrchestrator } from './services/analysis/analysis.orchestrator.js';

export function createApp(orchestrator: AnalysisOrchestrator = createOrchestrator(getConfig(), logger)) {
    const app = express();
    // Context first so body-parser failures still reach the error handler with req.log
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);

    app.use(helmet());
    app.use(compression());
    app.use(express.json({ limit: '1mb' }));
    app.use(cors()); // the map frontend is served from another origin

    app.use('/api/v1', createV1Router(orchestrator));

    // Legacy unversioned path kept for existing clients
    app.post('/analyze-area', createAnalysisRouter(orchestrator));

    app.get('/healthz', (_req, res) => res.status(200).send('ok'));

    app.use(errorHandlerMiddleware);

    return app;
}
