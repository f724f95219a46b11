import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { ErrorResponse } from '@mediapress/api-contracts';
import type { ProcessingOrchestrator } from './services/processing/ProcessingOrchestrator.js';
import { setupRoutes } from './routes/index.js';
import { createRequestContext } from './middleware/requestContext.js';
import { createMetricsMiddleware } from './middleware/metrics.js';
import { apiErrorHandler } from './api/middleware/apiErrorHandler.js';

export type AppDeps = {
  orchestrator: ProcessingOrchestrator;
  http: {
    jsonBodyLimit: string;
    rateLimitPerMinute: number;
    corsOrigins: string[];
    logSampleRate: number;
    logSlowMs: number;
  };
};

export function createApp(deps: AppDeps) {
  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', 1);

  app.use(createRequestContext({ sampleRate: deps.http.logSampleRate, slowMs: deps.http.logSlowMs }));
  app.use(createMetricsMiddleware());
  app.use(helmet());
  // No origins configured: allow any origin (the API carries no credentials).
  app.use(cors({ origin: deps.http.corsOrigins.length > 0 ? deps.http.corsOrigins : true }));
  app.use(express.json({ limit: deps.http.jsonBodyLimit }));

  setupRoutes(app, { orchestrator: deps.orchestrator, rateLimitPerMinute: deps.http.rateLimitPerMinute });

  app.use((req, res) => {
    const body: ErrorResponse = {
      success: false,
      error: { code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` },
    };
    res.status(404).json(body);
  });

  app.use(apiErrorHandler);

  return app;
}
