import express, { Express } from 'express';
import cors from 'cors';
import { requestLogger } from './middleware/requestLogger';
import { asyncHandler, errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createExtractRouter } from './routes/extract';
import { createTemplatesRouter } from './routes/templates';
import { healthCheck } from '../db/connection';
import type { EngineServices } from '../services/EngineServices';

const DEFAULT_ALLOWED_ORIGIN = 'http://localhost:5173';
const JSON_SIZE_LIMIT = '10mb';

export function createApp(services: EngineServices): Express {
  const app = express();

  app.use(
    cors({
      origin: process.env.CORS_ORIGIN || DEFAULT_ALLOWED_ORIGIN,
      credentials: true,
    })
  );

  app.use(express.json({ limit: JSON_SIZE_LIMIT }));

  app.use(requestLogger);

  app.get(
    '/api/health',
    asyncHandler(async (req, res) => {
      const store = services.registry.hasStore() ? services.registry.current() : null;
      const databaseHealthy = await healthCheck();

      res.json({
        status: store && databaseHealthy ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        database: databaseHealthy,
        templates: store ? { version: store.version, count: store.size } : null,
      });
    })
  );

  app.use('/api/extract', createExtractRouter(services));
  app.use('/api/templates', createTemplatesRouter(services));

  app.use(notFoundHandler);

  app.use(errorHandler);

  return app;
}
