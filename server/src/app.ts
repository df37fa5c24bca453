/**
 * Express application: health check plus the /api routes
 */

import express from 'express';
import cors from 'cors';
import { createApiRouter } from './routes/api.js';
import type { Orchestrator } from './orchestrator/index.js';

export function createApp(engine: Orchestrator): express.Express {
  const app = express();
  app.use(cors());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api', createApiRouter(engine));

  return app;
}
