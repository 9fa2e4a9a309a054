import express from 'express';
import cors from 'cors';

import { healthRouter } from './routes/health.js';
import { createSyncRouter } from './routes/sync.js';
import { requireAuth } from './auth/middleware.js';
import { errorHandler } from './middleware/errorHandler.js';
import type { SyncEngine } from './services/sync/syncEngine.js';

export type AppDeps = {
  /** Defaults to an engine over the PostgreSQL entity store. */
  syncEngine?: SyncEngine;
};

export function createApp(deps: AppDeps = {}) {
  const app = express();
  // Behind a reverse proxy X-Forwarded-* headers must be trusted.
  app.set('trust proxy', true);
  app.use(cors());
  // A full first upload of a large account fits well below this.
  app.use(express.json({ limit: process.env.TRIPSYNC_JSON_LIMIT ?? '5mb' }));

  app.use('/health', healthRouter);
  app.use('/api/sync', requireAuth, createSyncRouter(deps.syncEngine));

  // Must be last: centralized error handler.
  app.use(errorHandler);
  return app;
}
