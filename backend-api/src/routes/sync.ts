import { Router } from 'express';

import { formatSyncTimestamp, syncRequestSchema } from '@tripsync/shared';
import { isAuthenticated } from '../auth/middleware.js';
import { PgEntityStore } from '../services/sync/pgEntityStore.js';
import { SyncEngine, changesFromRequest } from '../services/sync/syncEngine.js';
import { StoreUnavailableError } from '../services/sync/syncErrors.js';
import { toSyncResponse } from '../services/sync/syncReport.js';
import { createLogger } from '../utils/logger.js';

export function createSyncRouter(engine: SyncEngine = new SyncEngine(new PgEntityStore())) {
  const router = Router();

  router.post('/', async (req, res, next) => {
    if (!isAuthenticated(req)) return res.status(401).json({ ok: false, error: 'missing user' });
    const userId = req.user.id;
    const log = createLogger('sync', { user: userId });

    const parsed = syncRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: parsed.error.flatten() });
    }
    const body = parsed.data;

    // A client that hangs up cancels the rest of its cycle; committed records stay.
    const abort = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) abort.abort(new Error('client disconnected'));
    });

    const since = body.last_sync_at === null ? 'never' : formatSyncTimestamp(body.last_sync_at);
    log.info('cycle start', { strategy: body.conflict_resolution, since });
    try {
      const result = await engine.sync({
        userId,
        watermark: body.last_sync_at,
        changes: changesFromRequest(body),
        strategy: body.conflict_resolution,
        signal: abort.signal,
      });
      return res.json(toSyncResponse(result.report, result.serverChanges));
    } catch (e) {
      if (e instanceof StoreUnavailableError) {
        log.error('store unavailable', { message: e.message });
        return res.status(503).json({ ok: false, error: e.code });
      }
      if (abort.signal.aborted) {
        log.warn('cycle cancelled');
        return undefined;
      }
      return next(e);
    }
  });

  return router;
}
