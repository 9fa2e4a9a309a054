import type { NextFunction, Request, Response } from 'express';

import { logError } from '../utils/logger.js';

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const msg = err instanceof Error ? err.message : String(err);

  // Body parser: invalid JSON comes as SyntaxError carrying the raw `body`.
  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json({ ok: false, error: 'invalid json' });
  }
  // Body parser: payload over the configured limit.
  if (err instanceof Error && 'type' in err && err.type === 'entity.too.large') {
    return res.status(413).json({ ok: false, error: 'payload too large' });
  }

  logError('unhandled error', {
    method: req.method,
    url: req.originalUrl || req.url,
    message: msg,
  });
  return res.status(500).json({ ok: false, error: msg });
}
