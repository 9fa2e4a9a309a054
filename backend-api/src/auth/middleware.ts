import type { NextFunction, Request, Response } from 'express';

import type { AuthUser } from './jwt.js';
import { verifyAccessToken } from './jwt.js';

export type AuthenticatedRequest = Request & { user: AuthUser };

export function isAuthenticated(req: Request): req is AuthenticatedRequest {
  return 'user' in req && typeof req.user === 'object' && req.user !== null;
}

function extractBearerToken(req: Request): string | null {
  const raw = req.header('authorization') ?? '';
  const m = raw.match(/^Bearer\s+(.+)$/i);
  const token = m?.[1];
  return token ? token.trim() : null;
}

// The user is resolved from the token on every request; nothing is cached between requests.
export async function requireAuth(req: Request, res: Response, next: NextFunction) {
  const token = extractBearerToken(req);
  if (!token) return res.status(401).json({ ok: false, error: 'missing bearer token' });
  let user: AuthUser;
  try {
    user = await verifyAccessToken(token);
  } catch {
    return res.status(401).json({ ok: false, error: 'invalid token' });
  }
  Object.assign(req, { user });
  return next();
}
