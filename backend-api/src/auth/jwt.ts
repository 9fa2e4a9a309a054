import { SignJWT, jwtVerify } from 'jose';
import { z } from 'zod';

export type AuthUser = {
  id: string;
  email: string;
};

type JwtPayload = {
  sub: string;
  email: string;
};

function getJwtSecret(): Uint8Array {
  const secret = process.env.TRIPSYNC_JWT_SECRET ?? '';
  if (secret.trim().length < 32) {
    throw new Error('TRIPSYNC_JWT_SECRET is not configured (must be 32+ chars)');
  }
  return new TextEncoder().encode(secret);
}

export async function signAccessToken(user: AuthUser, ttl = '12h'): Promise<string> {
  const payload: JwtPayload = { sub: user.id, email: user.email };
  return await new SignJWT(payload)
    .setProtectedHeader({ alg: 'HS256' })
    .setIssuedAt()
    .setExpirationTime(ttl)
    .sign(getJwtSecret());
}

export async function verifyAccessToken(token: string): Promise<AuthUser> {
  const { payload } = await jwtVerify(token, getJwtSecret(), { algorithms: ['HS256'] });
  // Records are owned by uuid user ids.
  const sub = z.string().uuid().safeParse(payload.sub);
  if (!sub.success) throw new Error('Invalid token payload');
  const email = typeof payload.email === 'string' ? payload.email : '';
  return { id: sub.data, email };
}
