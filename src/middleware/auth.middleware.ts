import type { Request, Response, NextFunction } from 'express';
import { verifyAccessToken } from '../lib/auth';
import { updateRequestContext } from '../lib/requestContext';

function extractBearerToken(header?: string) {
  if (!header) return null;
  const [scheme, token] = header.split(' ');
  if (scheme?.toLowerCase() !== 'bearer') return null;
  return token ?? null;
}

export function requireAuth(req: Request, res: Response, next: NextFunction) {
  const token = extractBearerToken(req.headers.authorization);

  if (!token) {
    return res.status(401).json({ error: 'Missing access token.' });
  }

  try {
    const payload = verifyAccessToken(token);
    req.auth = {
      userId: payload.sub,
      tenantId: payload.tenantId,
      role: payload.role
    };
    updateRequestContext({ tenantId: payload.tenantId, userId: payload.sub });
  } catch {
    return res.status(401).json({ error: 'Invalid or expired access token.' });
  }
  return next();
}

/** Tenant of the authenticated caller; routes are mounted behind `requireAuth`. */
export function tenantOf(req: Request): string {
  if (!req.auth) {
    throw new Error('UNAUTHENTICATED');
  }
  return req.auth.tenantId;
}
