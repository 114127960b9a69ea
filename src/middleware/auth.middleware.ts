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
    return res.status(401).json({ success: false, error: 'Missing access token.' });
  }

  try {
    const payload = verifyAccessToken(token);
    req.auth = { userId: payload.sub, role: payload.role };
    updateRequestContext({ userId: payload.sub });
    return next();
  } catch {
    return res.status(401).json({ success: false, error: 'Invalid or expired access token.' });
  }
}
