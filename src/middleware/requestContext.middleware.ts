import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { runWithRequestContext, type RequestContext } from '../lib/requestContext';

function extractRequestId(req: Request): string {
  const header = req.header('x-request-id') || req.header('x-correlation-id');
  if (typeof header === 'string' && header.trim()) {
    return header.trim();
  }
  return uuidv4();
}

/**
 * Opens the request context. The same object is kept on `req.context`, where the access log
 * reads the store and batch a route recorded after the response finishes.
 */
export function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
  const context: RequestContext = { requestId: extractRequestId(req) };
  req.requestId = context.requestId;
  req.context = context;
  res.setHeader('x-request-id', context.requestId);

  runWithRequestContext(context, () => next());
}
