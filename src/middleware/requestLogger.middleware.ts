import type { Request, Response, NextFunction } from 'express';
import { requestLogFields, type RequestLogFields } from '../lib/requestContext';

type RequestLogEntry = RequestLogFields & {
  event: 'http_request';
  method: string;
  path: string;
  status: number;
  durationMs: number;
  bytesIn: number;
  bytesOut: number;
  ip?: string;
  timestamp: string;
};

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const bytesIn = Number(req.headers['content-length'] ?? 0);

  res.on('finish', () => {
    const entry: RequestLogEntry = {
      ...requestLogFields(req.context),
      event: 'http_request',
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Date.now() - start,
      bytesIn,
      bytesOut: Number(res.getHeader('content-length') ?? 0),
      ip: req.ip,
      timestamp: new Date().toISOString()
    };
    console.log(JSON.stringify(entry));
  });

  next();
}
