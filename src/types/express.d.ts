import type { AccessTokenPayload } from '../lib/auth';
import type { RequestContext } from '../lib/requestContext';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      context?: RequestContext;
      auth?: {
        userId: string;
        role: AccessTokenPayload['role'];
      };
    }
  }
}

export {};
