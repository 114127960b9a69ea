import type { Request, Response, NextFunction } from 'express';
import { DomainError } from '../../lib/domainError';

export type ErrorResponse = { status: number; body: Record<string, unknown> };

/** Error code (a DomainError's `code`, or the message of a plain `new Error('CODE')`) to response. */
export type ErrorHandlerMap = Record<string, (error: Error) => ErrorResponse>;

export function createErrorResponse(status: number, message: string, details?: Record<string, unknown>): ErrorResponse {
  return { status, body: { success: false, error: message, ...(details ? { details } : {}) } };
}

function lookupCode(error: Error): string {
  return error instanceof DomainError ? error.code : error.message;
}

/**
 * Wraps an async route handler. Mapped errors become their response, other DomainErrors answer
 * with their own status and message, anything else is logged and answered with 500.
 */
export function asyncErrorHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
  errorMap?: ErrorHandlerMap
) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      if (error instanceof Error) {
        const mapper = errorMap?.[lookupCode(error)];
        if (mapper) {
          const mapped = mapper(error);
          return res.status(mapped.status).json(mapped.body);
        }
        if (error instanceof DomainError) {
          const mapped = createErrorResponse(error.status, error.message, error.details);
          return res.status(mapped.status).json(mapped.body);
        }
      }
      console.error(error);
      return res.status(500).json({
        success: false,
        error: 'An internal server error occurred.',
        ...(process.env.NODE_ENV === 'development' && error instanceof Error ? { details: error.message } : {})
      });
    }
  };
}

export const storeErrorMap: ErrorHandlerMap = {
  STORE_NOT_FOUND: () => createErrorResponse(404, 'Store not found'),
  STORE_INACTIVE: () => createErrorResponse(409, 'Store is inactive')
};

export const historyErrorMap: ErrorHandlerMap = {
  TRANSFER_RECORD_NOT_FOUND: () => createErrorResponse(404, 'Transfer record not found')
};
