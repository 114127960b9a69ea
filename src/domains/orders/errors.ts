import { DomainError } from '../../lib/domainError';

export class OrderSourceError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ORDER_SOURCE_ERROR', message, 502, details);
  }
}
