/**
 * Base for errors the transfer pipeline raises on purpose. `message` is operator-facing and is what
 * lands in the transfer ledger; `code` is what routes map to HTTP responses.
 */
export class DomainError extends Error {
  code: string;
  status: number;
  details?: Record<string, unknown>;

  constructor(code: string, message: string, status = 500, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') return error;
  return String(error);
}
