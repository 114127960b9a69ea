import { errorMessage } from './domainError';

/** A readiness dependency that did not answer in time. */
export class TimeoutError extends Error {
  constructor(
    readonly dependency: string,
    readonly timeoutMs: number
  ) {
    super(`${dependency} did not answer within ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Rejects with TimeoutError once `ms` passes; the underlying promise is not cancelled. */
export async function withTimeout<T>(promise: Promise<T>, ms: number, dependency: string): Promise<T> {
  if (!ms || ms <= 0) return promise;
  let timeoutId: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<T>((_resolve, reject) => {
    timeoutId = setTimeout(() => reject(new TimeoutError(dependency, ms)), ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Health-check detail for a failed dependency probe. */
export function probeFailure(error: unknown): { ok: false; error: string; timedOut: boolean } {
  if (error instanceof TimeoutError) {
    return { ok: false, error: error.message, timedOut: true };
  }
  return { ok: false, error: errorMessage(error), timedOut: false };
}
