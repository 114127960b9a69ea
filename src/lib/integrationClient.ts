type CircuitState = 'closed' | 'open' | 'half-open';

export type CircuitBreakerOptions = {
  failureThreshold: number;
  resetTimeoutMs: number;
};

export class CircuitOpenError extends Error {
  constructor(name: string) {
    super(`${name} is unavailable (circuit open)`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Opens after `failureThreshold` consecutive failures and lets one probe through once
 * `resetTimeoutMs` has passed.
 */
export class CircuitBreaker {
  private failures = 0;
  private state: CircuitState = 'closed';
  private openedAt = 0;

  constructor(
    private readonly name: string,
    private readonly options: CircuitBreakerOptions
  ) {}

  get currentState(): CircuitState {
    return this.state;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      if (Date.now() - this.openedAt < this.options.resetTimeoutMs) {
        throw new CircuitOpenError(this.name);
      }
      this.state = 'half-open';
    }

    try {
      const result = await fn();
      this.failures = 0;
      this.state = 'closed';
      return result;
    } catch (err) {
      this.failures += 1;
      if (this.state === 'half-open' || this.failures >= this.options.failureThreshold) {
        this.state = 'open';
        this.openedAt = Date.now();
      }
      throw err;
    }
  }
}

export type RetryOptions = {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
};

export type ResilientFetchOptions = {
  timeoutMs: number;
  retry: RetryOptions;
  circuitBreaker?: CircuitBreaker;
};

export const DEFAULT_RETRY: RetryOptions = {
  retries: 2,
  baseDelayMs: 200,
  maxDelayMs: 2000,
  jitterMs: 100
};

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function computeDelay(attempt: number, retry: RetryOptions) {
  const exponential = Math.min(retry.baseDelayMs * 2 ** attempt, retry.maxDelayMs);
  return exponential + Math.random() * retry.jitterMs;
}

class RetryableResponse extends Error {
  constructor(readonly response: Response) {
    super(`HTTP ${response.status}`);
  }
}

export function isRetryableStatus(status: number) {
  return status >= 500 || status === 429;
}

/**
 * fetch with a per-attempt timeout, retries with backoff on network errors, 5xx and 429, and an
 * optional circuit breaker. The last response is returned as-is, retryable or not.
 */
export async function resilientFetch(
  url: string,
  init: RequestInit,
  options: Partial<ResilientFetchOptions> = {}
): Promise<Response> {
  const retry = options.retry ?? DEFAULT_RETRY;
  const timeoutMs = options.timeoutMs ?? 5000;
  const breaker = options.circuitBreaker;

  const attemptRequest = async () => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      if (isRetryableStatus(response.status)) {
        // Counted as a failure by the breaker; the response itself is still handed back.
        throw new RetryableResponse(response);
      }
      return response;
    } finally {
      clearTimeout(timeoutId);
    }
  };

  for (let attempt = 0; ; attempt += 1) {
    try {
      return breaker ? await breaker.execute(attemptRequest) : await attemptRequest();
    } catch (err) {
      if (attempt >= retry.retries) {
        if (err instanceof RetryableResponse) {
          return err.response;
        }
        throw err;
      }
      if (err instanceof CircuitOpenError) {
        throw err;
      }
      await sleep(computeDelay(attempt, retry));
    }
  }
}
