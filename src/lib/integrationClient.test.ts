import { afterEach, describe, expect, it, vi } from 'vitest';
import { CircuitBreaker, CircuitOpenError, resilientFetch } from './integrationClient';

const NO_DELAY = { retries: 2, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('CircuitBreaker', () => {
  it('opens after consecutive failures and short-circuits calls', async () => {
    const breaker = new CircuitBreaker('catalog', { failureThreshold: 2, resetTimeoutMs: 60_000 });
    const failing = vi.fn().mockRejectedValue(new Error('down'));

    await expect(breaker.execute(failing)).rejects.toThrow('down');
    await expect(breaker.execute(failing)).rejects.toThrow('down');
    expect(breaker.currentState).toBe('open');

    await expect(breaker.execute(failing)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(failing).toHaveBeenCalledTimes(2);
  });

  it('closes again after a successful probe', async () => {
    const breaker = new CircuitBreaker('catalog', { failureThreshold: 1, resetTimeoutMs: 0 });
    await expect(breaker.execute(() => Promise.reject(new Error('down')))).rejects.toThrow('down');
    expect(breaker.currentState).toBe('open');

    await expect(breaker.execute(() => Promise.resolve('ok'))).resolves.toBe('ok');
    expect(breaker.currentState).toBe('closed');
  });

  it('reopens when the probe fails', async () => {
    const breaker = new CircuitBreaker('catalog', { failureThreshold: 1, resetTimeoutMs: 0 });
    await expect(breaker.execute(() => Promise.reject(new Error('down')))).rejects.toThrow('down');

    await expect(breaker.execute(() => Promise.reject(new Error('still down')))).rejects.toThrow('still down');
    expect(breaker.currentState).toBe('open');
  });
});

describe('resilientFetch', () => {
  it('retries server errors until a response succeeds', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response('busy', { status: 500 }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const response = await resilientFetch('https://example.test', {}, { retry: NO_DELAY });

    expect(response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('hands back the last retryable response once retries run out', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response('busy', { status: 429 }));
    vi.stubGlobal('fetch', fetchMock);

    const response = await resilientFetch('https://example.test', {}, { retry: { ...NO_DELAY, retries: 1 } });

    expect(response.status).toBe(429);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('returns client errors without retrying', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('missing', { status: 404 }));
    vi.stubGlobal('fetch', fetchMock);

    const response = await resilientFetch('https://example.test', {}, { retry: NO_DELAY });

    expect(response.status).toBe(404);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
