import { afterEach, describe, expect, it, vi, type Mock } from 'vitest';
import { withCatalogClient, withCatalogTransaction, type CatalogConnectionConfig } from './connection';

const state = vi.hoisted(() => ({
  clients: [] as Array<{ connect: Mock; query: Mock; end: Mock }>
}));

vi.mock('pg', () => ({
  Client: class {
    connect = vi.fn().mockResolvedValue(undefined);
    query = vi.fn().mockResolvedValue({ rows: [], rowCount: 0 });
    end = vi.fn().mockResolvedValue(undefined);

    constructor() {
      state.clients.push(this);
    }
  }
}));

const CONFIG: CatalogConnectionConfig = {
  role: 'primary',
  host: 'localhost',
  port: 5432,
  database: 'catalog',
  username: 'catalog',
  password: 'test-password'
};

function loggedEvents(spy: { mock: { calls: unknown[][] } }): unknown[] {
  return spy.mock.calls.map((call) => JSON.parse(String(call[0])));
}

afterEach(() => {
  state.clients.length = 0;
  vi.restoreAllMocks();
});

describe('withCatalogClient', () => {
  it('closes the connection after the handler', async () => {
    await expect(withCatalogClient(CONFIG, async () => 'done')).resolves.toBe('done');

    expect(state.clients[0]?.end).toHaveBeenCalledTimes(1);
  });

  it('keeps the handler error when closing also fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const violation = Object.assign(new Error('duplicate key value'), { code: '23505' });

    const run = withCatalogClient(CONFIG, async () => {
      state.clients[0]?.end.mockRejectedValue(new Error('Connection terminated'));
      throw violation;
    });

    await expect(run).rejects.toBe(violation);
    expect(loggedEvents(errorSpy)).toMatchObject([
      { event: 'CATALOG_CONNECTION_CLOSE_FAILED', role: 'primary', error: 'Connection terminated' }
    ]);
  });

  it('returns the result when only the close fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const run = withCatalogClient(CONFIG, async () => {
      state.clients[0]?.end.mockRejectedValue(new Error('Connection terminated'));
      return 7;
    });

    await expect(run).resolves.toBe(7);
  });
});

describe('withCatalogTransaction', () => {
  it('keeps the handler error when the rollback fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const reset = new Error('Connection reset by peer');

    const run = withCatalogTransaction(CONFIG, async () => {
      state.clients[0]?.query.mockRejectedValue(new Error('no connection to the server'));
      throw reset;
    });

    await expect(run).rejects.toBe(reset);
    expect(loggedEvents(errorSpy)).toMatchObject([
      { event: 'CATALOG_ROLLBACK_FAILED', role: 'primary', error: 'no connection to the server' }
    ]);
  });
});
