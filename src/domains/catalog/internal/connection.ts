import { Client, type QueryResult, type QueryResultRow } from 'pg';
import { getCatalogSettings } from '../../../config/transferSettings';
import { errorMessage } from '../../../lib/domainError';
import { requestLogFields } from '../../../lib/requestContext';
import { CatalogUnavailableError } from '../errors';
import type { CatalogRole } from '../types';

export type CatalogConnectionConfig = {
  role: CatalogRole;
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
};

export interface CatalogQueryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

function createClient(config: CatalogConnectionConfig): Client {
  const settings = getCatalogSettings();
  return new Client({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.username,
    password: config.password,
    connectionTimeoutMillis: settings.connectTimeoutMs,
    statement_timeout: settings.statementTimeoutMs,
    application_name: `order-quotation-bridge:${config.role}`
  });
}

function logCatalogFailure(event: string, role: CatalogRole, err: unknown): void {
  console.error(
    JSON.stringify({
      event,
      ...requestLogFields(),
      role,
      error: errorMessage(err),
      timestamp: new Date().toISOString()
    })
  );
}

/** Closing is best effort: a failed `end()` is logged and never replaces the handler's outcome. */
async function closeClient(client: Client, role: CatalogRole): Promise<void> {
  try {
    await client.end();
  } catch (err) {
    logCatalogFailure('CATALOG_CONNECTION_CLOSE_FAILED', role, err);
  }
}

/**
 * Opens a dedicated connection for one unit of work and closes it afterwards. Catalogs are
 * never pooled.
 */
export async function withCatalogClient<T>(
  config: CatalogConnectionConfig,
  handler: (client: CatalogQueryable) => Promise<T>
): Promise<T> {
  const client = createClient(config);
  try {
    await client.connect();
  } catch (err) {
    throw new CatalogUnavailableError(config.role, err);
  }
  try {
    return await handler(client);
  } finally {
    await closeClient(client, config.role);
  }
}

export async function withCatalogTransaction<T>(
  config: CatalogConnectionConfig,
  handler: (client: CatalogQueryable) => Promise<T>
): Promise<T> {
  return withCatalogClient(config, async (client) => {
    await client.query('BEGIN');
    try {
      const result = await handler(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        logCatalogFailure('CATALOG_ROLLBACK_FAILED', config.role, rollbackErr);
      }
      throw err;
    }
  });
}
