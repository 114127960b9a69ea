import { Pool, type QueryConfig, type QueryResult, type QueryResultRow, types } from 'pg';

// Keep DATE columns as "YYYY-MM-DD" strings so JSON serialization does not shift them by timezone.
types.setTypeParser(1082, (value) => value);

if (!process.env.DATABASE_URL) {
  throw new Error('DATABASE_URL must be set before starting the API');
}

export const pool = new Pool({
  connectionString: process.env.DATABASE_URL
});

export async function query<T extends QueryResultRow = QueryResultRow>(
  config: string | QueryConfig<unknown[]>,
  params?: unknown[]
): Promise<QueryResult<T>> {
  if (typeof config === 'string') {
    return pool.query<T>(config, params);
  }
  return pool.query<T>(config);
}
