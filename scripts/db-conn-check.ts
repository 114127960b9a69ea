/* eslint-disable no-console */
import 'dotenv/config';
import { Client } from 'pg';

function requiredEnv(name: string): string {
  const value = process.env[name];
  if (!value) throw new Error(`${name} must be set`);
  return value;
}

function describeDatabaseUrl(databaseUrl: string) {
  const url = new URL(databaseUrl);
  return {
    database: url.pathname.replace(/^\//, ''),
    user: decodeURIComponent(url.username || ''),
    host: url.hostname || 'localhost',
    port: url.port ? Number(url.port) : 5432
  };
}

async function main() {
  const databaseUrl = requiredEnv('DATABASE_URL');
  const parsed = describeDatabaseUrl(databaseUrl);

  const client = new Client({ connectionString: databaseUrl });
  await client.connect();
  try {
    const res = await client.query<{ current_user: string; current_database: string; latest_migration: string | null }>(
      `SELECT current_user AS current_user,
              current_database() AS current_database,
              (SELECT MAX(name) FROM pgmigrations) AS latest_migration`
    );
    const row = res.rows[0];
    if (!row) {
      throw new Error('Failed to query current_user/current_database');
    }
    if (row.current_database !== parsed.database) {
      console.error(
        `[db:conn:check] mismatch host=${parsed.host} port=${parsed.port} parsed_db=${parsed.database} actual_db=${row.current_database}`
      );
      process.exit(1);
    }
    console.log(
      `[db:conn:check] host=${parsed.host} port=${parsed.port} db=${row.current_database} user=${row.current_user} migration=${row.latest_migration ?? 'none'}`
    );
  } finally {
    await client.end();
  }
}

main().catch((err) => {
  console.error('[db:conn:check] Failed:', err);
  process.exit(1);
});
