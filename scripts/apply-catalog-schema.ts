/* eslint-disable no-console */
import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { Client } from 'pg';
import { pool } from '../src/db';
import { CATALOG_ROLES, type CatalogRole } from '../src/domains/catalog';
import { requireCatalogConnectionConfig } from '../src/services/catalogConnections.service';

// Creates the catalog tables in a configured catalog database, for local setups and demos.
// Usage: npm run catalog:schema -- primary|secondary
function parseRole(value: string | undefined): CatalogRole {
  const role = CATALOG_ROLES.find((candidate) => candidate === value);
  if (!role) {
    throw new Error(`Expected a catalog role (${CATALOG_ROLES.join(', ')}), got ${value ?? 'nothing'}`);
  }
  return role;
}

async function main() {
  const role = parseRole(process.argv[2]);
  const schemaPath = path.resolve(process.cwd(), 'sql', 'catalog_schema.sql');
  const sql = await readFile(schemaPath, 'utf8');
  const config = await requireCatalogConnectionConfig(role);

  const client = new Client({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.username,
    password: config.password
  });
  await client.connect();
  try {
    await client.query(sql);
    console.log(`[catalog:schema] applied ${path.basename(schemaPath)} to ${role} catalog ${config.host}/${config.database}`);
  } finally {
    await client.end();
  }
}

main()
  .catch((err) => {
    console.error('[catalog:schema] Failed:', err);
    process.exitCode = 1;
  })
  .finally(() => pool.end());
