import type { z } from 'zod';
import { query } from '../db';
import {
  CatalogNotConfiguredError,
  createPgPrimaryCatalog,
  createPgSecondaryCatalog,
  type CatalogConnectionConfig,
  type CatalogRole,
  type PrimaryCatalog,
  type ProductCatalog
} from '../domains/catalog';
import { decryptSecret, encryptSecret } from '../lib/secrets';
import type { catalogConnectionSchema } from '../schemas/settings.schema';

export type CatalogConnectionInput = z.infer<typeof catalogConnectionSchema>;

/** Connection settings as the API shows them: no password, only whether one is stored. */
export type CatalogConnectionSummary = {
  role: CatalogRole;
  host: string;
  port: number;
  database: string;
  username: string;
  hasPassword: boolean;
  updatedAt: string;
};

type CatalogConnectionRow = {
  role: CatalogRole;
  host: string;
  port: number;
  database_name: string;
  username: string;
  password_encrypted: string;
  updated_at: Date;
};

const CONNECTION_COLUMNS = 'role, host, port, database_name, username, password_encrypted, updated_at';

function mapSummary(row: CatalogConnectionRow): CatalogConnectionSummary {
  return {
    role: row.role,
    host: row.host,
    port: row.port,
    database: row.database_name,
    username: row.username,
    hasPassword: row.password_encrypted !== '',
    updatedAt: row.updated_at.toISOString()
  };
}

export async function listCatalogConnections(): Promise<CatalogConnectionSummary[]> {
  const { rows } = await query<CatalogConnectionRow>(
    `SELECT ${CONNECTION_COLUMNS} FROM catalog_connections ORDER BY role`
  );
  return rows.map(mapSummary);
}

/** A missing password keeps the stored one, so settings can be edited without re-entering it. */
export async function saveCatalogConnection(data: CatalogConnectionInput): Promise<CatalogConnectionSummary> {
  const { rows } = await query<CatalogConnectionRow>(
    `INSERT INTO catalog_connections (
        role, host, port, database_name, username, password_encrypted, created_at, updated_at
     ) VALUES ($1, $2, $3, $4, $5, COALESCE($6, ''), now(), now())
     ON CONFLICT (role) DO UPDATE
        SET host = EXCLUDED.host,
            port = EXCLUDED.port,
            database_name = EXCLUDED.database_name,
            username = EXCLUDED.username,
            password_encrypted = COALESCE($6, catalog_connections.password_encrypted),
            updated_at = now()
     RETURNING ${CONNECTION_COLUMNS}`,
    [
      data.role,
      data.host,
      data.port,
      data.database,
      data.username,
      data.password === undefined ? null : encryptSecret(data.password)
    ]
  );
  return mapSummary(rows[0]);
}

export async function getCatalogConnectionConfig(role: CatalogRole): Promise<CatalogConnectionConfig | null> {
  const { rows } = await query<CatalogConnectionRow>(
    `SELECT ${CONNECTION_COLUMNS} FROM catalog_connections WHERE role = $1`,
    [role]
  );
  const row = rows[0];
  if (!row) return null;
  return {
    role: row.role,
    host: row.host,
    port: row.port,
    database: row.database_name,
    username: row.username,
    password: decryptSecret(row.password_encrypted)
  };
}

export async function requireCatalogConnectionConfig(role: CatalogRole): Promise<CatalogConnectionConfig> {
  const config = await getCatalogConnectionConfig(role);
  if (!config) {
    throw new CatalogNotConfiguredError(role);
  }
  return config;
}

export type TransferCatalogs = {
  primary: PrimaryCatalog;
  secondary: ProductCatalog | null;
};

/**
 * The primary catalog is required. Without a secondary catalog, barcodes missing from the primary
 * one are reported missing and nothing is copied.
 */
export async function loadTransferCatalogs(): Promise<TransferCatalogs> {
  const primary = await requireCatalogConnectionConfig('primary');
  const secondary = await getCatalogConnectionConfig('secondary');
  return {
    primary: createPgPrimaryCatalog(primary),
    secondary: secondary ? createPgSecondaryCatalog(secondary) : null
  };
}
