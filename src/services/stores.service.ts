import type { z } from 'zod';
import { query } from '../db';
import { ShopifyOrderSource, type OrderSource } from '../domains/orders';
import { updateRequestContext } from '../lib/requestContext';
import { decryptSecret, encryptSecret } from '../lib/secrets';
import type { storeSchema, storeUpdateSchema } from '../schemas/stores.schema';

export type StoreInput = z.infer<typeof storeSchema>;
export type StoreUpdateInput = z.infer<typeof storeUpdateSchema>;

/** A store as the API returns it; the access token never leaves the service. */
export type Store = {
  id: number;
  name: string;
  shopUrl: string;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
};

type StoreRow = {
  id: number;
  name: string;
  shop_url: string;
  admin_api_token: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
};

const STORE_COLUMNS = 'id, name, shop_url, admin_api_token, is_active, created_at, updated_at';

function mapStore(row: StoreRow): Store {
  return {
    id: row.id,
    name: row.name,
    shopUrl: row.shop_url,
    isActive: row.is_active,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

export async function listStores(): Promise<Store[]> {
  const { rows } = await query<StoreRow>(`SELECT ${STORE_COLUMNS} FROM stores ORDER BY name`);
  return rows.map(mapStore);
}

export async function getStore(id: number): Promise<Store | null> {
  const { rows } = await query<StoreRow>(`SELECT ${STORE_COLUMNS} FROM stores WHERE id = $1`, [id]);
  return rows[0] ? mapStore(rows[0]) : null;
}

export async function createStore(data: StoreInput): Promise<Store> {
  const { rows } = await query<StoreRow>(
    `INSERT INTO stores (name, shop_url, admin_api_token, is_active, created_at, updated_at)
     VALUES ($1, $2, $3, $4, now(), now())
     RETURNING ${STORE_COLUMNS}`,
    [data.name, data.shop_url, encryptSecret(data.admin_api_token), data.is_active ?? true]
  );
  return mapStore(rows[0]);
}

export async function updateStore(id: number, data: StoreUpdateInput): Promise<Store | null> {
  const { rows } = await query<StoreRow>(
    `UPDATE stores
        SET name = COALESCE($2, name),
            shop_url = COALESCE($3, shop_url),
            admin_api_token = COALESCE($4, admin_api_token),
            is_active = COALESCE($5, is_active),
            updated_at = now()
      WHERE id = $1
      RETURNING ${STORE_COLUMNS}`,
    [
      id,
      data.name ?? null,
      data.shop_url ?? null,
      data.admin_api_token ? encryptSecret(data.admin_api_token) : null,
      data.is_active ?? null
    ]
  );
  return rows[0] ? mapStore(rows[0]) : null;
}

export async function deleteStore(id: number): Promise<boolean> {
  const result = await query('DELETE FROM stores WHERE id = $1', [id]);
  return (result.rowCount ?? 0) > 0;
}

/**
 * Order-source client for a store, with its token decrypted. Rejects with STORE_NOT_FOUND or
 * STORE_INACTIVE.
 */
export async function openStoreOrderSource(id: number): Promise<{ store: Store; orderSource: OrderSource }> {
  const { rows } = await query<StoreRow>(`SELECT ${STORE_COLUMNS} FROM stores WHERE id = $1`, [id]);
  const row = rows[0];
  if (!row) {
    throw new Error('STORE_NOT_FOUND');
  }
  if (!row.is_active) {
    throw new Error('STORE_INACTIVE');
  }
  updateRequestContext({ storeId: row.id });
  const orderSource = new ShopifyOrderSource({
    shopUrl: row.shop_url,
    accessToken: decryptSecret(row.admin_api_token)
  });
  return { store: mapStore(row), orderSource };
}
