import type { CatalogQueryable } from './connection';

export type CatalogDiagnostics = {
  itemCount: number;
  recentBarcodes: string[];
};

export async function selectServerVersion(client: CatalogQueryable): Promise<string> {
  const { rows } = await client.query<{ version: string }>('SELECT version() AS version');
  return rows[0]?.version ?? '';
}

export async function selectDiagnostics(client: CatalogQueryable): Promise<CatalogDiagnostics> {
  const count = await client.query<{ item_count: string }>('SELECT COUNT(*)::text AS item_count FROM items');
  const recent = await client.query<{ barcode: string }>(
    `SELECT barcode FROM items
      WHERE barcode <> ''
      ORDER BY product_id DESC
      LIMIT 5`
  );
  return {
    itemCount: Number(count.rows[0]?.item_count ?? 0),
    recentBarcodes: recent.rows.map((row) => row.barcode)
  };
}
