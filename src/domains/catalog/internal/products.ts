import { toNullableNumber } from '../../../lib/numbers';
import type { CatalogProduct, CatalogProductInsert, ProductCopyResult } from '../types';
import type { CatalogQueryable } from './connection';

type ItemRow = {
  product_id: number;
  barcode: string;
  sku: string | null;
  description: string | null;
  category_id: number | null;
  sub_category_id: number | null;
  unit_id: number | null;
  unit_price: string | null;
  unit_cost: string | null;
  item_size: string | null;
  item_weight: string | null;
  item_tax_id: number | null;
};

const ITEM_COLUMNS = `product_id, barcode, sku, description, category_id, sub_category_id, unit_id,
       unit_price, unit_cost, item_size, item_weight, item_tax_id`;

export function mapItemRow(row: ItemRow): CatalogProduct {
  return {
    productId: row.product_id,
    barcode: row.barcode,
    sku: row.sku,
    description: row.description,
    categoryId: row.category_id,
    subCategoryId: row.sub_category_id,
    unitId: row.unit_id,
    unitPrice: toNullableNumber(row.unit_price),
    unitCost: toNullableNumber(row.unit_cost),
    itemSize: row.item_size,
    itemWeight: row.item_weight,
    itemTaxId: row.item_tax_id
  };
}

export async function selectItemsByBarcodes(
  client: CatalogQueryable,
  barcodes: string[]
): Promise<CatalogProduct[]> {
  const unique = Array.from(new Set(barcodes));
  if (unique.length === 0) {
    return [];
  }
  const { rows } = await client.query<ItemRow>(
    `SELECT ${ITEM_COLUMNS}
       FROM items
      WHERE barcode = ANY($1::text[])`,
    [unique]
  );
  return rows.map(mapItemRow);
}

/**
 * Conditional insert: the NOT EXISTS probe and the unique barcode index both keep a second copy
 * of the same barcode out, including when two transfers copy it at the same time.
 */
export async function insertItemIfAbsent(
  client: CatalogQueryable,
  record: CatalogProductInsert
): Promise<ProductCopyResult> {
  const inserted = await client.query<ItemRow>(
    `INSERT INTO items (
        barcode, sku, description, category_id, sub_category_id, unit_id,
        unit_price, unit_cost, item_size, item_weight, item_tax_id
     )
     SELECT $1::text, $2::text, $3::text, $4::int, $5::int, $6::int,
            $7::numeric, $8::numeric, $9::text, $10::text, $11::int
      WHERE NOT EXISTS (SELECT 1 FROM items WHERE barcode = $1::text)
     ON CONFLICT DO NOTHING
     RETURNING ${ITEM_COLUMNS}`,
    [
      record.barcode,
      record.sku,
      record.description,
      record.categoryId,
      record.subCategoryId,
      record.unitId,
      record.unitPrice,
      record.unitCost,
      record.itemSize,
      record.itemWeight,
      record.itemTaxId
    ]
  );
  const row = inserted.rows[0];
  if (row) {
    return { product: mapItemRow(row), inserted: true };
  }

  const [existing] = await selectItemsByBarcodes(client, [record.barcode]);
  if (!existing) {
    throw new Error(`PRODUCT_COPY_LOST: ${record.barcode}`);
  }
  return { product: existing, inserted: false };
}

export async function selectUnitDescriptions(
  client: CatalogQueryable,
  unitIds: number[]
): Promise<Map<number, string>> {
  const unique = Array.from(new Set(unitIds));
  const descriptions = new Map<number, string>();
  if (unique.length === 0) {
    return descriptions;
  }
  const { rows } = await client.query<{ unit_id: number; unit_desc: string | null }>(
    'SELECT unit_id, unit_desc FROM units WHERE unit_id = ANY($1::int[])',
    [unique]
  );
  for (const row of rows) {
    descriptions.set(row.unit_id, row.unit_desc ?? '');
  }
  return descriptions;
}
