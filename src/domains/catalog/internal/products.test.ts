import { describe, expect, it, vi } from 'vitest';
import type { QueryResultRow } from 'pg';
import type { CatalogQueryable } from './connection';
import { insertItemIfAbsent, selectItemsByBarcodes, selectUnitDescriptions } from './products';

function fakeClient(...results: QueryResultRow[][]) {
  const query = vi.fn();
  for (const rows of results) {
    query.mockResolvedValueOnce({ rows, rowCount: rows.length });
  }
  const client: CatalogQueryable = { query };
  return { client, query };
}

const ROW = {
  product_id: 41,
  barcode: '0123456789012',
  sku: 'W-1',
  description: 'Widget',
  category_id: 1,
  sub_category_id: 2,
  unit_id: 3,
  unit_price: '10.50',
  unit_cost: null,
  item_size: null,
  item_weight: '1 lb',
  item_tax_id: null
};

describe('selectItemsByBarcodes', () => {
  it('queries each barcode once and maps numeric columns', async () => {
    const { client, query } = fakeClient([ROW]);

    const products = await selectItemsByBarcodes(client, ['0123456789012', '0123456789012', '999']);

    expect(query.mock.calls[0]?.[1]).toEqual([['0123456789012', '999']]);
    expect(products).toEqual([
      {
        productId: 41,
        barcode: '0123456789012',
        sku: 'W-1',
        description: 'Widget',
        categoryId: 1,
        subCategoryId: 2,
        unitId: 3,
        unitPrice: 10.5,
        unitCost: null,
        itemSize: null,
        itemWeight: '1 lb',
        itemTaxId: null
      }
    ]);
  });

  it('skips the round trip for an empty list', async () => {
    const { client, query } = fakeClient();

    await expect(selectItemsByBarcodes(client, [])).resolves.toEqual([]);
    expect(query).not.toHaveBeenCalled();
  });
});

describe('insertItemIfAbsent', () => {
  const record = {
    barcode: '0123456789012',
    sku: 'W-1',
    description: 'Widget',
    categoryId: 1,
    subCategoryId: 2,
    unitId: 3,
    unitPrice: 10.5,
    unitCost: null,
    itemSize: null,
    itemWeight: '1 lb',
    itemTaxId: null
  };

  it('reports a fresh insert', async () => {
    const { client } = fakeClient([ROW]);

    const result = await insertItemIfAbsent(client, record);

    expect(result.inserted).toBe(true);
    expect(result.product.productId).toBe(41);
  });

  it('returns the existing row when the barcode is already there', async () => {
    const { client, query } = fakeClient([], [ROW]);

    const result = await insertItemIfAbsent(client, record);

    expect(result).toMatchObject({ inserted: false, product: { productId: 41 } });
    expect(query).toHaveBeenCalledTimes(2);
  });
});

describe('selectUnitDescriptions', () => {
  it('maps unit ids to descriptions', async () => {
    const { client } = fakeClient([
      { unit_id: 3, unit_desc: 'CASE 12' },
      { unit_id: 4, unit_desc: null }
    ]);

    const descriptions = await selectUnitDescriptions(client, [3, 4, 3]);

    expect(Array.from(descriptions.entries())).toEqual([
      [3, 'CASE 12'],
      [4, '']
    ]);
  });
});
