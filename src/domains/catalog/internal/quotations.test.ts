import { describe, expect, it, vi } from 'vitest';
import type { QueryResultRow } from 'pg';
import { QuotationNumberConflictError } from '../errors';
import type { QuotationDetailRow, QuotationHeader } from '../types';
import type { CatalogQueryable } from './connection';
import { insertQuotationRows, selectMaxQuotationNumber } from './quotations';

function fakeClient(...results: Array<QueryResultRow[] | Error>) {
  const query = vi.fn();
  for (const result of results) {
    if (result instanceof Error) {
      query.mockRejectedValueOnce(result);
    } else {
      query.mockResolvedValueOnce({ rows: result, rowCount: result.length });
    }
  }
  const client: CatalogQueryable = { query };
  return { client, query };
}

const DATE = new Date('2025-03-01T12:00:00Z');

const HEADER: QuotationHeader = {
  quotationNumber: 6202025001n,
  quotationDate: DATE,
  quotationTitle: 'Shopify Order #1001',
  poNumber: '#1001',
  expirationDate: DATE,
  customerId: 500,
  businessName: 'Customer 500',
  accountNo: 'ACC500',
  shipTo: 'Jane Doe',
  shipAddress1: '1 Main Street',
  shipAddress2: '',
  shipContact: 'Jane Doe',
  shipCity: 'Springfield',
  shipState: 'IL',
  shipZipCode: '62701',
  shipPhoneNo: '',
  totalTaxes: 0,
  quotationTotal: 45.5
};

function detail(lineNumber: number): QuotationDetailRow {
  return {
    lineNumber,
    productId: 10 + lineNumber,
    categoryId: 1,
    subCategoryId: 2,
    unitDesc: 'EACH',
    unitQty: 1,
    productSku: `SKU-${lineNumber}`,
    productUpc: `UPC-${lineNumber}`,
    productDescription: 'Widget',
    itemSize: '',
    itemWeight: '',
    itemTaxId: null,
    taxable: false,
    quantity: 2,
    unitPrice: 5,
    originalPrice: 5,
    unitCost: 3,
    extendedPrice: 10,
    extendedCost: 6,
    expDate: DATE
  };
}

describe('selectMaxQuotationNumber', () => {
  it('returns the numeric maximum under the prefix', async () => {
    const { client, query } = fakeClient([{ max_number: '62020251000' }]);

    await expect(selectMaxQuotationNumber(client, '6202025')).resolves.toBe(62020251000n);
    expect(query.mock.calls[0]?.[1]).toEqual(['6202025']);
  });

  it('returns null when the prefix has no quotations yet', async () => {
    const { client } = fakeClient([{ max_number: null }]);

    await expect(selectMaxQuotationNumber(client, '6202025')).resolves.toBeNull();
  });
});

describe('insertQuotationRows', () => {
  it('writes the header and all details in one statement each', async () => {
    const { client, query } = fakeClient([{ quotation_id: 7 }], []);

    await expect(insertQuotationRows(client, HEADER, [detail(1), detail(2)])).resolves.toBe(7);

    expect(query).toHaveBeenCalledTimes(2);
    const headerParams: unknown[] = query.mock.calls[0]?.[1];
    expect(headerParams).toHaveLength(18);
    expect(headerParams[0]).toBe('6202025001');
    expect(String(query.mock.calls[0]?.[0])).not.toContain('status');

    const detailParams: unknown[] = query.mock.calls[1]?.[1];
    expect(detailParams).toHaveLength(42);
    expect(detailParams[0]).toBe(7);
    expect(detailParams[1]).toBe(1);
    expect(detailParams[21]).toBe(7);
    expect(detailParams[22]).toBe(2);
    expect(String(query.mock.calls[1]?.[0])).toContain('($22, $23,');
  });

  it('writes optional header columns only when they are set', async () => {
    const { client, query } = fakeClient([{ quotation_id: 8 }]);

    await insertQuotationRows(client, { ...HEADER, status: 1, termId: 6 }, []);

    const sql = String(query.mock.calls[0]?.[0]);
    expect(sql).toContain('quotation_total, status, term_id)');
    expect(query.mock.calls[0]?.[1]).toHaveLength(20);
    expect(query).toHaveBeenCalledTimes(1);
  });

  it('turns a taken quotation number into a conflict error', async () => {
    const violation = Object.assign(new Error('duplicate key value'), {
      code: '23505',
      constraint: 'quotations_quotation_number_key'
    });
    const { client } = fakeClient(violation);

    const error = await insertQuotationRows(client, HEADER, [detail(1)]).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(QuotationNumberConflictError);
    expect(error).toMatchObject({ quotationNumber: '6202025001' });
  });

  it('passes other unique violations through', async () => {
    const violation = Object.assign(new Error('duplicate key value'), { code: '23505', constraint: 'other_key' });
    const { client } = fakeClient(violation);

    await expect(insertQuotationRows(client, HEADER, [])).rejects.toBe(violation);
  });
});
