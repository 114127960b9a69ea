import { describe, expect, it, vi } from 'vitest';
import { CatalogUnavailableError } from '../domains/catalog';
import { TRANSFER_EVENT } from '../observability/transfer.events';
import {
  FakePrimaryCatalog,
  FakeSecondaryCatalog,
  makeLineItem,
  makeProduct,
  recordingLogger
} from '../test/fakes';
import { resolveOrderProducts } from './reconciliation.service';

function setup(primaryBarcodes: string[], secondaryBarcodes: string[]) {
  const primary = new FakePrimaryCatalog(primaryBarcodes.map((barcode) => makeProduct(barcode)));
  const secondary = new FakeSecondaryCatalog(secondaryBarcodes.map((barcode) => makeProduct(barcode, { productId: 7 })));
  const log = recordingLogger();
  return { primary, secondary, log };
}

describe('resolveOrderProducts', () => {
  it('classifies every line and copies secondary hits into the primary catalog', async () => {
    const { primary, secondary, log } = setup(['A1'], ['B1']);
    const items = [
      makeLineItem('A1'),
      makeLineItem('B1'),
      makeLineItem('C1'),
      makeLineItem('', { name: 'Gift wrap' }),
      makeLineItem('NONE', { name: 'Sample pack', quantity: 2 })
    ];

    const result = await resolveOrderProducts('1001', items, { primary, secondary }, { logger: log.logger });

    expect(result.valid).toBe(false);
    expect(result.resolved.map((line) => line.product.barcode)).toEqual(['A1']);
    expect(result.copied).toEqual([{ barcode: 'B1', name: 'Item B1' }]);
    expect(result.lines.map((line) => [line.product.barcode, line.source])).toEqual([
      ['A1', 'primary'],
      ['B1', 'copied']
    ]);
    expect(result.missing).toEqual([
      { barcode: '', name: 'Gift wrap', quantity: 1, reason: 'no barcode' },
      { barcode: 'NONE', name: 'Sample pack', quantity: 2, reason: 'no barcode' },
      { barcode: 'C1', name: 'Item C1', quantity: 1, reason: 'not found in any catalog' }
    ]);
    expect(result.diagnostics).toEqual({
      barcodesSearched: 3,
      primaryFound: 1,
      secondaryQueried: true,
      secondaryFound: 1
    });
    expect(primary.has('B1')).toBe(true);
    expect(log.names()).toEqual([TRANSFER_EVENT.PRODUCT_COPIED, TRANSFER_EVENT.RECONCILIATION_COMPLETED]);
  });

  it('looks each catalog up once per order, with duplicate barcodes collapsed', async () => {
    const { primary, secondary, log } = setup(['A1'], ['B1', 'B2']);
    const items = ['A1', 'B1', 'A1', 'B2', 'B1'].map((barcode, index) =>
      makeLineItem(barcode, { id: `line-${index}` })
    );

    const result = await resolveOrderProducts('1002', items, { primary, secondary }, { logger: log.logger });

    expect(primary.lookups).toEqual([['A1', 'B1', 'B2']]);
    expect(secondary.lookups).toEqual([['B1', 'B2']]);
    expect(primary.inserts.map((insert) => insert.barcode)).toEqual(['B1', 'B2']);
    expect(result.lines).toHaveLength(5);
    expect(result.valid).toBe(true);
  });

  it('does not consult the secondary catalog when the primary has everything', async () => {
    const { primary, secondary, log } = setup(['A1', 'A2'], ['A1']);

    const result = await resolveOrderProducts(
      '1003',
      [makeLineItem('A1'), makeLineItem('A2')],
      { primary, secondary },
      { logger: log.logger }
    );

    expect(secondary.lookups).toHaveLength(0);
    expect(result.diagnostics.secondaryQueried).toBe(false);
    expect(result.valid).toBe(true);
  });

  it('finds a copied product in the primary catalog on the next run', async () => {
    const { primary, secondary, log } = setup([], ['B1']);
    const catalogs = { primary, secondary };

    await resolveOrderProducts('1004', [makeLineItem('B1')], catalogs, { logger: log.logger });
    const second = await resolveOrderProducts('1004', [makeLineItem('B1')], catalogs, { logger: log.logger });

    expect(second.resolved.map((line) => line.product.barcode)).toEqual(['B1']);
    expect(second.copied).toEqual([]);
    expect(secondary.lookups).toHaveLength(1);
    expect(primary.inserts).toHaveLength(1);
  });

  it('treats a barcode another run copied first as a primary product', async () => {
    const { primary, secondary, log } = setup([], ['B1']);
    vi.spyOn(primary, 'insertProduct').mockResolvedValue({
      product: makeProduct('B1', { productId: 55 }),
      inserted: false
    });

    const result = await resolveOrderProducts('1005', [makeLineItem('B1')], { primary, secondary }, { logger: log.logger });

    expect(result.valid).toBe(true);
    expect(result.copied).toEqual([]);
    expect(result.resolved.map((line) => line.product.productId)).toEqual([55]);
  });

  it('keeps a failed copy from affecting the other barcodes', async () => {
    const { primary, secondary, log } = setup([], ['B1', 'B2']);
    primary.failInsertFor.add('B1');

    const result = await resolveOrderProducts(
      '1006',
      [makeLineItem('B1'), makeLineItem('B2')],
      { primary, secondary },
      { logger: log.logger }
    );

    expect(result.valid).toBe(false);
    expect(result.copied).toEqual([{ barcode: 'B2', name: 'Item B2' }]);
    expect(result.missing).toEqual([
      { barcode: 'B1', name: 'Item B1', quantity: 1, reason: 'copy failed', error: 'insert rejected for B1' }
    ]);
    expect(log.names()).toContain(TRANSFER_EVENT.PRODUCT_COPY_FAILED);
  });

  it('reports barcodes missing from the primary as not found when no secondary is configured', async () => {
    const { primary, log } = setup(['A1'], []);

    const result = await resolveOrderProducts(
      '1007',
      [makeLineItem('A1'), makeLineItem('C1')],
      { primary, secondary: null },
      { logger: log.logger }
    );

    expect(result.diagnostics.secondaryQueried).toBe(false);
    expect(result.missing.map((item) => [item.barcode, item.reason])).toEqual([['C1', 'not found in any catalog']]);
  });

  it('skips catalog lookups for an order without barcodes', async () => {
    const { primary, secondary, log } = setup([], []);

    const result = await resolveOrderProducts('1008', [makeLineItem('  ')], { primary, secondary }, { logger: log.logger });

    expect(primary.lookups).toHaveLength(0);
    expect(result.missing).toEqual([{ barcode: '', name: 'Item   ', quantity: 1, reason: 'no barcode' }]);
  });

  it('fails the whole reconciliation when a catalog lookup fails', async () => {
    const { primary, secondary, log } = setup([], []);
    secondary.failWith = new Error('timeout expired');

    const error = await resolveOrderProducts('1009', [makeLineItem('B1')], { primary, secondary }, { logger: log.logger })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CatalogUnavailableError);
    expect(error).toMatchObject({ message: 'secondary catalog: timeout expired', role: 'secondary' });
  });
});
