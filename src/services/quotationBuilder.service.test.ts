import { describe, expect, it } from 'vitest';
import type { ShippingAddress } from '../domains/orders';
import { makeCustomer, makeDefaults, makeLineItem, makeOrder, makeProduct } from '../test/fakes';
import {
  buildQuotation,
  resolveQuotationCustomerId,
  type BuildQuotationInput
} from './quotationBuilder.service';
import type { ResolvedLine, ValidationResult } from './reconciliation.service';
import { TransferConfigurationError } from './transferErrors';

const NOW = new Date('2025-03-01T12:00:00Z');

const ADDRESS: ShippingAddress = {
  firstName: 'Jane',
  lastName: 'Doe',
  company: '',
  address1: '1 Main Street',
  address2: 'Suite 4',
  city: 'Springfield',
  province: 'Illinois',
  provinceCode: 'IL',
  zip: '62701',
  country: 'United States',
  countryCode: 'US',
  phone: '555-0100'
};

function validationFor(lines: ResolvedLine[]): ValidationResult {
  return {
    orderId: '2001',
    valid: true,
    resolved: lines,
    copied: [],
    missing: [],
    lines,
    diagnostics: { barcodesSearched: lines.length, primaryFound: lines.length, secondaryQueried: false, secondaryFound: 0 }
  };
}

function baseInput(overrides: Partial<BuildQuotationInput> = {}): BuildQuotationInput {
  const first = makeLineItem('A1', { quantity: 3, unitPrice: 12.5 });
  const second = makeLineItem('B1', { quantity: 0, unitPrice: 0 });
  const lines: ResolvedLine[] = [
    {
      lineItem: first,
      product: makeProduct('A1', { productId: 11, unitId: 3, unitPrice: 10, unitCost: 4 }),
      source: 'primary'
    },
    {
      lineItem: second,
      product: makeProduct('B1', { productId: 12, unitId: null, unitPrice: 8, unitCost: null }),
      source: 'copied'
    }
  ];
  return {
    order: makeOrder('2001', [first, second], { shippingAddress: ADDRESS }),
    validation: validationFor(lines),
    customerId: 500,
    customer: makeCustomer(500),
    defaults: makeDefaults(1),
    unitDescriptions: new Map([[3, 'CASE 12']]),
    quotationNumber: 6202025001n,
    now: NOW,
    ...overrides
  };
}

describe('buildQuotation', () => {
  it('prices each line from the order, falling back to the catalog price', () => {
    const { details } = buildQuotation(baseInput());

    expect(details).toHaveLength(2);
    expect(details[0]).toMatchObject({
      lineNumber: 1,
      productId: 11,
      quantity: 3,
      unitPrice: 12.5,
      originalPrice: 10,
      unitCost: 4,
      extendedPrice: 37.5,
      extendedCost: 12,
      productUpc: 'A1',
      productSku: 'SKU-A1',
      unitQty: 1,
      taxable: false
    });
    expect(details[1]).toMatchObject({
      lineNumber: 2,
      productId: 12,
      quantity: 1,
      unitPrice: 8,
      originalPrice: 8,
      unitCost: 0,
      extendedPrice: 8,
      extendedCost: 0
    });
  });

  it('takes unit descriptions from the unit table by the product unit id', () => {
    const { details } = buildQuotation(baseInput());

    expect(details.map((row) => row.unitDesc)).toEqual(['CASE 12', '']);
  });

  it('totals the extended prices and dates the quotation', () => {
    const { header, details } = buildQuotation(baseInput());

    expect(header.quotationTotal).toBe(45.5);
    expect(header.totalTaxes).toBe(0);
    expect(header.quotationDate).toEqual(NOW);
    expect(header.expirationDate.toISOString()).toBe('2026-03-01T12:00:00.000Z');
    expect(details[0]?.expDate.toISOString()).toBe('2026-03-01T12:00:00.000Z');
  });

  it('fills the header from the order, the customer and the store defaults', () => {
    const { header } = buildQuotation(baseInput());

    expect(header).toMatchObject({
      quotationNumber: 6202025001n,
      quotationTitle: 'Shopify Order #2001',
      poNumber: '#2001',
      customerId: 500,
      businessName: 'Customer 500',
      accountNo: 'ACC500',
      shipTo: 'Jane Doe',
      shipAddress1: '1 Main Street',
      shipAddress2: 'Suite 4',
      shipContact: 'Jane Doe',
      shipCity: 'Springfield',
      shipState: 'IL',
      shipZipCode: '62701',
      shipPhoneNo: '555-0100',
      status: 1
    });
  });

  it('ships to the company when the address has one', () => {
    const input = baseInput();
    const order = { ...input.order, shippingAddress: { ...ADDRESS, company: 'Doe Hardware' } };

    expect(buildQuotation({ ...input, order }).header.shipTo).toBe('Doe Hardware');
  });

  it('leaves unset defaults off the header', () => {
    const { header } = buildQuotation(
      baseInput({ defaults: makeDefaults(1, { status: null, shipperId: 4, salesRepId: null, termId: 6 }) })
    );

    expect('status' in header).toBe(false);
    expect('salesRepId' in header).toBe(false);
    expect(header.shipperId).toBe(4);
    expect(header.termId).toBe(6);
  });

  it('cuts text to the quotation column widths', () => {
    const { header, details } = buildQuotation(
      baseInput({
        defaults: makeDefaults(1, { titlePrefix: 'P'.repeat(45) }),
        customer: makeCustomer(500, { businessName: 'B'.repeat(60), accountNo: 'ACCOUNT-NUMBER-123' })
      })
    );

    expect(header.quotationTitle).toBe(`${'P'.repeat(45)} #200`);
    expect(header.businessName).toBe('B'.repeat(50));
    expect(header.accountNo).toBe('ACCOUNT-NUMBE');
    expect(details[0]?.productDescription).toBe('Product A1');
  });

  it('uses the default title prefix when the store has none', () => {
    const { header } = buildQuotation(baseInput({ defaults: makeDefaults(1, { titlePrefix: null }) }));

    expect(header.quotationTitle).toBe('Shopify Order #2001');
  });

  it('rejects missing defaults and unknown customers as configuration errors', () => {
    expect(() => buildQuotation(baseInput({ defaults: null }))).toThrow(
      'No quotation defaults configured for this store'
    );
    expect(() => buildQuotation(baseInput({ customer: null }))).toThrow(
      'Customer ID 500 not found in primary catalog'
    );
  });
});

describe('resolveQuotationCustomerId', () => {
  const mapping = { storeId: 1, customerId: 500, businessName: null, updatedAt: null };

  it('prefers a per-order override', () => {
    expect(resolveQuotationCustomerId(mapping, 77)).toBe(77);
    expect(resolveQuotationCustomerId(mapping)).toBe(500);
  });

  it('requires a mapping when there is no override', () => {
    expect(() => resolveQuotationCustomerId(null)).toThrow(TransferConfigurationError);
    expect(resolveQuotationCustomerId(null, 77)).toBe(77);
  });
});
