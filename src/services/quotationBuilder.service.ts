import type { CatalogCustomer, QuotationDetailRow, QuotationHeader } from '../domains/catalog';
import type { Order } from '../domains/orders';
import { roundMoney } from '../lib/numbers';
import { joinNonEmpty, truncateText } from '../lib/text';
import type { ResolvedLine, ValidationResult } from './reconciliation.service';
import type { CustomerMapping, QuotationDefaults } from './storeSettings.service';
import { TransferConfigurationError } from './transferErrors';

/** Declared widths of the quotation columns that hold free text. */
export const QUOTATION_COLUMN_LIMITS = {
  quotationTitle: 50,
  poNumber: 20,
  businessName: 50,
  accountNo: 13,
  shipTo: 50,
  shipAddress1: 50,
  shipAddress2: 50,
  shipContact: 50,
  shipCity: 20,
  shipState: 3,
  shipZipCode: 10,
  shipPhoneNo: 20,
  unitDesc: 50,
  productSku: 20,
  productUpc: 20,
  productDescription: 50,
  itemSize: 10,
  itemWeight: 10
} as const;

export const DEFAULT_TITLE_PREFIX = 'Shopify Order';

const DAY_MS = 24 * 60 * 60 * 1000;

export type BuildQuotationInput = {
  order: Order;
  validation: ValidationResult;
  customerId: number;
  customer: CatalogCustomer | null;
  defaults: QuotationDefaults | null;
  /** Unit id to unit-table description, for every unit the resolved products reference. */
  unitDescriptions: ReadonlyMap<number, string>;
  quotationNumber: bigint;
  now: Date;
};

export type BuiltQuotation = {
  header: QuotationHeader;
  details: QuotationDetailRow[];
};

/**
 * A per-order override wins over the store mapping for that one transfer and is not saved.
 */
export function resolveQuotationCustomerId(mapping: CustomerMapping | null, override?: number | null): number {
  if (override !== undefined && override !== null) {
    return override;
  }
  if (!mapping) {
    throw new TransferConfigurationError('No customer mapping configured for this store');
  }
  return mapping.customerId;
}

export function requireQuotationDefaults(defaults: QuotationDefaults | null): QuotationDefaults {
  if (!defaults) {
    throw new TransferConfigurationError('No quotation defaults configured for this store');
  }
  return defaults;
}

export function requireCustomer(customer: CatalogCustomer | null, customerId: number): CatalogCustomer {
  if (!customer) {
    throw new TransferConfigurationError(`Customer ID ${customerId} not found in primary catalog`);
  }
  return customer;
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

function buildDetail(line: ResolvedLine, index: number, input: BuildQuotationInput, expDate: Date): QuotationDetailRow {
  const { lineItem, product } = line;
  const quantity = lineItem.quantity || 1;
  const unitPrice = lineItem.unitPrice || product.unitPrice || 0;
  const originalPrice = product.unitPrice || unitPrice;
  const unitCost = product.unitCost ?? 0;
  const unitDesc = product.unitId === null ? '' : input.unitDescriptions.get(product.unitId);

  return {
    lineNumber: index + 1,
    productId: product.productId,
    categoryId: product.categoryId,
    subCategoryId: product.subCategoryId,
    unitDesc: truncateText(unitDesc, QUOTATION_COLUMN_LIMITS.unitDesc),
    unitQty: 1,
    productSku: truncateText(product.sku, QUOTATION_COLUMN_LIMITS.productSku),
    productUpc: truncateText(product.barcode, QUOTATION_COLUMN_LIMITS.productUpc),
    productDescription: truncateText(product.description, QUOTATION_COLUMN_LIMITS.productDescription),
    itemSize: truncateText(product.itemSize, QUOTATION_COLUMN_LIMITS.itemSize),
    itemWeight: truncateText(product.itemWeight, QUOTATION_COLUMN_LIMITS.itemWeight),
    itemTaxId: product.itemTaxId,
    taxable: false,
    quantity,
    unitPrice,
    originalPrice,
    unitCost,
    extendedPrice: roundMoney(quantity * unitPrice),
    extendedCost: roundMoney(quantity * unitCost),
    expDate
  };
}

/**
 * Maps a validated order onto quotation header and detail rows. Does no I/O; the only errors are
 * configuration errors raised before anything is built.
 */
export function buildQuotation(input: BuildQuotationInput): BuiltQuotation {
  const defaults = requireQuotationDefaults(input.defaults);
  const customer = requireCustomer(input.customer, input.customerId);
  const { order, now } = input;

  const expirationDate = addDays(now, defaults.expirationDays);
  const details = input.validation.lines.map((line, index) => buildDetail(line, index, input, expirationDate));
  const total = roundMoney(details.reduce((sum, row) => sum + row.extendedPrice, 0));

  const address = order.shippingAddress;
  const contact = joinNonEmpty([address?.firstName, address?.lastName]);
  const limits = QUOTATION_COLUMN_LIMITS;

  const header: QuotationHeader = {
    quotationNumber: input.quotationNumber,
    quotationDate: now,
    quotationTitle: truncateText(
      joinNonEmpty([defaults.titlePrefix ?? DEFAULT_TITLE_PREFIX, order.name]),
      limits.quotationTitle
    ),
    poNumber: truncateText(order.name, limits.poNumber),
    expirationDate,
    customerId: customer.customerId,
    businessName: truncateText(customer.businessName, limits.businessName),
    accountNo: truncateText(customer.accountNo, limits.accountNo),
    shipTo: truncateText(address?.company || contact, limits.shipTo),
    shipAddress1: truncateText(address?.address1, limits.shipAddress1),
    shipAddress2: truncateText(address?.address2, limits.shipAddress2),
    shipContact: truncateText(contact, limits.shipContact),
    shipCity: truncateText(address?.city, limits.shipCity),
    shipState: truncateText(address?.provinceCode, limits.shipState),
    shipZipCode: truncateText(address?.zip, limits.shipZipCode),
    shipPhoneNo: truncateText(address?.phone, limits.shipPhoneNo),
    ...(defaults.status !== null ? { status: defaults.status } : {}),
    ...(defaults.shipperId !== null ? { shipperId: defaults.shipperId } : {}),
    ...(defaults.salesRepId !== null ? { salesRepId: defaults.salesRepId } : {}),
    ...(defaults.termId !== null ? { termId: defaults.termId } : {}),
    totalTaxes: 0,
    quotationTotal: total
  };

  return { header, details };
}
