export type CatalogRole = 'primary' | 'secondary';

export const CATALOG_ROLES: readonly CatalogRole[] = ['primary', 'secondary'];

/**
 * A product row as either catalog stores it, keyed by barcode.
 * `productId` is the id inside the catalog the row was read from.
 */
export type CatalogProduct = {
  productId: number | null;
  barcode: string;
  sku: string | null;
  description: string | null;
  categoryId: number | null;
  subCategoryId: number | null;
  unitId: number | null;
  unitPrice: number | null;
  unitCost: number | null;
  itemSize: string | null;
  itemWeight: string | null;
  itemTaxId: number | null;
};

export type CatalogProductInsert = Omit<CatalogProduct, 'productId'>;

export type ProductCopyResult = {
  product: CatalogProduct;
  /** false when the barcode was already present and nothing was written */
  inserted: boolean;
};

export type CatalogCustomer = {
  customerId: number;
  accountNo: string | null;
  businessName: string | null;
  contactName: string | null;
  salesRepId: number | null;
  termId: number | null;
};

export type CatalogCustomerSummary = {
  customerId: number;
  accountNo: string | null;
  businessName: string | null;
};

export type QuotationHeader = {
  quotationNumber: bigint;
  quotationDate: Date;
  quotationTitle: string;
  poNumber: string;
  expirationDate: Date;
  customerId: number;
  businessName: string;
  accountNo: string;
  shipTo: string;
  shipAddress1: string;
  shipAddress2: string;
  shipContact: string;
  shipCity: string;
  shipState: string;
  shipZipCode: string;
  shipPhoneNo: string;
  // Left off the written row entirely when undefined.
  status?: number;
  shipperId?: number;
  salesRepId?: number;
  termId?: number;
  totalTaxes: number;
  quotationTotal: number;
};

export type QuotationDetailRow = {
  lineNumber: number;
  productId: number | null;
  categoryId: number | null;
  subCategoryId: number | null;
  unitDesc: string;
  unitQty: number;
  productSku: string;
  productUpc: string;
  productDescription: string;
  itemSize: string;
  itemWeight: string;
  itemTaxId: number | null;
  taxable: boolean;
  quantity: number;
  unitPrice: number;
  originalPrice: number;
  unitCost: number;
  extendedPrice: number;
  extendedCost: number;
  expDate: Date;
};

export interface ProductCatalog {
  readonly role: CatalogRole;
  /** One round trip, however many barcodes are passed. */
  findByBarcodes(barcodes: string[]): Promise<CatalogProduct[]>;
}

/**
 * The catalog quotations are written against. Besides product lookups it owns the unit and
 * customer tables and the quotation tables.
 */
export interface PrimaryCatalog extends ProductCatalog {
  /** Inserts the product unless its barcode already exists. */
  insertProduct(record: CatalogProductInsert): Promise<ProductCopyResult>;
  getUnitDescriptions(unitIds: number[]): Promise<Map<number, string>>;
  getCustomer(customerId: number): Promise<CatalogCustomer | null>;
  /** Highest quotation number that starts with `prefix`, or null when there is none. */
  maxQuotationNumber(prefix: string): Promise<bigint | null>;
  /**
   * Writes header and detail rows in one transaction and returns the new quotation id.
   * Throws QuotationNumberConflictError when the number is already taken.
   */
  insertQuotation(header: QuotationHeader, details: QuotationDetailRow[]): Promise<number>;
}
