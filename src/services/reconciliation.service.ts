import {
  CatalogUnavailableError,
  type CatalogProduct,
  type PrimaryCatalog,
  type ProductCatalog
} from '../domains/catalog';
import { isMissingBarcode, type OrderLineItem } from '../domains/orders';
import { DomainError, errorMessage } from '../lib/domainError';
import {
  TRANSFER_EVENT,
  emitTransferEvent,
  type TransferEventLogger
} from '../observability/transfer.events';

export type MissingReason = 'no barcode' | 'not found in any catalog' | 'copy failed';

export type ResolvedLine = {
  lineItem: OrderLineItem;
  product: CatalogProduct;
  /** `copied` when the product was brought over from the secondary catalog during this run. */
  source: 'primary' | 'copied';
};

export type CopiedProduct = { barcode: string; name: string };

export type MissingProduct = {
  barcode: string;
  name: string;
  quantity: number;
  reason: MissingReason;
  error?: string;
};

export type ReconciliationDiagnostics = {
  barcodesSearched: number;
  primaryFound: number;
  secondaryQueried: boolean;
  secondaryFound: number;
};

export type ValidationResult = {
  orderId: string;
  valid: boolean;
  /** Lines whose barcode was already in the primary catalog. */
  resolved: ResolvedLine[];
  copied: CopiedProduct[];
  missing: MissingProduct[];
  /** Every line that has a primary-catalog product, in order-line order. Quotation details are built from these. */
  lines: ResolvedLine[];
  diagnostics: ReconciliationDiagnostics;
};

export type ReconciliationCatalogs = {
  primary: PrimaryCatalog;
  secondary: ProductCatalog | null;
};

export type ReconciliationOptions = {
  logger?: TransferEventLogger;
};

async function lookup(catalog: ProductCatalog, barcodes: string[]): Promise<Map<string, CatalogProduct>> {
  let rows: CatalogProduct[];
  try {
    rows = await catalog.findByBarcodes(barcodes);
  } catch (err) {
    if (err instanceof DomainError) throw err;
    throw new CatalogUnavailableError(catalog.role, err);
  }
  const byBarcode = new Map<string, CatalogProduct>();
  for (const row of rows) {
    if (!byBarcode.has(row.barcode)) {
      byBarcode.set(row.barcode, row);
    }
  }
  return byBarcode;
}

function toInsert(product: CatalogProduct) {
  const { productId: _sourceId, ...record } = product;
  return record;
}

/**
 * Resolves every line of one order to a primary-catalog product. Issues one primary lookup and at
 * most one secondary lookup however many barcodes the order carries; secondary hits are copied
 * into the primary catalog one guarded insert at a time.
 *
 * Lookup failures on either catalog reject with CatalogUnavailableError. A failed copy only
 * marks that barcode as missing.
 */
export async function resolveOrderProducts(
  orderId: string,
  lineItems: OrderLineItem[],
  catalogs: ReconciliationCatalogs,
  options: ReconciliationOptions = {}
): Promise<ValidationResult> {
  const missing: MissingProduct[] = [];
  const barcodes: string[] = [];
  const seen = new Set<string>();

  for (const item of lineItems) {
    if (isMissingBarcode(item.barcode)) {
      missing.push({ barcode: item.barcode.trim(), name: item.name, quantity: item.quantity, reason: 'no barcode' });
      continue;
    }
    const barcode = item.barcode.trim();
    if (!seen.has(barcode)) {
      seen.add(barcode);
      barcodes.push(barcode);
    }
  }

  const inPrimary = barcodes.length > 0 ? await lookup(catalogs.primary, barcodes) : new Map<string, CatalogProduct>();
  const remaining = barcodes.filter((barcode) => !inPrimary.has(barcode));

  let inSecondary = new Map<string, CatalogProduct>();
  const secondaryQueried = remaining.length > 0 && catalogs.secondary !== null;
  if (secondaryQueried && catalogs.secondary) {
    inSecondary = await lookup(catalogs.secondary, remaining);
  }

  const copied: CopiedProduct[] = [];
  const copiedProducts = new Map<string, CatalogProduct>();
  const copyErrors = new Map<string, string>();
  for (const barcode of remaining) {
    const source = inSecondary.get(barcode);
    if (!source) continue;
    const name = lineItems.find((item) => item.barcode.trim() === barcode)?.name ?? '';
    try {
      const result = await catalogs.primary.insertProduct(toInsert(source));
      if (result.inserted) {
        copiedProducts.set(barcode, result.product);
        copied.push({ barcode, name });
        emitTransferEvent(
          TRANSFER_EVENT.PRODUCT_COPIED,
          { orderId, barcode, productId: result.product.productId },
          options.logger
        );
      } else {
        // Another run copied it first; it is a primary product now.
        inPrimary.set(barcode, result.product);
      }
    } catch (err) {
      copyErrors.set(barcode, errorMessage(err));
      emitTransferEvent(
        TRANSFER_EVENT.PRODUCT_COPY_FAILED,
        { orderId, barcode, error: errorMessage(err) },
        options.logger
      );
    }
  }

  const resolved: ResolvedLine[] = [];
  const lines: ResolvedLine[] = [];
  for (const item of lineItems) {
    if (isMissingBarcode(item.barcode)) continue;
    const barcode = item.barcode.trim();
    const primaryProduct = inPrimary.get(barcode);
    if (primaryProduct) {
      const line: ResolvedLine = { lineItem: item, product: primaryProduct, source: 'primary' };
      resolved.push(line);
      lines.push(line);
      continue;
    }
    const copiedProduct = copiedProducts.get(barcode);
    if (copiedProduct) {
      lines.push({ lineItem: item, product: copiedProduct, source: 'copied' });
      continue;
    }
    const copyError = copyErrors.get(barcode);
    missing.push(
      copyError === undefined
        ? { barcode, name: item.name, quantity: item.quantity, reason: 'not found in any catalog' }
        : { barcode, name: item.name, quantity: item.quantity, reason: 'copy failed', error: copyError }
    );
  }

  const diagnostics: ReconciliationDiagnostics = {
    barcodesSearched: barcodes.length,
    primaryFound: barcodes.length - remaining.length,
    secondaryQueried,
    secondaryFound: inSecondary.size
  };
  const result: ValidationResult = {
    orderId,
    valid: missing.length === 0,
    resolved,
    copied,
    missing,
    lines,
    diagnostics
  };

  emitTransferEvent(
    TRANSFER_EVENT.RECONCILIATION_COMPLETED,
    {
      orderId,
      valid: result.valid,
      resolved: resolved.length,
      copied: copied.length,
      missing: missing.length,
      ...diagnostics
    },
    options.logger
  );
  return result;
}
