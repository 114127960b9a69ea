import { withCatalogClient, withCatalogTransaction, type CatalogConnectionConfig } from './internal/connection';
import { selectActiveCustomers, selectCustomer, searchCustomersByAccount } from './internal/customers';
import { selectDiagnostics, selectServerVersion, type CatalogDiagnostics } from './internal/diagnostics';
import { insertItemIfAbsent, selectItemsByBarcodes, selectUnitDescriptions } from './internal/products';
import { insertQuotationRows, selectMaxQuotationNumber } from './internal/quotations';
import type { CatalogCustomerSummary, PrimaryCatalog, ProductCatalog } from './types';

export {
  CATALOG_ROLES,
  type CatalogCustomer,
  type CatalogCustomerSummary,
  type CatalogProduct,
  type CatalogProductInsert,
  type CatalogRole,
  type PrimaryCatalog,
  type ProductCatalog,
  type ProductCopyResult,
  type QuotationDetailRow,
  type QuotationHeader
} from './types';

export { CatalogNotConfiguredError, CatalogUnavailableError, QuotationNumberConflictError } from './errors';

export type { CatalogConnectionConfig } from './internal/connection';
export type { CatalogDiagnostics } from './internal/diagnostics';

/**
 * Catalog backed by a Postgres database. Every method opens its own connection, so the object
 * holds nothing but the connection settings.
 */
export function createPgPrimaryCatalog(config: CatalogConnectionConfig): PrimaryCatalog {
  return {
    role: config.role,
    findByBarcodes: (barcodes) => withCatalogClient(config, (client) => selectItemsByBarcodes(client, barcodes)),
    insertProduct: (record) => withCatalogClient(config, (client) => insertItemIfAbsent(client, record)),
    getUnitDescriptions: (unitIds) => withCatalogClient(config, (client) => selectUnitDescriptions(client, unitIds)),
    getCustomer: (customerId) => withCatalogClient(config, (client) => selectCustomer(client, customerId)),
    maxQuotationNumber: (prefix) => withCatalogClient(config, (client) => selectMaxQuotationNumber(client, prefix)),
    insertQuotation: (header, details) =>
      withCatalogTransaction(config, (client) => insertQuotationRows(client, header, details))
  };
}

export function createPgSecondaryCatalog(config: CatalogConnectionConfig): ProductCatalog {
  return {
    role: config.role,
    findByBarcodes: (barcodes) => withCatalogClient(config, (client) => selectItemsByBarcodes(client, barcodes))
  };
}

export function listCatalogCustomers(config: CatalogConnectionConfig): Promise<CatalogCustomerSummary[]> {
  return withCatalogClient(config, selectActiveCustomers);
}

export function searchCatalogCustomers(
  config: CatalogConnectionConfig,
  term: string
): Promise<CatalogCustomerSummary[]> {
  return withCatalogClient(config, (client) => searchCustomersByAccount(client, term));
}

export function probeCatalog(config: CatalogConnectionConfig): Promise<string> {
  return withCatalogClient(config, selectServerVersion);
}

export function inspectCatalog(config: CatalogConnectionConfig): Promise<CatalogDiagnostics> {
  return withCatalogClient(config, selectDiagnostics);
}
