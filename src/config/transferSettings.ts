import { parsePositiveInt } from './env';

export type TransferSettings = {
  /** Two-digit prefix that opens every quotation number. */
  quotationServicePrefix: string;
  batchMaxOrders: number;
  orderLookbackDays: number;
};

export type CatalogSettings = {
  connectTimeoutMs: number;
  statementTimeoutMs: number;
};

const DEFAULT_SERVICE_PREFIX = '62';

export function getTransferSettings(): TransferSettings {
  const prefix = process.env.QUOTATION_SERVICE_PREFIX?.trim() || DEFAULT_SERVICE_PREFIX;
  if (!/^[0-9]{2}$/.test(prefix)) {
    throw new Error('QUOTATION_SERVICE_PREFIX must be exactly two digits');
  }
  return {
    quotationServicePrefix: prefix,
    batchMaxOrders: parsePositiveInt(process.env.TRANSFER_BATCH_MAX_ORDERS, 100),
    orderLookbackDays: parsePositiveInt(process.env.ORDER_LOOKBACK_DAYS, 14)
  };
}

export function getCatalogSettings(): CatalogSettings {
  return {
    connectTimeoutMs: parsePositiveInt(process.env.CATALOG_CONNECT_TIMEOUT_MS, 10_000),
    statementTimeoutMs: parsePositiveInt(process.env.CATALOG_STATEMENT_TIMEOUT_MS, 30_000)
  };
}
