import type { z } from 'zod';
import { query } from '../db';
import { toNullableNumber } from '../lib/numbers';
import type { customerMappingSchema, quotationDefaultsSchema } from '../schemas/settings.schema';

export type CustomerMapping = {
  storeId: number;
  customerId: number;
  businessName: string | null;
  updatedAt: string | null;
};

/**
 * Per-store constants applied to every quotation. A null numeric field means the column is left
 * off the quotation row.
 */
export type QuotationDefaults = {
  storeId: number;
  status: number | null;
  shipperId: number | null;
  salesRepId: number | null;
  termId: number | null;
  titlePrefix: string | null;
  expirationDays: number;
  /** Single digit placed between the service prefix and the year in quotation numbers. */
  dbId: string;
};

export type CustomerMappingInput = z.infer<typeof customerMappingSchema>;
export type QuotationDefaultsInput = z.infer<typeof quotationDefaultsSchema>;

/** What the transfer pipeline reads from store configuration. */
export interface TransferSettingsStore {
  getCustomerMapping(storeId: number): Promise<CustomerMapping | null>;
  getQuotationDefaults(storeId: number): Promise<QuotationDefaults | null>;
}

type CustomerMappingRow = {
  store_id: number;
  customer_id: number;
  business_name: string | null;
  updated_at: Date | null;
};

type QuotationDefaultsRow = {
  store_id: number;
  status: number | null;
  shipper_id: number | null;
  sales_rep_id: number | null;
  term_id: number | null;
  title_prefix: string | null;
  expiration_days: number | string;
  db_id: string;
};

function mapCustomerMapping(row: CustomerMappingRow): CustomerMapping {
  return {
    storeId: row.store_id,
    customerId: row.customer_id,
    businessName: row.business_name,
    updatedAt: row.updated_at ? row.updated_at.toISOString() : null
  };
}

function mapQuotationDefaults(row: QuotationDefaultsRow): QuotationDefaults {
  return {
    storeId: row.store_id,
    status: row.status,
    shipperId: row.shipper_id,
    salesRepId: row.sales_rep_id,
    termId: row.term_id,
    titlePrefix: row.title_prefix,
    expirationDays: toNullableNumber(row.expiration_days) ?? 365,
    dbId: row.db_id.trim()
  };
}

export async function getCustomerMapping(storeId: number): Promise<CustomerMapping | null> {
  const { rows } = await query<CustomerMappingRow>(
    `SELECT store_id, customer_id, business_name, updated_at
       FROM customer_mappings
      WHERE store_id = $1`,
    [storeId]
  );
  return rows[0] ? mapCustomerMapping(rows[0]) : null;
}

export async function upsertCustomerMapping(data: CustomerMappingInput): Promise<CustomerMapping> {
  const { rows } = await query<CustomerMappingRow>(
    `INSERT INTO customer_mappings (store_id, customer_id, business_name, created_at, updated_at)
     VALUES ($1, $2, $3, now(), now())
     ON CONFLICT (store_id) DO UPDATE
        SET customer_id = EXCLUDED.customer_id,
            business_name = EXCLUDED.business_name,
            updated_at = now()
     RETURNING store_id, customer_id, business_name, updated_at`,
    [data.store_id, data.customer_id, data.business_name ?? null]
  );
  return mapCustomerMapping(rows[0]);
}

export async function getQuotationDefaults(storeId: number): Promise<QuotationDefaults | null> {
  const { rows } = await query<QuotationDefaultsRow>(
    `SELECT store_id, status, shipper_id, sales_rep_id, term_id, title_prefix, expiration_days, db_id
       FROM quotation_defaults
      WHERE store_id = $1`,
    [storeId]
  );
  return rows[0] ? mapQuotationDefaults(rows[0]) : null;
}

export async function upsertQuotationDefaults(data: QuotationDefaultsInput): Promise<QuotationDefaults> {
  const { rows } = await query<QuotationDefaultsRow>(
    `INSERT INTO quotation_defaults (
        store_id, status, shipper_id, sales_rep_id, term_id, title_prefix, expiration_days, db_id,
        created_at, updated_at
     ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, now(), now())
     ON CONFLICT (store_id) DO UPDATE
        SET status = EXCLUDED.status,
            shipper_id = EXCLUDED.shipper_id,
            sales_rep_id = EXCLUDED.sales_rep_id,
            term_id = EXCLUDED.term_id,
            title_prefix = EXCLUDED.title_prefix,
            expiration_days = EXCLUDED.expiration_days,
            db_id = EXCLUDED.db_id,
            updated_at = now()
     RETURNING store_id, status, shipper_id, sales_rep_id, term_id, title_prefix, expiration_days, db_id`,
    [
      data.store_id,
      data.status === undefined ? 1 : data.status,
      data.shipper_id ?? null,
      data.sales_rep_id ?? null,
      data.term_id ?? null,
      data.quotation_title_prefix === undefined ? 'Shopify Order' : data.quotation_title_prefix,
      data.expiration_days ?? 365,
      data.db_id ?? '1'
    ]
  );
  return mapQuotationDefaults(rows[0]);
}

export const pgStoreSettings: TransferSettingsStore = {
  getCustomerMapping,
  getQuotationDefaults
};
