import type { CatalogCustomer, CatalogCustomerSummary } from '../types';
import type { CatalogQueryable } from './connection';

type CustomerRow = {
  customer_id: number;
  account_no: string | null;
  business_name: string | null;
  contact_name: string | null;
  sales_rep_id: number | null;
  term_id: number | null;
};

const CUSTOMER_LIST_LIMIT = 500;
const CUSTOMER_SEARCH_LIMIT = 10;

function mapCustomerRow(row: CustomerRow): CatalogCustomer {
  return {
    customerId: row.customer_id,
    accountNo: row.account_no,
    businessName: row.business_name,
    contactName: row.contact_name,
    salesRepId: row.sales_rep_id,
    termId: row.term_id
  };
}

export async function selectCustomer(
  client: CatalogQueryable,
  customerId: number
): Promise<CatalogCustomer | null> {
  const { rows } = await client.query<CustomerRow>(
    `SELECT customer_id, account_no, business_name, contact_name, sales_rep_id, term_id
       FROM customers
      WHERE customer_id = $1`,
    [customerId]
  );
  return rows[0] ? mapCustomerRow(rows[0]) : null;
}

export async function selectActiveCustomers(client: CatalogQueryable): Promise<CatalogCustomerSummary[]> {
  const { rows } = await client.query<Pick<CustomerRow, 'customer_id' | 'account_no' | 'business_name'>>(
    `SELECT customer_id, account_no, business_name
       FROM customers
      WHERE discontinued = false
      ORDER BY business_name
      LIMIT $1`,
    [CUSTOMER_LIST_LIMIT]
  );
  return rows.map((row) => ({
    customerId: row.customer_id,
    accountNo: row.account_no,
    businessName: row.business_name
  }));
}

/** Partial, case-insensitive match on the account number. */
export async function searchCustomersByAccount(
  client: CatalogQueryable,
  term: string
): Promise<CatalogCustomerSummary[]> {
  const escaped = term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
  const { rows } = await client.query<Pick<CustomerRow, 'customer_id' | 'account_no' | 'business_name'>>(
    `SELECT customer_id, account_no, business_name
       FROM customers
      WHERE discontinued = false
        AND account_no ILIKE '%' || $1 || '%'
      ORDER BY account_no
      LIMIT $2`,
    [escaped, CUSTOMER_SEARCH_LIMIT]
  );
  return rows.map((row) => ({
    customerId: row.customer_id,
    accountNo: row.account_no,
    businessName: row.business_name
  }));
}
