import { isUniqueViolation } from '../../../lib/pgErrors';
import { parseQuotationNumber, quotationNumberToText } from '../../../lib/numbers';
import { QuotationNumberConflictError } from '../errors';
import type { QuotationDetailRow, QuotationHeader } from '../types';
import type { CatalogQueryable } from './connection';

export const QUOTATION_NUMBER_CONSTRAINT = 'quotations_quotation_number_key';

/**
 * Highest all-digit quotation number under `prefix`. Compared numerically so a sequence that
 * has widened past three digits still sorts after the narrower ones.
 */
export async function selectMaxQuotationNumber(
  client: CatalogQueryable,
  prefix: string
): Promise<bigint | null> {
  const { rows } = await client.query<{ max_number: string | null }>(
    `SELECT MAX(quotation_number::numeric)::text AS max_number
       FROM quotations
      WHERE quotation_number LIKE $1 || '%'
        AND quotation_number ~ '^[0-9]+$'`,
    [prefix]
  );
  const max = rows[0]?.max_number;
  return max ? parseQuotationNumber(max) : null;
}

type ColumnValue = [column: string, value: unknown];

function headerColumns(header: QuotationHeader): ColumnValue[] {
  const columns: ColumnValue[] = [
    ['quotation_number', quotationNumberToText(header.quotationNumber)],
    ['quotation_date', header.quotationDate],
    ['quotation_title', header.quotationTitle],
    ['po_number', header.poNumber],
    ['expiration_date', header.expirationDate],
    ['customer_id', header.customerId],
    ['business_name', header.businessName],
    ['account_no', header.accountNo],
    ['ship_to', header.shipTo],
    ['ship_address1', header.shipAddress1],
    ['ship_address2', header.shipAddress2],
    ['ship_contact', header.shipContact],
    ['ship_city', header.shipCity],
    ['ship_state', header.shipState],
    ['ship_zip_code', header.shipZipCode],
    ['ship_phone_no', header.shipPhoneNo],
    ['total_taxes', header.totalTaxes],
    ['quotation_total', header.quotationTotal]
  ];
  const optional: Array<[string, number | undefined]> = [
    ['status', header.status],
    ['shipper_id', header.shipperId],
    ['sales_rep_id', header.salesRepId],
    ['term_id', header.termId]
  ];
  for (const [column, value] of optional) {
    if (value !== undefined) {
      columns.push([column, value]);
    }
  }
  return columns;
}

const DETAIL_COLUMNS = [
  'quotation_id',
  'line_number',
  'product_id',
  'category_id',
  'sub_category_id',
  'unit_desc',
  'unit_qty',
  'product_sku',
  'product_upc',
  'product_description',
  'item_size',
  'item_weight',
  'item_tax_id',
  'taxable',
  'qty',
  'unit_price',
  'original_price',
  'unit_cost',
  'extended_price',
  'extended_cost',
  'exp_date'
] as const;

function detailValues(quotationId: number, row: QuotationDetailRow): unknown[] {
  return [
    quotationId,
    row.lineNumber,
    row.productId,
    row.categoryId,
    row.subCategoryId,
    row.unitDesc,
    row.unitQty,
    row.productSku,
    row.productUpc,
    row.productDescription,
    row.itemSize,
    row.itemWeight,
    row.itemTaxId,
    row.taxable,
    row.quantity,
    row.unitPrice,
    row.originalPrice,
    row.unitCost,
    row.extendedPrice,
    row.extendedCost,
    row.expDate
  ];
}

function placeholders(count: number, offset = 0): string {
  return Array.from({ length: count }, (_, i) => `$${i + 1 + offset}`).join(', ');
}

/**
 * Header first, then one multi-row insert for the details. Expects to run inside a transaction;
 * a taken quotation number surfaces as QuotationNumberConflictError.
 */
export async function insertQuotationRows(
  client: CatalogQueryable,
  header: QuotationHeader,
  details: QuotationDetailRow[]
): Promise<number> {
  const columns = headerColumns(header);
  let quotationId: number;
  try {
    const { rows } = await client.query<{ quotation_id: number }>(
      `INSERT INTO quotations (${columns.map(([column]) => column).join(', ')})
       VALUES (${placeholders(columns.length)})
       RETURNING quotation_id`,
      columns.map(([, value]) => value)
    );
    const inserted = rows[0];
    if (!inserted) {
      throw new Error('QUOTATION_INSERT_FAILED');
    }
    quotationId = inserted.quotation_id;
  } catch (err) {
    if (isUniqueViolation(err, QUOTATION_NUMBER_CONSTRAINT)) {
      throw new QuotationNumberConflictError(header.quotationNumber.toString());
    }
    throw err;
  }

  if (details.length > 0) {
    const width = DETAIL_COLUMNS.length;
    const tuples = details.map((_, index) => `(${placeholders(width, index * width)})`);
    const params = details.flatMap((row) => detailValues(quotationId, row));
    await client.query(
      `INSERT INTO quotation_details (${DETAIL_COLUMNS.join(', ')})
       VALUES ${tuples.join(',\n              ')}`,
      params
    );
  }
  return quotationId;
}
