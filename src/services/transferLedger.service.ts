import type { QueryResult, QueryResultRow } from 'pg';
import { pool, query } from '../db';
import { toNumber } from '../lib/numbers';
import { isUniqueViolation } from '../lib/pgErrors';
import { DuplicateTransferError } from './transferErrors';

export type TransferStatus = 'success' | 'failed' | 'pending';

export type TransferRecord = {
  id: number;
  storeId: number;
  storeName?: string | null;
  orderId: string;
  orderName: string | null;
  quotationNumber: string | null;
  status: TransferStatus;
  errorMessage: string | null;
  lineItemsCount: number;
  totalAmount: number;
  createdAt: string;
};

export type NewTransferRecord = Omit<TransferRecord, 'id' | 'createdAt' | 'storeName'>;

export type TransferHistoryFilters = {
  storeId?: number;
  status?: TransferStatus | 'all';
  dateFrom?: Date;
  dateTo?: Date;
  limit: number;
  offset: number;
};

export type TransferStats = {
  total: number;
  success: number;
  failed: number;
  pending: number;
};

/** Ledger reads and writes; under the order lock they go through the connection holding it. */
export type LedgerWriter = {
  findSuccess(orderId: string, storeId: number): Promise<TransferRecord | null>;
  /** Rejects with DuplicateTransferError when a second success row would be written. */
  append(record: NewTransferRecord): Promise<TransferRecord>;
};

/** The part of the ledger the transfer pipeline writes through. */
export interface TransferLedger extends LedgerWriter {
  /** Runs `handler` while holding the (store, order) lock; other holders wait. */
  withOrderLock<T>(storeId: number, orderId: string, handler: (ledger: LedgerWriter) => Promise<T>): Promise<T>;
}

type LedgerQueryable = {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
};

const serviceDb: LedgerQueryable = { query };

export const ONE_SUCCESS_PER_ORDER_INDEX = 'transfer_history_one_success_idx';

type TransferRow = {
  id: number | string;
  store_id: number;
  store_name?: string | null;
  order_id: string;
  order_name: string | null;
  quotation_number: string | null;
  status: TransferStatus;
  error_message: string | null;
  line_items_count: number;
  total_amount: string | number;
  created_at: Date;
};

const TRANSFER_COLUMNS = `th.id, th.store_id, th.order_id, th.order_name, th.quotation_number, th.status,
       th.error_message, th.line_items_count, th.total_amount, th.created_at`;

function mapTransferRow(row: TransferRow): TransferRecord {
  return {
    id: toNumber(row.id),
    storeId: row.store_id,
    ...(row.store_name !== undefined ? { storeName: row.store_name } : {}),
    orderId: row.order_id,
    orderName: row.order_name,
    quotationNumber: row.quotation_number,
    status: row.status,
    errorMessage: row.error_message,
    lineItemsCount: row.line_items_count,
    totalAmount: toNumber(row.total_amount),
    createdAt: row.created_at.toISOString()
  };
}

export async function findSuccessfulTransfer(
  orderId: string,
  storeId: number,
  db: LedgerQueryable = serviceDb
): Promise<TransferRecord | null> {
  const { rows } = await db.query<TransferRow>(
    `SELECT ${TRANSFER_COLUMNS}
       FROM transfer_history th
      WHERE th.order_id = $1 AND th.store_id = $2 AND th.status = 'success'
      LIMIT 1`,
    [orderId, storeId]
  );
  return rows[0] ? mapTransferRow(rows[0]) : null;
}

export async function appendTransferRecord(
  record: NewTransferRecord,
  db: LedgerQueryable = serviceDb
): Promise<TransferRecord> {
  try {
    const { rows } = await db.query<TransferRow>(
      `INSERT INTO transfer_history AS th (
          store_id, order_id, order_name, quotation_number, status, error_message,
          line_items_count, total_amount, created_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, now())
       RETURNING ${TRANSFER_COLUMNS}`,
      [
        record.storeId,
        record.orderId,
        record.orderName,
        record.quotationNumber,
        record.status,
        record.errorMessage,
        record.lineItemsCount,
        record.totalAmount
      ]
    );
    const inserted = rows[0];
    if (!inserted) {
      throw new Error('TRANSFER_RECORD_INSERT_FAILED');
    }
    return mapTransferRow(inserted);
  } catch (err) {
    if (isUniqueViolation(err, ONE_SUCCESS_PER_ORDER_INDEX)) {
      throw new DuplicateTransferError(record.storeId, record.orderId);
    }
    throw err;
  }
}

/**
 * Session-level advisory lock keyed on (store id, hash of order id), held on one pooled
 * connection for the duration of `handler`. The handler's ledger runs on that same connection,
 * so a lock holder never waits on the pool. If the unlock fails the connection is discarded
 * instead of returned to the pool, which ends the session and its locks.
 */
export async function withOrderTransferLock<T>(
  storeId: number,
  orderId: string,
  handler: (ledger: LedgerWriter) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  let releaseError: Error | undefined;
  try {
    await client.query('SELECT pg_advisory_lock($1::int, hashtext($2::text))', [storeId, orderId]);
    return await handler({
      findSuccess: (lockedOrderId, lockedStoreId) => findSuccessfulTransfer(lockedOrderId, lockedStoreId, client),
      append: (record) => appendTransferRecord(record, client)
    });
  } finally {
    try {
      await client.query('SELECT pg_advisory_unlock($1::int, hashtext($2::text))', [storeId, orderId]);
    } catch (err) {
      releaseError = err instanceof Error ? err : new Error(String(err));
      console.error(
        JSON.stringify({
          event: 'TRANSFER_LOCK_RELEASE_FAILED',
          storeId,
          orderId,
          error: releaseError.message,
          timestamp: new Date().toISOString()
        })
      );
    }
    client.release(releaseError);
  }
}

export async function listTransferRecords(filters: TransferHistoryFilters): Promise<TransferRecord[]> {
  const params: unknown[] = [];
  const where: string[] = [];
  if (filters.storeId !== undefined) {
    params.push(filters.storeId);
    where.push(`th.store_id = $${params.length}`);
  }
  if (filters.status && filters.status !== 'all') {
    params.push(filters.status);
    where.push(`th.status = $${params.length}`);
  }
  if (filters.dateFrom) {
    params.push(filters.dateFrom);
    where.push(`th.created_at >= $${params.length}`);
  }
  if (filters.dateTo) {
    params.push(filters.dateTo);
    where.push(`th.created_at <= $${params.length}`);
  }
  params.push(filters.limit, filters.offset);
  const { rows } = await query<TransferRow>(
    `SELECT ${TRANSFER_COLUMNS}, s.name AS store_name
       FROM transfer_history th
       LEFT JOIN stores s ON s.id = th.store_id
      ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
      ORDER BY th.created_at DESC, th.id DESC
      LIMIT $${params.length - 1} OFFSET $${params.length}`,
    params
  );
  return rows.map(mapTransferRow);
}

export async function getTransferStats(storeId?: number): Promise<TransferStats> {
  const { rows } = await query<{ total: string; success: string; failed: string; pending: string }>(
    `SELECT COUNT(*)::text AS total,
            COUNT(*) FILTER (WHERE status = 'success')::text AS success,
            COUNT(*) FILTER (WHERE status = 'failed')::text AS failed,
            COUNT(*) FILTER (WHERE status = 'pending')::text AS pending
       FROM transfer_history
      WHERE ($1::int IS NULL OR store_id = $1::int)`,
    [storeId ?? null]
  );
  const row = rows[0];
  return {
    total: toNumber(row?.total),
    success: toNumber(row?.success),
    failed: toNumber(row?.failed),
    pending: toNumber(row?.pending)
  };
}

export async function deleteTransferRecord(id: number): Promise<boolean> {
  const result = await query('DELETE FROM transfer_history WHERE id = $1', [id]);
  return (result.rowCount ?? 0) > 0;
}

export async function deleteFailedTransfers(storeId?: number | null): Promise<number> {
  const result = await query(
    `DELETE FROM transfer_history
      WHERE status = 'failed'
        AND ($1::int IS NULL OR store_id = $1::int)`,
    [storeId ?? null]
  );
  return result.rowCount ?? 0;
}

export async function findTransferredOrderIds(storeId: number, orderIds: string[]): Promise<Set<string>> {
  if (orderIds.length === 0) {
    return new Set();
  }
  const { rows } = await query<{ order_id: string }>(
    `SELECT DISTINCT order_id
       FROM transfer_history
      WHERE store_id = $1 AND status = 'success' AND order_id = ANY($2::text[])`,
    [storeId, orderIds]
  );
  return new Set(rows.map((row) => row.order_id));
}

export const pgTransferLedger: TransferLedger = {
  findSuccess: (orderId, storeId) => findSuccessfulTransfer(orderId, storeId),
  append: (record) => appendTransferRecord(record),
  withOrderLock: withOrderTransferLock
};
