import { Router, type Request, type Response } from 'express';
import { asyncErrorHandler, historyErrorMap } from '../middleware/validation/errors';
import {
  deleteFailedSchema,
  historyQuerySchema,
  historyStatsQuerySchema,
  transferIdSchema
} from '../schemas/history.schema';
import {
  deleteFailedTransfers,
  deleteTransferRecord,
  getTransferStats,
  listTransferRecords,
  type TransferRecord
} from '../services/transferLedger.service';

const router = Router();

function presentRecord(record: TransferRecord) {
  return {
    id: record.id,
    store_id: record.storeId,
    store_name: record.storeName ?? null,
    order_id: record.orderId,
    order_name: record.orderName,
    quotation_number: record.quotationNumber,
    status: record.status,
    error_message: record.errorMessage,
    line_items_count: record.lineItemsCount,
    total_amount: record.totalAmount,
    created_at: record.createdAt
  };
}

router.get(
  '/api/history',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.flatten() });
      return;
    }
    const { store_id, status, date_from, date_to, limit, offset } = parsed.data;
    const records = await listTransferRecords({
      storeId: store_id,
      status,
      dateFrom: date_from,
      dateTo: date_to,
      limit,
      offset
    });
    res.json({ success: true, history: records.map(presentRecord), count: records.length, limit, offset });
  })
);

router.get(
  '/api/history/stats',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = historyStatsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.flatten() });
      return;
    }
    const stats = await getTransferStats(parsed.data.store_id);
    res.json({ success: true, stats });
  })
);

router.delete(
  '/api/history/:id',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const id = transferIdSchema.safeParse(req.params.id);
    if (!id.success) {
      res.status(400).json({ success: false, error: 'Invalid transfer id.' });
      return;
    }
    const deleted = await deleteTransferRecord(id.data);
    if (!deleted) {
      throw new Error('TRANSFER_RECORD_NOT_FOUND');
    }
    res.json({ success: true, affected_rows: 1 });
  }, historyErrorMap)
);

router.post(
  '/api/history/delete-failed',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = deleteFailedSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.flatten() });
      return;
    }
    const affected = await deleteFailedTransfers(parsed.data.store_id);
    res.json({ success: true, affected_rows: affected });
  })
);

export default router;
