import { requestLogFields } from '../lib/requestContext';

export const TRANSFER_EVENT = {
  BATCH_STARTED: 'TRANSFER_BATCH_STARTED',
  BATCH_COMPLETED: 'TRANSFER_BATCH_COMPLETED',
  ORDER_SKIPPED: 'TRANSFER_ORDER_SKIPPED',
  ORDER_BLOCKED: 'TRANSFER_ORDER_BLOCKED',
  ORDER_FAILED: 'TRANSFER_ORDER_FAILED',
  ORDER_RECORDED: 'TRANSFER_ORDER_RECORDED',
  LEDGER_WRITE_FAILED: 'TRANSFER_LEDGER_WRITE_FAILED',
  NUMBER_COLLISION: 'QUOTATION_NUMBER_COLLISION',
  RECONCILIATION_COMPLETED: 'RECONCILIATION_COMPLETED',
  PRODUCT_COPIED: 'RECONCILIATION_PRODUCT_COPIED',
  PRODUCT_COPY_FAILED: 'RECONCILIATION_PRODUCT_COPY_FAILED'
} as const;

export type TransferEventName = (typeof TRANSFER_EVENT)[keyof typeof TRANSFER_EVENT];

type OrderRef = {
  batchId?: string;
  storeId: number;
  orderId: string;
};

export type TransferEventPayloadMap = {
  [TRANSFER_EVENT.BATCH_STARTED]: { batchId: string; storeId: number; orderCount: number };
  [TRANSFER_EVENT.BATCH_COMPLETED]: {
    batchId: string;
    storeId: number;
    success: number;
    failed: number;
    durationMs: number;
  };
  [TRANSFER_EVENT.ORDER_SKIPPED]: OrderRef & { reason: string };
  [TRANSFER_EVENT.ORDER_BLOCKED]: OrderRef & { missingBarcodes: string[] };
  [TRANSFER_EVENT.ORDER_FAILED]: OrderRef & { errorKind: string; error: string };
  [TRANSFER_EVENT.ORDER_RECORDED]: OrderRef & {
    quotationNumber: string;
    lineItems: number;
    totalAmount: number;
  };
  [TRANSFER_EVENT.LEDGER_WRITE_FAILED]: OrderRef & { status: string; error: string };
  [TRANSFER_EVENT.NUMBER_COLLISION]: OrderRef & { quotationNumber: string; attempt: number };
  [TRANSFER_EVENT.RECONCILIATION_COMPLETED]: {
    orderId: string;
    valid: boolean;
    resolved: number;
    copied: number;
    missing: number;
    barcodesSearched: number;
    primaryFound: number;
    secondaryQueried: boolean;
    secondaryFound: number;
  };
  [TRANSFER_EVENT.PRODUCT_COPIED]: { orderId: string; barcode: string; productId: number | null };
  [TRANSFER_EVENT.PRODUCT_COPY_FAILED]: { orderId: string; barcode: string; error: string };
};

export type TransferEventLogger = (eventName: string, payload: object) => void;

const WARN_EVENTS = new Set<string>([
  TRANSFER_EVENT.ORDER_BLOCKED,
  TRANSFER_EVENT.NUMBER_COLLISION,
  TRANSFER_EVENT.PRODUCT_COPY_FAILED
]);
const ERROR_EVENTS = new Set<string>([TRANSFER_EVENT.ORDER_FAILED, TRANSFER_EVENT.LEDGER_WRITE_FAILED]);

/**
 * Writes one JSON line per event, tagged with the current request's id, user, store and batch.
 */
export const jsonLineLogger: TransferEventLogger = (eventName, payload) => {
  const line = JSON.stringify({
    event: eventName,
    ...requestLogFields(),
    ...payload,
    timestamp: new Date().toISOString()
  });
  if (ERROR_EVENTS.has(eventName)) {
    console.error(line);
  } else if (WARN_EVENTS.has(eventName)) {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export function emitTransferEvent<T extends TransferEventName>(
  event: T,
  payload: TransferEventPayloadMap[T],
  logger: TransferEventLogger = jsonLineLogger
): void {
  logger(event, payload);
}
