import { v4 as uuidv4 } from 'uuid';
import {
  CatalogNotConfiguredError,
  CatalogUnavailableError,
  QuotationNumberConflictError,
  type CatalogCustomer,
  type CatalogRole
} from '../domains/catalog';
import { normalizeOrderId, OrderSourceError, type Order, type OrderSource } from '../domains/orders';
import { DomainError, errorMessage } from '../lib/domainError';
import { QuotationNumberOverflowError, quotationNumberToText } from '../lib/numbers';
import { updateRequestContext } from '../lib/requestContext';
import {
  TRANSFER_EVENT,
  emitTransferEvent,
  type TransferEventLogger
} from '../observability/transfer.events';
import {
  buildQuotation,
  requireCustomer,
  requireQuotationDefaults,
  resolveQuotationCustomerId,
  type BuiltQuotation
} from './quotationBuilder.service';
import { allocateQuotationNumber, quotationNumberPrefix } from './quotationNumbers.service';
import {
  resolveOrderProducts,
  type MissingProduct,
  type ReconciliationCatalogs,
  type ValidationResult
} from './reconciliation.service';
import type { CustomerMapping, QuotationDefaults, TransferSettingsStore } from './storeSettings.service';
import { DuplicateTransferError, TransferConfigurationError } from './transferErrors';
import type { LedgerWriter, TransferLedger, TransferRecord } from './transferLedger.service';

// One allocation plus one re-allocation after a quotation-number collision.
export const MAX_NUMBER_ATTEMPTS = 2;

export type TransferState = 'recorded' | 'blocked' | 'failed' | 'already_transferred' | 'not_found';

export type TransferErrorKind =
  | 'configuration'
  | 'catalog'
  | 'numbering'
  | 'order_source'
  | 'database'
  | 'duplicate'
  | 'missing_products';

export type TransferOutcome = {
  orderId: string;
  orderName: string | null;
  success: boolean;
  state: TransferState;
  quotationNumber: string | null;
  error: string | null;
  errorKind: TransferErrorKind | null;
  lineItems?: number;
  totalAmount?: number;
  missing?: MissingProduct[];
};

export type TransferSummary = {
  total: number;
  success: number;
  failed: number;
};

export type TransferBatchResult = {
  batchId: string;
  success: boolean;
  summary: TransferSummary;
  results: TransferOutcome[];
};

export type TransferDependencies = {
  orderSource: OrderSource;
  catalogs: ReconciliationCatalogs;
  ledger: TransferLedger;
  settings: TransferSettingsStore;
  /** Two-digit prefix every quotation number starts with. */
  servicePrefix: string;
  now?: () => Date;
  logger?: TransferEventLogger;
};

/** Order id to the customer id that replaces the store mapping for that order only. */
export type CustomerOverrides = Readonly<Record<string, number>>;

type StoreTransferConfig = {
  defaults: QuotationDefaults | null;
  mapping: CustomerMapping | null;
};

/**
 * Everything one batch shares. Store configuration and customer records are loaded on first use
 * and reused by later orders; a failed load is not cached, so the next order tries again.
 */
type BatchContext = {
  readonly batchId: string;
  readonly storeId: number;
  readonly deps: TransferDependencies;
  readonly overrides: ReadonlyMap<string, number>;
  config: StoreTransferConfig | null;
  readonly customers: Map<number, CatalogCustomer>;
};

function classifyError(err: unknown, fallback: TransferErrorKind): TransferErrorKind {
  if (err instanceof TransferConfigurationError) return 'configuration';
  if (err instanceof CatalogUnavailableError || err instanceof CatalogNotConfiguredError) return 'catalog';
  if (err instanceof QuotationNumberConflictError || err instanceof QuotationNumberOverflowError) return 'numbering';
  if (err instanceof DuplicateTransferError) return 'duplicate';
  if (err instanceof OrderSourceError) return 'order_source';
  return fallback;
}

async function catalogCall<T>(role: CatalogRole, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof DomainError) throw err;
    throw new CatalogUnavailableError(role, err);
  }
}

function describeMissing(missing: MissingProduct[]): string {
  const labels = missing.map((item) => (item.barcode !== '' ? item.barcode : `${item.name} (no barcode)`));
  return `Missing products: ${labels.join(', ')}`;
}

function currentTime(ctx: BatchContext): Date {
  return ctx.deps.now ? ctx.deps.now() : new Date();
}

function failedOutcome(
  ctx: BatchContext,
  orderId: string,
  orderName: string | null,
  errorKind: TransferErrorKind,
  error: string
): TransferOutcome {
  emitTransferEvent(
    TRANSFER_EVENT.ORDER_FAILED,
    { batchId: ctx.batchId, storeId: ctx.storeId, orderId, errorKind, error },
    ctx.deps.logger
  );
  return { orderId, orderName, success: false, state: 'failed', quotationNumber: null, error, errorKind };
}

function alreadyTransferred(ctx: BatchContext, orderId: string, existing: TransferRecord): TransferOutcome {
  emitTransferEvent(
    TRANSFER_EVENT.ORDER_SKIPPED,
    { batchId: ctx.batchId, storeId: ctx.storeId, orderId, reason: 'already transferred' },
    ctx.deps.logger
  );
  return {
    orderId,
    orderName: existing.orderName,
    success: false,
    state: 'already_transferred',
    quotationNumber: existing.quotationNumber,
    error: 'Order already transferred',
    errorKind: null
  };
}

/** Writes a failed ledger row. The ledger being unavailable is logged and does not change the outcome. */
async function appendFailure(ctx: BatchContext, ledger: LedgerWriter, order: Order, message: string): Promise<void> {
  try {
    await ledger.append({
      storeId: ctx.storeId,
      orderId: order.id,
      orderName: order.name,
      quotationNumber: null,
      status: 'failed',
      errorMessage: message,
      lineItemsCount: order.lineItems.length,
      totalAmount: order.totalAmount
    });
  } catch (err) {
    emitTransferEvent(
      TRANSFER_EVENT.LEDGER_WRITE_FAILED,
      { batchId: ctx.batchId, storeId: ctx.storeId, orderId: order.id, status: 'failed', error: errorMessage(err) },
      ctx.deps.logger
    );
  }
}

async function recordFailure(
  ctx: BatchContext,
  ledger: LedgerWriter,
  order: Order,
  errorKind: TransferErrorKind,
  message: string
): Promise<TransferOutcome> {
  await appendFailure(ctx, ledger, order, message);
  return failedOutcome(ctx, order.id, order.name, errorKind, message);
}

async function recordBlocked(
  ctx: BatchContext,
  ledger: LedgerWriter,
  order: Order,
  validation: ValidationResult
): Promise<TransferOutcome> {
  const message = describeMissing(validation.missing);
  await appendFailure(ctx, ledger, order, message);
  emitTransferEvent(
    TRANSFER_EVENT.ORDER_BLOCKED,
    {
      batchId: ctx.batchId,
      storeId: ctx.storeId,
      orderId: order.id,
      missingBarcodes: validation.missing.map((item) => item.barcode)
    },
    ctx.deps.logger
  );
  return {
    orderId: order.id,
    orderName: order.name,
    success: false,
    state: 'blocked',
    quotationNumber: null,
    error: message,
    errorKind: 'missing_products',
    missing: validation.missing
  };
}

async function loadStoreConfig(ctx: BatchContext): Promise<StoreTransferConfig> {
  if (ctx.config) {
    return ctx.config;
  }
  const [defaults, mapping] = await Promise.all([
    ctx.deps.settings.getQuotationDefaults(ctx.storeId),
    ctx.deps.settings.getCustomerMapping(ctx.storeId)
  ]);
  ctx.config = { defaults, mapping };
  return ctx.config;
}

async function loadCustomer(ctx: BatchContext, customerId: number): Promise<CatalogCustomer> {
  const cached = ctx.customers.get(customerId);
  if (cached) {
    return cached;
  }
  const primary = ctx.deps.catalogs.primary;
  const customer = requireCustomer(
    await catalogCall(primary.role, () => primary.getCustomer(customerId)),
    customerId
  );
  ctx.customers.set(customerId, customer);
  return customer;
}

/**
 * Allocate, build, insert. A collision on the quotation number gets one fresh allocation; a
 * second collision is returned to the caller.
 */
async function insertWithNumbering(
  ctx: BatchContext,
  orderId: string,
  prefix: string,
  build: (quotationNumber: bigint) => BuiltQuotation
): Promise<BuiltQuotation> {
  const primary = ctx.deps.catalogs.primary;
  for (let attempt = 1; ; attempt += 1) {
    const quotationNumber = await allocateQuotationNumber(primary, prefix);
    const built = build(quotationNumber);
    try {
      await primary.insertQuotation(built.header, built.details);
      return built;
    } catch (err) {
      if (!(err instanceof QuotationNumberConflictError)) {
        throw err;
      }
      emitTransferEvent(
        TRANSFER_EVENT.NUMBER_COLLISION,
        { batchId: ctx.batchId, storeId: ctx.storeId, orderId, quotationNumber: err.quotationNumber, attempt },
        ctx.deps.logger
      );
      if (attempt >= MAX_NUMBER_ATTEMPTS) {
        throw err;
      }
    }
  }
}

async function recordSuccess(
  ctx: BatchContext,
  ledger: LedgerWriter,
  order: Order,
  built: BuiltQuotation
): Promise<TransferOutcome> {
  const quotationNumber = quotationNumberToText(built.header.quotationNumber);
  const lineItems = built.details.length;
  const totalAmount = built.header.quotationTotal;
  try {
    await ledger.append({
      storeId: ctx.storeId,
      orderId: order.id,
      orderName: order.name,
      quotationNumber,
      status: 'success',
      errorMessage: null,
      lineItemsCount: lineItems,
      totalAmount
    });
  } catch (err) {
    emitTransferEvent(
      TRANSFER_EVENT.LEDGER_WRITE_FAILED,
      { batchId: ctx.batchId, storeId: ctx.storeId, orderId: order.id, status: 'success', error: errorMessage(err) },
      ctx.deps.logger
    );
    const outcome = failedOutcome(
      ctx,
      order.id,
      order.name,
      classifyError(err, 'database'),
      `Quotation ${quotationNumber} was created but the transfer was not recorded: ${errorMessage(err)}`
    );
    return { ...outcome, quotationNumber };
  }

  emitTransferEvent(
    TRANSFER_EVENT.ORDER_RECORDED,
    { batchId: ctx.batchId, storeId: ctx.storeId, orderId: order.id, quotationNumber, lineItems, totalAmount },
    ctx.deps.logger
  );
  return {
    orderId: order.id,
    orderName: order.name,
    success: true,
    state: 'recorded',
    quotationNumber,
    error: null,
    errorKind: null,
    lineItems,
    totalAmount
  };
}

/**
 * Runs with the (store, order) lock held. Ledger access goes through `ledger`, which shares the
 * lock's connection; store configuration is loaded before the lock is taken.
 */
async function transferLocked(
  ctx: BatchContext,
  ledger: LedgerWriter,
  order: Order,
  config: StoreTransferConfig
): Promise<TransferOutcome> {
  const { deps } = ctx;

  const existing = await ledger.findSuccess(order.id, ctx.storeId);
  if (existing) {
    return alreadyTransferred(ctx, order.id, existing);
  }

  let validation: ValidationResult;
  try {
    validation = await resolveOrderProducts(order.id, order.lineItems, deps.catalogs, { logger: deps.logger });
  } catch (err) {
    return recordFailure(ctx, ledger, order, classifyError(err, 'catalog'), errorMessage(err));
  }
  if (!validation.valid) {
    return recordBlocked(ctx, ledger, order, validation);
  }

  let built: BuiltQuotation;
  try {
    const defaults = requireQuotationDefaults(config.defaults);
    const customerId = resolveQuotationCustomerId(config.mapping, ctx.overrides.get(order.id));
    const customer = await loadCustomer(ctx, customerId);

    const primary = deps.catalogs.primary;
    const unitIds = validation.lines
      .map((line) => line.product.unitId)
      .filter((unitId): unitId is number => unitId !== null);
    const unitDescriptions = await catalogCall(primary.role, () => primary.getUnitDescriptions(unitIds));

    const now = currentTime(ctx);
    const prefix = quotationNumberPrefix(deps.servicePrefix, defaults.dbId, now.getFullYear());
    built = await insertWithNumbering(ctx, order.id, prefix, (quotationNumber) =>
      buildQuotation({
        order,
        validation,
        customerId,
        customer,
        defaults,
        unitDescriptions,
        quotationNumber,
        now
      })
    );
  } catch (err) {
    return recordFailure(ctx, ledger, order, classifyError(err, 'catalog'), errorMessage(err));
  }

  return recordSuccess(ctx, ledger, order, built);
}

async function transferOne(ctx: BatchContext, orderId: string): Promise<TransferOutcome> {
  const { deps } = ctx;

  let existing: TransferRecord | null;
  try {
    existing = await deps.ledger.findSuccess(orderId, ctx.storeId);
  } catch (err) {
    return failedOutcome(ctx, orderId, null, 'database', errorMessage(err));
  }
  if (existing) {
    return alreadyTransferred(ctx, orderId, existing);
  }

  let order: Order | null;
  try {
    order = await deps.orderSource.getOrder(orderId);
  } catch (err) {
    return failedOutcome(ctx, orderId, null, 'order_source', errorMessage(err));
  }
  if (!order) {
    emitTransferEvent(
      TRANSFER_EVENT.ORDER_SKIPPED,
      { batchId: ctx.batchId, storeId: ctx.storeId, orderId, reason: 'order not found' },
      deps.logger
    );
    return {
      orderId,
      orderName: null,
      success: false,
      state: 'not_found',
      quotationNumber: null,
      error: 'Order not found',
      errorKind: 'order_source'
    };
  }

  const found = order;
  let config: StoreTransferConfig;
  try {
    config = await loadStoreConfig(ctx);
  } catch (err) {
    return recordFailure(ctx, deps.ledger, found, classifyError(err, 'database'), errorMessage(err));
  }

  try {
    return await deps.ledger.withOrderLock(ctx.storeId, found.id, (ledger) => transferLocked(ctx, ledger, found, config));
  } catch (err) {
    return failedOutcome(ctx, found.id, found.name, classifyError(err, 'database'), errorMessage(err));
  }
}

/**
 * Transfers each order in turn. Every order ends in its own outcome; nothing one order does stops
 * the ones after it.
 */
export async function transferOrders(
  storeId: number,
  orderIds: string[],
  deps: TransferDependencies,
  overrides: CustomerOverrides = {}
): Promise<TransferBatchResult> {
  const ctx: BatchContext = {
    batchId: uuidv4(),
    storeId,
    deps,
    overrides: new Map(Object.entries(overrides).map(([orderId, customerId]) => [normalizeOrderId(orderId), customerId])),
    config: null,
    customers: new Map()
  };
  updateRequestContext({ storeId, batchId: ctx.batchId });
  const startedAt = Date.now();
  emitTransferEvent(
    TRANSFER_EVENT.BATCH_STARTED,
    { batchId: ctx.batchId, storeId, orderCount: orderIds.length },
    deps.logger
  );

  const results: TransferOutcome[] = [];
  for (const rawId of orderIds) {
    const orderId = normalizeOrderId(rawId);
    try {
      results.push(await transferOne(ctx, orderId));
    } catch (err) {
      results.push({
        orderId,
        orderName: null,
        success: false,
        state: 'failed',
        quotationNumber: null,
        error: errorMessage(err),
        errorKind: classifyError(err, 'database')
      });
    }
  }

  const success = results.filter((result) => result.success).length;
  const summary: TransferSummary = { total: results.length, success, failed: results.length - success };
  emitTransferEvent(
    TRANSFER_EVENT.BATCH_COMPLETED,
    { batchId: ctx.batchId, storeId, success, failed: summary.failed, durationMs: Date.now() - startedAt },
    deps.logger
  );
  return { batchId: ctx.batchId, success: true, summary, results };
}

export type OrderValidation = {
  order: Order;
  validation: ValidationResult;
};

/**
 * Reconciles one order without writing a quotation. Missing products may still be copied into
 * the primary catalog. Rejects with ORDER_NOT_FOUND.
 */
export async function validateOrder(
  orderId: string,
  deps: Pick<TransferDependencies, 'orderSource' | 'catalogs' | 'logger'>
): Promise<OrderValidation> {
  const order = await deps.orderSource.getOrder(normalizeOrderId(orderId));
  if (!order) {
    throw new Error('ORDER_NOT_FOUND');
  }
  const validation = await resolveOrderProducts(order.id, order.lineItems, deps.catalogs, { logger: deps.logger });
  return { order, validation };
}
