import { Router, type Request, type Response } from 'express';
import { getTransferSettings } from '../config/transferSettings';
import type { Order } from '../domains/orders';
import { asyncErrorHandler, createErrorResponse, storeErrorMap, type ErrorHandlerMap } from '../middleware/validation/errors';
import { ordersQuerySchema, transferOrdersSchema, validateOrderSchema } from '../schemas/orders.schema';
import { loadTransferCatalogs } from '../services/catalogConnections.service';
import type { ValidationResult } from '../services/reconciliation.service';
import { openStoreOrderSource } from '../services/stores.service';
import { findTransferredOrderIds } from '../services/transferLedger.service';
import { buildTransferDependencies } from '../services/transferRuntime.service';
import { transferOrders, validateOrder, type TransferOutcome } from '../services/transfers.service';

const router = Router();

const DAY_MS = 24 * 60 * 60 * 1000;

const orderErrorMap: ErrorHandlerMap = {
  ...storeErrorMap,
  ORDER_NOT_FOUND: () => createErrorResponse(404, 'Order not found'),
  ORDER_SOURCE_ERROR: (error) => createErrorResponse(502, error.message),
  CATALOG_NOT_CONFIGURED: (error) => createErrorResponse(409, error.message),
  CATALOG_UNAVAILABLE: (error) => createErrorResponse(502, error.message)
};

function presentOrder(order: Order, transferred: boolean) {
  const address = order.shippingAddress;
  return {
    id: order.id,
    gid: order.gid,
    name: order.name,
    created_at: order.createdAt,
    fulfillment_status: order.fulfillmentStatus,
    note: order.note,
    total_amount: order.totalAmount,
    currency: order.currency,
    customer: order.customer,
    shipping_address: address
      ? {
          first_name: address.firstName,
          last_name: address.lastName,
          company: address.company,
          address1: address.address1,
          address2: address.address2,
          city: address.city,
          province: address.province,
          province_code: address.provinceCode,
          zip: address.zip,
          country: address.country,
          country_code: address.countryCode,
          phone: address.phone
        }
      : null,
    line_items: order.lineItems.map((item) => ({
      id: item.id,
      name: item.name,
      quantity: item.quantity,
      barcode: item.barcode,
      sku: item.sku,
      price: item.unitPrice,
      variant_title: item.variantTitle,
      product_title: item.productTitle
    })),
    line_items_count: order.lineItems.length,
    transferred
  };
}

function presentValidation(validation: ValidationResult) {
  return {
    valid: validation.valid,
    products: validation.lines.map((line) => ({
      barcode: line.product.barcode,
      product_id: line.product.productId,
      description: line.product.description,
      name: line.lineItem.name,
      quantity: line.lineItem.quantity,
      price: line.lineItem.unitPrice,
      source: line.source
    })),
    copied: validation.copied,
    missing: validation.missing,
    diagnostics: {
      barcodes_searched: validation.diagnostics.barcodesSearched,
      primary_found: validation.diagnostics.primaryFound,
      secondary_queried: validation.diagnostics.secondaryQueried,
      secondary_found: validation.diagnostics.secondaryFound
    }
  };
}

function presentOutcome(outcome: TransferOutcome) {
  return {
    order_id: outcome.orderId,
    order_name: outcome.orderName,
    success: outcome.success,
    state: outcome.state,
    quotation_number: outcome.quotationNumber,
    error: outcome.error,
    error_kind: outcome.errorKind,
    ...(outcome.lineItems !== undefined ? { line_items: outcome.lineItems } : {}),
    ...(outcome.totalAmount !== undefined ? { total_amount: outcome.totalAmount } : {}),
    ...(outcome.missing ? { missing: outcome.missing } : {})
  };
}

router.get(
  '/api/orders',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = ordersQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.flatten() });
      return;
    }
    const { store_id: storeId, days_back: daysBack, cursor, limit } = parsed.data;
    const { orderSource } = await openStoreOrderSource(storeId);
    const since = new Date(Date.now() - (daysBack ?? getTransferSettings().orderLookbackDays) * DAY_MS);
    const page = await orderSource.fetchUnfulfilled(since, { cursor, limit });
    const transferred = await findTransferredOrderIds(
      storeId,
      page.orders.map((order) => order.id)
    );
    res.json({
      success: true,
      orders: page.orders.map((order) => presentOrder(order, transferred.has(order.id))),
      page_info: { has_next_page: page.pageInfo.hasNextPage, end_cursor: page.pageInfo.endCursor },
      total_fetched: page.orders.length
    });
  }, orderErrorMap)
);

router.post(
  '/api/orders/validate',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = validateOrderSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.flatten() });
      return;
    }
    const { orderSource } = await openStoreOrderSource(parsed.data.store_id);
    const catalogs = await loadTransferCatalogs();
    const { order, validation } = await validateOrder(parsed.data.order_id, { orderSource, catalogs });
    res.json({ success: true, order_name: order.name, validation: presentValidation(validation) });
  }, orderErrorMap)
);

router.post(
  '/api/orders/transfer',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = transferOrdersSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.flatten() });
      return;
    }
    const { store_id: storeId, order_ids: orderIds, custom_customers: overrides } = parsed.data;
    const maxOrders = getTransferSettings().batchMaxOrders;
    if (orderIds.length > maxOrders) {
      res.status(400).json({ success: false, error: `At most ${maxOrders} orders can be transferred at once.` });
      return;
    }
    const { deps } = await buildTransferDependencies(storeId);
    const batch = await transferOrders(storeId, orderIds, deps, overrides ?? {});
    res.json({
      success: batch.success,
      batch_id: batch.batchId,
      summary: batch.summary,
      results: batch.results.map(presentOutcome)
    });
  }, orderErrorMap)
);

export default router;
