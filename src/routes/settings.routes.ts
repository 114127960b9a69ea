import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import {
  inspectCatalog,
  listCatalogCustomers,
  probeCatalog,
  searchCatalogCustomers,
  type CatalogCustomerSummary
} from '../domains/catalog';
import { errorMessage } from '../lib/domainError';
import { mapPgErrorToHttp } from '../lib/pgErrors';
import { asyncErrorHandler, createErrorResponse, type ErrorHandlerMap } from '../middleware/validation/errors';
import {
  catalogConnectionSchema,
  customerMappingSchema,
  customerSearchQuerySchema,
  quotationDefaultsSchema
} from '../schemas/settings.schema';
import { storeIdSchema } from '../schemas/stores.schema';
import {
  listCatalogConnections,
  requireCatalogConnectionConfig,
  saveCatalogConnection,
  type CatalogConnectionSummary
} from '../services/catalogConnections.service';
import {
  getCustomerMapping,
  getQuotationDefaults,
  upsertCustomerMapping,
  upsertQuotationDefaults,
  type CustomerMapping,
  type QuotationDefaults
} from '../services/storeSettings.service';

const router = Router();

const roleSchema = z.enum(['primary', 'secondary']);

const catalogErrorMap: ErrorHandlerMap = {
  CATALOG_NOT_CONFIGURED: (error) => createErrorResponse(404, error.message),
  CATALOG_UNAVAILABLE: (error) => createErrorResponse(502, error.message)
};

const unknownStore = () => ({ status: 404, body: { success: false, error: 'Store not found' } });

function presentConnection(connection: CatalogConnectionSummary) {
  return {
    role: connection.role,
    host: connection.host,
    port: connection.port,
    database: connection.database,
    username: connection.username,
    has_password: connection.hasPassword,
    updated_at: connection.updatedAt
  };
}

function presentMapping(mapping: CustomerMapping) {
  return {
    store_id: mapping.storeId,
    customer_id: mapping.customerId,
    business_name: mapping.businessName,
    updated_at: mapping.updatedAt
  };
}

function presentDefaults(defaults: QuotationDefaults) {
  return {
    store_id: defaults.storeId,
    status: defaults.status,
    shipper_id: defaults.shipperId,
    sales_rep_id: defaults.salesRepId,
    term_id: defaults.termId,
    quotation_title_prefix: defaults.titlePrefix,
    expiration_days: defaults.expirationDays,
    db_id: defaults.dbId
  };
}

function presentCustomer(customer: CatalogCustomerSummary) {
  return {
    customer_id: customer.customerId,
    account_no: customer.accountNo,
    business_name: customer.businessName
  };
}

router.get(
  '/api/catalog-connections',
  asyncErrorHandler(async (_req: Request, res: Response) => {
    const connections = await listCatalogConnections();
    res.json({ success: true, connections: connections.map(presentConnection) });
  })
);

router.post(
  '/api/catalog-connections',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = catalogConnectionSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.flatten() });
      return;
    }
    const connection = await saveCatalogConnection(parsed.data);
    res.json({ success: true, connection: presentConnection(connection) });
  })
);

router.post(
  '/api/catalog-connections/:role/test',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const role = roleSchema.safeParse(req.params.role);
    if (!role.success) {
      res.status(400).json({ success: false, error: 'Invalid connection role.' });
      return;
    }
    const config = await requireCatalogConnectionConfig(role.data);
    try {
      const version = await probeCatalog(config);
      res.json({ success: true, message: `Connected to ${config.database} on ${config.host}`, version });
    } catch (error) {
      res.json({ success: false, message: errorMessage(error) });
    }
  }, catalogErrorMap)
);

router.get(
  '/api/catalog-connections/:role/diagnostics',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const role = roleSchema.safeParse(req.params.role);
    if (!role.success) {
      res.status(400).json({ success: false, error: 'Invalid connection role.' });
      return;
    }
    const config = await requireCatalogConnectionConfig(role.data);
    const diagnostics = await inspectCatalog(config);
    res.json({
      success: true,
      role: role.data,
      item_count: diagnostics.itemCount,
      recent_barcodes: diagnostics.recentBarcodes
    });
  }, catalogErrorMap)
);

router.get(
  '/api/customer-mappings/:storeId',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const storeId = storeIdSchema.safeParse(req.params.storeId);
    if (!storeId.success) {
      res.status(400).json({ success: false, error: 'Invalid store id.' });
      return;
    }
    const mapping = await getCustomerMapping(storeId.data);
    res.json({ success: true, mapping: mapping ? presentMapping(mapping) : null });
  })
);

router.post('/api/customer-mappings', async (req: Request, res: Response) => {
  const parsed = customerMappingSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: parsed.error.flatten() });
  }
  try {
    const mapping = await upsertCustomerMapping(parsed.data);
    return res.json({ success: true, mapping: presentMapping(mapping) });
  } catch (error) {
    const mapped = mapPgErrorToHttp(error, { foreignKey: unknownStore });
    if (mapped) {
      return res.status(mapped.status).json(mapped.body);
    }
    console.error(error);
    return res.status(500).json({ success: false, error: 'Failed to save customer mapping.' });
  }
});

router.get(
  '/api/quotation-defaults/:storeId',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const storeId = storeIdSchema.safeParse(req.params.storeId);
    if (!storeId.success) {
      res.status(400).json({ success: false, error: 'Invalid store id.' });
      return;
    }
    const defaults = await getQuotationDefaults(storeId.data);
    res.json({ success: true, defaults: defaults ? presentDefaults(defaults) : null });
  })
);

router.post('/api/quotation-defaults', async (req: Request, res: Response) => {
  const parsed = quotationDefaultsSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: parsed.error.flatten() });
  }
  try {
    const defaults = await upsertQuotationDefaults(parsed.data);
    return res.json({ success: true, defaults: presentDefaults(defaults) });
  } catch (error) {
    const mapped = mapPgErrorToHttp(error, { foreignKey: unknownStore });
    if (mapped) {
      return res.status(mapped.status).json(mapped.body);
    }
    console.error(error);
    return res.status(500).json({ success: false, error: 'Failed to save quotation defaults.' });
  }
});

router.get(
  '/api/customers',
  asyncErrorHandler(async (_req: Request, res: Response) => {
    const config = await requireCatalogConnectionConfig('primary');
    const customers = await listCatalogCustomers(config);
    res.json({ success: true, customers: customers.map(presentCustomer) });
  }, catalogErrorMap)
);

router.get(
  '/api/customers/search',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const parsed = customerSearchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.flatten() });
      return;
    }
    const config = await requireCatalogConnectionConfig('primary');
    const customers = await searchCatalogCustomers(config, parsed.data.q);
    res.json({ success: true, customers: customers.map(presentCustomer) });
  }, catalogErrorMap)
);

export default router;
