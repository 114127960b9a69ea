import { Router, type Request, type Response } from 'express';
import { storeIdSchema, storeSchema, storeUpdateSchema } from '../schemas/stores.schema';
import {
  createStore,
  deleteStore,
  listStores,
  openStoreOrderSource,
  updateStore,
  type Store
} from '../services/stores.service';
import { errorMessage } from '../lib/domainError';
import { mapPgErrorToHttp } from '../lib/pgErrors';
import { asyncErrorHandler, storeErrorMap } from '../middleware/validation/errors';

const router = Router();

function presentStore(store: Store) {
  return {
    id: store.id,
    name: store.name,
    shop_url: store.shopUrl,
    is_active: store.isActive,
    created_at: store.createdAt,
    updated_at: store.updatedAt
  };
}

const uniqueName = () => ({ status: 409, body: { success: false, error: 'Store name must be unique.' } });

router.get(
  '/api/stores',
  asyncErrorHandler(async (_req: Request, res: Response) => {
    const stores = await listStores();
    res.json({ success: true, stores: stores.map(presentStore) });
  })
);

router.post('/api/stores', async (req: Request, res: Response) => {
  const parsed = storeSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: parsed.error.flatten() });
  }
  try {
    const store = await createStore(parsed.data);
    return res.status(201).json({ success: true, store: presentStore(store) });
  } catch (error) {
    const mapped = mapPgErrorToHttp(error, { unique: uniqueName });
    if (mapped) {
      return res.status(mapped.status).json(mapped.body);
    }
    console.error(error);
    return res.status(500).json({ success: false, error: 'Failed to create store.' });
  }
});

router.put('/api/stores/:id', async (req: Request, res: Response) => {
  const id = storeIdSchema.safeParse(req.params.id);
  if (!id.success) {
    return res.status(400).json({ success: false, error: 'Invalid store id.' });
  }
  const parsed = storeUpdateSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: parsed.error.flatten() });
  }
  try {
    const store = await updateStore(id.data, parsed.data);
    if (!store) {
      return res.status(404).json({ success: false, error: 'Store not found' });
    }
    return res.json({ success: true, store: presentStore(store) });
  } catch (error) {
    const mapped = mapPgErrorToHttp(error, { unique: uniqueName });
    if (mapped) {
      return res.status(mapped.status).json(mapped.body);
    }
    console.error(error);
    return res.status(500).json({ success: false, error: 'Failed to update store.' });
  }
});

router.delete(
  '/api/stores/:id',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const id = storeIdSchema.safeParse(req.params.id);
    if (!id.success) {
      res.status(400).json({ success: false, error: 'Invalid store id.' });
      return;
    }
    const deleted = await deleteStore(id.data);
    if (!deleted) {
      res.status(404).json({ success: false, error: 'Store not found' });
      return;
    }
    res.json({ success: true, affected_rows: 1 });
  })
);

router.post(
  '/api/stores/:id/test',
  asyncErrorHandler(async (req: Request, res: Response) => {
    const id = storeIdSchema.safeParse(req.params.id);
    if (!id.success) {
      res.status(400).json({ success: false, error: 'Invalid store id.' });
      return;
    }
    const { orderSource } = await openStoreOrderSource(id.data);
    try {
      const message = await orderSource.testConnection();
      res.json({ success: true, message });
    } catch (error) {
      res.json({ success: false, message: errorMessage(error) });
    }
  }, storeErrorMap)
);

export default router;
