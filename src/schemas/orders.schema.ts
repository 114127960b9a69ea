import { z } from 'zod';

const orderIdSchema = z.union([z.string().trim().min(1).max(255), z.number().int().positive()]).transform(String);

export const ordersQuerySchema = z.object({
  store_id: z.coerce.number().int().positive(),
  days_back: z.coerce.number().int().min(1).max(365).optional(),
  cursor: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(250).optional()
});

export const validateOrderSchema = z.object({
  store_id: z.number().int().positive(),
  order_id: orderIdSchema
});

export const transferOrdersSchema = z.object({
  store_id: z.number().int().positive(),
  order_ids: z.array(orderIdSchema).min(1),
  custom_customers: z.record(z.string(), z.coerce.number().int().positive()).optional()
});
