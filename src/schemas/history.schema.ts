import { z } from 'zod';

export const historyQuerySchema = z.object({
  store_id: z.coerce.number().int().positive().optional(),
  status: z.enum(['success', 'failed', 'pending', 'all']).default('all'),
  date_from: z.coerce.date().optional(),
  date_to: z.coerce.date().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0)
});

export const historyStatsQuerySchema = z.object({
  store_id: z.coerce.number().int().positive().optional()
});

export const deleteFailedSchema = z.object({
  store_id: z.number().int().positive().nullable().optional()
});

export const transferIdSchema = z.coerce.number().int().positive();
