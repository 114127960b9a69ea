import { z } from 'zod';

export const storeSchema = z.object({
  name: z.string().min(1).max(255),
  shop_url: z.string().min(1).max(255),
  admin_api_token: z.string().min(1).max(512),
  is_active: z.boolean().optional()
});

export const storeUpdateSchema = z.object({
  name: z.string().min(1).max(255).optional(),
  shop_url: z.string().min(1).max(255).optional(),
  admin_api_token: z.string().min(1).max(512).optional(),
  is_active: z.boolean().optional()
});

export const storeIdSchema = z.coerce.number().int().positive();
