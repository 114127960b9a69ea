import { z } from 'zod';

const optionalId = z.number().int().positive().nullable().optional();

export const catalogConnectionSchema = z.object({
  role: z.enum(['primary', 'secondary']),
  host: z.string().min(1).max(255),
  port: z.number().int().min(1).max(65535).default(5432),
  database: z.string().min(1).max(128),
  username: z.string().min(1).max(128),
  password: z.string().max(512).optional()
});

export const customerMappingSchema = z.object({
  store_id: z.number().int().positive(),
  customer_id: z.number().int().positive(),
  business_name: z.string().max(255).nullable().optional()
});

export const quotationDefaultsSchema = z.object({
  store_id: z.number().int().positive(),
  status: z.number().int().nullable().optional(),
  shipper_id: optionalId,
  sales_rep_id: optionalId,
  term_id: optionalId,
  quotation_title_prefix: z.string().max(40).nullable().optional(),
  expiration_days: z.number().int().min(0).max(3650).optional(),
  db_id: z.string().regex(/^[0-9]$/, 'db_id must be a single digit').optional()
});

export const customerSearchQuerySchema = z.object({
  q: z.string().trim().min(1).max(13)
});
