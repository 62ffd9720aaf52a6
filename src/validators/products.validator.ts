import { z } from 'zod';

export const productIdSchema = z.string().uuid();

export const productInputSchema = z.object({
  name: z.string().min(1).max(100),
  description: z.string().max(500).nullish().transform(value => value ?? null),
  price: z.number().positive(),
  category: z.string().min(1).max(50),
});

export const listProductsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  category: z.string().max(50).optional(),
});

export type ProductInput = z.infer<typeof productInputSchema>;
export type ListProductsQuery = z.infer<typeof listProductsQuerySchema>;
