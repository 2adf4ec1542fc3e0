/**
 * Request validation and response schemas for the flower API. The same
 * schemas feed the OpenAPI document.
 */

import { z } from './zod';
import { STOCK_MAX } from '@/services/flower.service';

const SEED_EXAMPLE_ID = '550e8400-e29b-41d4-a716-446655440001';

// PostgreSQL text columns cannot store U+0000
const text = () =>
  z.string().refine(value => !value.includes('\u0000'), { message: 'Must not contain NUL characters' });

export const FlowerIdParamsSchema = z.object({
  id: z
    .string()
    .uuid()
    .openapi({ param: { name: 'id', in: 'path' }, example: SEED_EXAMPLE_ID }),
});

export const CreateFlowerSchema = z
  .object({
    name: text().openapi({ description: 'Flower name (max 100 characters)', example: 'Rose' }),
    color: text().openapi({ description: 'Flower color (max 50 characters)', example: 'red' }),
    description: text().nullable().optional().openapi({ example: 'A beautiful red rose' }),
    price: z.number().finite().nonnegative().optional().openapi({ description: 'Price in IDR', example: 25000 }),
    stock: z
      .number()
      .int()
      .min(0)
      .max(STOCK_MAX)
      .optional()
      .openapi({ description: 'Initial stock quantity', example: 100 }),
  })
  .openapi('CreateFlowerRequest');

export const UpdateFlowerSchema = z
  .object({
    name: text().optional().openapi({ example: 'Red Rose' }),
    color: text().optional(),
    description: text().nullable().optional().openapi({ description: 'null clears the description' }),
    price: z.number().finite().nonnegative().optional().openapi({ example: 30000 }),
    stock: z.number().int().min(0).max(STOCK_MAX).optional().openapi({ example: 150 }),
  })
  .openapi('UpdateFlowerRequest');

export const StockAdjustmentSchema = z
  .object({
    action: z.enum(['add', 'reduce']).openapi({ example: 'reduce' }),
    quantity: z.number().int().positive().max(STOCK_MAX).openapi({ example: 5 }),
  })
  .openapi('StockAdjustmentRequest');

export const ListFlowersQuerySchema = z.object({
  page: z.string().optional().openapi({ description: 'Page number (default: 1)', example: '1' }),
  per_page: z
    .string()
    .optional()
    .openapi({ description: 'Items per page, 1 to 100 (default: 10)', example: '10' }),
  search: text().optional().openapi({ description: 'Case-insensitive substring of the name' }),
  color: text().optional().openapi({ description: 'Exact color, case-insensitive', example: 'white' }),
});

export const FlowerFiltersSchema = ListFlowersQuerySchema.pick({ search: true, color: true });

export const FlowerResponseSchema = z
  .object({
    id: z.string().uuid().openapi({ example: SEED_EXAMPLE_ID }),
    name: z.string().openapi({ example: 'Rose' }),
    color: z.string().openapi({ example: 'red' }),
    description: z.string().nullable().openapi({ example: 'A beautiful red rose' }),
    price: z.number().openapi({ example: 25000 }),
    stock: z.number().int().openapi({ example: 100 }),
    created_at: z.string().datetime().openapi({ example: '2024-12-11T00:00:00.000Z' }),
    updated_at: z.string().datetime().openapi({ example: '2024-12-11T00:00:00.000Z' }),
  })
  .openapi('FlowerResponse');

export const PaginatedFlowerResponseSchema = z
  .object({
    data: z.array(FlowerResponseSchema),
    total: z.number().int(),
    page: z.number().int(),
    per_page: z.number().int(),
    total_pages: z.number().int(),
  })
  .openapi('PaginatedFlowerResponse');

export const ApiResponseFlowerSchema = z
  .object({
    success: z.literal(true),
    data: FlowerResponseSchema,
    message: z.string().optional(),
  })
  .openapi('ApiResponseFlower');

export const ApiResponsePaginatedFlowerSchema = z
  .object({
    success: z.literal(true),
    data: PaginatedFlowerResponseSchema,
  })
  .openapi('ApiResponsePaginatedFlower');

export const HealthResponseSchema = z
  .object({
    success: z.literal(true),
    data: z.literal('OK'),
  })
  .openapi('HealthResponse');

export const ErrorResponseSchema = z
  .object({
    success: z.literal(false),
    error: z.string().openapi({ example: `Flower not found with id: ${SEED_EXAMPLE_ID}` }),
    details: z
      .array(z.object({ field: z.string(), message: z.string() }))
      .optional(),
  })
  .openapi('ErrorResponse');
