import { z } from 'zod';

// Shared request schemas

export const paginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type PaginationQuery = z.infer<typeof paginationQuerySchema>;

export const numericIdSchema = z.coerce.number().int().positive('Id must be a positive integer');

export const uuidSchema = z.string().uuid('Id must be a valid UUID');

/**
 * Query string booleans arrive as text
 */
export const booleanQuerySchema = z
  .enum(['true', 'false'])
  .transform(value => value === 'true');

export const toOffset = ({ page, limit }: PaginationQuery): number => (page - 1) * limit;
