import { z } from 'zod';
import { ORDER_LIMITS, ORDER_RATING, ORDER_STATUSES } from '../../constants';
import { paginationQuerySchema } from '../../utils/validation';

// Validation schemas for the Orders module
export const orderLineSchema = z.object({
  product_id: z.number().int().positive(),
  quantity: z
    .number()
    .int('Quantity must be an integer')
    .min(1, 'Quantity must be at least 1')
    .max(ORDER_LIMITS.MAX_ITEM_QUANTITY, `Quantity must be at most ${ORDER_LIMITS.MAX_ITEM_QUANTITY}`),
});

export const createOrderSchema = z.object({
  items: z.array(orderLineSchema).min(1, 'An order needs at least one item'),
  notes: z.string().trim().max(255).nullish(),
  user_id: z.string().uuid().optional(),
});

export const transitionSchema = z.object({
  status: z.enum(ORDER_STATUSES),
  notes: z.string().trim().max(255).nullish(),
  reason: z.string().trim().max(500).nullish(),
});

export const updateItemSchema = orderLineSchema.pick({ quantity: true });

export const ratingSchema = z.object({
  rating: z.number().int().min(ORDER_RATING.MIN).max(ORDER_RATING.MAX),
});

export const listOrdersQuerySchema = paginationQuerySchema.extend({
  status: z.enum(ORDER_STATUSES).optional(),
});
